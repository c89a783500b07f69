/**
 * Structured logging for errata
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  passId?: string;
  frameId?: string;
  nodeId?: string;
  component?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'errata',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Structured event logging for invocation frames
export function logFrameTransition(
  frameId: string,
  fromState: string,
  toState: string,
  operation: string
): void {
  getLogger().debug(
    {
      event: 'frame_transition',
      frameId,
      fromState,
      toState,
      operation,
    },
    `Frame transition: ${fromState} -> ${toState}`
  );
}

export function logPassCompleted(
  passId: string,
  status: string,
  resumedFrames: number,
  failedFrames: number,
  durationMs: number
): void {
  getLogger().info(
    {
      event: 'pass_completed',
      passId,
      status,
      resumedFrames,
      failedFrames,
      durationMs,
    },
    `Propagation pass ${status}: ${resumedFrames} frame(s) resumed${failedFrames ? `, ${failedFrames} failed` : ''}`
  );
}

export function logLLMCall(
  engine: string,
  model: string,
  structured: boolean,
  durationMs?: number
): void {
  getLogger().info(
    {
      event: 'llm_call',
      engine,
      model,
      structured,
      durationMs,
    },
    `LLM ${structured ? 'structured' : 'text'} call on ${engine}${durationMs ? ` completed in ${durationMs}ms` : ''}`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
