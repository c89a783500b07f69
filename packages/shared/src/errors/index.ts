/**
 * Custom error hierarchy for errata
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'LLM'
  | 'GRAPH'
  | 'PROPAGATION'
  | 'STATE_MACHINE'
  | 'RECONSTRUCTION'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  passId?: string;
  frameId?: string;
  nodeId?: string;
  [key: string]: unknown;
}

/**
 * Base error class for errata
 */
export class ErrataError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ErrataError';
    this.code = code;
    this.context = {
      ...context,
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (caller input, correction payloads)
 */
export class ValidationError extends ErrataError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * LLM capability errors
 */
export class LLMError extends ErrataError {
  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {},
    options?: { cause?: unknown }
  ) {
    super(
      message,
      code,
      {
        category: 'LLM',
        severity: 'MEDIUM',
        retryable: true,
        ...context,
      },
      options
    );
    this.name = 'LLMError';
  }
}

export class LLMRateLimitError extends LLMError {
  public readonly retryAfterMs: number;

  constructor(retryAfterMs: number, context: Partial<ErrorContext> = {}) {
    super('LLM provider rate limit exceeded', 'E2001', {
      severity: 'MEDIUM',
      retryable: true,
      ...context,
    });
    this.name = 'LLMRateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class LLMTimeoutError extends LLMError {
  constructor(timeoutMs: number, context: Partial<ErrorContext> = {}) {
    super(`LLM call timed out after ${timeoutMs}ms`, 'E2002', {
      severity: 'MEDIUM',
      retryable: true,
      ...context,
    });
    this.name = 'LLMTimeoutError';
  }
}

export class LLMResponseError extends LLMError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2003', {
      severity: 'MEDIUM',
      retryable: true,
      ...context,
    });
    this.name = 'LLMResponseError';
  }
}

/**
 * Propagation errors
 */
export class ForwardFailureError extends ErrataError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown, context: Partial<ErrorContext> = {}) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Forward phase of '${operation}' failed: ${reason}`,
      'E3001',
      {
        category: 'PROPAGATION',
        severity: 'MEDIUM',
        retryable: isRetryableError(cause),
        ...context,
      },
      { cause }
    );
    this.name = 'ForwardFailureError';
    this.operation = operation;
  }
}

export class BackwardFailureError extends ErrataError {
  public readonly frameId: string;
  public readonly nodeId: string;

  constructor(frameId: string, nodeId: string, cause: unknown, context: Partial<ErrorContext> = {}) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Backward phase of frame ${frameId} failed: ${reason}`,
      'E3002',
      {
        category: 'PROPAGATION',
        severity: 'MEDIUM',
        retryable: false,
        frameId,
        nodeId,
        ...context,
      },
      { cause }
    );
    this.name = 'BackwardFailureError';
    this.frameId = frameId;
    this.nodeId = nodeId;
  }
}

/**
 * Graph errors
 */
export class GraphError extends ErrataError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'GRAPH',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'GraphError';
  }
}

export class CycleDetectedError extends GraphError {
  public readonly path: string[];

  constructor(path: string[], context: Partial<ErrorContext> = {}) {
    super(`Producer relation closes a cycle: ${path.join(' -> ')}`, 'E4001', {
      severity: 'CRITICAL',
      ...context,
    });
    this.name = 'CycleDetectedError';
    this.path = path;
  }
}

/**
 * State machine errors
 */
export class StateMachineError extends ErrataError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'STATE_MACHINE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'StateMachineError';
  }
}

export class InvalidTransitionError extends StateMachineError {
  constructor(fromState: string, toState: string, context: Partial<ErrorContext> = {}) {
    super(`Invalid state transition: ${fromState} -> ${toState}`, 'E5001', {
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Module reconstruction errors
 */
export class ReconstructionFailureError extends ErrataError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'RECONSTRUCTION',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'ReconstructionFailureError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends ErrataError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E7001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ErrataError) {
    return error.context.retryable;
  }
  return false;
}
