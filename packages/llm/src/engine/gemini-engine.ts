/**
 * Gemini Engine
 * Uses @google/genai SDK
 * Includes OpenTelemetry tracing and progressive-backoff retries
 */

import { GoogleGenAI, type GenerateContentConfig } from '@google/genai';
import { trace, SpanStatusCode } from '@opentelemetry/api';
import {
  LLMError,
  LLMRateLimitError,
  LLMResponseError,
  LLMTimeoutError,
  getConfig,
  isJsonObject,
  isRetryableError,
  logLLMCall,
} from '@errata/shared';
import {
  DEFAULT_PROGRESSIVE_BACKOFF,
  type GenerateRequest,
  type GenerateResult,
  type ProgressiveBackoffConfig,
  type TokenUsage,
} from '../types.js';
import { sleep } from '../utils/sleep.js';
import { BaseEngine } from './base-engine.js';

export interface GeminiEngineConfig {
  apiKey: string;
  name?: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  maxRetries?: number;
  requestTimeoutMs?: number;
  backoff?: Partial<ProgressiveBackoffConfig>;
}

// OpenTelemetry tracer for LLM call observability
const tracer = trace.getTracer('errata-llm', '0.1.0');

export class GeminiEngine extends BaseEngine {
  readonly model: string;
  private client: GoogleGenAI;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private readonly maxRetries: number;
  private readonly requestTimeoutMs: number;
  private readonly backoff: ProgressiveBackoffConfig;

  constructor(config: GeminiEngineConfig) {
    super(config.name ?? 'gemini');
    const defaults = getConfig().llm;

    this.model = config.model ?? defaults.model;
    this.temperature = config.temperature ?? defaults.temperature;
    this.maxOutputTokens = config.maxOutputTokens ?? defaults.maxOutputTokens;
    this.maxRetries = config.maxRetries ?? defaults.maxRetries;
    this.requestTimeoutMs = config.requestTimeoutMs ?? defaults.requestTimeoutMs;
    this.backoff = { ...DEFAULT_PROGRESSIVE_BACKOFF, ...config.backoff };

    this.client = new GoogleGenAI({
      apiKey: config.apiKey,
      httpOptions: {
        timeout: this.requestTimeoutMs,
      },
    });

    this.logger.info(
      {
        model: this.model,
        timeout: this.requestTimeoutMs,
        maxRetries: this.maxRetries,
      },
      'GeminiEngine initialized'
    );
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    return tracer.startActiveSpan('llm.generate', async (span) => {
      span.setAttribute('llm.engine', this.name);
      span.setAttribute('llm.model', this.model);
      span.setAttribute('llm.structured', request.json);
      span.setAttribute('llm.max_retries', this.maxRetries);

      let lastError: LLMError = new LLMError('No attempt was made', 'E2000');

      for (let attempt = 0; attempt < this.maxRetries; attempt++) {
        const attemptStart = Date.now();
        span.setAttribute('llm.current_attempt', attempt + 1);

        try {
          const config: GenerateContentConfig = {
            temperature: this.temperature,
            maxOutputTokens: this.maxOutputTokens,
            responseMimeType: request.json ? 'application/json' : 'text/plain',
          };
          if (request.system) {
            config.systemInstruction = request.system;
          }

          const response = await this.client.models.generateContent({
            model: this.model,
            contents: request.text,
            config,
          });

          const text = response.text;
          if (text === undefined || text === '') {
            throw new LLMResponseError('Gemini returned an empty response', { engine: this.name });
          }

          const duration = Date.now() - attemptStart;
          const usage = toUsage(response.usageMetadata);
          span.setAttribute('llm.duration_ms', duration);
          span.setAttribute('llm.attempts_used', attempt + 1);
          if (usage) {
            span.setAttribute('llm.tokens.prompt', usage.promptTokens);
            span.setAttribute('llm.tokens.completion', usage.completionTokens);
            span.setAttribute('llm.tokens.total', usage.totalTokens);
          }
          span.setStatus({ code: SpanStatusCode.OK });
          span.end();

          logLLMCall(this.name, this.model, request.json, duration);
          return { text, usage };
        } catch (error) {
          lastError = this.classify(error);
          const duration = Date.now() - attemptStart;

          span.setAttribute('llm.error', lastError.message.substring(0, 500));
          span.setAttribute('llm.error_type', lastError.name);

          if (!isRetryableError(lastError) || attempt === this.maxRetries - 1) {
            this.logger.error({ attempt, durationMs: duration, error: lastError.message }, 'Gemini API call failed');
            break;
          }

          let delay = this.progressiveDelay(attempt);
          if (lastError instanceof LLMRateLimitError) {
            span.setAttribute('llm.rate_limited', true);
            delay = Math.max(lastError.retryAfterMs, delay);
          } else if (lastError instanceof LLMTimeoutError) {
            span.setAttribute('llm.timeout_error', true);
          }

          this.logger.warn(
            { attempt, durationMs: duration, retryDelayMs: delay, error: lastError.message },
            'Gemini API call failed, retrying with progressive backoff'
          );
          await sleep(delay);
        }
      }

      span.setAttribute('llm.retries_exhausted', true);
      span.setStatus({ code: SpanStatusCode.ERROR, message: lastError.message });
      span.end();
      throw lastError;
    });
  }

  /**
   * Delay before retry `attempt + 1`: initial + attempt * increment, capped,
   * with jitter
   */
  progressiveDelay(attempt: number): number {
    const base = this.backoff.initialDelayMs + attempt * this.backoff.incrementMs;
    const capped = Math.min(base, this.backoff.maxDelayMs);
    const jitterRange = capped * this.backoff.jitterFactor;
    const jitter = (Math.random() * 2 - 1) * jitterRange;
    return Math.max(0, Math.round(capped + jitter));
  }

  /**
   * Map a provider failure onto the LLM error hierarchy
   */
  private classify(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    const context = { engine: this.name, model: this.model };

    if (isRateLimitError(error)) {
      return new LLMRateLimitError(extractRetryAfter(error, this.backoff.initialDelayMs), context);
    }
    if (isTimeoutError(error)) {
      return new LLMTimeoutError(this.requestTimeoutMs, context);
    }

    const status = errorField(error, 'status');
    const message = errorMessage(error);
    // Client errors other than 429 will fail the same way again
    const retryable = typeof status !== 'number' || status >= 500 || isCancelled(message);
    return new LLMError(`Gemini request failed: ${message}`, 'E2000', { ...context, status, retryable }, { cause: error });
  }
}

function toUsage(
  metadata: { promptTokenCount?: number; candidatesTokenCount?: number; totalTokenCount?: number } | undefined
): TokenUsage | undefined {
  if (!metadata) return undefined;
  return {
    promptTokens: metadata.promptTokenCount ?? 0,
    completionTokens: metadata.candidatesTokenCount ?? 0,
    totalTokens: metadata.totalTokenCount ?? 0,
  };
}

function errorField(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  return Reflect.get(error, key);
}

function errorMessage(error: unknown): string {
  const message = errorField(error, 'message');
  return typeof message === 'string' ? message : String(error);
}

function isCancelled(message: string): boolean {
  return message.includes('499') || message.includes('CANCELLED');
}

export function isRateLimitError(error: unknown): boolean {
  return errorField(error, 'status') === 429 || errorField(error, 'code') === 'RATE_LIMIT_EXCEEDED';
}

/**
 * Handles timeout patterns from fetch, AbortController and the SDK
 */
export function isTimeoutError(error: unknown): boolean {
  const name = errorField(error, 'name');
  if (name === 'AbortError' || name === 'TimeoutError') return true;
  if (errorField(error, 'code') === 'ECONNABORTED') return true;

  const message = errorMessage(error).toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('etimedout') ||
    message.includes('socket hang up')
  );
}

/**
 * Retry-After in ms from a rate-limit error: a `retryAfter` property in
 * seconds, a retry-after header, or "retry after N" in the message
 */
export function extractRetryAfter(error: unknown, fallbackMs: number): number {
  const retryAfter = errorField(error, 'retryAfter');
  if (typeof retryAfter === 'number') {
    return retryAfter * 1000;
  }

  const headers = errorField(error, 'headers');
  if (isJsonObject(headers)) {
    const value = headers['retry-after'] ?? headers['Retry-After'];
    const seconds = typeof value === 'string' ? parseInt(value, 10) : NaN;
    if (!isNaN(seconds)) {
      return seconds * 1000;
    }
  }

  const match = errorMessage(error).match(/retry\s+(?:after\s+)?(\d+)/i);
  if (match?.[1]) {
    return parseInt(match[1], 10) * 1000;
  }

  return fallbackMs;
}
