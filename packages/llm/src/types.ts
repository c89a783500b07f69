/**
 * Engine-level request and response types
 */

/**
 * A rendered request. `json` asks the provider for a JSON body.
 */
export interface GenerateRequest {
  text: string;
  system?: string;
  json: boolean;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface GenerateResult {
  text: string;
  usage?: TokenUsage;
}

/**
 * Progressive backoff: initial, initial + increment, ... capped at max,
 * each spread by ±jitterFactor
 */
export interface ProgressiveBackoffConfig {
  initialDelayMs: number;
  incrementMs: number;
  maxDelayMs: number;
  jitterFactor: number;
}

export const DEFAULT_PROGRESSIVE_BACKOFF: ProgressiveBackoffConfig = {
  initialDelayMs: 2000,
  incrementMs: 2000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
};
