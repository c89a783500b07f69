/**
 * Rate-limited engine: waits on call and token limits before delegating
 */

import type { CallLimit } from '../limits/call-limit.js';
import type { TokenLimit } from '../limits/token-limit.js';
import { estimateTokens } from '../prompts/render.js';
import type { GenerateRequest, GenerateResult } from '../types.js';
import { BaseEngine } from './base-engine.js';

export interface RateLimits {
  calls?: CallLimit;
  tokens?: TokenLimit;
}

export class RateLimitedEngine extends BaseEngine {
  constructor(
    private readonly inner: BaseEngine,
    readonly limits: RateLimits,
    name: string = inner.name
  ) {
    super(name);
  }

  override nextAllowed(): number {
    return Math.max(
      this.inner.nextAllowed(),
      this.limits.calls?.nextAllowed() ?? 0,
      this.limits.tokens?.nextAllowed() ?? 0
    );
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    const estimate = estimateTokens(request.text);
    await this.limits.tokens?.waitFor(estimate);
    await this.limits.calls?.consume();

    const result = await this.inner.generate(request);

    const used = result.usage?.totalTokens ?? estimate + estimateTokens(result.text);
    this.limits.tokens?.reportConsumed(used);
    this.logger.debug({ tokens: used }, 'Rate-limited call completed');

    return result;
  }
}
