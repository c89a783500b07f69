/**
 * Multi-engine dispatcher
 * - Picks the engine whose next allowed call is earliest
 * - Fails over to another engine, backing off exponentially per engine
 * - Drops an engine after maxRetries consecutive failures
 */

import { LLMError, getConfig, type Prompt, type Schema } from '@errata/shared';
import { BaseEngine } from '../engine/base-engine.js';
import type { GenerateRequest, GenerateResult } from '../types.js';
import { sleep } from '../utils/sleep.js';

export interface MultiEngineOptions {
  name?: string;
  maxRetries?: number;
  backoffExp?: number;
  backoffMultiplierMs?: number;
  removeFailedEngines?: boolean;
}

export class MultiEngine extends BaseEngine {
  private readonly engines: BaseEngine[];
  private readonly failureStreaks = new Map<BaseEngine, number>();
  private readonly maxRetries: number;
  private readonly backoffExp: number;
  private readonly backoffMultiplierMs: number;
  private readonly removeFailedEngines: boolean;

  constructor(engines: readonly BaseEngine[], options: MultiEngineOptions = {}) {
    super(options.name ?? 'multi');
    const defaults = getConfig().dispatch;

    this.engines = [...engines];
    this.maxRetries = options.maxRetries ?? defaults.maxRetries;
    this.backoffExp = options.backoffExp ?? defaults.backoffExp;
    this.backoffMultiplierMs = options.backoffMultiplierMs ?? defaults.backoffMultiplierMs;
    this.removeFailedEngines = options.removeFailedEngines ?? defaults.removeFailedEngines;
  }

  available(): readonly BaseEngine[] {
    return [...this.engines];
  }

  override nextAllowed(): number {
    return this.engines.reduce((earliest, engine) => Math.min(earliest, engine.nextAllowed()), Infinity);
  }

  /**
   * Engine with the earliest next allowed call. Ties go to the engine with
   * the shorter failure streak, then to the first listed.
   */
  select(): BaseEngine {
    let selected: BaseEngine | null = null;
    let selectedAt = Infinity;
    let selectedStreak = Infinity;
    for (const engine of this.engines) {
      const at = engine.nextAllowed();
      const streak = this.failureStreaks.get(engine) ?? 0;
      if (selected === null || at < selectedAt || (at === selectedAt && streak < selectedStreak)) {
        selected = engine;
        selectedAt = at;
        selectedStreak = streak;
      }
    }
    if (selected === null) {
      throw new LLMError('No LLM engines available', 'E2004', { engine: this.name, retryable: false });
    }
    return selected;
  }

  override complete(prompt: Prompt): Promise<string>;
  override complete<T>(prompt: Prompt, schema: Schema<T>): Promise<T>;
  override async complete<T>(prompt: Prompt, schema?: Schema<T>): Promise<T | string> {
    return this.withFailover<T | string>((engine) => (schema ? engine.complete(prompt, schema) : engine.complete(prompt)));
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    return this.withFailover((engine) => engine.generate(request));
  }

  private async withFailover<R>(call: (engine: BaseEngine) => Promise<R>): Promise<R> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      const engine = this.select();
      const streak = this.failureStreaks.get(engine) ?? 0;
      const delay = streak > 0 ? Math.random() * this.backoffMultiplierMs * this.backoffExp ** (streak - 1) : 0;
      if (delay > 0) {
        await sleep(delay);
      }

      try {
        const result = await call(engine);
        this.failureStreaks.set(engine, 0);
        return result;
      } catch (error) {
        lastError = error;
        this.recordFailure(engine, error);
      }
    }

    throw lastError;
  }

  private recordFailure(engine: BaseEngine, error: unknown): void {
    const streak = (this.failureStreaks.get(engine) ?? 0) + 1;
    this.failureStreaks.set(engine, streak);
    this.logger.warn(
      { engine: engine.name, streak, error: error instanceof Error ? error.message : String(error) },
      'Engine call failed'
    );

    if (this.removeFailedEngines && streak >= this.maxRetries) {
      const index = this.engines.indexOf(engine);
      if (index >= 0) {
        this.engines.splice(index, 1);
        this.failureStreaks.delete(engine);
        this.logger.warn({ engine: engine.name, remaining: this.engines.length }, 'Engine failed too many times, removing it');
      }
    }
  }
}
