/**
 * Engine Registry
 * Named engines, used to resolve { $capability } references when modules
 * are reconstructed.
 */

import { ConfigurationError, ValidationError, createChildLogger, getConfig, type Config } from '@errata/shared';
import { MultiEngine } from './dispatch/multi-engine.js';
import type { BaseEngine } from './engine/base-engine.js';
import { GeminiEngine } from './engine/gemini-engine.js';
import { RateLimitedEngine } from './engine/rate-limited-engine.js';
import { CallLimit } from './limits/call-limit.js';
import { TokenLimit } from './limits/token-limit.js';

export class EngineRegistry {
  private engines = new Map<string, BaseEngine>();
  private logger = createChildLogger({ component: 'EngineRegistry' });

  register(engine: BaseEngine, name: string = engine.name): this {
    if (this.engines.has(name)) {
      throw new ValidationError(`An engine named '${name}' is already registered`, { engine: name });
    }
    this.engines.set(name, engine);
    this.logger.debug({ engine: name }, 'Engine registered');
    return this;
  }

  get(name: string): BaseEngine | undefined {
    return this.engines.get(name);
  }

  has(name: string): boolean {
    return this.engines.has(name);
  }

  names(): string[] {
    return [...this.engines.keys()];
  }

  /**
   * All registered engines behind one dispatcher
   */
  dispatcher(name = 'multi'): MultiEngine {
    return new MultiEngine([...this.engines.values()], { name });
  }
}

/**
 * Build the configured engine, wrapped in its rate limits when any are set
 */
export function createEngineFromConfig(config: Config = getConfig()): BaseEngine {
  const { llm } = config;
  if (!llm.apiKey) {
    throw new ConfigurationError('LLM_API_KEY is required to create an engine', { provider: llm.provider });
  }

  const engine = new GeminiEngine({
    name: llm.provider,
    apiKey: llm.apiKey,
    model: llm.model,
    temperature: llm.temperature,
    maxOutputTokens: llm.maxOutputTokens,
    maxRetries: llm.maxRetries,
    requestTimeoutMs: llm.requestTimeoutMs,
  });

  if (llm.callsPerInterval === undefined && llm.tokensPerInterval === undefined) {
    return engine;
  }

  return new RateLimitedEngine(engine, {
    calls: llm.callsPerInterval === undefined ? undefined : new CallLimit(llm.callsPerInterval, llm.rateIntervalMs),
    tokens: llm.tokensPerInterval === undefined ? undefined : new TokenLimit(llm.tokensPerInterval, llm.rateIntervalMs),
  });
}

export function loadEnginesFromConfig(config: Config = getConfig()): EngineRegistry {
  return new EngineRegistry().register(createEngineFromConfig(config));
}
