/**
 * @errata/llm
 * LLM capability implementations: prompt rendering, Gemini engine, rate
 * limits and multi-engine dispatch
 */

export * from './types.js';
export * from './prompts/render.js';
export * from './engine/base-engine.js';
export * from './engine/gemini-engine.js';
export * from './engine/rate-limited-engine.js';
export * from './limits/index.js';
export * from './dispatch/multi-engine.js';
export * from './engine-registry.js';
