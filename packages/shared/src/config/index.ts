/**
 * Configuration management for errata
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../errors/index.js';

// When running inside a workspace package, CWD may be the package directory,
// so parent directories are tried too
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  if (!process.env.LLM_API_KEY) {
    dotenvConfig({ path: envPath });
  }
}

const booleanFromEnv = z
  .union([z.boolean(), z.string()])
  .transform((val) => (typeof val === 'boolean' ? val : ['1', 'true', 'yes'].includes(val.toLowerCase())));

export const MERGE_POLICY_NAMES = ['collect', 'concat-text', 'shallow-merge'] as const;
export type MergePolicyName = (typeof MERGE_POLICY_NAMES)[number];

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // LLM capability
  llm: z.object({
    provider: z.enum(['gemini']).default('gemini'),
    apiKey: z.string().optional(),
    model: z.string().default('gemini-2.5-flash'),
    temperature: z.coerce.number().min(0).max(2).default(0.2),
    maxOutputTokens: z.coerce.number().int().positive().default(8192),
    maxRetries: z.coerce.number().int().min(1).default(3),
    requestTimeoutMs: z.coerce.number().int().positive().default(120000),
    // Sliding-window rate limits, applied per engine
    callsPerInterval: z.coerce.number().positive().optional(),
    tokensPerInterval: z.coerce.number().positive().optional(),
    rateIntervalMs: z.coerce.number().int().positive().default(60000),
  }),

  // Multi-engine dispatch
  dispatch: z.object({
    maxRetries: z.coerce.number().int().min(0).default(3),
    backoffExp: z.coerce.number().min(1).default(2),
    backoffMultiplierMs: z.coerce.number().min(0).default(1000),
    removeFailedEngines: booleanFromEnv.default(true),
  }),

  // Propagation
  propagation: z.object({
    defaultMergePolicy: z.enum(MERGE_POLICY_NAMES).default('collect'),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    llm: {
      provider: process.env.LLM_PROVIDER,
      apiKey: process.env.LLM_API_KEY,
      model: process.env.LLM_MODEL,
      temperature: process.env.LLM_TEMPERATURE,
      maxOutputTokens: process.env.LLM_MAX_OUTPUT_TOKENS,
      maxRetries: process.env.LLM_MAX_RETRIES,
      requestTimeoutMs: process.env.LLM_REQUEST_TIMEOUT_MS,
      callsPerInterval: process.env.LLM_CALLS_PER_INTERVAL,
      tokensPerInterval: process.env.LLM_TOKENS_PER_INTERVAL,
      rateIntervalMs: process.env.LLM_RATE_INTERVAL_MS,
    },

    dispatch: {
      maxRetries: process.env.DISPATCH_MAX_RETRIES,
      backoffExp: process.env.DISPATCH_BACKOFF_EXP,
      backoffMultiplierMs: process.env.DISPATCH_BACKOFF_MULTIPLIER_MS,
      removeFailedEngines: process.env.DISPATCH_REMOVE_FAILED_ENGINES,
    },

    propagation: {
      defaultMergePolicy: process.env.PROPAGATION_MERGE_POLICY,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    try {
      configInstance = loadConfig();
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new ConfigurationError('Invalid configuration', {
          issues: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
        });
      }
      throw error;
    }
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}
