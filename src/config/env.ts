/**
 * Environment configuration for the generation client.
 */

import { z } from 'zod';
import type { GenerationClientConfig } from './types.js';
import { DEFAULT_ENDPOINT, DEFAULT_TIMEOUT_SECONDS, MAX_TIMEOUT_MS } from './constants.js';
import { GenerationClient } from '../client.js';
import { ConfigurationError } from '../types/errors.js';
import { LOG_LEVELS, createLogger } from '../observability/logging.js';

/**
 * Environment variables read by `loadConfigFromEnv`.
 */
export const envSchema = z.object({
  OLLAMA_HOST: z.string().url().default(DEFAULT_ENDPOINT),
  OLLAMA_MODEL: z.string().min(1),
  OLLAMA_TIMEOUT_SECONDS: z.coerce
    .number()
    .positive()
    .max(MAX_TIMEOUT_MS / 1000)
    .default(DEFAULT_TIMEOUT_SECONDS),
  OLLAMA_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type GenerationEnv = z.infer<typeof envSchema>;

/**
 * Build a client configuration from environment variables.
 *
 * @throws {ConfigurationError} Naming each invalid or missing variable
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GenerationClientConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join('; ')}`, field);
  }

  const parsed = result.data;

  return {
    endpoint: parsed.OLLAMA_HOST,
    model: parsed.OLLAMA_MODEL,
    timeoutMs: parsed.OLLAMA_TIMEOUT_SECONDS * 1000,
    logger: createLogger(parsed.OLLAMA_LOG_LEVEL),
  };
}

export function createGenerationClientFromEnv(
  env: NodeJS.ProcessEnv = process.env
): GenerationClient {
  return new GenerationClient(loadConfigFromEnv(env));
}
