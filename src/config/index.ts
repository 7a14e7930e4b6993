/**
 * Configuration module for the generation client.
 *
 * @example
 * ```typescript
 * import { GenerationClientBuilder } from './config';
 *
 * // Build client from OLLAMA_HOST / OLLAMA_MODEL
 * const client = new GenerationClientBuilder()
 *   .endpointFromEnv()
 *   .modelFromEnv()
 *   .build();
 *
 * // Build client with explicit settings
 * const client = new GenerationClientBuilder()
 *   .endpoint('http://localhost:11434')
 *   .model('llama3.2')
 *   .timeoutSeconds(300)
 *   .build();
 * ```
 */

export * from './types.js';
export * from './constants.js';
export * from './builder.js';
export * from './env.js';
