/**
 * Local model generation client
 *
 * Sends a prompt to the generate endpoint of a local model server and
 * returns the generated text.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { GenerationClient } from 'local-llm-generate';
 *
 * const client = GenerationClient.create('http://localhost:11434', 'llama3.2', 180);
 *
 * const result = await client.generate('Once upon a time');
 * if (!result.success) {
 *   console.error(result.error.kind, result.error.message);
 * }
 * ```
 */

// Main client
export { GenerationClient } from './client.js';

// Configuration
export {
  GenerationClientBuilder,
  loadConfigFromEnv,
  createGenerationClientFromEnv,
  envSchema,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_MS,
  GENERATE_PATH,
} from './config/index.js';

export type { GenerationClientConfig, GenerationEnv } from './config/index.js';

// Types - Errors
export {
  GenerationError,
  GenerationErrorKind,
  ConfigurationError,
  isGenerationError,
  ok,
  err,
} from './types/index.js';

export type { Result } from './types/index.js';

// Types - Generate
export { generationResponseSchema } from './types/index.js';
export type { GenerationRequest, GenerationResponse } from './types/index.js';

// Observability
export {
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  createLogger,
  LOG_LEVELS,
} from './observability/index.js';

export type { Logger, LogLevel, LogEntry, LogContext } from './observability/index.js';

// Services (for advanced usage)
export { GenerateService } from './services/generate/index.js';
export type { GenerateServiceDeps } from './services/generate/index.js';

// Transport (for advanced usage)
export type { HttpTransport, HttpResponse } from './transport/index.js';
export { UndiciTransport } from './transport/index.js';
