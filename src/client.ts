/**
 * Generation Client Implementation
 *
 * Client for the generate endpoint of a local model server.
 */

import type { GenerationClientConfig } from './config/types.js';
import { DEFAULT_TIMEOUT_SECONDS, MAX_TIMEOUT_MS } from './config/constants.js';
import type { HttpTransport } from './transport/types.js';
import { UndiciTransport } from './transport/http.js';
import { GenerateService } from './services/generate/service.js';
import { createLogger, type Logger } from './observability/logging.js';
import { ConfigurationError, type Result } from './types/errors.js';

/**
 * Validate configuration.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
function validateConfig(config: GenerationClientConfig): void {
  let url: URL;
  try {
    url = new URL(config.endpoint);
  } catch {
    throw new ConfigurationError(`Invalid endpoint URL: ${config.endpoint}`, 'endpoint');
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError('Endpoint must start with http:// or https://', 'endpoint');
  }

  if (config.model.trim() === '') {
    throw new ConfigurationError('Model must not be empty', 'model');
  }

  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new ConfigurationError('Timeout must be greater than 0', 'timeout');
  }

  if (config.timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigurationError(`Timeout must not exceed ${MAX_TIMEOUT_MS}ms`, 'timeout');
  }
}

function buildTransport(config: GenerationClientConfig): HttpTransport {
  try {
    return new UndiciTransport({ endpoint: config.endpoint, timeoutMs: config.timeoutMs });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to build HTTP transport: ${reason}`, 'transport');
  }
}

/**
 * Generation client
 *
 * Owns one HTTP transport, reused by every call and released by `close()`.
 * Concurrent `generate` calls are independent of each other.
 *
 * @example
 * ```typescript
 * const client = GenerationClient.create('http://localhost:11434', 'llama3.2', 180);
 *
 * const result = await client.generate('Why is the sky blue?');
 * if (result.success) {
 *   console.log(result.data);
 * } else {
 *   console.error(result.error.message);
 * }
 *
 * await client.close();
 * ```
 */
export class GenerationClient {
  private readonly _config: GenerationClientConfig;
  private readonly transport: HttpTransport;
  private readonly generateService: GenerateService;

  /**
   * @param transport - Replaces the undici transport built from `config`
   * @throws {ConfigurationError} If the configuration is invalid or the
   *   transport cannot be built
   */
  constructor(config: GenerationClientConfig, transport?: HttpTransport) {
    validateConfig(config);

    this._config = config;
    this.transport = transport ?? buildTransport(config);
    this.generateService = new GenerateService({
      config,
      transport: this.transport,
      logger: config.logger.child({ component: 'generation-client' }),
    });
  }

  /**
   * Create a client for `model` served at `endpoint`.
   *
   * No network I/O happens here.
   *
   * @param timeoutSeconds - Applied to every request; 120-300 suits most models
   * @throws {ConfigurationError} If a setting is invalid
   */
  static create(
    endpoint: string,
    model: string,
    timeoutSeconds: number = DEFAULT_TIMEOUT_SECONDS,
    logger: Logger = createLogger()
  ): GenerationClient {
    return new GenerationClient({
      endpoint,
      model,
      timeoutMs: timeoutSeconds * 1000,
      logger,
    });
  }

  get config(): Readonly<GenerationClientConfig> {
    return this._config;
  }

  get endpoint(): string {
    return this._config.endpoint;
  }

  get model(): string {
    return this._config.model;
  }

  /**
   * Generate text for `prompt` and wait for the complete response.
   *
   * Resolves to the generated text, or to a `GenerationError` of kind
   * `transport` (the request could not complete) or `generation` (the
   * response was an error status, unparseable, or not done).
   */
  async generate(prompt: string): Promise<Result<string>> {
    return this.generateService.create(prompt);
  }

  /**
   * Release the transport. Later calls fail with a transport error.
   */
  async close(): Promise<void> {
    await this.transport.close();
  }
}
