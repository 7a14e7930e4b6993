/**
 * Builder for creating generation client instances.
 */

import type { GenerationClientConfig } from './types.js';
import { DEFAULT_ENDPOINT, DEFAULT_TIMEOUT_SECONDS } from './constants.js';
import { GenerationClient } from '../client.js';
import { ConfigurationError } from '../types/errors.js';
import { createLogger, type Logger } from '../observability/logging.js';

/**
 * Builder for GenerationClientConfig with fluent API.
 */
export class GenerationClientBuilder {
  private _endpoint?: string;
  private _model?: string;
  private _timeoutMs?: number;
  private _logger?: Logger;

  /**
   * Set base URL.
   */
  endpoint(url: string): this {
    this._endpoint = url;
    return this;
  }

  /**
   * Set base URL from environment variable.
   * Reads from OLLAMA_HOST environment variable.
   */
  endpointFromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const url = env.OLLAMA_HOST;
    if (url) {
      this._endpoint = url;
    }
    return this;
  }

  /**
   * Set model.
   */
  model(model: string): this {
    this._model = model;
    return this;
  }

  /**
   * Set model from environment variable.
   * Reads from OLLAMA_MODEL environment variable.
   */
  modelFromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const model = env.OLLAMA_MODEL;
    if (model) {
      this._model = model;
    }
    return this;
  }

  /**
   * Set timeout in seconds.
   */
  timeoutSeconds(seconds: number): this {
    this._timeoutMs = seconds * 1000;
    return this;
  }

  /**
   * Set timeout in milliseconds.
   */
  timeoutMs(ms: number): this {
    this._timeoutMs = ms;
    return this;
  }

  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /**
   * Build the client.
   *
   * @throws {ConfigurationError} If no model is set or a setting is invalid
   */
  build(): GenerationClient {
    if (this._model === undefined) {
      throw new ConfigurationError('Model is required', 'model');
    }

    const config: GenerationClientConfig = {
      endpoint: this._endpoint ?? DEFAULT_ENDPOINT,
      model: this._model,
      timeoutMs: this._timeoutMs ?? DEFAULT_TIMEOUT_SECONDS * 1000,
      logger: this._logger ?? createLogger(),
    };

    return new GenerationClient(config);
  }
}
