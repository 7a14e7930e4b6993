/**
 * HTTP Transport Implementation
 *
 * Implements the HttpTransport interface on top of an undici Agent owned by
 * the transport for its whole lifetime.
 */

import { Agent, errors, request } from 'undici';
import { GenerationError } from '../types/errors.js';
import type { HttpResponse, HttpTransport } from './types.js';

export interface UndiciTransportOptions {
  /** Base URL requests are issued against, used as-is. */
  endpoint: string;
  /** Timeout applied to every request, in milliseconds. */
  timeoutMs: number;
}

/**
 * HTTP transport backed by a reusable undici Agent
 */
export class UndiciTransport implements HttpTransport {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly agent: Agent;
  private closed = false;

  constructor(options: UndiciTransportOptions) {
    this.endpoint = options.endpoint;
    this.timeoutMs = options.timeoutMs;

    this.agent = new Agent({
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs,
      connect: { timeout: options.timeoutMs },
    });
  }

  /**
   * Build full URL from base URL and path
   */
  private buildUrl(path: string): string {
    return `${this.endpoint}${path}`;
  }

  /**
   * Map undici and socket errors to transport errors
   */
  private mapError(error: unknown): GenerationError {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (
      error instanceof errors.HeadersTimeoutError ||
      error instanceof errors.BodyTimeoutError ||
      error instanceof errors.ConnectTimeoutError
    ) {
      return GenerationError.timeout(this.endpoint, this.timeoutMs, cause);
    }

    return GenerationError.transport(cause, this.endpoint);
  }

  /**
   * Send POST request with JSON body and read the whole response
   *
   * The timer covers connecting, waiting for headers and reading the body.
   */
  async postJson<T>(path: string, body: T): Promise<HttpResponse> {
    const url = this.buildUrl(path);
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await request(url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          accept: 'application/json',
        },
        body: JSON.stringify(body),
        dispatcher: this.agent,
        signal: controller.signal,
      });

      const text = await response.body.text();

      return {
        status: response.statusCode,
        body: text,
      };
    } catch (error) {
      if (timedOut) {
        const cause = error instanceof Error ? error : new Error(String(error));
        throw GenerationError.timeout(this.endpoint, this.timeoutMs, cause);
      }
      throw this.mapError(error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.agent.close();
  }
}
