/**
 * Transport Layer Types
 *
 * Defines the HTTP transport abstraction used by the generation client.
 */

/**
 * HTTP response structure
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** Raw response body, read to completion */
  body: string;
}

/**
 * HTTP transport abstraction
 *
 * Implementations apply the configured timeout to every request and reject
 * with a `transport` GenerationError when the exchange cannot complete.
 * A transport is safe to use from concurrent calls.
 */
export interface HttpTransport {
  /**
   * Send POST request with JSON body
   *
   * @param path - API path (e.g., "/api/generate")
   * @param body - Request body (will be JSON-serialized)
   */
  postJson<T>(path: string, body: T): Promise<HttpResponse>;

  /**
   * Release the underlying connections
   */
  close(): Promise<void>;
}
