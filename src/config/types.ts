/**
 * Configuration types for the generation client.
 */

import type { Logger } from '../observability/logging.js';

/**
 * Generation client configuration.
 */
export interface GenerationClientConfig {
  /** Base URL of the model server, used without normalization. */
  readonly endpoint: string;
  /** Model identifier sent with every request. */
  readonly model: string;
  /** Request timeout in milliseconds. */
  readonly timeoutMs: number;
  /** Logger the client writes its records through. */
  readonly logger: Logger;
}
