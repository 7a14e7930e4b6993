/**
 * Default configuration constants for the generation client.
 */

/** Default base URL of a local model server. */
export const DEFAULT_ENDPOINT = 'http://localhost:11434';

/** Default request timeout in seconds (2 minutes). */
export const DEFAULT_TIMEOUT_SECONDS = 120;

/** Largest timeout a Node.js timer honours (2^31 - 1 ms, about 24.8 days). */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Path of the generate endpoint, appended to the base URL. */
export const GENERATE_PATH = '/api/generate';
