/**
 * Transport module exports
 */

export type { HttpResponse, HttpTransport } from './types.js';
export { UndiciTransport } from './http.js';
export type { UndiciTransportOptions } from './http.js';
