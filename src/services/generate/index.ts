/**
 * Generate service exports
 */

export { GenerateService } from './service.js';
export type { GenerateServiceDeps } from './service.js';
