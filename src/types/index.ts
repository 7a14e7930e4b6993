/**
 * Type exports
 */

export {
  GenerationError,
  GenerationErrorKind,
  ConfigurationError,
  isGenerationError,
  ok,
  err,
} from './errors.js';
export type { Result } from './errors.js';

export { generationResponseSchema } from './generate.js';
export type { GenerationRequest, GenerationResponse } from './generate.js';
