/**
 * Wire types for the generate endpoint.
 */

import { z } from 'zod';

/**
 * Text generation request body
 */
export interface GenerationRequest {
  /**
   * Model name to use for generation
   *
   * Example: "llama3.2", "mistral", "qwen2.5:7b"
   */
  model: string;

  /**
   * Input prompt
   */
  prompt: string;

  /**
   * Streaming flag
   *
   * Always false: the call returns once the server reports completion.
   */
  stream: false;
}

/**
 * Schema of a non-streaming generate response.
 *
 * Only `response` and `done` are consumed; other fields the server sends
 * (timings, token counts, `done_reason`) are dropped.
 */
export const generationResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean(),
  context: z.array(z.number().int()).optional(),
});

/**
 * Text generation response
 */
export type GenerationResponse = z.infer<typeof generationResponseSchema>;
