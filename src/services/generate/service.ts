/**
 * Generate Service
 *
 * Non-streaming text generation against the generate endpoint.
 */

import { z } from 'zod';
import type { GenerationClientConfig } from '../../config/types.js';
import { GENERATE_PATH } from '../../config/constants.js';
import type { HttpResponse, HttpTransport } from '../../transport/types.js';
import type { Logger } from '../../observability/logging.js';
import {
  type GenerationRequest,
  type GenerationResponse,
  generationResponseSchema,
} from '../../types/generate.js';
import { GenerationError, err, isGenerationError, ok, type Result } from '../../types/errors.js';

export interface GenerateServiceDeps {
  config: GenerationClientConfig;
  transport: HttpTransport;
  logger: Logger;
}

const serverErrorSchema = z.object({ error: z.string() });

/**
 * Length in user-perceived characters (code points), not UTF-16 units
 */
function characterCount(text: string): number {
  return Array.from(text).length;
}

/**
 * Generate service for text completion
 *
 * Each call is independent; the only state held is the immutable
 * configuration and the shared transport.
 */
export class GenerateService {
  private readonly config: GenerationClientConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(deps: GenerateServiceDeps) {
    this.config = deps.config;
    this.transport = deps.transport;
    this.logger = deps.logger;
  }

  /**
   * Generate a completion for `prompt` and return the generated text
   *
   * Failures are returned, never thrown. The empty prompt is sent as-is.
   */
  async create(prompt: string): Promise<Result<string>> {
    const request = this.buildRequest(prompt);

    this.logger.info('Sending generation request', {
      model: request.model,
      promptLength: characterCount(prompt),
    });

    const sent = await this.execute(request);
    if (!sent.success) {
      return sent;
    }

    const parsed = this.parseResponse(sent.data);
    if (!parsed.success) {
      return parsed;
    }

    const { response, done } = parsed.data;

    this.logger.info('Received generation response', {
      model: request.model,
      responseLength: characterCount(response),
      done,
    });

    if (!done) {
      return err(GenerationError.incomplete());
    }

    return ok(response);
  }

  private buildRequest(prompt: string): GenerationRequest {
    return {
      model: this.config.model,
      prompt,
      stream: false,
    };
  }

  private async execute(request: GenerationRequest): Promise<Result<HttpResponse>> {
    try {
      return ok(await this.transport.postJson(GENERATE_PATH, request));
    } catch (error) {
      if (isGenerationError(error)) {
        return err(error);
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      return err(GenerationError.transport(cause, this.config.endpoint));
    }
  }

  /**
   * Check the status, then decode and validate the body
   */
  private parseResponse(response: HttpResponse): Result<GenerationResponse> {
    if (response.status < 200 || response.status >= 300) {
      return err(GenerationError.httpStatus(response.status, this.serverMessage(response.body)));
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return err(GenerationError.parseFailure(cause));
    }

    const result = generationResponseSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return err(GenerationError.parseFailure(new Error(issues)));
    }

    return ok(result.data);
  }

  /**
   * Error text from a failed response, e.g. `{"error":"model 'x' not found"}`
   */
  private serverMessage(body: string): string | undefined {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      json = undefined;
    }

    const parsed = serverErrorSchema.safeParse(json);
    if (parsed.success) {
      return parsed.data.error;
    }

    const text = body.trim();
    return text === '' ? undefined : text;
  }
}
