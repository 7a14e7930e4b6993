/**
 * Tests for generation error types.
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  GenerationError,
  GenerationErrorKind,
  err,
  isGenerationError,
  ok,
} from '../index.js';

describe('GenerationError', () => {
  describe('transport errors', () => {
    it('wraps the underlying error', () => {
      const cause = new Error('connect ECONNREFUSED 127.0.0.1:11434');
      const error = GenerationError.transport(cause, 'http://localhost:11434');

      expect(error.kind).toBe(GenerationErrorKind.TRANSPORT);
      expect(error.message).toBe(
        'HTTP request to http://localhost:11434 failed: connect ECONNREFUSED 127.0.0.1:11434'
      );
      expect(error.cause).toBe(cause);
      expect(error.details).toEqual({ endpoint: 'http://localhost:11434' });
      expect(error.isTransport()).toBe(true);
    });

    it('describes a timeout with its duration', () => {
      const error = GenerationError.timeout('http://localhost:11434', 120000);

      expect(error.kind).toBe(GenerationErrorKind.TRANSPORT);
      expect(error.message).toBe('HTTP request to http://localhost:11434 timed out after 120000ms');
      expect(error.details).toEqual({ endpoint: 'http://localhost:11434', timeoutMs: 120000 });
      expect(error.cause).toBeUndefined();
    });

    it('keeps the underlying timeout error as its cause', () => {
      const cause = new Error('Headers Timeout Error');
      const error = GenerationError.timeout('http://localhost:11434', 120000, cause);

      expect(error.cause).toBe(cause);
      expect(error.toJSON()).toHaveProperty('cause', 'Headers Timeout Error');
    });
  });

  describe('generation errors', () => {
    it('distinguishes a parse failure from an incomplete response', () => {
      const parse = GenerationError.parseFailure(new Error('Unexpected end of JSON input'));
      const incomplete = GenerationError.incomplete();

      expect(parse.kind).toBe(GenerationErrorKind.GENERATION);
      expect(parse.message).toBe('Failed to parse generation response: Unexpected end of JSON input');
      expect(incomplete.kind).toBe(GenerationErrorKind.GENERATION);
      expect(incomplete.message).toBe('Incomplete response from model server');
      expect(incomplete.isTransport()).toBe(false);
    });

    it('omits the server message suffix when there is none', () => {
      expect(GenerationError.httpStatus(503).message).toBe(
        'Model server responded with status 503'
      );
    });
  });

  it('serializes to JSON', () => {
    const error = GenerationError.parseFailure(new Error('bad token'));

    expect(error.toJSON()).toEqual({
      name: 'GenerationError',
      kind: 'generation',
      message: 'Failed to parse generation response: bad token',
      details: undefined,
      cause: 'bad token',
    });
  });

  it('is an Error with its own name', () => {
    const error = GenerationError.incomplete();

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('GenerationError');
    expect(isGenerationError(error)).toBe(true);
    expect(isGenerationError(new Error('other'))).toBe(false);
  });
});

describe('ConfigurationError', () => {
  it('records the offending field', () => {
    const error = new ConfigurationError('Model is required', 'model');

    expect(error.name).toBe('ConfigurationError');
    expect(error.field).toBe('model');
    expect(isGenerationError(error)).toBe(false);
  });
});

describe('Result helpers', () => {
  it('builds success and failure variants', () => {
    const failure = GenerationError.incomplete();

    expect(ok('text')).toEqual({ success: true, data: 'text' });
    expect(err(failure)).toEqual({ success: false, error: failure });
  });
});
