/**
 * Error Type Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  CommentApiError,
  ConfigurationError,
  DataError,
  ToolExecutionError,
  describeError,
  formatZodIssues,
  isPilotError,
} from '../src/lib/errors/index.js';

describe('errors', () => {
  it('tags each error with its kind and class name', () => {
    const error = new ConfigurationError('bad mode');
    expect(error.kind).toBe('configuration');
    expect(error.name).toBe('ConfigurationError');
    expect(error).toBeInstanceOf(Error);
  });

  it('describes tool failures by exit code', () => {
    expect(new ToolExecutionError('terraform plan', 1, '').message).toBe('terraform plan failed with exit code 1');
    expect(new ToolExecutionError('tflint', null, '').message).toBe('tflint failed');
  });

  it('narrows by kind', () => {
    expect(isPilotError(new DataError('x'), 'data')).toBe(true);
    expect(isPilotError(new DataError('x'), 'configuration')).toBe(false);
    expect(isPilotError(new CommentApiError('x', 500))).toBe(true);
    expect(isPilotError(new Error('x'))).toBe(false);
  });

  it('formats zod issues with their paths', () => {
    const result = z.object({ currency: z.string(), nested: z.object({ n: z.number() }) }).safeParse({
      currency: 1,
      nested: { n: 'x' },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe(
        'currency: Expected string, received number; nested.n: Expected number, received string'
      );
    }
  });

  it('describes unknown thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
