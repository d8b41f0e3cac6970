import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { handleCliError, redactMeta } from '../../../src/shared/errors/error-handler';
import { AppError } from '../../../src/shared/errors/errors';
import { DirectoryErrors } from '../../../src/modules/directory';

describe('handleCliError', () => {
  it('AppError keeps its exit code and message', () => {
    expect(handleCliError(DirectoryErrors.groupNotFound('lab'))).toEqual({
      exitCode: 3,
      message: 'Group "lab" was not found in the identity directory.',
    });
  });

  it('validation errors exit with 2', () => {
    expect(handleCliError(AppError.validationError('Invalid start: bad'))).toEqual({
      exitCode: 2,
      message: 'Invalid start: bad',
    });
  });

  it('a ZodError reports its first issue with the field path', () => {
    const result = z.object({ a: z.number() }).safeParse({ a: 'x' });
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(handleCliError(result.error)).toEqual({
      exitCode: 2,
      message: 'a: Expected number, received string',
    });
  });

  it('unexpected errors exit with 1 and a generic message', () => {
    expect(handleCliError(new TypeError('secret internals'))).toEqual({
      exitCode: 1,
      message: 'Internal error while generating the report',
    });
    expect(handleCliError('not even an error')).toEqual({
      exitCode: 1,
      message: 'Internal error while generating the report',
    });
  });
});

describe('redactMeta', () => {
  it('redacts sensitive keys and keeps the rest', () => {
    expect(redactMeta({ username: 'alice', email: 'alice@example.edu', gecos: 'A' })).toEqual({
      username: 'alice',
      email: '[REDACTED]',
      gecos: '[REDACTED]',
    });
  });

  it('passes non-objects through', () => {
    expect(redactMeta(undefined)).toBeUndefined();
    expect(redactMeta('plain')).toBe('plain');
  });
});
