/**
 * Tests for signing error types
 */

import { describe, it, expect } from 'vitest';
import { SigningError, isSigningError } from './error.js';
import type { SigningErrorCode } from './error.js';

describe('SigningError', () => {
  it('should create error with message and code', () => {
    const error = new SigningError('region must not be empty', 'INVALID_ARGUMENT');

    expect(error.message).toBe('region must not be empty');
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.name).toBe('SigningError');
  });

  it('should be instance of Error', () => {
    const error = new SigningError('Test error', 'MALFORMED_REQUEST');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(SigningError);
  });

  it('should support all error codes', () => {
    const codes: SigningErrorCode[] = ['INVALID_ARGUMENT', 'MALFORMED_REQUEST', 'INVALID_TIMESTAMP'];

    for (const code of codes) {
      expect(new SigningError('Test', code).code).toBe(code);
    }
  });

  it('should format toString correctly', () => {
    const error = new SigningError('Test error', 'INVALID_TIMESTAMP');

    expect(error.toString()).toBe('SigningError [INVALID_TIMESTAMP]: Test error');
  });

  it('should have proper stack trace', () => {
    const error = new SigningError('Test error', 'INVALID_ARGUMENT');

    expect(error.stack).toContain('SigningError');
  });
});

describe('isSigningError', () => {
  it('should identify SigningError instances', () => {
    expect(isSigningError(new SigningError('Test', 'INVALID_ARGUMENT'))).toBe(true);
  });

  it('should reject other values', () => {
    expect(isSigningError(new Error('Test'))).toBe(false);
    expect(isSigningError('SigningError')).toBe(false);
    expect(isSigningError(null)).toBe(false);
    expect(isSigningError({ code: 'INVALID_ARGUMENT', name: 'SigningError' })).toBe(false);
  });
});
