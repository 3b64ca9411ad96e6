import { describe, it, expect } from 'vitest';
import { ConnectionResolutionError } from '../src/index.js';
import { getErrorMessage, getErrorName, toError, wrapError } from '../src/utils/errors.js';

// ============================================================================
// Error Utility Tests
// ============================================================================

describe('error utilities', () => {
  it('should normalize thrown values', () => {
    const error = new TypeError('bad input');

    expect(toError(error)).toBe(error);
    expect(toError('boom').message).toBe('boom');
    expect(getErrorMessage(42)).toBe('42');
  });

  it('should name errors by class', () => {
    expect(getErrorName(new ConnectionResolutionError('audit'))).toBe('ConnectionResolutionError');
    expect(getErrorName('boom')).toBe('Error');
  });

  it('should wrap errors with context and keep the cause', () => {
    const cause = new Error('no such table');
    const wrapped = wrapError(cause, 'Failed to create inbound_request_logs');

    expect(wrapped.message).toBe('Failed to create inbound_request_logs: no such table');
    expect(wrapped.cause).toBe(cause);
  });
});
