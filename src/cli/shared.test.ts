/**
 * CLI helper tests
 */

import { describe, it, expect } from 'vitest';
import { describeError, parseBankNumber, parsePositiveInteger } from './shared.js';

describe('describeError', () => {
  it('redacts secrets from error messages', () => {
    expect(describeError(new Error('401 for key ANTHROPIC_API_KEY=test-secret'))).toBe(
      '401 for key ANTHROPIC_API_KEY=***REDACTED***'
    );
    expect(describeError('token: "test-secret-value"')).toBe('token: "***REDACTED***"');
  });
});

describe('argument parsing', () => {
  it('accepts bank numbers only', () => {
    expect(parseBankNumber('22')).toBe(22);
    expect(() => parseBankNumber('10')).toThrow('"10" is not a bank number (1-9, 11, 22, 33, 44)');
  });

  it('accepts positive integers only', () => {
    expect(parsePositiveInteger('3', 'Count')).toBe(3);
    expect(() => parsePositiveInteger('0', 'Count')).toThrow('Count must be a positive integer, got "0"');
  });
});
