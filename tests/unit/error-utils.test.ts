/**
 * Tests for error-utils.ts and the request deadline.
 */

import { describe, it, expect } from 'vitest';
import { Deadline } from '../../src/utils/deadline';
import {
  ConfigError,
  DeadlineExceededError,
  getErrorMessage,
  NestingDepthError,
  wrapError,
} from '../../src/utils/error-utils';

describe('getErrorMessage', () => {
  it('should extract message from Error instance', () => {
    expect(getErrorMessage(new Error('Something went wrong'))).toBe('Something went wrong');
  });

  it('should extract message from TypeError', () => {
    expect(getErrorMessage(new TypeError('Cannot read property'))).toBe('Cannot read property');
  });

  it('should convert primitives to string', () => {
    expect(getErrorMessage('Raw error string')).toBe('Raw error string');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage(null)).toBe('null');
    expect(getErrorMessage(undefined)).toBe('undefined');
  });

  it('should convert plain object to string', () => {
    expect(getErrorMessage({ code: 500 })).toBe('[object Object]');
  });
});

describe('wrapError', () => {
  it('should wrap Error with context and keep it as cause', () => {
    const original = new Error('Original message');
    const wrapped = wrapError(original, 'While extracting');
    expect(wrapped.message).toBe('While extracting: Original message');
    expect(wrapped.cause).toBe(original);
  });

  it('should handle nested wrapping', () => {
    const wrapped = wrapError(wrapError(new Error('Root cause'), 'Level 1'), 'Level 2');
    expect(wrapped.message).toBe('Level 2: Level 1: Root cause');
  });

  it('should not set cause for non-Error values', () => {
    const wrapped = wrapError('string error', 'Context');
    expect(wrapped.message).toBe('Context: string error');
    expect(wrapped.cause).toBeUndefined();
  });
});

describe('validator error classes', () => {
  it('DeadlineExceededError carries budget and elapsed time', () => {
    const error = new DeadlineExceededError(100, 150);
    expect(error.message).toBe('Validation exceeded its time budget of 100ms');
    expect(error.name).toBe('DeadlineExceededError');
    expect(DeadlineExceededError.isDeadlineExceededError(error)).toBe(true);
    expect(DeadlineExceededError.isDeadlineExceededError(new Error('other'))).toBe(false);
  });

  it('NestingDepthError names the limit', () => {
    const error = new NestingDepthError(50, 7);
    expect(error.message).toBe('Source nesting exceeds the maximum depth of 50');
    expect(error.line).toBe(7);
  });

  it('ConfigError appends the file path when given', () => {
    expect(new ConfigError('Bad value', '/tmp/x.yaml').message).toBe('Bad value (/tmp/x.yaml)');
    expect(new ConfigError('Bad value').message).toBe('Bad value');
  });
});

describe('Deadline', () => {
  it('throws once the budget is spent', () => {
    let now = 1000;
    const deadline = new Deadline(50, () => now);
    expect(() => deadline.check()).not.toThrow();
    now = 1051;
    expect(deadline.expired()).toBe(true);
    expect(() => deadline.check()).toThrow(DeadlineExceededError);
  });

  it('never expires with a zero budget', () => {
    let now = 0;
    const deadline = new Deadline(0, () => now);
    now = 1_000_000;
    expect(deadline.expired()).toBe(false);
    expect(Deadline.unbounded().expired()).toBe(false);
  });
});
