/**
 * Tests for error types.
 */

import { describe, it, expect } from 'vitest';
import {
  DiagnosticsError,
  InvalidSignalError,
  MissingBaselineError,
  UnknownGroupingError,
  MalformedAggregateError,
  ConfigError,
  StorageError,
  isErrorWithCode,
  isInvalidSignalError,
  isMissingBaselineError,
  isUnknownGroupingError,
  isMalformedAggregateError,
  isConfigError,
  wrapError,
} from '../../src/utils/errors.js';

describe('errors', () => {
  describe('DiagnosticsError', () => {
    it('has message, code, and name', () => {
      const error = new DiagnosticsError('Something failed', 'TEST_ERROR');

      expect(error.message).toBe('Something failed');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.name).toBe('DiagnosticsError');
    });

    it('captures cause from Error', () => {
      const cause = new Error('Original error');
      const error = new DiagnosticsError('Wrapped error', 'WRAPPED', cause);

      expect(error.cause).toBe(cause);
    });

    it('converts non-Error cause to Error', () => {
      const error = new DiagnosticsError('Wrapped error', 'WRAPPED', 'string cause');

      expect(error.cause).toBeInstanceOf(Error);
      expect(error.cause?.message).toBe('string cause');
    });

    it('has undefined cause when not provided', () => {
      expect(new DiagnosticsError('No cause', 'NO_CAUSE').cause).toBeUndefined();
    });

    it('formats the cause chain in toDetailedString', () => {
      const inner = new InvalidSignalError('bad timestamps', 'NON_MONOTONIC');
      const outer = new DiagnosticsError('run failed', 'RUN_FAILED', inner);

      expect(outer.toDetailedString()).toBe(
        'DiagnosticsError [RUN_FAILED]: run failed\n  Caused by: bad timestamps [NON_MONOTONIC]',
      );
    });

    it('omits the cause line when there is none', () => {
      expect(new ConfigError('bad band', 'INVALID_VALUE').toDetailedString()).toBe(
        'ConfigError [INVALID_VALUE]: bad band',
      );
    });
  });

  describe('subclasses', () => {
    it.each([
      [InvalidSignalError, 'InvalidSignalError'],
      [MissingBaselineError, 'MissingBaselineError'],
      [UnknownGroupingError, 'UnknownGroupingError'],
      [MalformedAggregateError, 'MalformedAggregateError'],
      [ConfigError, 'ConfigError'],
      [StorageError, 'StorageError'],
    ])('%s extends DiagnosticsError', (ErrorClass, name) => {
      const error = new ErrorClass('message', 'CODE');
      expect(error).toBeInstanceOf(DiagnosticsError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
    });
  });

  describe('type guards', () => {
    const signal = new InvalidSignalError('x', 'EMPTY_SIGNAL');
    const baseline = new MissingBaselineError('x', 'INSUFFICIENT_TRIALS');
    const grouping = new UnknownGroupingError('x', 'MISSING_SET_ID');
    const aggregate = new MalformedAggregateError('x', 'MISSING_SERIES');
    const config = new ConfigError('x', 'CONFIG_INVALID');

    it('recognize their own class only', () => {
      expect(isInvalidSignalError(signal)).toBe(true);
      expect(isInvalidSignalError(grouping)).toBe(false);
      expect(isMissingBaselineError(baseline)).toBe(true);
      expect(isMissingBaselineError(signal)).toBe(false);
      expect(isUnknownGroupingError(grouping)).toBe(true);
      expect(isUnknownGroupingError(new Error('x'))).toBe(false);
      expect(isMalformedAggregateError(aggregate)).toBe(true);
      expect(isConfigError(config)).toBe(true);
      expect(isConfigError('CONFIG_INVALID')).toBe(false);
    });

    it('isErrorWithCode matches on code', () => {
      expect(isErrorWithCode(signal, 'EMPTY_SIGNAL')).toBe(true);
      expect(isErrorWithCode(signal, 'NON_MONOTONIC')).toBe(false);
      expect(isErrorWithCode(new Error('EMPTY_SIGNAL'), 'EMPTY_SIGNAL')).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('returns diagnostics errors unchanged', () => {
      const error = new StorageError('missing', 'RUN_NOT_FOUND');
      expect(wrapError(error)).toBe(error);
    });

    it('wraps plain errors with UNKNOWN code', () => {
      const cause = new Error('disk full');
      const wrapped = wrapError(cause);

      expect(wrapped.code).toBe('UNKNOWN');
      expect(wrapped.message).toBe('disk full');
      expect(wrapped.cause).toBe(cause);
    });

    it('uses the supplied message', () => {
      const wrapped = wrapError('boom', 'Run failed');
      expect(wrapped.message).toBe('Run failed');
      expect(wrapped.cause?.message).toBe('boom');
    });
  });
});
