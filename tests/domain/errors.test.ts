import {
  ambiguousChainError,
  brokenChainError,
  COMPAT_ERROR_CODES,
  CompatError,
  createTypedError,
  emptyChainError,
  flagTypeMismatchError,
  isCompatError,
  malformedVersionError,
  nonMonotonicVersionError,
  unknownFlagError,
  unsupportedVersionError,
  versionTooNewError,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError fills defaults', () => {
    const error = createTypedError({ code: 'TEST', message: 'test' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
    expect(error.details).toBeUndefined();
  });

  test('every error kind has a distinct code', () => {
    const codes = Object.values(COMPAT_ERROR_CODES);
    expect(new Set(codes).size).toBe(codes.length);
  });

  test('malformedVersionError', () => {
    const error = malformedVersionError('5.x', 'component "x" is not a non-negative integer');
    expect(error.code).toBe('VERSION.MALFORMED');
    expect(error.message).toBe('Malformed version "5.x": component "x" is not a non-negative integer');
    expect(error.suggestedFixes[0].type).toBe('USE_DOTTED_VERSION');
  });

  test('nonMonotonicVersionError names both versions', () => {
    const error = nonMonotonicVersionError('2.0.0', '1.0.0');
    expect(error.code).toBe('CHAIN.NON_MONOTONIC_VERSION');
    expect(error.message).toContain('1.0.0');
    expect(error.message).toContain('2.0.0');
    expect(error.details).toEqual({ previous: '2.0.0', offending: '1.0.0' });
  });

  test('chain structure errors', () => {
    expect(ambiguousChainError('two roots').code).toBe('CHAIN.AMBIGUOUS');
    expect(brokenChainError('no root').code).toBe('CHAIN.BROKEN');
    expect(emptyChainError().code).toBe('CHAIN.EMPTY');
    expect(emptyChainError().suggestedFixes[0].type).toBe('ADD_ROOT_PROFILE');
  });

  test('flag errors', () => {
    expect(unknownFlagError('flagZ', '2.0.0').details).toEqual({ flag: 'flagZ', profile: '2.0.0' });
    expect(flagTypeMismatchError('flagA', 'boolean', 'list', '2.0.0').code).toBe('CHAIN.FLAG_TYPE_MISMATCH');
  });

  test('unsupportedVersionError suggests the minimum version', () => {
    const error = unsupportedVersionError('4.0.0', '5.0.0');
    expect(error.code).toBe('RESOLVE.UNSUPPORTED_VERSION');
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([
      { type: 'RAISE_DECLARED_VERSION', params: { version: '5.0.0' }, description: 'Declare version 5.0.0 or newer' },
    ]);
  });

  test('versionTooNewError suggests upgrading the tool', () => {
    const error = versionTooNewError('6.0.0', '5.210.2');
    expect(error.code).toBe('RESOLVE.VERSION_TOO_NEW');
    expect(error.details).toEqual({ requested: '6.0.0', toolVersion: '5.210.2' });
  });
});

describe('CompatError', () => {
  test('carries the typed error', () => {
    const typed = emptyChainError();
    const err = new CompatError(typed);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('CompatError');
    expect(err.message).toBe(typed.message);
    expect(err.code).toBe('CHAIN.EMPTY');
    expect(err.typedError).toBe(typed);
  });

  test('isCompatError narrows by code', () => {
    const err = new CompatError(emptyChainError());
    expect(isCompatError(err)).toBe(true);
    expect(isCompatError(err, COMPAT_ERROR_CODES.EmptyChain)).toBe(true);
    expect(isCompatError(err, COMPAT_ERROR_CODES.BrokenChain)).toBe(false);
    expect(isCompatError(new Error('plain'))).toBe(false);
    expect(isCompatError('CHAIN.EMPTY')).toBe(false);
  });
});
