/**
 * Typed error model for compatibility resolution.
 *
 * Every failure is described by a TypedError with a namespaced code so
 * that the build tool embedding the resolver can tell a defect in the
 * declared ladder apart from a project that declares an unsupported
 * version. Errors are thrown wrapped in a CompatError.
 */

/** Typed suggested fix that a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure carried by every CompatError. */
export interface TypedError {
  /** Namespaced error code (e.g., "CHAIN.NON_MONOTONIC_VERSION"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Error codes raised by this library, keyed by error kind. */
export const COMPAT_ERROR_CODES = {
  MalformedVersion: 'VERSION.MALFORMED',
  NonMonotonicVersion: 'CHAIN.NON_MONOTONIC_VERSION',
  AmbiguousChain: 'CHAIN.AMBIGUOUS',
  EmptyChain: 'CHAIN.EMPTY',
  BrokenChain: 'CHAIN.BROKEN',
  UnknownFlag: 'CHAIN.UNKNOWN_FLAG',
  FlagTypeMismatch: 'CHAIN.FLAG_TYPE_MISMATCH',
  UnsupportedVersion: 'RESOLVE.UNSUPPORTED_VERSION',
  VersionTooNew: 'RESOLVE.VERSION_TOO_NEW',
} as const;

export type CompatErrorKind = keyof typeof COMPAT_ERROR_CODES;
export type CompatErrorCode = (typeof COMPAT_ERROR_CODES)[CompatErrorKind];

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Thrown wrapper around a TypedError. */
export class CompatError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'CompatError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** Narrow an unknown thrown value to a CompatError, optionally of one code. */
export function isCompatError(err: unknown, code?: CompatErrorCode): err is CompatError {
  if (!(err instanceof CompatError)) return false;
  return code === undefined || err.code === code;
}

// --- VERSION ---

export function malformedVersionError(text: string, reason: string): TypedError {
  return createTypedError({
    code: COMPAT_ERROR_CODES.MalformedVersion,
    message: `Malformed version "${text}": ${reason}`,
    details: { version: text, reason },
    suggestedFixes: [
      {
        type: 'USE_DOTTED_VERSION',
        params: { example: '5.2.0' },
        description: 'Use dot-separated non-negative integers, e.g. "5.2.0"',
      },
    ],
  });
}

// --- CHAIN ---

export function nonMonotonicVersionError(previous: string, offending: string): TypedError {
  return createTypedError({
    code: COMPAT_ERROR_CODES.NonMonotonicVersion,
    message: `Compatibility version ${offending} does not follow ${previous}: versions must strictly increase along the chain`,
    details: { previous, offending },
  });
}

export function ambiguousChainError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: COMPAT_ERROR_CODES.AmbiguousChain,
    message,
    details,
  });
}

export function emptyChainError(): TypedError {
  return createTypedError({
    code: COMPAT_ERROR_CODES.EmptyChain,
    message: 'Compatibility chain has no entries; at least a root profile is required',
    suggestedFixes: [
      { type: 'ADD_ROOT_PROFILE', params: {}, description: 'Declare the oldest supported profile first' },
    ],
  });
}

export function brokenChainError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: COMPAT_ERROR_CODES.BrokenChain,
    message,
    details,
  });
}

export function unknownFlagError(flag: string, profile: string): TypedError {
  return createTypedError({
    code: COMPAT_ERROR_CODES.UnknownFlag,
    message: `Profile ${profile} overrides flag "${flag}" which has no default in the root profile`,
    details: { flag, profile },
    suggestedFixes: [
      { type: 'ADD_FLAG_DEFAULT', params: { flag }, description: `Declare a default for "${flag}" in the root flag set` },
    ],
  });
}

export function flagTypeMismatchError(flag: string, expected: string, actual: string, profile: string): TypedError {
  return createTypedError({
    code: COMPAT_ERROR_CODES.FlagTypeMismatch,
    message: `Profile ${profile} sets flag "${flag}" to a ${actual} value but its default is a ${expected}`,
    details: { flag, expected, actual, profile },
  });
}

// --- RESOLVE ---

export function unsupportedVersionError(requested: string, minimum: string): TypedError {
  return createTypedError({
    code: COMPAT_ERROR_CODES.UnsupportedVersion,
    message: `Declared version ${requested} is older than the oldest supported compatibility version ${minimum}`,
    details: { requested, minimum },
    suggestedFixes: [
      {
        type: 'RAISE_DECLARED_VERSION',
        params: { version: minimum },
        description: `Declare version ${minimum} or newer`,
      },
    ],
  });
}

export function versionTooNewError(requested: string, toolVersion: string): TypedError {
  return createTypedError({
    code: COMPAT_ERROR_CODES.VersionTooNew,
    message: `Declared version ${requested} is newer than the running tool version ${toolVersion}`,
    details: { requested, toolVersion },
    suggestedFixes: [
      {
        type: 'UPGRADE_TOOL',
        params: { version: requested },
        description: `Upgrade the build tool to ${requested} or newer`,
      },
    ],
  });
}
