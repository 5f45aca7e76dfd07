/**
 * Compatibility profiles.
 *
 * A profile is the frozen set of capability flag values in effect from its
 * `introducedAt` version onward. The root profile holds every flag at its
 * default; each later profile is derived from its predecessor by copying
 * the predecessor's flags and applying a sparse set of overrides.
 */

import { chainDefect } from './defect';
import { CapabilityFlags, flagKind, FlagSet, FlagValue } from './flags';
import { flagTypeMismatchError, unknownFlagError } from '../domain/errors';
import { VersionSpec } from '../version/version-spec';

export class CompatibilityProfile<F extends FlagSet<F> = CapabilityFlags> {
  private constructor(
    readonly introducedAt: VersionSpec,
    readonly name: string,
    /** Effective flag values. */
    readonly flags: Readonly<F>,
    private readonly overridden: ReadonlySet<keyof F>,
    /** The profile this one was derived from; undefined for the root. */
    readonly predecessor: CompatibilityProfile<F> | undefined,
  ) {
    Object.freeze(this);
  }

  /** Create a root profile: the defaults, with optional overrides applied. */
  static root<F extends FlagSet<F>>(
    introducedAt: VersionSpec,
    name: string,
    defaults: F,
    overrides: Partial<F> = {},
  ): CompatibilityProfile<F> {
    const { flags, overridden } = applyOverrides(defaults, overrides, name);
    return new CompatibilityProfile(introducedAt, name, flags, overridden, undefined);
  }

  /** Derive the next profile. Flags not overridden keep this profile's values. */
  derive(introducedAt: VersionSpec, name: string, overrides: Partial<F> = {}): CompatibilityProfile<F> {
    const { flags, overridden } = applyOverrides(this.flags, overrides, name);
    return new CompatibilityProfile(introducedAt, name, flags, overridden, this);
  }

  get isRoot(): boolean {
    return this.predecessor === undefined;
  }

  get<K extends keyof F>(flag: K): F[K] {
    return this.flags[flag];
  }

  /** Flags whose value this profile set itself. */
  overrides(): Partial<F> {
    const own: Partial<F> = {};
    for (const flag of this.overridden) {
      const value: F[keyof F] = this.flags[flag];
      own[flag] = value;
    }
    return own;
  }

  /** The nearest profile, starting at this one, that set the given flag. */
  definedBy(flag: keyof F): CompatibilityProfile<F> | undefined {
    let current: CompatibilityProfile<F> | undefined = this;
    while (current) {
      if (current.overridden.has(flag)) return current;
      current = current.predecessor;
    }
    return undefined;
  }

  toString(): string {
    return `Compatibility(${this.introducedAt.toString()})`;
  }
}

function isFlagName<F>(flags: Readonly<F>, key: string): key is Extract<keyof F, string> {
  return Object.prototype.hasOwnProperty.call(flags, key);
}

function overrideValue<F, K extends keyof F>(overrides: Partial<F>, key: K): F[K] | undefined {
  return overrides[key];
}

/** A list value the caller cannot mutate; caller-owned lists are copied, never frozen in place. */
function detached<V extends FlagValue>(value: V): V;
function detached(value: FlagValue): FlagValue {
  if (typeof value !== 'object' || Object.isFrozen(value)) return value;
  return Object.freeze([...value]);
}

function applyOverrides<F extends FlagSet<F>>(
  base: Readonly<F>,
  overrides: Partial<F>,
  profileName: string,
): { flags: Readonly<F>; overridden: ReadonlySet<keyof F> } {
  const flags: F = { ...base };
  const overridden = new Set<keyof F>();

  for (const key of Object.keys(overrides)) {
    if (!isFlagName<F>(base, key)) {
      throw chainDefect(unknownFlagError(key, profileName));
    }
    const value = overrideValue<F, Extract<keyof F, string>>(overrides, key);
    if (value === undefined) continue;

    const expected = flagKind(base[key]);
    const actual = flagKind(value);
    if (expected !== actual) {
      throw chainDefect(flagTypeMismatchError(key, expected, actual, profileName));
    }
    flags[key] = detached(value);
    overridden.add(key);
  }

  for (const key of Object.keys(flags)) {
    if (!isFlagName<F>(flags, key)) continue;
    flags[key] = detached(flags[key]);
  }
  return { flags: Object.freeze(flags), overridden };
}
