/**
 * Compatibility table.
 *
 * An immutable, ascending (version, profile) table built from a profile
 * chain. A flag value holds from the version that introduced it until a
 * later entry overrides it, so the profile in effect for a query version
 * is the one at the greatest table version not above the query.
 */

import { chainDefect } from './defect';
import { FlagSet } from './flags';
import { CompatibilityProfile } from './profile';
import { ProfileChain } from './chain';
import { CompatError, nonMonotonicVersionError, unsupportedVersionError } from '../domain/errors';
import { toVersionSpec, VersionSpec } from '../version/version-spec';

export interface TableEntry<F extends FlagSet<F>> {
  readonly version: VersionSpec;
  readonly profile: CompatibilityProfile<F>;
}

export class CompatibilityTable<F extends FlagSet<F>> {
  private constructor(
    private readonly keys: readonly VersionSpec[],
    private readonly profiles: readonly CompatibilityProfile<F>[],
  ) {
    Object.freeze(this);
  }

  /** Build the table, re-checking that versions strictly increase. */
  static fromChain<F extends FlagSet<F>>(chain: ProfileChain<F>): CompatibilityTable<F> {
    const keys: VersionSpec[] = [];
    const profiles: CompatibilityProfile<F>[] = [];

    for (const profile of chain) {
      const previous = keys[keys.length - 1];
      if (previous !== undefined && !profile.introducedAt.isGreaterThan(previous)) {
        throw chainDefect(nonMonotonicVersionError(previous.toString(), profile.introducedAt.toString()));
      }
      keys.push(profile.introducedAt);
      profiles.push(profile);
    }

    return new CompatibilityTable(Object.freeze(keys), Object.freeze(profiles));
  }

  get size(): number {
    return this.keys.length;
  }

  /** The oldest supported version: the root profile's version. */
  minVersion(): VersionSpec {
    return this.keys[0];
  }

  maxVersion(): VersionSpec {
    return this.keys[this.keys.length - 1];
  }

  versions(): readonly VersionSpec[] {
    return this.keys;
  }

  entries(): TableEntry<F>[] {
    return this.keys.map((version, i) => ({ version, profile: this.profiles[i] }));
  }

  /**
   * Profile in effect at `query`. Throws RESOLVE.UNSUPPORTED_VERSION when
   * the query is older than the root version.
   */
  resolve(query: VersionSpec | string): CompatibilityProfile<F> {
    const version = toVersionSpec(query);
    const profile = this.tryResolve(version);
    if (profile === undefined) {
      throw new CompatError(unsupportedVersionError(version.toString(), this.minVersion().toString()));
    }
    return profile;
  }

  /** Like resolve(), but returns undefined for versions older than the root. */
  tryResolve(query: VersionSpec | string): CompatibilityProfile<F> | undefined {
    const index = this.upperBound(toVersionSpec(query)) - 1;
    return index < 0 ? undefined : this.profiles[index];
  }

  /** Index of the first key greater than `version` (bisect right). */
  private upperBound(version: VersionSpec): number {
    let lo = 0;
    let hi = this.keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (version.isLessThan(this.keys[mid])) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }
    return lo;
  }
}
