/**
 * Compatibility resolver.
 *
 * Owns a chain factory and the table built from it. The table is built
 * on first use and then reused for the life of the resolver; callers that
 * share a resolver share a single table instance.
 *
 * Usage:
 *   const resolver = new CompatibilityResolver(() => buildProfileChain(LADDER, DEFAULTS));
 *   const profile = resolver.resolve(project.declaredVersion);
 *   if (profile.flags.supportsLicenses) { ... }
 */

import { ProfileChain } from './chain';
import { chainDefect } from './defect';
import { FlagSet } from './flags';
import { CompatibilityProfile } from './profile';
import { CompatibilityTable } from './table';
import {
  brokenChainError,
  CompatError,
  TypedError,
  unsupportedVersionError,
  versionTooNewError,
} from '../domain/errors';
import { logger } from '../logger';
import { toVersionSpec, VersionSpec } from '../version/version-spec';

const log = logger.child({ module: 'resolver' });

export type ChainFactory<F extends FlagSet<F>> = () => ProfileChain<F>;

export class CompatibilityResolver<F extends FlagSet<F>> {
  private table: CompatibilityTable<F> | undefined;
  private building = false;

  constructor(private readonly chainFactory: ChainFactory<F>) {}

  /** Whether the table has been built. */
  get isBuilt(): boolean {
    return this.table !== undefined;
  }

  /**
   * Build the table on first call; return the same instance afterwards.
   * A chain factory that reaches back into its own resolver while the
   * table is being built is a ladder defect.
   */
  build(): CompatibilityTable<F> {
    if (this.table) return this.table;
    if (this.building) {
      throw chainDefect(brokenChainError('Chain factory re-entered the resolver while the table was being built'));
    }

    this.building = true;
    try {
      const table = CompatibilityTable.fromChain(this.chainFactory());
      log.debug('Compatibility table built', {
        entries: table.size,
        minVersion: table.minVersion().toString(),
        maxVersion: table.maxVersion().toString(),
      });
      this.table = table;
      return table;
    } finally {
      this.building = false;
    }
  }

  minVersion(): VersionSpec {
    return this.build().minVersion();
  }

  maxVersion(): VersionSpec {
    return this.build().maxVersion();
  }

  /**
   * Profile in effect for the given version. Throws
   * RESOLVE.UNSUPPORTED_VERSION when the version predates the root.
   */
  resolve(query: VersionSpec | string): CompatibilityProfile<F> {
    const version = toVersionSpec(query);
    const table = this.build();
    const profile = table.tryResolve(version);
    if (profile === undefined) {
      throw rejected(unsupportedVersionError(version.toString(), table.minVersion().toString()));
    }
    return profile;
  }

  tryResolve(query: VersionSpec | string): CompatibilityProfile<F> | undefined {
    return this.build().tryResolve(query);
  }

  /**
   * Validate a project's declared version against the running tool and
   * return its profile. A declaration newer than the tool fails with
   * RESOLVE.VERSION_TOO_NEW; one older than the root fails with
   * RESOLVE.UNSUPPORTED_VERSION.
   */
  checkDeclaredVersion(declared: VersionSpec | string, toolVersion: VersionSpec | string): CompatibilityProfile<F> {
    const version = toVersionSpec(declared);
    const tool = toVersionSpec(toolVersion);
    if (version.isGreaterThan(tool)) {
      throw rejected(versionTooNewError(version.toString(), tool.toString()));
    }
    return this.resolve(version);
  }
}

function rejected(error: TypedError): CompatError {
  log.warn(error.message, { code: error.code, ...error.details });
  return new CompatError(error);
}
