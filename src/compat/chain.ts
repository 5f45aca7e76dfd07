/**
 * Profile chains.
 *
 * A chain is the linear, version-ordered sequence of compatibility
 * profiles from which the lookup table is built. It can be assembled from
 * an ordered declaration list, from the fluent ProfileChainBuilder, or
 * from declarations that name their predecessor, which are first
 * flattened into a single path.
 *
 * All assembly failures are ladder defects: they are logged and thrown.
 */

import { chainDefect } from './defect';
import { FlagSet } from './flags';
import { CompatibilityProfile } from './profile';
import {
  ambiguousChainError,
  brokenChainError,
  emptyChainError,
  nonMonotonicVersionError,
} from '../domain/errors';
import { toVersionSpec, VersionSpec } from '../version/version-spec';

/** One step of an ordered chain declaration. */
export interface ProfileDeclaration<F> {
  /** Version from which this step's flag values apply. */
  version: VersionSpec | string;
  /** Display name; defaults to the version text. */
  name?: string;
  /** Flags this step changes relative to its predecessor. */
  overrides?: Partial<F>;
}

/** A declaration that names its predecessor instead of relying on list order. */
export interface LinkedProfileDeclaration<F> extends ProfileDeclaration<F> {
  name: string;
  /** Name of the predecessor; omitted only for the root. */
  extends?: string;
}

export class ProfileChain<F extends FlagSet<F>> implements Iterable<CompatibilityProfile<F>> {
  readonly profiles: readonly CompatibilityProfile<F>[];

  constructor(profiles: readonly CompatibilityProfile<F>[]) {
    assertLinear(profiles);
    this.profiles = Object.freeze([...profiles]);
  }

  get length(): number {
    return this.profiles.length;
  }

  get root(): CompatibilityProfile<F> {
    return this.profiles[0];
  }

  /** The newest profile. */
  get head(): CompatibilityProfile<F> {
    return this.profiles[this.profiles.length - 1];
  }

  versions(): VersionSpec[] {
    return this.profiles.map((p) => p.introducedAt);
  }

  [Symbol.iterator](): Iterator<CompatibilityProfile<F>> {
    return this.profiles[Symbol.iterator]();
  }
}

/**
 * Check that every profile's predecessor is the entry before it and that
 * versions strictly increase.
 */
function assertLinear<F extends FlagSet<F>>(profiles: readonly CompatibilityProfile<F>[]): void {
  if (profiles.length === 0) {
    throw chainDefect(emptyChainError());
  }

  profiles.forEach((profile, index) => {
    const expected = index === 0 ? undefined : profiles[index - 1];
    if (profile.predecessor === expected) return;

    if (index === 0) {
      throw chainDefect(
        brokenChainError(`Chain starts at ${profile.name}, which derives from ${profile.predecessor?.name}`, {
          profile: profile.name,
        }),
      );
    }
    throw chainDefect(
      ambiguousChainError(
        `Profile ${profile.name} does not derive from the preceding profile ${expected?.name}`,
        { profile: profile.name, expected: expected?.name, actual: profile.predecessor?.name },
      ),
    );
  });

  for (let i = 1; i < profiles.length; i++) {
    const previous = profiles[i - 1].introducedAt;
    const current = profiles[i].introducedAt;
    if (!current.isGreaterThan(previous)) {
      throw chainDefect(nonMonotonicVersionError(previous.toString(), current.toString()));
    }
  }
}

/**
 * Build a chain from an ordered declaration list. The first entry is the
 * root and starts from `defaults`; every later entry derives from the
 * entry before it.
 */
export function buildProfileChain<F extends FlagSet<F>>(
  declarations: readonly ProfileDeclaration<F>[],
  defaults: F,
): ProfileChain<F> {
  if (declarations.length === 0) {
    throw chainDefect(emptyChainError());
  }

  const profiles: CompatibilityProfile<F>[] = [];
  for (const declaration of declarations) {
    const version = toVersionSpec(declaration.version);
    const name = declaration.name ?? version.toString();
    const previous = profiles[profiles.length - 1];

    if (previous === undefined) {
      profiles.push(CompatibilityProfile.root(version, name, defaults, declaration.overrides));
      continue;
    }
    if (!version.isGreaterThan(previous.introducedAt)) {
      throw chainDefect(nonMonotonicVersionError(previous.introducedAt.toString(), version.toString()));
    }
    profiles.push(previous.derive(version, name, declaration.overrides));
  }

  return new ProfileChain(profiles);
}

/**
 * Order parent-linked declarations into a single root-to-leaf path.
 *
 * Fails with CHAIN.AMBIGUOUS when names repeat, when there is more than
 * one root, or when a declaration has more than one direct successor;
 * with CHAIN.BROKEN when a predecessor is undefined or some declarations
 * cannot be reached from the root.
 */
export function flattenProfileLineage<F>(
  declarations: readonly LinkedProfileDeclaration<F>[],
): LinkedProfileDeclaration<F>[] {
  if (declarations.length === 0) {
    throw chainDefect(emptyChainError());
  }

  const byName = new Map<string, LinkedProfileDeclaration<F>>();
  for (const declaration of declarations) {
    if (byName.has(declaration.name)) {
      throw chainDefect(
        ambiguousChainError(`Profile name ${declaration.name} is declared more than once`, {
          profile: declaration.name,
        }),
      );
    }
    byName.set(declaration.name, declaration);
  }

  const roots: LinkedProfileDeclaration<F>[] = [];
  const successors = new Map<string, LinkedProfileDeclaration<F>>();
  for (const declaration of declarations) {
    if (declaration.extends === undefined) {
      roots.push(declaration);
      continue;
    }
    if (!byName.has(declaration.extends)) {
      throw chainDefect(
        brokenChainError(`Profile ${declaration.name} extends undefined profile ${declaration.extends}`, {
          profile: declaration.name,
          extends: declaration.extends,
        }),
      );
    }
    const sibling = successors.get(declaration.extends);
    if (sibling) {
      throw chainDefect(
        ambiguousChainError(
          `Profile ${declaration.extends} has more than one direct successor: ${sibling.name}, ${declaration.name}`,
          { profile: declaration.extends, successors: [sibling.name, declaration.name] },
        ),
      );
    }
    successors.set(declaration.extends, declaration);
  }

  if (roots.length > 1) {
    throw chainDefect(
      ambiguousChainError(`Chain has more than one root: ${roots.map((r) => r.name).join(', ')}`, {
        roots: roots.map((r) => r.name),
      }),
    );
  }
  if (roots.length === 0) {
    throw chainDefect(brokenChainError('Chain has no root: every profile extends another'));
  }

  const ordered: LinkedProfileDeclaration<F>[] = [];
  let current: LinkedProfileDeclaration<F> | undefined = roots[0];
  while (current) {
    ordered.push(current);
    current = successors.get(current.name);
  }

  if (ordered.length !== declarations.length) {
    const reached = new Set(ordered.map((d) => d.name));
    const unreachable = declarations.filter((d) => !reached.has(d.name)).map((d) => d.name);
    throw chainDefect(
      brokenChainError(`Profiles unreachable from root ${ordered[0].name}: ${unreachable.join(', ')}`, {
        unreachable,
      }),
    );
  }

  return ordered;
}

/** Flatten parent-linked declarations, then build the chain. */
export function buildProfileChainFromLineage<F extends FlagSet<F>>(
  declarations: readonly LinkedProfileDeclaration<F>[],
  defaults: F,
): ProfileChain<F> {
  return buildProfileChain(flattenProfileLineage(declarations), defaults);
}

/**
 * Fluent chain assembly.
 *
 *   const chain = new ProfileChainBuilder(DEFAULTS)
 *     .root('1.0.0')
 *     .step('2.0.0', { strictMode: true })
 *     .build();
 */
export class ProfileChainBuilder<F extends FlagSet<F>> {
  private readonly declarations: ProfileDeclaration<F>[] = [];

  constructor(private readonly defaults: F) {}

  root(version: VersionSpec | string, overrides?: Partial<F>, name?: string): this {
    if (this.declarations.length > 0) {
      throw chainDefect(
        ambiguousChainError(`Chain already has a root; cannot add ${String(version)} as a second root`, {
          version: String(version),
        }),
      );
    }
    this.declarations.push({ version, overrides, name });
    return this;
  }

  step(version: VersionSpec | string, overrides?: Partial<F>, name?: string): this {
    if (this.declarations.length === 0) {
      throw chainDefect(
        brokenChainError(`Step ${String(version)} has no predecessor; declare a root first`, {
          version: String(version),
        }),
      );
    }
    this.declarations.push({ version, overrides, name });
    return this;
  }

  build(): ProfileChain<F> {
    return buildProfileChain(this.declarations, this.defaults);
  }
}
