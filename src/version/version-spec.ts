/**
 * Dotted version numbers.
 *
 * A VersionSpec is an immutable sequence of non-negative integer
 * components. Ordering is component-wise; a missing trailing component
 * compares as zero, so "5.2" and "5.2.0" are equal.
 */

import { CompatError, malformedVersionError } from '../domain/errors';

const COMPONENT_PATTERN = /^\d+$/;

export type VersionOrdering = -1 | 0 | 1;

export class VersionSpec {
  private constructor(readonly components: readonly number[]) {
    Object.freeze(this);
  }

  /** Parse a dotted string such as "5.124.7". Throws VERSION.MALFORMED. */
  static parse(text: string): VersionSpec {
    if (text.length === 0) {
      throw new CompatError(malformedVersionError(text, 'version is empty'));
    }
    if (text.trim() !== text) {
      throw new CompatError(malformedVersionError(text, 'version has surrounding whitespace'));
    }

    const components = text.split('.').map((part, index) => {
      if (part.length === 0) {
        throw new CompatError(malformedVersionError(text, `component ${index + 1} is empty`));
      }
      if (!COMPONENT_PATTERN.test(part)) {
        throw new CompatError(malformedVersionError(text, `component "${part}" is not a non-negative integer`));
      }
      const value = Number(part);
      if (!Number.isSafeInteger(value)) {
        throw new CompatError(malformedVersionError(text, `component "${part}" is too large`));
      }
      return value;
    });

    return new VersionSpec(Object.freeze(components));
  }

  /** Build a version from numeric components. */
  static of(...components: number[]): VersionSpec {
    if (components.length === 0) {
      throw new CompatError(malformedVersionError('', 'version is empty'));
    }
    for (const component of components) {
      if (!Number.isSafeInteger(component) || component < 0) {
        throw new CompatError(
          malformedVersionError(components.join('.'), `component "${component}" is not a non-negative integer`),
        );
      }
    }
    return new VersionSpec(Object.freeze([...components]));
  }

  compare(other: VersionSpec): VersionOrdering {
    const length = Math.max(this.components.length, other.components.length);
    for (let i = 0; i < length; i++) {
      const a = this.components[i] ?? 0;
      const b = other.components[i] ?? 0;
      if (a < b) return -1;
      if (a > b) return 1;
    }
    return 0;
  }

  equals(other: VersionSpec): boolean {
    return this.compare(other) === 0;
  }

  isLessThan(other: VersionSpec): boolean {
    return this.compare(other) < 0;
  }

  isGreaterThan(other: VersionSpec): boolean {
    return this.compare(other) > 0;
  }

  isAtLeast(other: VersionSpec): boolean {
    return this.compare(other) >= 0;
  }

  isAtMost(other: VersionSpec): boolean {
    return this.compare(other) <= 0;
  }

  toString(): string {
    return this.components.join('.');
  }

  toJSON(): string {
    return this.toString();
  }
}

/** Accept either a parsed version or its dotted text. */
export function toVersionSpec(version: VersionSpec | string): VersionSpec {
  return version instanceof VersionSpec ? version : VersionSpec.parse(version);
}

/** Comparator for Array.prototype.sort. */
export function compareVersions(a: VersionSpec | string, b: VersionSpec | string): VersionOrdering {
  return toVersionSpec(a).compare(toVersionSpec(b));
}
