/**
 * compat-ladder: version-gated compatibility resolution for build tooling.
 *
 * A build tool evolves its default behaviors by appending steps to a
 * compatibility ladder. A project declares the oldest tool version whose
 * behavior it expects, and the resolver maps that declaration to the set
 * of capability flags in effect at that version.
 *
 *   import { getCompatibility } from 'compat-ladder';
 *
 *   const compat = getCompatibility(suite.declaredVersion);
 *   const attr = compat.flags.licenseAttribute;
 */

export * from './compat';
export * from './config';
export * from './domain';
export * from './logger';
export * from './version';
