/**
 * The production compatibility ladder.
 *
 * Each step lists only the flags it changes; everything else is inherited
 * from the step before it. Steps must stay in strictly increasing version
 * order. To change a default behavior, append a step at the release that
 * introduces it and bump CURRENT_COMPAT_VERSION.
 */

import { buildProfileChain, ProfileChain, ProfileDeclaration } from './chain';
import { CapabilityFlags, DEFAULT_CAPABILITY_FLAGS } from './flags';
import { CompatibilityProfile } from './profile';
import { CompatibilityResolver } from './resolver';
import { VersionSpec } from '../version/version-spec';

/** Newest version on the ladder. */
export const CURRENT_COMPAT_VERSION = '5.210.2';

export const COMPATIBILITY_LADDER: readonly ProfileDeclaration<CapabilityFlags>[] = [
  { version: '5.0.0' },
  {
    version: '5.2.0',
    overrides: {
      supportsLicenses: true,
      supportedMavenMetadata: ['library-coordinates', 'suite-url', 'suite-developer', 'dist-description'],
    },
  },
  { version: '5.2.1', overrides: { supportsRepositories: true } },
  {
    version: '5.2.2',
    overrides: {
      licenseAttribute: 'license',
      licensesAttribute: 'licenses',
      defaultLicenseAttribute: 'defaultLicense',
    },
  },
  { version: '5.3.3', overrides: { newestInputIsTimeStampFile: true } },
  { version: '5.5.5', overrides: { suiteOutputLayout: 'build-subdir' } },
  { version: '5.6.6', overrides: { mavenDeployJavadoc: true } },
  { version: '5.6.16', overrides: { checkstyleVersion: '6.15' } },
  { version: '5.9.0', overrides: { verifySincePresent: ['-verifysincepresent'] } },
  {
    version: '5.20.0',
    overrides: { checkDependencyJavaCompliance: true, improvedImportMatching: true },
  },
  { version: '5.34.4', overrides: { moduleDepsEqualDistDeps: true } },
  { version: '5.59.0', overrides: { useDistsForUnittest: true } },
  { version: '5.68.0', overrides: { excludeDisableJavaDebugging: true } },
  { version: '5.110.4', overrides: { makeLintVCInputsAbsolute: true } },
  { version: '5.113.0', overrides: { disableImportOfTestProjects: true } },
  { version: '5.115.0', overrides: { useJobsForMakeByDefault: true } },
  { version: '5.124.7', overrides: { overwriteProjectAttributes: false } },
  { version: '5.133.0', overrides: { requireJsonifiableSuite: true } },
  { version: '5.138.0', overrides: { supportSuiteImportGitBref: false } },
  {
    version: '5.140.0',
    overrides: { enforceTestDistributions: true, deprecateIsTestProject: true },
  },
  { version: '5.149.2', overrides: { filterFindbugsProjectsByJavaCompliance: true } },
  { version: '5.176.0', overrides: { addVersionSuffixToExplicitVersion: true } },
  { version: '5.181.0', overrides: { jarsUseJdkDiscriminant: true } },
  { version: '5.194.0', overrides: { checkPackageLocations: true } },
  { version: '5.195.0', overrides: { mavenSupportsClassifier: true } },
  { version: '5.195.1', overrides: { checkCheckstyleConfig: true } },
  { version: '5.206.1', overrides: { verifyMultireleaseProjects: true } },
  { version: CURRENT_COMPAT_VERSION, overrides: { spotbugsVersion: '3.1.11' } },
];

export function buildCompatibilityChain(): ProfileChain<CapabilityFlags> {
  return buildProfileChain(COMPATIBILITY_LADDER, DEFAULT_CAPABILITY_FLAGS);
}

let defaultResolver: CompatibilityResolver<CapabilityFlags> | undefined;

/**
 * Process-wide resolver over the production ladder. Created on first
 * access; its table is built on first resolution.
 */
export function getDefaultResolver(): CompatibilityResolver<CapabilityFlags> {
  if (!defaultResolver) {
    defaultResolver = new CompatibilityResolver(buildCompatibilityChain);
  }
  return defaultResolver;
}

/** Profile in effect for a project declaring `version`. */
export function getCompatibility(version: VersionSpec | string): CompatibilityProfile<CapabilityFlags> {
  return getDefaultResolver().resolve(version);
}

/** Oldest version a project may declare. */
export function minSupportedVersion(): VersionSpec {
  return getDefaultResolver().minVersion();
}
