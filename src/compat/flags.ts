/**
 * Capability flags.
 *
 * A capability flag is a named, typed behavior switch read by the build
 * components that consume a resolved compatibility profile. Every flag
 * has a default here; the default set is the root profile of the
 * production ladder and later ladder steps only override values.
 */

import { join } from 'path';

/** Values a capability flag may hold. */
export type FlagValue = boolean | string | readonly string[];

/** Shape constraint for a flag set: every property is a FlagValue. */
export type FlagSet<F> = { readonly [K in keyof F]: FlagValue };

/** Runtime kind of a flag value, used to reject overrides of the wrong type. */
export type FlagKind = 'boolean' | 'string' | 'list';

export function flagKind(value: FlagValue): FlagKind {
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'string') return 'string';
  return 'list';
}

/** Where a suite's build output is placed. */
export type SuiteOutputLayout = 'suite-dir' | 'build-subdir';

/** Maven metadata attributes a suite may declare. */
export type MavenMetadataAttribute =
  | 'library-coordinates'
  | 'suite-url'
  | 'suite-developer'
  | 'dist-description';

/** The production capability flags. */
export interface CapabilityFlags {
  /** Suites may declare licenses for libraries and distributions. */
  supportsLicenses: boolean;
  /** Canonical spelling of the per-dependency license attribute. */
  licenseAttribute: string;
  /** Canonical spelling of the suite-level licenses table. */
  licensesAttribute: string;
  /** Canonical spelling of the suite's default license attribute. */
  defaultLicenseAttribute: string;
  supportedMavenMetadata: readonly MavenMetadataAttribute[];
  /** Suites may declare artifact repositories. */
  supportsRepositories: boolean;
  /**
   * Whether the newest input passed to a build task's staleness check is
   * a time stamp file rather than a bare modification time.
   */
  newestInputIsTimeStampFile: boolean;
  suiteOutputLayout: SuiteOutputLayout;
  mavenDeployJavadoc: boolean;
  /** Checkstyle release used for style checks. */
  checkstyleVersion: string;
  /** Extra javadoc arguments. */
  verifySincePresent: readonly string[];
  /**
   * A project must have a Java compliance level at least that of every
   * project it depends on.
   */
  checkDependencyJavaCompliance: boolean;
  improvedImportMatching: boolean;
  /**
   * The constituents of a module derived from a distribution are exactly
   * the constituents of that distribution.
   */
  moduleDepsEqualDistDeps: boolean;
  /** Unit tests run against jars from distributions. */
  useDistsForUnittest: boolean;
  excludeDisableJavaDebugging: boolean;
  /** Lint inputs discovered through version control are made absolute. */
  makeLintVCInputsAbsolute: boolean;
  /** Test projects may only be imported by test projects. */
  disableImportOfTestProjects: boolean;
  /** Native make projects build with -j unless they opt out with single_job. */
  useJobsForMakeByDefault: boolean;
  /**
   * Project attributes from the suite configuration that the project type
   * does not handle itself overwrite values set by its constructor. When
   * false, such attributes are not applied at all, so consumers treat
   * this as a switch on attribute handling rather than a feature gate.
   */
  overwriteProjectAttributes: boolean;
  requireJsonifiableSuite: boolean;
  /** Suite imports may pin a git bref. */
  supportSuiteImportGitBref: boolean;
  enforceTestDistributions: boolean;
  deprecateIsTestProject: boolean;
  /** Static analysis skips projects whose Java compliance is above 8. */
  filterFindbugsProjectsByJavaCompliance: boolean;
  addVersionSuffixToExplicitVersion: boolean;
  /**
   * Jar distributions use the JDK version of the build as an artifact
   * discriminant, so builds with different JDKs do not collide.
   */
  jarsUseJdkDiscriminant: boolean;
  /** Project canonicalization checks that package declarations match source locations. */
  checkPackageLocations: boolean;
  mavenSupportsClassifier: boolean;
  checkCheckstyleConfig: boolean;
  verifyMultireleaseProjects: boolean;
  /** SpotBugs release used for static analysis. */
  spotbugsVersion: string;
}

export type CapabilityFlagName = keyof CapabilityFlags;

/** Defaults of the oldest supported behavior set. */
export const DEFAULT_CAPABILITY_FLAGS: Readonly<CapabilityFlags> = {
  supportsLicenses: false,
  licenseAttribute: 'licence',
  licensesAttribute: 'licences',
  defaultLicenseAttribute: 'defaultLicence',
  supportedMavenMetadata: [],
  supportsRepositories: false,
  newestInputIsTimeStampFile: false,
  suiteOutputLayout: 'suite-dir',
  mavenDeployJavadoc: false,
  checkstyleVersion: '6.0',
  verifySincePresent: [],
  checkDependencyJavaCompliance: false,
  improvedImportMatching: false,
  moduleDepsEqualDistDeps: false,
  useDistsForUnittest: false,
  excludeDisableJavaDebugging: false,
  makeLintVCInputsAbsolute: false,
  disableImportOfTestProjects: false,
  useJobsForMakeByDefault: false,
  overwriteProjectAttributes: true,
  requireJsonifiableSuite: false,
  supportSuiteImportGitBref: true,
  enforceTestDistributions: false,
  deprecateIsTestProject: false,
  filterFindbugsProjectsByJavaCompliance: false,
  addVersionSuffixToExplicitVersion: false,
  jarsUseJdkDiscriminant: false,
  checkPackageLocations: false,
  mavenSupportsClassifier: false,
  checkCheckstyleConfig: false,
  verifyMultireleaseProjects: false,
  spotbugsVersion: '3.0.0',
};

/** Name of the build output directory under the 'build-subdir' layout. */
export const BUILD_OUTPUT_DIR = 'build';

/** Resolve the build output root of a suite located at suiteDir. */
export function suiteOutputRoot(
  flags: Pick<CapabilityFlags, 'suiteOutputLayout'>,
  suiteDir: string,
  outputDirName: string = BUILD_OUTPUT_DIR,
): string {
  return flags.suiteOutputLayout === 'build-subdir' ? join(suiteDir, outputDirName) : suiteDir;
}
