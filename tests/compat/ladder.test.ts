import {
  buildCompatibilityChain,
  COMPATIBILITY_LADDER,
  CURRENT_COMPAT_VERSION,
  getCompatibility,
  getDefaultResolver,
  minSupportedVersion,
} from '../../src/compat/ladder';
import { DEFAULT_CAPABILITY_FLAGS, suiteOutputRoot } from '../../src/compat/flags';
import { COMPAT_ERROR_CODES, isCompatError } from '../../src/domain/errors';
import { setLogHandler } from '../../src/logger';
import { VersionSpec } from '../../src/version/version-spec';

describe('production compatibility ladder', () => {
  beforeEach(() => setLogHandler(jest.fn()));
  afterEach(() => setLogHandler());

  test('builds without defects', () => {
    const chain = buildCompatibilityChain();
    expect(chain.length).toBe(COMPATIBILITY_LADDER.length);
    expect(chain.root.flags).toEqual(DEFAULT_CAPABILITY_FLAGS);
  });

  test('spans 5.0.0 to the current version', () => {
    expect(minSupportedVersion().toString()).toBe('5.0.0');
    expect(getDefaultResolver().maxVersion().toString()).toBe(CURRENT_COMPAT_VERSION);
  });

  test('every step overrides at least one flag', () => {
    const chain = buildCompatibilityChain();
    for (const profile of chain.profiles.slice(1)) {
      expect(Object.keys(profile.overrides()).length).toBeGreaterThan(0);
    }
  });

  test('default resolver is shared', () => {
    expect(getDefaultResolver()).toBe(getDefaultResolver());
    expect(getCompatibility('5.2.0')).toBe(getCompatibility('5.2.0'));
  });

  test('oldest profile spells license attributes the British way', () => {
    const compat = getCompatibility('5.0.0');
    expect(compat.flags.supportsLicenses).toBe(false);
    expect(compat.flags.licenseAttribute).toBe('licence');
    expect(compat.flags.supportedMavenMetadata).toEqual([]);
  });

  test('5.2.1 supports repositories but keeps the old spelling', () => {
    const compat = getCompatibility('5.2.1');
    expect(compat.flags.supportsRepositories).toBe(true);
    expect(compat.flags.supportsLicenses).toBe(true);
    expect(compat.flags.licensesAttribute).toBe('licences');
  });

  test('5.2.2 switches to the American spelling', () => {
    const compat = getCompatibility('5.2.2');
    expect(compat.flags.licenseAttribute).toBe('license');
    expect(compat.flags.licensesAttribute).toBe('licenses');
    expect(compat.flags.defaultLicenseAttribute).toBe('defaultLicense');
  });

  test('checkstyle version changes at 5.6.16, not 5.6.2', () => {
    expect(getCompatibility('5.6.2').flags.checkstyleVersion).toBe('6.0');
    expect(getCompatibility('5.6.15').flags.checkstyleVersion).toBe('6.0');
    expect(getCompatibility('5.6.16').flags.checkstyleVersion).toBe('6.15');
  });

  test('attribute overwriting stops at 5.124.7', () => {
    expect(getCompatibility('5.124.6').flags.overwriteProjectAttributes).toBe(true);
    expect(getCompatibility('5.124.7').flags.overwriteProjectAttributes).toBe(false);
    expect(getCompatibility('5.124.7').definedBy('overwriteProjectAttributes')?.introducedAt.toString()).toBe(
      '5.124.7',
    );
  });

  test('5.140.0 turns on two flags at once', () => {
    const compat = getCompatibility('5.140.0');
    expect(compat.flags.enforceTestDistributions).toBe(true);
    expect(compat.flags.deprecateIsTestProject).toBe(true);
    expect(compat.overrides()).toEqual({ enforceTestDistributions: true, deprecateIsTestProject: true });
  });

  test('newest profile carries every change', () => {
    const compat = getCompatibility(CURRENT_COMPAT_VERSION);
    expect(compat.flags.spotbugsVersion).toBe('3.1.11');
    expect(compat.flags.supportSuiteImportGitBref).toBe(false);
    expect(compat.flags.verifySincePresent).toEqual(['-verifysincepresent']);
    expect(compat.flags.suiteOutputLayout).toBe('build-subdir');
  });

  test('versions before 5.0.0 are unsupported', () => {
    let caught: unknown;
    try {
      getCompatibility('4.9.9');
    } catch (err) {
      caught = err;
    }
    expect(isCompatError(caught, COMPAT_ERROR_CODES.UnsupportedVersion)).toBe(true);
  });

  test('declared versions resolve through the tool version check', () => {
    const resolver = getDefaultResolver();
    expect(resolver.checkDeclaredVersion('5.59.3', CURRENT_COMPAT_VERSION).introducedAt).toEqual(
      VersionSpec.parse('5.59.0'),
    );
  });
});

describe('suiteOutputRoot', () => {
  test('uses the suite directory before 5.5.5', () => {
    expect(suiteOutputRoot(getCompatibility('5.5.4').flags, '/work/suite')).toBe('/work/suite');
  });

  test('uses a build subdirectory from 5.5.5', () => {
    expect(suiteOutputRoot(getCompatibility('5.5.5').flags, '/work/suite')).toBe('/work/suite/build');
    expect(suiteOutputRoot({ suiteOutputLayout: 'build-subdir' }, '/work/suite', 'out')).toBe('/work/suite/out');
  });
});
