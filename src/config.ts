/**
 * Runtime configuration.
 *
 * Read from environment variables:
 *   COMPAT_TOOL_VERSION  version of the running build tool (default: newest ladder version)
 *   COMPAT_LOG_LEVEL     debug | info | warn | error (default: info)
 */

import { CURRENT_COMPAT_VERSION } from './compat/ladder';
import { LogLevel, parseLogLevel, setLogLevel } from './logger';
import { VersionSpec } from './version/version-spec';

export interface CompatConfig {
  /** Version of the running tool; declarations newer than this are rejected. */
  toolVersion: VersionSpec;
  logLevel: LogLevel;
}

/** Build configuration from the environment. Throws VERSION.MALFORMED on a bad tool version. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CompatConfig {
  const toolVersion = env.COMPAT_TOOL_VERSION?.trim() || CURRENT_COMPAT_VERSION;
  return {
    toolVersion: VersionSpec.parse(toolVersion),
    logLevel: parseLogLevel(env.COMPAT_LOG_LEVEL) ?? LogLevel.Info,
  };
}

/** Apply process-wide settings from a loaded configuration. */
export function applyConfig(config: CompatConfig): void {
  setLogLevel(config.logLevel);
}
