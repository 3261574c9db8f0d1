/**
 * CliContext bundles the loaded config and the paths derived from it.
 * Purpose: resolve --config / FLAKEREF_CONFIG once per command and pass paths explicitly.
 * Usage: const ctx = loadCliContext({ explicitConfigPath: globals.config });
 */

import type { RebuildConfig } from "../core/config.js";
import { loadConfig, pathsFromConfig, type ConfigSource } from "../core/config-loader.js";
import type { PathsContext } from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type GlobalCliOptions = {
  config?: string;
  debug?: boolean;
  verbose?: boolean;
};

export type CliContext = {
  config: RebuildConfig;
  configPath: string | null;
  configSource: ConfigSource;
  paths: PathsContext;
  env: NodeJS.ProcessEnv;
  debug: boolean;
  verbose: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadCliContext(
  globals: GlobalCliOptions,
  env: NodeJS.ProcessEnv = process.env,
): CliContext {
  const { config, configPath, source } = loadConfig({ explicitPath: globals.config, env });

  return {
    config,
    configPath,
    configSource: source,
    paths: pathsFromConfig(config),
    env,
    debug: globals.debug ?? false,
    verbose: globals.verbose ?? false,
  };
}
