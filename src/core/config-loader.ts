import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { RebuildConfigSchema, defaultRebuildConfig, type RebuildConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createPathsContext, type PathsContext } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "env" | "defaults";

export type LoadedConfig = {
  config: RebuildConfig;
  configPath: string | null;
  source: ConfigSource;
};

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Pass --config <path> pointing at an existing file, or unset FLAKEREF_CONFIG.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  return { line: line + 1, column: column + 1 };
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveConfigPath(args: {
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
}): { configPath: string | null; source: ConfigSource } {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  const envPath = (args.env ?? process.env).FLAKEREF_CONFIG;
  if (envPath && envPath.length > 0) {
    return { configPath: path.resolve(envPath), source: "env" };
  }

  return { configPath: null, source: "defaults" };
}

export function loadConfig(args: { explicitPath?: string; env?: NodeJS.ProcessEnv } = {}): LoadedConfig {
  const env = args.env ?? process.env;
  const { configPath, source } = resolveConfigPath({ explicitPath: args.explicitPath, env });

  if (!configPath) {
    return { config: defaultRebuildConfig(), configPath: null, source };
  }

  return { config: loadConfigFile(configPath, env), configPath, source };
}

export function loadConfigFile(configPath: string, env: NodeJS.ProcessEnv = process.env): RebuildConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found at ${absolutePath}.`, undefined, MISSING_CONFIG_HINT);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveYamlErrorLocation(err);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(
      `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
      err,
    );
  }

  // An empty file loads as undefined; treat it as "all defaults".
  const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [], env });

  const parsed = RebuildConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid config at ${absolutePath}:\n${details}`, parsed.error);
  }

  const cfg = parsed.data;
  const configDir = path.dirname(absolutePath);

  // Relative paths are relative to the config file, not the working directory.
  return {
    ...cfg,
    paths: {
      system_profile: path.resolve(configDir, cfg.paths.system_profile),
      profiles_dir: path.resolve(configDir, cfg.paths.profiles_dir),
      default_flake: path.resolve(configDir, cfg.paths.default_flake),
    },
  };
}

export function pathsFromConfig(config: RebuildConfig): PathsContext {
  return createPathsContext({
    systemProfile: config.paths.system_profile,
    profilesDir: config.paths.profiles_dir,
    defaultFlake: config.paths.default_flake,
  });
}
