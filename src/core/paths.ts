import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  systemProfile: string;
  profilesDir: string;
  defaultFlake: string;
};

export type PathsOverrides = Partial<PathsContext>;

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_SYSTEM_PROFILE = "/nix/var/nix/profiles/system";
export const DEFAULT_PROFILES_DIR = "/nix/var/nix/profiles/system-profiles";
export const DEFAULT_FLAKE_PATH = "/etc/nixos/flake.nix";

// =============================================================================
// CONTEXT
// =============================================================================

export function createPathsContext(overrides: PathsOverrides = {}): PathsContext {
  return {
    systemProfile: path.resolve(overrides.systemProfile ?? DEFAULT_SYSTEM_PROFILE),
    profilesDir: path.resolve(overrides.profilesDir ?? DEFAULT_PROFILES_DIR),
    defaultFlake: path.resolve(overrides.defaultFlake ?? DEFAULT_FLAKE_PATH),
  };
}

// Re-roots every default under `root`; tests point this at a temp directory.
export function createRootedPathsContext(root: string): PathsContext {
  const base = path.resolve(root);
  return createPathsContext({
    systemProfile: path.join(base, DEFAULT_SYSTEM_PROFILE),
    profilesDir: path.join(base, DEFAULT_PROFILES_DIR),
    defaultFlake: path.join(base, DEFAULT_FLAKE_PATH),
  });
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function namedProfilePath(name: string, paths: PathsContext): string {
  return path.join(paths.profilesDir, name);
}
