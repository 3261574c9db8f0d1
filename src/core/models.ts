import fse from "fs-extra";

import { namedProfilePath, type PathsContext } from "./paths.js";

// =============================================================================
// GENERATIONS
// =============================================================================

export type Generation = Readonly<{
  id: number;
  // Kept as the string the profile listing reports; no parsing happens here.
  timestamp: string;
  current: boolean;
}>;

// camelCase on purpose: this is the `--json` record shape.
export type GenerationJson = {
  generation: number;
  date: string;
  nixosVersion: string;
  kernelVersion: string;
  configurationRevision: string;
  specialisations: string[];
  current: boolean;
};

export function createGeneration(id: number, timestamp: string, current: boolean): Generation {
  return Object.freeze({ id, timestamp, current });
}

// =============================================================================
// PROFILES
// =============================================================================

export const SYSTEM_PROFILE = "system";

export type Profile = Readonly<{
  name: string;
  path: string;
}>;

export function profileFromArg(name: string, paths: PathsContext): Profile {
  if (name === SYSTEM_PROFILE) {
    return { name, path: paths.systemProfile };
  }

  fse.ensureDirSync(paths.profilesDir, 0o755);
  return { name, path: namedProfilePath(name, paths) };
}
