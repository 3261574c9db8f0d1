import path from "node:path";

import { isFile, walkUp } from "./fs-walk.js";

export const FLAKE_FILE = "flake.nix";

/** Closest directory at or above `location` that holds a flake.nix. */
export function discoverClosestFlake(location: string): string | null {
  return walkUp(location, (dir) => (isFile(path.join(dir, FLAKE_FILE)) ? dir : null));
}
