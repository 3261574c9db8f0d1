import fs from "node:fs";
import path from "node:path";

// =============================================================================
// PATH CHECKS
// =============================================================================

export function isDirectory(target: string): boolean {
  return fs.statSync(target, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

export function isFile(target: string): boolean {
  return fs.statSync(target, { throwIfNoEntry: false })?.isFile() ?? false;
}

// Symlinks are followed when the path exists; otherwise fall back to lexical resolution.
export function canonicalPath(target: string): string {
  const absolute = path.resolve(target);
  try {
    return fs.realpathSync(absolute);
  } catch {
    return absolute;
  }
}

// =============================================================================
// UPWARD WALK
// =============================================================================

/**
 * Visits `start` and each of its parents until `visit` returns a value.
 *
 * Stops at the first path that is not a directory, and at the filesystem root
 * (where the parent of a path is the path itself).
 */
export function walkUp<T>(start: string, visit: (dir: string) => T | null): T | null {
  let current = canonicalPath(start);
  let previous: string | null = null;

  while (current !== previous && isDirectory(current)) {
    const found = visit(current);
    if (found !== null) return found;

    previous = current;
    current = path.dirname(current);
  }

  return null;
}
