import fs from "node:fs";
import path from "node:path";

import { GitError } from "../core/errors.js";
import { isDirectory, isFile, walkUp } from "../core/fs-walk.js";

const DOT_GIT = ".git";
const GITDIR_PREFIX = "gitdir: ";

/**
 * Finds the repository enclosing `location`.
 *
 * A `.git` directory marks the repository root. A `.git` file marks a linked
 * worktree, and the path after `gitdir: ` is returned as written.
 */
export function discoverGit(location: string): string | null {
  return walkUp(location, (dir) => {
    const dotgit = path.join(dir, DOT_GIT);

    if (isDirectory(dotgit)) {
      return dir;
    }
    if (isFile(dotgit)) {
      return readWorktreePointer(dotgit);
    }

    return null;
  });
}

function readWorktreePointer(dotgit: string): string | null {
  let content: string;
  try {
    content = fs.readFileSync(dotgit, "utf8").trim();
  } catch (err) {
    throw new GitError(`Failed to read worktree pointer at ${dotgit}`, err);
  }

  if (!content.startsWith(GITDIR_PREFIX)) {
    return null;
  }

  return content.slice(GITDIR_PREFIX.length);
}
