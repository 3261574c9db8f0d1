import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { GitError } from "../core/errors.js";

import { discoverGit } from "./discover.js";

const tempDirs: string[] = [];

// realpath so expectations match on hosts where tmpdir is a symlink.
function makeDir(): string {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "discover-git-")));
  tempDirs.push(dir);
  return dir;
}

function mkdirp(...segments: string[]): string {
  const dir = path.join(...segments);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("discoverGit", () => {
  it("returns the directory holding a .git directory", () => {
    const repo = makeDir();
    mkdirp(repo, ".git");

    expect(discoverGit(repo)).toBe(repo);
  });

  it("walks up from nested directories", () => {
    const repo = makeDir();
    mkdirp(repo, ".git");
    const nested = mkdirp(repo, "hosts", "box", "modules");

    expect(discoverGit(nested)).toBe(repo);
  });

  it("returns the nearest repository when repositories are nested", () => {
    const outer = makeDir();
    mkdirp(outer, ".git");
    const inner = mkdirp(outer, "vendor", "inner");
    mkdirp(inner, ".git");

    expect(discoverGit(inner)).toBe(inner);
  });

  it("returns the worktree pointer target verbatim", () => {
    const worktree = makeDir();
    fs.writeFileSync(path.join(worktree, ".git"), "gitdir: /elsewhere/.git\n", "utf8");
    const nested = mkdirp(worktree, "sub");

    expect(discoverGit(nested)).toBe("/elsewhere/.git");
  });

  it("skips a .git file without a gitdir line and keeps walking", () => {
    const repo = makeDir();
    mkdirp(repo, ".git");
    const child = mkdirp(repo, "child");
    fs.writeFileSync(path.join(child, ".git"), "not a pointer\n", "utf8");

    expect(discoverGit(child)).toBe(repo);
  });

  it("resolves relative start paths against the working directory", () => {
    const repo = makeDir();
    mkdirp(repo, ".git");
    const nested = mkdirp(repo, "a");

    expect(discoverGit(path.relative(process.cwd(), nested))).toBe(repo);
  });

  it("returns null for paths that do not exist", () => {
    const dir = makeDir();

    expect(discoverGit(path.join(dir, "missing", "deeper"))).toBeNull();
  });

  it("returns null when started from a regular file", () => {
    const repo = makeDir();
    mkdirp(repo, ".git");
    const file = path.join(repo, "flake.nix");
    fs.writeFileSync(file, "{ }\n", "utf8");

    expect(discoverGit(file)).toBeNull();
  });

  it("terminates at the filesystem root", () => {
    const root = path.parse(process.cwd()).root;

    expect(() => discoverGit(root)).not.toThrow();
  });

  it("raises GitError when the worktree pointer cannot be read", () => {
    if (process.getuid?.() === 0) return;

    const worktree = makeDir();
    const pointer = path.join(worktree, ".git");
    fs.writeFileSync(pointer, "gitdir: /elsewhere/.git\n", "utf8");
    fs.chmodSync(pointer, 0o000);

    expect(() => discoverGit(worktree)).toThrow(GitError);
  });
});
