import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  configurationAttr,
  flakeFromArg,
  flakeToAttr,
  formatFlake,
  parseFlake,
  splitReference,
  type Flake,
} from "./flake.js";
import type { LogEventInput } from "./logger.js";
import { createRootedPathsContext } from "./paths.js";

// =============================================================================
// HELPERS
// =============================================================================

const tempDirs: string[] = [];

function makeDir(): string {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "parse-flake-")));
  tempDirs.push(dir);
  return dir;
}

function mkdirp(...segments: string[]): string {
  const dir = path.join(...segments);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

function writeFlake(dir: string): void {
  mkdirp(dir);
  fs.writeFileSync(path.join(dir, "flake.nix"), "{ outputs = _: { }; }\n", "utf8");
}

const hostnameBox = vi.fn(async () => "box");
const noHostname = vi.fn(async () => null);

afterEach(() => {
  vi.restoreAllMocks();
  hostnameBox.mockClear();
  noHostname.mockClear();
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// TESTS
// =============================================================================

describe("splitReference", () => {
  it("splits on the first hash only", () => {
    expect(splitReference("/etc/nixos#box")).toEqual({ pathPart: "/etc/nixos", attrPart: "box" });
    expect(splitReference("a#b#c")).toEqual({ pathPart: "a", attrPart: "b#c" });
    expect(splitReference("/etc/nixos")).toEqual({ pathPart: "/etc/nixos", attrPart: "" });
    expect(splitReference("")).toEqual({ pathPart: "", attrPart: "" });
  });
});

describe("formatting", () => {
  const flake: Flake = { path: "github:owner/repo", attr: 'nixosConfigurations."box"' };

  it("renders the canonical path#attr form", () => {
    expect(formatFlake(flake)).toBe('github:owner/repo#nixosConfigurations."box"');
  });

  it("appends dotted attributes to the canonical form", () => {
    expect(flakeToAttr(flake, "config", "system", "build", "toplevel")).toBe(
      'github:owner/repo#nixosConfigurations."box".config.system.build.toplevel',
    );
  });

  it("escapes quotes and backslashes in configuration names", () => {
    expect(configurationAttr('we"ird\\name')).toBe('nixosConfigurations."we\\"ird\\\\name"');
  });
});

describe("parseFlake", () => {
  it("keeps a plain local path when no repository encloses it", async () => {
    const dir = mkdirp(makeDir(), "config");

    const flake = await parseFlake(`${dir}#web`, { resolveHostname: noHostname });

    expect(flake).toEqual({ path: dir, attr: 'nixosConfigurations."web"' });
    expect(noHostname).not.toHaveBeenCalled();
  });

  it("uses the hostname when the attribute is empty", async () => {
    const dir = makeDir();

    const flake = await parseFlake(dir, { resolveHostname: hostnameBox });

    expect(flake.attr).toBe('nixosConfigurations."box"');
    expect(hostnameBox).toHaveBeenCalledWith(null);
  });

  it("passes the target host to the hostname resolver", async () => {
    const dir = makeDir();
    const targetHost = { host: "build01", sshOpts: [] };

    await parseFlake(`${dir}#`, { resolveHostname: hostnameBox, targetHost });

    expect(hostnameBox).toHaveBeenCalledWith(targetHost);
  });

  it("falls back to default when the hostname is unknown", async () => {
    const dir = makeDir();

    const flake = await parseFlake(dir, { resolveHostname: noHostname });

    expect(flake.attr).toBe('nixosConfigurations."default"');
  });

  it("leaves URL references untouched", async () => {
    const flake = await parseFlake("github:owner/repo#web", { resolveHostname: noHostname });

    expect(flake).toEqual({ path: "github:owner/repo", attr: 'nixosConfigurations."web"' });
  });

  it("is a fixed point when re-parsing the canonical form of a URL reference", async () => {
    const first = await parseFlake('github:owner/repo#we"ird', { resolveHostname: noHostname });
    const second = await parseFlake(formatFlake(first), { resolveHostname: noHostname });

    expect(second).toEqual(first);
    expect(first.attr).toBe('nixosConfigurations."we\\"ird"');
  });

  it("builds a git+file URL without dir when the flake sits at the repository root", async () => {
    const repo = makeDir();
    mkdirp(repo, ".git");
    writeFlake(repo);
    const nested = mkdirp(repo, "modules");

    const flake = await parseFlake(`${nested}#box`, { resolveHostname: noHostname });

    expect(flake).toEqual({ path: `git+file://${repo}`, attr: 'nixosConfigurations."box"' });
  });

  it("adds dir when the flake lives in a sub-directory of the repository", async () => {
    const repo = makeDir();
    mkdirp(repo, ".git");
    writeFlake(path.join(repo, "sub", "dir"));
    const start = mkdirp(repo, "sub", "dir", "hosts");

    const flake = await parseFlake(`${start}#box`, { resolveHostname: noHostname });

    expect(flake.path).toBe(`git+file://${repo}?dir=sub/dir`);
  });

  it("omits dir when the closest flake lies outside the repository", async () => {
    const outer = makeDir();
    writeFlake(outer);
    const repo = mkdirp(outer, "checkout");
    mkdirp(repo, ".git");

    const flake = await parseFlake(`${repo}#box`, { resolveHostname: noHostname });

    expect(flake.path).toBe(`git+file://${repo}`);
  });

  it("omits dir when the repository has no flake at all", async () => {
    const repo = makeDir();
    mkdirp(repo, ".git");

    const flake = await parseFlake(`${repo}#box`, { resolveHostname: noHostname });

    expect(flake.path).toBe(`git+file://${repo}`);
  });

  it("uses the worktree pointer target as the repository location", async () => {
    const worktree = makeDir();
    fs.writeFileSync(path.join(worktree, ".git"), "gitdir: /elsewhere/.git\n", "utf8");
    writeFlake(worktree);

    const flake = await parseFlake(`${worktree}#box`, { resolveHostname: noHostname });

    expect(flake.path).toBe("git+file:///elsewhere/.git");
  });

  it("treats an empty path as the current directory", async () => {
    const repo = makeDir();
    mkdirp(repo, ".git");
    vi.spyOn(process, "cwd").mockReturnValue(repo);

    const flake = await parseFlake("#box", { resolveHostname: noHostname });

    expect(flake).toEqual({ path: `git+file://${repo}`, attr: 'nixosConfigurations."box"' });
  });

  it("records discovery events", async () => {
    const repo = makeDir();
    mkdirp(repo, ".git");
    writeFlake(path.join(repo, "nixos"));
    const start = path.join(repo, "nixos");
    const events: LogEventInput[] = [];

    await parseFlake(`${start}#box`, {
      resolveHostname: noHostname,
      events: { log: (event) => events.push(event) },
    });

    expect(events.map((event) => event.type)).toEqual([
      "flake.parse",
      "git.discovered",
      "flake.discovered",
    ]);
    expect(events[2].payload).toEqual({ location: start, dir: start });
  });
});

describe("flakeFromArg", () => {
  it("parses an explicit reference", async () => {
    const paths = createRootedPathsContext(makeDir());

    const flake = await flakeFromArg(
      { kind: "ref", value: "github:owner/repo#web" },
      { paths, resolveHostname: noHostname },
    );

    expect(flake).toEqual({ path: "github:owner/repo", attr: 'nixosConfigurations."web"' });
  });

  it("resolves the current directory for an enabled flag", async () => {
    const root = makeDir();
    const repo = mkdirp(root, "repo");
    mkdirp(repo, ".git");
    vi.spyOn(process, "cwd").mockReturnValue(repo);
    const options = { paths: createRootedPathsContext(root), resolveHostname: hostnameBox };

    const fromFlag = await flakeFromArg({ kind: "flag", enabled: true }, options);
    const fromDot = await parseFlake(".", options);

    expect(fromFlag).toEqual(fromDot);
    expect(fromFlag).toEqual({ path: `git+file://${repo}`, attr: 'nixosConfigurations."box"' });
  });

  it("returns null for a disabled flag", async () => {
    const paths = createRootedPathsContext(makeDir());

    await expect(flakeFromArg({ kind: "flag", enabled: false }, { paths })).resolves.toBeNull();
  });

  it("returns null when the default flake file is missing", async () => {
    const paths = createRootedPathsContext(makeDir());
    const events: LogEventInput[] = [];

    const flake = await flakeFromArg(
      { kind: "unset" },
      { paths, resolveHostname: hostnameBox, events: { log: (event) => events.push(event) } },
    );

    expect(flake).toBeNull();
    expect(hostnameBox).not.toHaveBeenCalled();
    expect(events).toEqual([
      { type: "flake.default_missing", payload: { path: paths.defaultFlake } },
    ]);
  });

  it("follows a symlinked default flake to its checkout", async () => {
    const root = makeDir();
    const paths = createRootedPathsContext(root);
    const checkout = mkdirp(root, "home", "admin", "nixos-config");
    mkdirp(checkout, ".git");
    writeFlake(path.join(checkout, "hosts"));
    mkdirp(path.dirname(paths.defaultFlake));
    fs.symlinkSync(path.join(checkout, "hosts", "flake.nix"), paths.defaultFlake);

    const flake = await flakeFromArg({ kind: "unset" }, { paths, resolveHostname: hostnameBox });

    expect(flake).toEqual({
      path: `git+file://${checkout}?dir=hosts`,
      attr: 'nixosConfigurations."box"',
    });
  });

  it("uses the default flake directory itself when it is a regular file", async () => {
    const root = makeDir();
    const paths = createRootedPathsContext(root);
    writeFlake(path.dirname(paths.defaultFlake));

    const flake = await flakeFromArg({ kind: "unset" }, { paths, resolveHostname: hostnameBox });

    expect(flake).toEqual({
      path: path.dirname(paths.defaultFlake),
      attr: 'nixosConfigurations."box"',
    });
  });
});
