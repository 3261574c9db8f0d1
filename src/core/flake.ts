/*
Purpose: turn a user-supplied flake reference into the canonical form nix builds from.
Assumptions: discovery only reads the filesystem; the hostname probe may reach a remote host.
Usage: formatFlake(await parseFlake(".#box")), await flakeFromArg({ kind: "unset" }, { paths }).
*/

import fs from "node:fs";
import path from "node:path";

import type { Remote } from "../process/remote.js";
import { discoverGit } from "../git/discover.js";

import { discoverClosestFlake } from "./flake-discovery.js";
import { getHostname, type HostnameResolver } from "./hostname.js";
import { logEvent, noopEventSink, type EventSink } from "./logger.js";
import type { PathsContext } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type Flake = Readonly<{
  path: string;
  attr: string;
}>;

export type FlakeArg =
  | { kind: "ref"; value: string }
  | { kind: "flag"; enabled: boolean }
  | { kind: "unset" };

export type ParseFlakeOptions = {
  targetHost?: Remote | null;
  resolveHostname?: HostnameResolver;
  events?: EventSink;
};

export type FlakeFromArgOptions = ParseFlakeOptions & {
  paths: PathsContext;
};

type SplitReference = {
  pathPart: string;
  attrPart: string;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const CONFIGURATIONS_ATTR = "nixosConfigurations";
const FALLBACK_CONFIGURATION = "default";
const QUOTED_CONFIGURATION = /^nixosConfigurations\."((?:[^"\\]|\\.)*)"$/;

// =============================================================================
// FORMATTING
// =============================================================================

export function formatFlake(flake: Flake): string {
  return `${flake.path}#${flake.attr}`;
}

export function flakeToAttr(flake: Flake, ...attrs: string[]): string {
  return `${formatFlake(flake)}.${attrs.join(".")}`;
}

export function configurationAttr(name: string): string {
  const escaped = name.replace(/[\\"]/g, (ch) => `\\${ch}`);
  return `${CONFIGURATIONS_ATTR}."${escaped}"`;
}

// =============================================================================
// PARSING
// =============================================================================

export function splitReference(raw: string): SplitReference {
  const hashIndex = raw.indexOf("#");
  if (hashIndex === -1) {
    return { pathPart: raw, attrPart: "" };
  }
  return { pathPart: raw.slice(0, hashIndex), attrPart: raw.slice(hashIndex + 1) };
}

export async function parseFlake(raw: string, options: ParseFlakeOptions = {}): Promise<Flake> {
  const events = options.events ?? noopEventSink;
  const { pathPart, attrPart } = splitReference(raw);

  const name =
    unquoteConfigurationAttr(attrPart) ||
    (await resolveHostname(options)) ||
    FALLBACK_CONFIGURATION;
  const attr = configurationAttr(name);

  logEvent(events, "flake.parse", { raw, path: pathPart, attr });

  if (pathPart.includes(":")) {
    return { path: pathPart, attr };
  }

  // `#name` alone means the current directory.
  const location = pathPart === "" ? "." : pathPart;

  const gitRepo = discoverGit(location);
  if (gitRepo === null) {
    return { path: location, attr };
  }
  logEvent(events, "git.discovered", { location, repo: gitRepo });

  let url = `git+file://${gitRepo}`;
  const flakeDir = discoverClosestFlake(location);
  if (flakeDir !== null) {
    logEvent(events, "flake.discovered", { location, dir: flakeDir });
    const relative = nestedRelativePath(gitRepo, flakeDir);
    if (relative !== null) {
      url += `?dir=${relative}`;
    }
  }

  return { path: url, attr };
}

export async function flakeFromArg(arg: FlakeArg, options: FlakeFromArgOptions): Promise<Flake | null> {
  switch (arg.kind) {
    case "ref":
      return parseFlake(arg.value, options);
    case "flag":
      return arg.enabled ? parseFlake(".", options) : null;
    case "unset":
      return defaultFlake(options);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function resolveHostname(options: ParseFlakeOptions): Promise<string | null> {
  const targetHost = options.targetHost ?? null;
  if (options.resolveHostname) {
    return options.resolveHostname(targetHost);
  }
  return getHostname(targetHost, { events: options.events });
}

// Accepts both `box` and an already-qualified `nixosConfigurations."box"`.
function unquoteConfigurationAttr(attrPart: string): string {
  const match = QUOTED_CONFIGURATION.exec(attrPart);
  if (!match) return attrPart;
  return match[1].replace(/\\(.)/g, "$1");
}

// Relative path of `child` under `root`, or null when it is `root` itself or lies outside it.
function nestedRelativePath(root: string, child: string): string | null {
  const relative = path.relative(root, child);
  const outside = relative === ".." || relative.startsWith(`..${path.sep}`);
  if (relative === "" || outside || path.isAbsolute(relative)) {
    return null;
  }
  return relative;
}

async function defaultFlake(options: FlakeFromArgOptions): Promise<Flake | null> {
  const defaultPath = options.paths.defaultFlake;
  if (!fs.existsSync(defaultPath)) {
    logEvent(options.events ?? noopEventSink, "flake.default_missing", { path: defaultPath });
    return null;
  }

  // The default flake is often a symlink into a checkout elsewhere.
  const resolved = fs.realpathSync(defaultPath);
  return parseFlake(path.dirname(resolved), options);
}
