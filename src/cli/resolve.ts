import type { Command } from "commander";

import { buildAttrFromArg, type BuildAttr } from "../core/build-attr.js";
import { flakeFromArg, formatFlake, type Flake, type FlakeArg } from "../core/flake.js";
import {
  JsonlLogger,
  combineEventSinks,
  createConsoleEventSink,
  noopEventSink,
  type EventSink,
} from "../core/logger.js";
import { remoteFromArg } from "../process/remote.js";

import { loadCliContext, type CliContext, type GlobalCliOptions } from "./context.js";

// =============================================================================
// TYPES
// =============================================================================

export type ResolveCliOptions = {
  flake?: string | boolean;
  targetHost?: string;
  attr?: string;
  file?: string;
  json?: boolean;
  logFile?: string;
};

export type ResolveResult =
  | { mode: "flake"; flake: Flake }
  | { mode: "legacy"; buildAttr: BuildAttr };

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerResolveCommand(program: Command): void {
  program
    .command("resolve")
    .description("Print the fully qualified build target for the given flags")
    .option("--flake [ref]", "Flake reference (bare flag: the current directory)")
    .option("--no-flake", "Do not use a flake; build from --file/--attr instead")
    .option("--target-host <host>", "Probe this host's name for the default configuration")
    .option("-A, --attr <attr>", "Attribute inside --file (legacy mode)")
    .option("-f, --file <file>", "Nix file to build from (legacy mode)")
    .option("--json", "Emit JSON output", false)
    .option("--log-file <path>", "Append resolution events as JSON lines")
    .action(async (opts: ResolveCliOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalCliOptions>();
      const ctx = loadCliContext(globals);
      const output = await resolveCommand(opts, ctx);
      console.log(output);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function resolveCommand(opts: ResolveCliOptions, ctx: CliContext): Promise<string> {
  const logger = opts.logFile
    ? new JsonlLogger(opts.logFile, { command: "resolve" }, ctx.debug)
    : null;
  const sinks: EventSink[] = [];
  if (logger) sinks.push(logger);
  if (ctx.verbose) sinks.push(createConsoleEventSink());
  const events = sinks.length > 0 ? combineEventSinks(...sinks) : noopEventSink;

  try {
    const result = await resolveTarget(opts, ctx, events);
    return opts.json ? formatResolveJson(result) : formatResolveText(result);
  } finally {
    logger?.close();
  }
}

export async function resolveTarget(
  opts: ResolveCliOptions,
  ctx: CliContext,
  events: EventSink = noopEventSink,
): Promise<ResolveResult> {
  const targetHost = remoteFromArg(opts.targetHost, { env: ctx.env, sshOpts: ctx.config.ssh_opts });
  const flake = await flakeFromArg(toFlakeArg(opts.flake), {
    paths: ctx.paths,
    targetHost,
    events,
  });

  if (flake) {
    return { mode: "flake", flake };
  }
  return { mode: "legacy", buildAttr: buildAttrFromArg(opts.attr, opts.file) };
}

export function toFlakeArg(flake: string | boolean | undefined): FlakeArg {
  if (typeof flake === "string") return { kind: "ref", value: flake };
  if (typeof flake === "boolean") return { kind: "flag", enabled: flake };
  return { kind: "unset" };
}

// =============================================================================
// OUTPUT
// =============================================================================

export function formatResolveText(result: ResolveResult): string {
  if (result.mode === "flake") {
    return formatFlake(result.flake);
  }

  const { path, attr } = result.buildAttr;
  return attr ? `${path} -A ${attr}` : path;
}

export function formatResolveJson(result: ResolveResult): string {
  const payload =
    result.mode === "flake"
      ? {
          mode: result.mode,
          flake: formatFlake(result.flake),
          path: result.flake.path,
          attr: result.flake.attr,
        }
      : { mode: result.mode, path: result.buildAttr.path, attr: result.buildAttr.attr };

  return JSON.stringify(payload, null, 2);
}
