import type { Command } from "commander";

import { ACTIONS } from "../core/action.js";
import { SYSTEM_PROFILE, profileFromArg } from "../core/models.js";

import { loadCliContext, type CliContext, type GlobalCliOptions } from "./context.js";

// =============================================================================
// PROFILE
// =============================================================================

export function registerProfileCommand(program: Command): void {
  program
    .command("profile")
    .description("Print the store path of a system profile")
    .argument("[name]", "Profile name", SYSTEM_PROFILE)
    .option("--json", "Emit JSON output", false)
    .action((name: string, opts: { json?: boolean }, command: Command) => {
      const ctx = loadCliContext(command.optsWithGlobals<GlobalCliOptions>());
      console.log(profileCommand(name, opts, ctx));
    });
}

export function profileCommand(name: string, opts: { json?: boolean }, ctx: CliContext): string {
  const profile = profileFromArg(name, ctx.paths);
  return opts.json ? JSON.stringify(profile, null, 2) : profile.path;
}

// =============================================================================
// ACTIONS
// =============================================================================

export function registerActionsCommand(program: Command): void {
  program
    .command("actions")
    .description("List the action labels a rebuild accepts")
    .action(() => {
      console.log(ACTIONS.join("\n"));
    });
}
