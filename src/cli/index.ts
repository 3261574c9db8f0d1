import { Command } from "commander";

import { registerActionsCommand, registerProfileCommand } from "./profile.js";
import { registerResolveCommand } from "./resolve.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("flakeref")
    .description("Resolve NixOS flake references and repository context into build targets")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Config file overriding profile and default flake paths (default: $FLAKEREF_CONFIG)",
    )
    .option("--debug", "Show error names, causes and stacks")
    .option("-v, --verbose", "Echo resolution events to stderr", false);

  registerResolveCommand(program);
  registerProfileCommand(program);
  registerActionsCommand(program);

  return program;
}
