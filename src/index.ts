#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

// Commander already printed its own usage message for parse errors.
function isCommanderUsageError(error: unknown): error is CommanderError {
  return error instanceof CommanderError;
}

function resolveDebugFlagFromArgv(argv: string[]): boolean {
  let debugFlag = false;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }
    if (arg === "--debug") {
      debugFlag = true;
    }
  }

  return debugFlag;
}

function resolveExitCode(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    if (!isCommanderUsageError(error)) {
      console.error(renderCliError(error, { debug: resolveDebugFlagFromArgv(argv) }));
    }
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  // npm installs the bin as a symlink, so compare against the real file.
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isDirectExecution()) {
  void main(process.argv);
}
