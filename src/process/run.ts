import { execa } from "execa";

import { CommandError } from "../core/errors.js";

import { sshArgv, type Remote } from "./remote.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunCommandOptions = {
  captureOutput?: boolean;
  remote?: Remote | null;
  env?: NodeJS.ProcessEnv;
};

export type RunCommandResult = {
  stdout: string;
};

export type CommandRunner = (
  argv: string[],
  options?: RunCommandOptions,
) => Promise<RunCommandResult>;

// =============================================================================
// PUBLIC API
// =============================================================================

export const runCommand: CommandRunner = async (argv, options = {}) => {
  const fullArgv = options.remote ? sshArgv(options.remote, argv) : argv;
  const [file, ...args] = fullArgv;
  if (file === undefined) {
    throw new CommandError("Cannot run an empty command.", {
      argv: fullArgv,
      stdout: "",
      stderr: "",
      exitCode: null,
    });
  }

  try {
    const res = await execa(file, args, {
      stdin: "inherit",
      stdout: options.captureOutput ? "pipe" : "inherit",
      stderr: "inherit",
      env: options.env ?? process.env,
    });
    return { stdout: toText(res.stdout) };
  } catch (err) {
    const stdout = toText(readField(err, "stdout"));
    const stderr = toText(readField(err, "stderr"));
    const exitCode = readField(err, "exitCode");
    const detail = err instanceof Error ? err.message : String(err);

    throw new CommandError(
      `command ${fullArgv.join(" ")} failed: ${detail}`,
      { argv: fullArgv, stdout, stderr, exitCode: typeof exitCode === "number" ? exitCode : null },
      err,
    );
  }
};

// =============================================================================
// INTERNALS
// =============================================================================

function readField(err: unknown, key: "stdout" | "stderr" | "exitCode"): unknown {
  if (err && typeof err === "object" && key in err) {
    return (err as Record<string, unknown>)[key];
  }
  return undefined;
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}
