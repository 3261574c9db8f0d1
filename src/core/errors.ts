export class RebuildError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = "RebuildError";
  }

  override toString(): string {
    return `error: ${this.message}`;
  }
}

export class ConfigError extends RebuildError {
  constructor(message: string, cause?: unknown, hint?: string) {
    super(message, cause, hint);
    this.name = "ConfigError";
  }
}

export class GitError extends RebuildError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export type CommandFailure = {
  argv: string[];
  stdout: string;
  stderr: string;
  exitCode: number | null;
};

export class CommandError extends RebuildError {
  readonly argv: string[];
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number | null;

  constructor(message: string, failure: CommandFailure, cause?: unknown) {
    super(message, cause);
    this.name = "CommandError";
    this.argv = failure.argv;
    this.stdout = failure.stdout;
    this.stderr = failure.stderr;
    this.exitCode = failure.exitCode;
  }
}
