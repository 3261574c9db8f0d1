// =============================================================================
// TYPES
// =============================================================================

export type Remote = {
  host: string;
  sshOpts: string[];
};

export type RemoteFromArgOptions = {
  env?: NodeJS.ProcessEnv;
  sshOpts?: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function remoteFromArg(
  host: string | undefined | null,
  options: RemoteFromArgOptions = {},
): Remote | null {
  const trimmed = host?.trim() ?? "";
  if (trimmed.length === 0) return null;

  const env = options.env ?? process.env;
  return {
    host: trimmed,
    sshOpts: [...splitSshOpts(env.NIX_SSHOPTS), ...(options.sshOpts ?? [])],
  };
}

export function splitSshOpts(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(/\s+/).filter((part) => part.length > 0);
}

/** POSIX single-quote quoting for arguments passed through a remote shell. */
export function quoteShellArg(arg: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

export function sshArgv(remote: Remote, argv: string[]): string[] {
  return ["ssh", ...remote.sshOpts, remote.host, "--", ...argv.map(quoteShellArg)];
}
