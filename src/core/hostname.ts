import os from "node:os";

import { runCommand, type CommandRunner } from "../process/run.js";
import type { Remote } from "../process/remote.js";

import { formatErrorMessage } from "./error-format.js";
import { logEvent, noopEventSink, type EventSink } from "./logger.js";

export type HostnameResolver = (targetHost: Remote | null) => Promise<string | null>;

export type HostnameDeps = {
  run?: CommandRunner;
  events?: EventSink;
  localHostname?: () => string;
};

/**
 * Name used for `nixosConfigurations."<name>"` when no attribute is given.
 * Remote probes are best effort: any failure yields null.
 */
export async function getHostname(
  targetHost: Remote | null,
  deps: HostnameDeps = {},
): Promise<string | null> {
  if (!targetHost) {
    return (deps.localHostname ?? os.hostname)();
  }

  const run = deps.run ?? runCommand;
  try {
    const res = await run(["uname", "-n"], { captureOutput: true, remote: targetHost });
    return res.stdout.trim();
  } catch (err) {
    logEvent(deps.events ?? noopEventSink, "hostname.probe_failed", {
      host: targetHost.host,
      error: formatErrorMessage(err),
    });
    return null;
  }
}
