import { RebuildError } from "./errors.js";

export const ACTIONS = [
  "switch",
  "boot",
  "test",
  "build",
  "edit",
  "repl",
  "dry-build",
  "dry-run",
  "dry-activate",
  "build-image",
  "build-vm",
  "build-vm-with-bootloader",
  "list-generations",
] as const;

export type Action = (typeof ACTIONS)[number];

export function isAction(value: string): value is Action {
  return (ACTIONS as readonly string[]).includes(value);
}

export function parseAction(label: string): Action {
  if (isAction(label)) return label;
  throw new RebuildError(
    `unknown action '${label}' (expected one of: ${ACTIONS.join(", ")})`,
  );
}
