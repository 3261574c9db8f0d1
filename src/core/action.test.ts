import { describe, expect, it } from "vitest";

import { ACTIONS, isAction, parseAction } from "./action.js";
import { RebuildError } from "./errors.js";

describe("actions", () => {
  it("lists every action label in order", () => {
    expect(ACTIONS).toEqual([
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
    ]);
  });

  it("parses known labels", () => {
    expect(parseAction("build-vm-with-bootloader")).toBe("build-vm-with-bootloader");
    expect(isAction("dry-activate")).toBe(true);
  });

  it("rejects unknown labels with the valid choices", () => {
    expect(isAction("Switch")).toBe(false);
    expect(() => parseAction("deploy")).toThrow(RebuildError);
    expect(() => parseAction("deploy")).toThrow(/unknown action 'deploy' \(expected one of: switch, boot,/);
  });
});
