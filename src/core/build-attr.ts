// Legacy (non-flake) target: a Nix file plus an optional attribute inside it.

export type BuildAttr = Readonly<{
  path: string;
  attr: string | null;
}>;

export const DEFAULT_NIXOS_PATH = "<nixpkgs/nixos>";
export const DEFAULT_NIX_FILE = "default.nix";

export function buildAttrFromArg(attr?: string | null, file?: string | null): BuildAttr {
  if (!attr && !file) {
    return { path: DEFAULT_NIXOS_PATH, attr: null };
  }
  return { path: file || DEFAULT_NIX_FILE, attr: attr ?? null };
}

export function buildAttrToAttr(buildAttr: BuildAttr, ...attrs: string[]): string {
  const prefix = buildAttr.attr ? `${buildAttr.attr}.` : "";
  return `${prefix}${attrs.join(".")}`;
}
