import { z } from "zod";

import {
  DEFAULT_FLAKE_PATH,
  DEFAULT_PROFILES_DIR,
  DEFAULT_SYSTEM_PROFILE,
} from "./paths.js";

const PathsSchema = z
  .object({
    system_profile: z.string().min(1).default(DEFAULT_SYSTEM_PROFILE),
    profiles_dir: z.string().min(1).default(DEFAULT_PROFILES_DIR),
    default_flake: z.string().min(1).default(DEFAULT_FLAKE_PATH),
  })
  .strict();

export const RebuildConfigSchema = z
  .object({
    paths: PathsSchema.default({}),

    // Extra ssh arguments appended after NIX_SSHOPTS, e.g. ["-p", "2222"].
    ssh_opts: z.array(z.string()).default([]),
  })
  .strict();

export type RebuildConfig = z.infer<typeof RebuildConfigSchema>;

export function defaultRebuildConfig(): RebuildConfig {
  return RebuildConfigSchema.parse({});
}
