// Settings read from the environment at startup

import { z } from "zod/mini";
import { MaError } from "./domain/entities/errors.js";

// One path segment below the root, never the root or its parent
const DIR_NAME = /^(?!\.{1,2}$)[^/\\\u0000]+$/;

const EnvSchema = z.object({
  MONOREPO_AGENT_DIR: z.optional(
    z.string().check(z.regex(DIR_NAME, "must be a single directory name")),
  ),
  MONOREPO_AGENT_RSYNC: z.optional(z.string().check(z.minLength(1))),
  MONOREPO_AGENT_GIT: z.optional(z.string().check(z.minLength(1))),
  MONOREPO_AGENT_CONCURRENCY: z.optional(
    z.string().check(z.regex(/^[1-9]\d*$/, "must be a positive integer")),
  ),
});

export type Settings = {
  readonly configDir: string;
  readonly rsyncBinary: string;
  readonly gitBinary: string;
  readonly concurrency: number;
};

export const DEFAULT_SETTINGS: Settings = {
  configDir: ".monorepo",
  rsyncBinary: "rsync",
  gitBinary: "git",
  concurrency: 1,
};

export function loadSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Settings {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map(String).join(".")} ${issue.message}`)
      .join("; ");
    throw new MaError("invalid_args", `Invalid environment: ${details}`);
  }

  const vars = result.data;
  return {
    configDir: vars.MONOREPO_AGENT_DIR ?? DEFAULT_SETTINGS.configDir,
    rsyncBinary: vars.MONOREPO_AGENT_RSYNC ?? DEFAULT_SETTINGS.rsyncBinary,
    gitBinary: vars.MONOREPO_AGENT_GIT ?? DEFAULT_SETTINGS.gitBinary,
    concurrency: vars.MONOREPO_AGENT_CONCURRENCY
      ? parseInt(vars.MONOREPO_AGENT_CONCURRENCY, 10)
      : DEFAULT_SETTINGS.concurrency,
  };
}
