/**
 * Adapter: JsonConfigStore
 *
 * Implements the ConfigStore port using one JSON file:
 * {root}/.monorepo/config.json
 *
 * Saves go through a temp file in the same directory followed by a rename,
 * so readers see either the previous artifact or the new one. A corrupt
 * artifact is reported and left as it is.
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 *   - zod/mini for validating what's read back
 */

import { dirname, isAbsolute, join } from "node:path";
import { z } from "zod/mini";
import {
  CONFIG_VERSION,
  type MonorepoConfig,
  RULE_KINDS,
  type Submodule,
} from "../../domain/entities/config.js";
import { MaError } from "../../domain/entities/errors.js";
import type { ConfigStore } from "../../domain/ports/config-store.js";
import type { FileSystem } from "../../domain/ports/filesystem.js";
import { Mutex } from "../../domain/services/mutex.js";

export const DEFAULT_CONFIG_DIR = ".monorepo";
export const CONFIG_FILE_NAME = "config.json";

// ============================================================================
// Schemas
// ============================================================================

const SyncRuleSchema = z.object({
  pattern: z.string(),
  kind: z.enum(RULE_KINDS),
});

const SubmoduleSchema = z.object({
  name: z.string(),
  description: z.optional(z.string()),
  rules: z.array(SyncRuleSchema),
});

const MonorepoConfigSchema = z.object({
  version: z.optional(z.number()), // absent in artifacts written before versioning
  root_path: z.string(),
  stage_config: z.optional(z.boolean()),
  submodules: z.array(SubmoduleSchema),
});

// ============================================================================
// Serialization
// ============================================================================

export function parseConfig(content: string, source: string): MonorepoConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new MaError("config_corrupt", `${source} is not valid JSON`);
  }

  const result = MonorepoConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("; ");
    throw new MaError("config_corrupt", `${source} is invalid: ${details}`);
  }

  const data = result.data;
  const version = data.version ?? 1;
  if (!Number.isInteger(version) || version < 1 || version > CONFIG_VERSION) {
    throw new MaError(
      "config_corrupt",
      `${source} has unsupported version ${version}`,
    );
  }
  if (!isAbsolute(data.root_path)) {
    throw new MaError(
      "config_corrupt",
      `${source} has a relative root_path: ${data.root_path}`,
    );
  }

  const seen = new Set<string>();
  const submodules: Submodule[] = [];
  for (const entry of data.submodules) {
    if (seen.has(entry.name)) {
      throw new MaError(
        "config_corrupt",
        `${source} lists submodule '${entry.name}' twice`,
        entry.name,
      );
    }
    seen.add(entry.name);
    submodules.push({
      name: entry.name,
      ...(entry.description !== undefined &&
        { description: entry.description }),
      rules: entry.rules.map((r) => ({ pattern: r.pattern, kind: r.kind })),
    });
  }

  return {
    version,
    root_path: data.root_path,
    stage_config: data.stage_config ?? false,
    submodules,
  };
}

export function serializeConfig(config: MonorepoConfig): string {
  const document = {
    version: config.version,
    root_path: config.root_path,
    stage_config: config.stage_config,
    submodules: config.submodules.map((s) => ({
      name: s.name,
      ...(s.description !== undefined && { description: s.description }),
      rules: s.rules.map((r) => ({ pattern: r.pattern, kind: r.kind })),
    })),
  };
  return JSON.stringify(document, null, 2) + "\n";
}

// ============================================================================
// Store
// ============================================================================

export class JsonConfigStore implements ConfigStore {
  readonly path: string;
  private readonly dir: string;
  private readonly writeLock = new Mutex();
  private tempCounter = 0;

  constructor(
    private readonly fs: FileSystem,
    rootPath: string,
    configDirName: string = DEFAULT_CONFIG_DIR,
  ) {
    this.dir = join(rootPath, configDirName);
    this.path = join(this.dir, CONFIG_FILE_NAME);
  }

  async load(): Promise<MonorepoConfig> {
    if (!(await this.fs.exists(this.path))) {
      throw new MaError(
        "not_initialized",
        "Monorepo not initialized. Run 'mra init' first.",
      );
    }

    const content = await this.fs.readFile(this.path);
    return parseConfig(content, this.path);
  }

  async save(config: MonorepoConfig): Promise<void> {
    const content = serializeConfig(config);

    await this.writeLock.runExclusive(async () => {
      await this.fs.ensureDir(this.dir);
      const tempPath = `${this.path}.${process.pid}.${++this.tempCounter}.tmp`;
      try {
        await this.fs.writeFile(tempPath, content);
        await this.fs.rename(tempPath, this.path);
      } catch (e) {
        await this.fs.remove(tempPath);
        throw e;
      }
    });
  }

  async exists(): Promise<boolean> {
    return await this.fs.exists(this.path);
  }
}

/**
 * Walk up from `cwd` to the nearest directory holding the config directory.
 * Returns null when none is found.
 */
export async function findMonorepoRoot(
  fs: FileSystem,
  cwd: string,
  configDirName: string = DEFAULT_CONFIG_DIR,
): Promise<string | null> {
  let current = cwd;
  while (true) {
    if (await fs.isDirectory(join(current, configDirName))) return current;
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return null;
}
