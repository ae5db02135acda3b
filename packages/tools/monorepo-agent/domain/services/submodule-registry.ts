// SubmoduleRegistry - lifecycle of submodule entries over the ConfigStore

import { isAbsolute } from "node:path";
import {
  CONFIG_VERSION,
  findSubmodule,
  type MonorepoConfig,
  type Submodule,
  type SyncRule,
} from "../entities/config.js";
import { MaError } from "../entities/errors.js";
import type { InitOutput, StatusOutput } from "../entities/outputs.js";
import type { ConfigStore } from "../ports/config-store.js";
import type { FileSystem } from "../ports/filesystem.js";
import type { VcsService } from "../ports/vcs-service.js";
import { Mutex } from "./mutex.js";
import { sourcePathFor, validateSubmoduleName } from "./path-resolver.js";
import { validateRules } from "./rule-engine.js";

export interface SubmoduleRegistryDeps {
  readonly store: ConfigStore;
  readonly fs: FileSystem;
  readonly vcs?: VcsService;
}

export interface InitializeInput {
  readonly rootPath: string;
  readonly stageConfig?: boolean;
  readonly submodules?: readonly {
    readonly name: string;
    readonly rules: readonly SyncRule[];
  }[];
}

export interface UpdateSubmoduleInput {
  readonly rules?: readonly SyncRule[];
  readonly description?: string;
}

/**
 * All mutations are load-modify-save cycles run one at a time.
 * Removing an entry never touches files already mirrored to its sibling.
 */
export class SubmoduleRegistry {
  private readonly mutex = new Mutex();

  constructor(private readonly deps: SubmoduleRegistryDeps) {}

  async initialize(input: InitializeInput): Promise<InitOutput> {
    if (!isAbsolute(input.rootPath)) {
      throw new MaError(
        "invalid_args",
        `Monorepo root must be an absolute path: ${input.rootPath}`,
      );
    }

    return await this.mutex.runExclusive<InitOutput>(async () => {
      if (await this.deps.store.exists()) {
        throw new MaError(
          "already_initialized",
          `Monorepo already initialized: ${this.deps.store.path}`,
        );
      }

      let config: MonorepoConfig = {
        version: CONFIG_VERSION,
        root_path: input.rootPath,
        stage_config: input.stageConfig ?? false,
        submodules: [],
      };
      for (const entry of input.submodules ?? []) {
        config = await this.withNewSubmodule(config, entry.name, entry.rules);
      }

      await this.deps.store.save(config);
      const warnings = await this.stageConfig(config);

      return {
        status: "initialized",
        rootPath: config.root_path,
        configPath: this.deps.store.path,
        submodules: config.submodules.map((s) => s.name),
        ...(warnings.length > 0 && { warnings }),
      };
    });
  }

  async list(): Promise<readonly Submodule[]> {
    const config = await this.deps.store.load();
    return config.submodules;
  }

  async get(name: string): Promise<Submodule> {
    const config = await this.deps.store.load();
    return requireSubmodule(config, name);
  }

  async add(
    name: string,
    rules: readonly SyncRule[],
    description?: string,
  ): Promise<StatusOutput> {
    return await this.mutate(name, "submodule_added", (config) =>
      this.withNewSubmodule(config, name, rules, description));
  }

  async remove(name: string): Promise<StatusOutput> {
    return await this.mutate(name, "submodule_removed", (config) => {
      requireSubmodule(config, name);
      return Promise.resolve({
        ...config,
        submodules: config.submodules.filter((s) => s.name !== name),
      });
    });
  }

  /**
   * Replace a submodule's rules and/or description.
   * Rules are swapped wholesale, never merged with the previous list.
   */
  async update(
    name: string,
    input: UpdateSubmoduleInput,
  ): Promise<StatusOutput> {
    if (input.rules === undefined && input.description === undefined) {
      throw new MaError(
        "invalid_args",
        "Nothing to update: give new rules or a description",
        name,
      );
    }
    if (input.rules) validateRules(input.rules, name);

    return await this.mutate(name, "submodule_updated", (config) => {
      const existing = requireSubmodule(config, name);
      const updated: Submodule = {
        ...existing,
        ...(input.description !== undefined &&
          { description: input.description }),
        ...(input.rules !== undefined && { rules: [...input.rules] }),
      };
      return Promise.resolve({
        ...config,
        submodules: config.submodules.map((s) =>
          s.name === name ? updated : s
        ),
      });
    });
  }

  // =========================================================================
  // Private
  // =========================================================================

  private async mutate(
    name: string,
    status: string,
    fn: (config: MonorepoConfig) => Promise<MonorepoConfig>,
  ): Promise<StatusOutput> {
    return await this.mutex.runExclusive<StatusOutput>(async () => {
      const config = await this.deps.store.load();
      const next = await fn(config);
      await this.deps.store.save(next);
      const warnings = await this.stageConfig(next);
      return {
        status,
        name,
        ...(warnings.length > 0 && { warnings }),
      };
    });
  }

  private async withNewSubmodule(
    config: MonorepoConfig,
    name: string,
    rules: readonly SyncRule[],
    description?: string,
  ): Promise<MonorepoConfig> {
    validateSubmoduleName(name);
    validateRules(rules, name);

    if (findSubmodule(config, name)) {
      throw new MaError(
        "duplicate_submodule",
        `Submodule already registered: ${name}`,
        name,
      );
    }

    const sourcePath = sourcePathFor(config.root_path, name);
    if (!(await this.deps.fs.isDirectory(sourcePath))) {
      throw new MaError(
        "not_a_subdirectory",
        `${sourcePath} is not a directory of the monorepo`,
        name,
      );
    }

    const submodule: Submodule = {
      name,
      ...(description !== undefined && { description }),
      rules: [...rules],
    };
    return { ...config, submodules: [...config.submodules, submodule] };
  }

  /**
   * Stage the config artifact when the monorepo asks for it.
   * Failures come back as warnings: the mutation is already persisted.
   */
  private async stageConfig(config: MonorepoConfig): Promise<string[]> {
    const vcs = this.deps.vcs;
    if (!config.stage_config || !vcs) {
      return [];
    }

    if (!(await vcs.isInRepo(config.root_path))) {
      return [
        `${config.root_path} is not inside a git repository, config not staged`,
      ];
    }

    const result = await vcs.track(config.root_path, this.deps.store.path);
    if (!result.ok) {
      return [
        `Failed to stage ${this.deps.store.path}: ${result.stderr.trim()}`,
      ];
    }
    return [];
  }
}

function requireSubmodule(config: MonorepoConfig, name: string): Submodule {
  const submodule = findSubmodule(config, name);
  if (!submodule) {
    throw new MaError(
      "unknown_submodule",
      `Submodule not found: ${name}`,
      name,
    );
  }
  return submodule;
}
