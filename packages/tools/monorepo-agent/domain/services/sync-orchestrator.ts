// SyncOrchestrator - mirror submodules into their sibling checkouts

import { dirname, join } from "node:path";
import type { MonorepoConfig, Submodule } from "../entities/config.js";
import { MaError, type MaErrorCode } from "../entities/errors.js";
import {
  type CompiledRule,
  type SiblingBinding,
  type SkipReason,
  summarizeOutcomes,
  type SyncOutcome,
  type SyncReport,
} from "../entities/sync.js";
import type { ConfigStore } from "../ports/config-store.js";
import type { FileSystem } from "../ports/filesystem.js";
import type { MirrorService } from "../ports/mirror-service.js";
import { PathLocks } from "./mutex.js";
import { PathResolver } from "./path-resolver.js";
import { compileRules } from "./rule-engine.js";

export type SyncTarget = "all" | readonly string[];

export interface SyncInput {
  readonly target: SyncTarget;
  readonly dryRun?: boolean;
  /** Number of submodules mirrored at once. Defaults to 1. */
  readonly concurrency?: number;
  /** Create a missing sibling directory instead of skipping the submodule. */
  readonly createMissing?: boolean;
  readonly signal?: AbortSignal;
  /** Applied to each mirror process, not to the whole run. */
  readonly timeoutMs?: number;
  readonly onOutcome?: (outcome: SyncOutcome) => void;
}

export interface SyncOrchestratorDeps {
  readonly store: ConfigStore;
  readonly fs: FileSystem;
  readonly mirror: MirrorService;
}

const SKIP_REASONS: ReadonlySet<MaErrorCode> = new Set<SkipReason>([
  "sibling_not_found",
  "invalid_name",
  "not_a_subdirectory",
  "invalid_rule",
  "vacuous_rule_set",
]);

function isSkipReason(code: MaErrorCode): code is SkipReason {
  return SKIP_REASONS.has(code);
}

/**
 * Turns each target submodule's rules into one mirror invocation.
 *
 * Validation failures skip a submodule, mirror failures fail it; neither
 * stops the rest of the batch. The configuration is only read here.
 */
export class SyncOrchestrator {
  private readonly resolver: PathResolver;
  private readonly siblingLocks = new PathLocks();

  constructor(private readonly deps: SyncOrchestratorDeps) {
    this.resolver = new PathResolver(deps.fs);
  }

  async sync(input: SyncInput): Promise<SyncReport> {
    const concurrency = input.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new MaError(
        "invalid_args",
        `Concurrency must be a positive integer, got ${concurrency}`,
      );
    }

    const config = await this.deps.store.load();
    const targets = selectTargets(config, input.target);

    const outcomes: (SyncOutcome | undefined)[] = targets.map(() => undefined);
    let next = 0;
    let cancelled = false;

    const worker = async (): Promise<void> => {
      while (next < targets.length) {
        if (input.signal?.aborted) {
          cancelled = true;
          return;
        }
        const index = next++;
        const outcome = await this.syncOne(
          config.root_path,
          targets[index],
          input,
        );
        outcomes[index] = outcome;
        input.onOutcome?.(outcome);
      }
    };

    const workers = Array.from(
      { length: Math.min(concurrency, targets.length) },
      () => worker(),
    );
    await Promise.all(workers);

    return summarizeOutcomes(
      outcomes.filter((o): o is SyncOutcome => o !== undefined),
      cancelled || (input.signal?.aborted ?? false),
    );
  }

  /** Never rejects; any error becomes this submodule's outcome. */
  private async syncOne(
    rootPath: string,
    submodule: Submodule,
    input: SyncInput,
  ): Promise<SyncOutcome> {
    let siblingPath = join(dirname(rootPath), submodule.name);

    try {
      const prepared = await this.prepare(rootPath, submodule, input);
      if ("status" in prepared) {
        return prepared;
      }
      const { binding, rules } = prepared;
      siblingPath = binding.siblingPath;

      const lockPath = await this.deps.fs.realPath(binding.siblingPath);
      const result = await this.siblingLocks.runExclusive(
        lockPath,
        () =>
          this.deps.mirror.mirror({
            sourcePath: binding.sourcePath,
            destinationPath: binding.siblingPath,
            rules,
            deleteExtraneous: true,
            dryRun: input.dryRun ?? false,
            signal: input.signal,
            timeoutMs: input.timeoutMs,
          }),
      );

      if (result.exitCode === 0) {
        return {
          status: "succeeded",
          name: submodule.name,
          siblingPath,
          rules,
          ...(input.dryRun && { changes: result.stdout }),
        };
      }

      return {
        status: "failed",
        name: submodule.name,
        siblingPath,
        exitCode: result.exitCode,
        diagnostic: result.stderr !== ""
          ? result.stderr
          : result.exitCode === null
          ? "mirror process was terminated"
          : `mirror process exited with status ${result.exitCode}`,
      };
    } catch (e) {
      return {
        status: "failed",
        name: submodule.name,
        siblingPath,
        exitCode: null,
        diagnostic: e instanceof Error ? e.message : String(e),
      };
    }
  }

  /**
   * Resolve the sibling and compile the rules. Validation failures come
   * back as a skipped outcome; anything else is thrown to syncOne.
   */
  private async prepare(
    rootPath: string,
    submodule: Submodule,
    input: SyncInput,
  ): Promise<
    { binding: SiblingBinding; rules: CompiledRule[] } | SyncOutcome
  > {
    try {
      if (input.createMissing) {
        await this.resolver.ensureSibling(rootPath, submodule.name);
      }
      const binding = await this.resolver.resolve(rootPath, submodule.name);
      if (!(await this.deps.fs.isDirectory(binding.sourcePath))) {
        throw new MaError(
          "not_a_subdirectory",
          `Source directory ${binding.sourcePath} does not exist`,
          submodule.name,
        );
      }
      const rules = compileRules(submodule.rules, submodule.name);
      return { binding, rules };
    } catch (e) {
      if (e instanceof MaError && isSkipReason(e.code)) {
        return {
          status: "skipped",
          name: submodule.name,
          reason: e.code,
          message: e.message,
        };
      }
      throw e;
    }
  }
}

/**
 * Pick the submodules to process: registry order for "all", the given
 * order otherwise. Unknown names abort before anything is mirrored.
 */
export function selectTargets(
  config: MonorepoConfig,
  target: SyncTarget,
): Submodule[] {
  if (target === "all") {
    return [...config.submodules];
  }

  const selected: Submodule[] = [];
  for (const name of target) {
    if (selected.some((s) => s.name === name)) continue;
    const submodule = config.submodules.find((s) => s.name === name);
    if (!submodule) {
      throw new MaError(
        "unknown_submodule",
        `Submodule not found: ${name}`,
        name,
      );
    }
    selected.push(submodule);
  }
  return selected;
}
