import { Command, CommanderError, InvalidArgumentError } from "commander";
import { resolve } from "node:path";
import {
  DEFAULT_RULES,
  type ListOutput,
  MaError,
  type RuleKind,
  type SyncRule,
  type SyncTarget,
} from "./mod.js";
import {
  formatError,
  formatExplain,
  formatInit,
  formatList,
  formatOutcome,
  formatShow,
  formatStatus,
  formatSyncSummary,
} from "./adapters/cli/formatter.js";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.js";
import { GitVcsService } from "./adapters/git/git-vcs.js";
import { RsyncMirrorService } from "./adapters/mirror/rsync-mirror.js";
import { NodeProcessRunner } from "./adapters/process/node-process-runner.js";
import {
  findMonorepoRoot,
  JsonConfigStore,
} from "./adapters/repositories/json-config-store.js";
import type { FileSystem } from "./domain/ports/filesystem.js";
import type { ProcessRunner } from "./domain/ports/process-runner.js";
import { SubmoduleRegistry } from "./domain/services/submodule-registry.js";
import { SyncOrchestrator } from "./domain/services/sync-orchestrator.js";
import { ExplainRulesUseCase } from "./domain/use-cases/explain-rules.js";
import { ShowSubmoduleUseCase } from "./domain/use-cases/show-submodule.js";
import { loadSettings, type Settings } from "./settings.js";

// ============================================================================
// Version
// ============================================================================

const VERSION = "0.1.0";

// ============================================================================
// Dependencies
// ============================================================================

export interface CliDeps {
  readonly cwd: string;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly fs: FileSystem;
  readonly processRunner: ProcessRunner;
  /** Aborts a running sync (wired to SIGINT by the entry point). */
  readonly signal?: AbortSignal;
}

export function defaultDeps(signal?: AbortSignal): CliDeps {
  return {
    cwd: process.cwd(),
    env: process.env,
    fs: new NodeFileSystem(),
    processRunner: new NodeProcessRunner(),
    signal,
  };
}

// ============================================================================
// Option types
// ============================================================================

type JsonOption = { json?: boolean };

type InitOptions = JsonOption & {
  submodules?: string;
  stageConfig?: boolean;
  defaultRules?: boolean;
};

type AddOptions = JsonOption & { description?: string };

type UpdateOptions = AddOptions & { clear?: boolean };

type SyncOptions = JsonOption & {
  dryRun?: boolean;
  concurrency: number;
  timeout?: number;
  createMissing?: boolean;
};

// ============================================================================
// Helpers
// ============================================================================

function handleError(e: unknown, json: boolean): number {
  if (e instanceof MaError) {
    if (json) {
      console.error(JSON.stringify(e.toJSON()));
    } else {
      console.error(formatError(e));
    }
    return 1;
  }
  throw e;
}

function printWarnings(warnings: readonly string[] | undefined): void {
  for (const warning of warnings ?? []) {
    console.error(`warning: ${warning}`);
  }
}

function parsePositiveInt(value: string): number {
  if (!/^[1-9]\d*$/.test(value)) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parseInt(value, 10);
}

/**
 * Split comma-separated names, rejecting empty entries.
 */
function parseNames(values: readonly string[]): string[] {
  const names = values.flatMap((v) => v.split(",")).map((n) => n.trim());
  if (names.some((n) => n === "")) {
    throw new MaError(
      "invalid_args",
      "Submodule list cannot contain empty names",
    );
  }
  return names;
}

function parseSyncTarget(values: readonly string[]): SyncTarget {
  const names = parseNames(values);
  if (names.length === 0) return "all";
  if (names.includes("all")) {
    if (names.length > 1) {
      throw new MaError(
        "invalid_args",
        "'all' cannot be combined with submodule names",
      );
    }
    return "all";
  }
  return names;
}

/**
 * Add -i/--include and -e/--exclude to a command. Both feed one list so
 * the order given on the command line is the rule order.
 */
function withRuleOptions(command: Command): () => SyncRule[] {
  const rules: SyncRule[] = [];
  const collect = (kind: RuleKind) => (pattern: string, previous: string[]) => {
    rules.push({ pattern, kind });
    return [...previous, pattern];
  };
  command
    .option(
      "-i, --include <pattern>",
      "Mirror paths matching pattern (repeatable, order matters)",
      collect("include"),
      [],
    )
    .option(
      "-e, --exclude <pattern>",
      "Keep paths matching pattern out of the sibling (repeatable, order matters)",
      collect("exclude"),
      [],
    );
  return () => rules;
}

// ============================================================================
// Program
// ============================================================================

function buildProgram(
  deps: CliDeps,
  settings: Settings,
  state: { exitCode: number },
): Command {
  const fs = deps.fs;

  async function openStore(): Promise<JsonConfigStore> {
    const root = await findMonorepoRoot(fs, deps.cwd, settings.configDir);
    if (!root) {
      throw new MaError(
        "not_initialized",
        "Monorepo not initialized. Run 'mra init' first.",
      );
    }
    return new JsonConfigStore(fs, root, settings.configDir);
  }

  function registryFor(store: JsonConfigStore): SubmoduleRegistry {
    return new SubmoduleRegistry({
      store,
      fs,
      vcs: new GitVcsService(deps.processRunner, settings.gitBinary),
    });
  }

  const program = new Command()
    .name("mra")
    .version(VERSION)
    .description(
      "Monorepo agent - mirror selected files of monorepo submodules into\n" +
        "sibling checkouts named after them.\n\n" +
        "Workflow:\n" +
        "  1. mra init                                  # in the monorepo root\n" +
        "  2. mra add user_app -i 'lib/***' -i pubspec.yaml\n" +
        "  3. mra sync                                  # mirrors into ../user_app\n\n" +
        "Rules are matched in order, first match wins; anything unmatched is\n" +
        "excluded. See 'mra <command> --help' for details",
    )
    .exitOverride()
    .configureOutput({
      writeOut: (str) => console.log(str.trimEnd()),
      writeErr: (str) => console.error(str.trimEnd()),
    });

  // --- init ---

  const initCmd = program
    .command("init")
    .description("Create the monorepo configuration in the current directory")
    .option("-s, --submodules <names>", "Comma-separated submodules to register")
    .option("--stage-config", "Stage the configuration in git after each change")
    .option(
      "--default-rules",
      "Give each submodule lib/***, pubspec.yaml and test/*** instead of -i/-e",
    )
    .option("--json", "Output as JSON");
  const initRules = withRuleOptions(initCmd);
  initCmd.action(async (options: InitOptions) => {
    try {
      const rootPath = resolve(deps.cwd);
      const store = new JsonConfigStore(fs, rootPath, settings.configDir);
      const names = options.submodules !== undefined
        ? parseNames([options.submodules])
        : [];
      if (options.defaultRules && initRules().length > 0) {
        throw new MaError(
          "invalid_args",
          "--default-rules cannot be combined with --include/--exclude",
        );
      }
      const rules = options.defaultRules ? [...DEFAULT_RULES] : initRules();
      if (names.length === 0 && rules.length > 0) {
        throw new MaError(
          "invalid_args",
          options.defaultRules
            ? "--default-rules needs --submodules to apply to"
            : "--include/--exclude need --submodules to apply to",
        );
      }
      const output = await registryFor(store).initialize({
        rootPath,
        stageConfig: options.stageConfig ?? false,
        submodules: names.map((name) => ({ name, rules })),
      });
      printWarnings(output.warnings);
      console.log(options.json ? JSON.stringify(output) : formatInit(output));
    } catch (e) {
      state.exitCode = handleError(e, options.json ?? false);
    }
  });

  // --- add ---

  const addCmd = program
    .command("add")
    .description("Register a submodule (an immediate child directory)")
    .argument("<name>", "Submodule directory name")
    .option("-d, --description <text>", "Free-text description")
    .option("--json", "Output as JSON");
  const addRules = withRuleOptions(addCmd);
  addCmd.action(async (name: string, options: AddOptions) => {
    try {
      const store = await openStore();
      const output = await registryFor(store).add(
        name,
        addRules(),
        options.description,
      );
      printWarnings(output.warnings);
      console.log(options.json ? JSON.stringify(output) : formatStatus(output));
    } catch (e) {
      state.exitCode = handleError(e, options.json ?? false);
    }
  });

  // --- remove ---

  program
    .command("remove")
    .description(
      "Unregister a submodule (files already mirrored are left in place)",
    )
    .argument("<name>", "Submodule name")
    .option("--json", "Output as JSON")
    .action(async (name: string, options: JsonOption) => {
      try {
        const store = await openStore();
        const output = await registryFor(store).remove(name);
        printWarnings(output.warnings);
        console.log(
          options.json ? JSON.stringify(output) : formatStatus(output),
        );
      } catch (e) {
        state.exitCode = handleError(e, options.json ?? false);
      }
    });

  // --- update ---

  const updateCmd = program
    .command("update")
    .description("Replace a submodule's rules and/or description")
    .argument("<name>", "Submodule name")
    .option("-d, --description <text>", "New description")
    .option("--clear", "Remove all rules (nothing will be mirrored)")
    .option("--json", "Output as JSON");
  const updateRules = withRuleOptions(updateCmd);
  updateCmd.action(async (name: string, options: UpdateOptions) => {
    try {
      const given = updateRules();
      if (options.clear && given.length > 0) {
        throw new MaError(
          "invalid_args",
          "--clear cannot be combined with --include/--exclude",
          name,
        );
      }
      const rules = options.clear ? [] : given.length > 0 ? given : undefined;
      const store = await openStore();
      const output = await registryFor(store).update(name, {
        rules,
        description: options.description,
      });
      printWarnings(output.warnings);
      console.log(options.json ? JSON.stringify(output) : formatStatus(output));
    } catch (e) {
      state.exitCode = handleError(e, options.json ?? false);
    }
  });

  // --- list ---

  program
    .command("list")
    .description("List submodules in registration order")
    .option("--json", "Output as JSON")
    .action(async (options: JsonOption) => {
      try {
        const store = await openStore();
        const config = await store.load();
        const output: ListOutput = {
          rootPath: config.root_path,
          submodules: config.submodules.map((s) => ({
            name: s.name,
            ...(s.description !== undefined &&
              { description: s.description }),
            rules: s.rules,
          })),
        };
        console.log(options.json ? JSON.stringify(output) : formatList(output));
      } catch (e) {
        state.exitCode = handleError(e, options.json ?? false);
      }
    });

  // --- show ---

  program
    .command("show")
    .description("Show a submodule's rules, compiled rules and sibling path")
    .argument("<name>", "Submodule name")
    .option("--json", "Output as JSON")
    .action(async (name: string, options: JsonOption) => {
      try {
        const store = await openStore();
        const output = await new ShowSubmoduleUseCase(store).execute({ name });
        console.log(options.json ? JSON.stringify(output) : formatShow(output));
      } catch (e) {
        state.exitCode = handleError(e, options.json ?? false);
      }
    });

  // --- explain ---

  program
    .command("explain")
    .description("Show whether paths (relative to the submodule) are mirrored")
    .argument("<name>", "Submodule name")
    .argument("<paths...>", "Paths to check; a trailing / marks a directory")
    .option("--json", "Output as JSON")
    .action(async (name: string, paths: string[], options: JsonOption) => {
      try {
        const store = await openStore();
        const output = await new ExplainRulesUseCase(store).execute({
          name,
          paths,
        });
        console.log(
          options.json ? JSON.stringify(output) : formatExplain(output),
        );
      } catch (e) {
        state.exitCode = handleError(e, options.json ?? false);
      }
    });

  // --- sync ---

  program
    .command("sync")
    .description("Mirror submodules into their sibling directories")
    .argument("[names...]", "Submodules to sync, comma or space separated", [])
    .option("-n, --dry-run", "Show what would change without writing")
    .option(
      "-c, --concurrency <n>",
      "Submodules mirrored at once",
      parsePositiveInt,
      settings.concurrency,
    )
    .option(
      "--timeout <ms>",
      "Kill a mirror process after this many milliseconds",
      parsePositiveInt,
    )
    .option("--create-missing", "Create missing sibling directories")
    .option("--json", "Output as JSON")
    .action(async (names: string[], options: SyncOptions) => {
      try {
        const target = parseSyncTarget(names);
        const store = await openStore();
        const orchestrator = new SyncOrchestrator({
          store,
          fs,
          mirror: new RsyncMirrorService(
            deps.processRunner,
            settings.rsyncBinary,
          ),
        });
        const report = await orchestrator.sync({
          target,
          dryRun: options.dryRun ?? false,
          concurrency: options.concurrency,
          timeoutMs: options.timeout,
          createMissing: options.createMissing ?? false,
          signal: deps.signal,
          onOutcome: options.json
            ? undefined
            : (outcome) => console.log(formatOutcome(outcome)),
        });

        if (options.json) {
          console.log(JSON.stringify(report));
        } else {
          console.log(formatSyncSummary(report));
        }

        if (!report.ok) {
          state.exitCode = handleError(
            new MaError(
              "sync_failed",
              report.outcomes.length === 0
                ? "No submodules to sync"
                : "No submodule was synced successfully",
            ),
            options.json ?? false,
          );
        }
      } catch (e) {
        state.exitCode = handleError(e, options.json ?? false);
      }
    });

  return program;
}

// ============================================================================
// Main CLI
// ============================================================================

/**
 * Run the CLI with the given arguments. Resolves to the process exit code.
 */
export async function main(
  args: string[],
  deps: CliDeps = defaultDeps(),
): Promise<number> {
  const json = args.includes("--json");

  let settings: Settings;
  try {
    settings = loadSettings(deps.env);
  } catch (e) {
    return handleError(e, json);
  }

  const state = { exitCode: 0 };
  const program = buildProgram(deps, settings, state);

  // Show help when no arguments provided
  if (args.length === 0) {
    program.outputHelp();
    return 0;
  }

  try {
    await program.parseAsync(args, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) {
      return e.exitCode;
    }
    throw e;
  }
  return state.exitCode;
}
