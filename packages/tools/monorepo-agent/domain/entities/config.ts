// Config entity - persisted monorepo configuration

export const CONFIG_VERSION = 1;

export const RULE_KINDS = ["include", "exclude"] as const;

export type RuleKind = (typeof RULE_KINDS)[number];

/**
 * One ordered entry of a submodule's mirroring policy.
 * The pattern is relative to the submodule root.
 */
export type SyncRule = {
  readonly pattern: string;
  readonly kind: RuleKind;
};

export type Submodule = {
  readonly name: string; // Immediate child directory of the monorepo root
  readonly description?: string;
  readonly rules: readonly SyncRule[];
};

/**
 * Root entity, one per initialized monorepo.
 * Submodules are kept in insertion order; names are unique.
 */
export type MonorepoConfig = {
  readonly version: number;
  readonly root_path: string; // Absolute, fixed at init
  readonly stage_config: boolean; // Stage the artifact in git after each mutation
  readonly submodules: readonly Submodule[];
};

export function include(pattern: string): SyncRule {
  return { pattern, kind: "include" };
}

export function exclude(pattern: string): SyncRule {
  return { pattern, kind: "exclude" };
}

/** Preset for a Flutter/Dart package: sources, manifest and tests. */
export const DEFAULT_RULES: readonly SyncRule[] = [
  include("lib/***"),
  include("pubspec.yaml"),
  include("test/***"),
  exclude("*"),
];

export function findSubmodule(
  config: MonorepoConfig,
  name: string,
): Submodule | undefined {
  return config.submodules.find((s) => s.name === name);
}
