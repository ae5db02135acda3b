// Sync entities - derived bindings, compiled rules and per-submodule outcomes

import type { RuleKind } from "./config.js";
import type { MaErrorCode } from "./errors.js";

/**
 * Resolved relationship between a submodule and its sibling checkout.
 * Computed fresh for every orchestration run, never persisted.
 */
export type SiblingBinding = {
  readonly name: string;
  readonly sourcePath: string;
  readonly siblingPath: string;
};

export type CompiledRule = {
  readonly pattern: string;
  readonly kind: RuleKind;
  readonly implicit: boolean; // true only for the trailing catch-all
};

export type SkipReason = Extract<
  MaErrorCode,
  | "sibling_not_found"
  | "invalid_name"
  | "not_a_subdirectory"
  | "invalid_rule"
  | "vacuous_rule_set"
>;

export type SyncOutcome =
  | {
    readonly status: "succeeded";
    readonly name: string;
    readonly siblingPath: string;
    readonly rules: readonly CompiledRule[];
    readonly changes?: string; // Dry runs only: what would be transferred
  }
  | {
    readonly status: "failed";
    readonly name: string;
    readonly siblingPath: string;
    readonly exitCode: number | null;
    readonly diagnostic: string;
  }
  | {
    readonly status: "skipped";
    readonly name: string;
    readonly reason: SkipReason;
    readonly message: string;
  };

export type SyncStatus = SyncOutcome["status"];

export type SyncReport = {
  readonly outcomes: readonly SyncOutcome[];
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
  readonly cancelled: boolean;
  readonly ok: boolean; // At least one submodule succeeded
};

export function summarizeOutcomes(
  outcomes: readonly SyncOutcome[],
  cancelled: boolean,
): SyncReport {
  let succeeded = 0;
  let failed = 0;
  let skipped = 0;
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "succeeded":
        succeeded++;
        break;
      case "failed":
        failed++;
        break;
      case "skipped":
        skipped++;
        break;
    }
  }
  return {
    outcomes,
    succeeded,
    failed,
    skipped,
    cancelled,
    ok: succeeded > 0,
  };
}
