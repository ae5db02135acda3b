/**
 * CLI output formatters for monorepo-agent commands.
 *
 * All formatX() functions transform command output objects into human-readable strings.
 * These are pure functions with no side effects.
 */

import type {
  CompiledRule,
  ExplainOutput,
  InitOutput,
  ListOutput,
  MaError,
  ShowOutput,
  StatusOutput,
  SyncOutcome,
  SyncReport,
  SyncRule,
} from "../../types.js";

// ============================================================================
// Helpers
// ============================================================================

function formatRule(rule: SyncRule | CompiledRule): string {
  const suffix = "implicit" in rule && rule.implicit ? "  (implicit)" : "";
  return `${rule.kind.padEnd(7)} ${rule.pattern}${suffix}`;
}

function indent(text: string, prefix = "  "): string {
  return text
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}

// ============================================================================
// Formatters
// ============================================================================

export function formatInit(output: InitOutput): string {
  const lines = [`Initialized monorepo at ${output.rootPath}`];
  if (output.submodules.length > 0) {
    lines.push(`Registered: ${output.submodules.join(", ")}`);
  }
  return lines.join("\n");
}

export function formatStatus(output: StatusOutput): string {
  switch (output.status) {
    case "submodule_added":
      return `Added submodule: ${output.name}`;
    case "submodule_removed":
      return `Removed submodule: ${output.name} (files already mirrored to its sibling were left in place)`;
    case "submodule_updated":
      return `Updated submodule: ${output.name}`;
    default:
      return output.name ? `${output.status}: ${output.name}` : output.status;
  }
}

export function formatList(output: ListOutput): string {
  if (output.submodules.length === 0) {
    return "No submodules configured.";
  }

  const blocks = output.submodules.map((submodule) => {
    const header = submodule.description
      ? `${submodule.name} - ${submodule.description}`
      : submodule.name;
    if (submodule.rules.length === 0) {
      return `${header}\n  (no rules, nothing is mirrored)`;
    }
    return [header, ...submodule.rules.map((r) => indent(formatRule(r)))]
      .join("\n");
  });

  return blocks.join("\n\n");
}

export function formatShow(output: ShowOutput): string {
  const lines = [`name:    ${output.name}`];
  if (output.description) {
    lines.push(`desc:    ${output.description}`);
  }
  lines.push(`source:  ${output.sourcePath}`);
  lines.push(`sibling: ${output.siblingPath}`);

  lines.push("rules:");
  if (output.rules.length === 0) {
    lines.push("  (none)");
  } else {
    lines.push(...output.rules.map((r) => indent(formatRule(r))));
  }

  if (output.compiled) {
    lines.push("compiled:");
    lines.push(...output.compiled.map((r) => indent(formatRule(r))));
  } else {
    lines.push(`compiled: ${output.compileError ?? "unavailable"}`);
  }

  return lines.join("\n");
}

export function formatExplain(output: ExplainOutput): string {
  return output.paths
    .map((item) => {
      const via = item.directory ? `  (via ${item.directory})` : "";
      return `${item.disposition.padEnd(7)} ${item.path}  <- ${
        formatRule(item.rule)
      }${via}`;
    })
    .join("\n");
}

export function formatOutcome(outcome: SyncOutcome): string {
  switch (outcome.status) {
    case "succeeded": {
      const line = `[ok]      ${outcome.name} -> ${outcome.siblingPath}`;
      const changes = outcome.changes?.trimEnd();
      return changes ? `${line}\n${indent(changes, "          ")}` : line;
    }
    case "failed":
      return `[failed]  ${outcome.name}: ${outcome.diagnostic.trimEnd()}`;
    case "skipped":
      return `[skipped] ${outcome.name}: ${outcome.message}`;
  }
}

export function formatSyncSummary(report: SyncReport): string {
  if (report.outcomes.length === 0 && !report.cancelled) {
    return "No submodules to sync.";
  }
  const total = report.outcomes.length;
  const noun = total === 1 ? "submodule" : "submodules";
  const summary =
    `${total} ${noun}: ${report.succeeded} succeeded, ${report.failed} failed, ${report.skipped} skipped`;
  return report.cancelled ? `${summary} (cancelled)` : summary;
}

export function formatError(error: MaError): string {
  return error.submodule
    ? `error [${error.submodule}]: ${error.message}`
    : `error: ${error.message}`;
}
