/**
 * SyncRuleEngine
 *
 * Compiles a submodule's ordered include/exclude list into the canonical
 * list handed to the mirroring tool, and evaluates relative paths against it.
 *
 * Pattern language follows rsync filter rules:
 *   - `*` matches within one path segment, `**` across segments
 *   - `?` matches one non-separator character, `[...]` a character class
 *   - `dir/***` matches `dir` itself and everything below it
 *   - a leading `/` anchors the pattern to the submodule root
 *   - a trailing `/` restricts the pattern to directories
 *   - unanchored patterns match at any segment boundary
 *
 * Precedence: first match by position, after hoisting every exclude that
 * narrows an earlier include (its literal prefix extends the include's)
 * ahead of that include. `lib/secret/***` after `lib/***` therefore carves
 * the secret subtree out of the include.
 *
 * Like rsync, a path is only reached when every parent directory is
 * included: `include lib/main.dart` alone mirrors nothing, because `lib/`
 * falls to the catch-all.
 */

import type { SyncRule } from "../entities/config.js";
import { MaError } from "../entities/errors.js";
import type { CompiledRule } from "../entities/sync.js";

const CATCH_ALL = "*";

// Also rejects newlines, which would split a filter rule in two
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

export const IMPLICIT_EXCLUDE: CompiledRule = {
  pattern: CATCH_ALL,
  kind: "exclude",
  implicit: true,
};

export type RuleDecision = {
  readonly disposition: "include" | "exclude";
  readonly rule: CompiledRule;
  /** Set when an excluded parent directory decided, e.g. `lib/`. */
  readonly directory?: string;
};

// ============================================================================
// Compilation
// ============================================================================

/**
 * Check each rule's pattern. Throws invalid_rule on the first bad one.
 */
export function validateRules(
  rules: readonly SyncRule[],
  submodule?: string,
): void {
  rules.forEach((rule, index) => {
    if (rule.pattern.trim() === "") {
      throw new MaError(
        "invalid_rule",
        `Rule #${index + 1} (${rule.kind}) has an empty pattern`,
        submodule,
      );
    }
    if (CONTROL_CHARS.test(rule.pattern)) {
      throw new MaError(
        "invalid_rule",
        `Rule #${index + 1} (${rule.kind}) contains control characters`,
        submodule,
      );
    }
  });
}

export function compileRules(
  rules: readonly SyncRule[],
  submodule?: string,
): CompiledRule[] {
  validateRules(rules, submodule);

  if (!rules.some((r) => r.kind === "include")) {
    throw new MaError(
      "vacuous_rule_set",
      rules.length === 0
        ? "No rules configured, nothing would be mirrored"
        : "Rule set only excludes, nothing would be mirrored",
      submodule,
    );
  }

  const compiled: CompiledRule[] = rules.map((r) => ({
    pattern: r.pattern,
    kind: r.kind,
    implicit: false,
  }));

  const last = rules[rules.length - 1];
  if (!(last.kind === "exclude" && last.pattern === CATCH_ALL)) {
    compiled.push(IMPLICIT_EXCLUDE);
  }

  return compiled;
}

/**
 * Reorder a compiled list so that a plain first-match tool reaches the
 * same decisions as evaluateRules().
 */
export function toFirstMatchOrder(
  compiled: readonly CompiledRule[],
): CompiledRule[] {
  const ordered: CompiledRule[] = [];
  for (const rule of compiled) {
    if (rule.kind === "exclude" && !rule.implicit) {
      const at = ordered.findIndex((r) =>
        r.kind === "include" && narrows(rule, r)
      );
      if (at !== -1) {
        ordered.splice(at, 0, rule);
        continue;
      }
    }
    ordered.push(rule);
  }
  return ordered;
}

function narrows(exclude: CompiledRule, include: CompiledRule): boolean {
  const excludePrefix = literalPrefix(exclude.pattern);
  const includePrefix = literalPrefix(include.pattern);
  return excludePrefix.length > includePrefix.length &&
    excludePrefix.startsWith(includePrefix);
}

function literalPrefix(pattern: string): string {
  const body = pattern.startsWith("/") ? pattern.slice(1) : pattern;
  const end = body.search(/[*?[\\]/);
  return end === -1 ? body : body.slice(0, end);
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Decide whether a path relative to the submodule root is mirrored.
 * A trailing `/` marks the path as a directory. Parent directories are
 * checked first, outermost to innermost.
 */
export function evaluateRules(
  compiled: readonly CompiledRule[],
  path: string,
): RuleDecision {
  const target = normalizeRelativePath(path);
  const ordered = toFirstMatchOrder(compiled);

  for (let depth = 1; depth < target.segments.length; depth++) {
    const parent: RelativePath = {
      segments: target.segments.slice(0, depth),
      isDirectory: true,
    };
    const rule = firstMatch(ordered, parent);
    if (rule.kind === "exclude") {
      return {
        disposition: "exclude",
        rule,
        directory: `${parent.segments.join("/")}/`,
      };
    }
  }

  const rule = firstMatch(ordered, target);
  return { disposition: rule.kind, rule };
}

function firstMatch(
  ordered: readonly CompiledRule[],
  path: RelativePath,
): CompiledRule {
  return ordered.find((rule) => matchesPattern(rule.pattern, path)) ??
    IMPLICIT_EXCLUDE;
}

type RelativePath = {
  readonly segments: readonly string[];
  readonly isDirectory: boolean;
};

function normalizeRelativePath(path: string): RelativePath {
  const isDirectory = path.endsWith("/");
  const segments = path
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".");

  if (segments.length === 0) {
    throw new MaError("invalid_args", `Not a relative path: '${path}'`);
  }
  if (segments.includes("..")) {
    throw new MaError(
      "invalid_args",
      `Path escapes the submodule root: '${path}'`,
    );
  }

  return { segments, isDirectory };
}

function matchesPattern(pattern: string, path: RelativePath): boolean {
  let body = pattern;

  const directoryOnly = body.length > 1 && body.endsWith("/");
  if (directoryOnly) {
    if (!path.isDirectory) return false;
    body = body.slice(0, -1);
  }

  const anchored = body.startsWith("/");
  if (anchored) body = body.slice(1);

  const regex = patternToRegExp(body);

  if (anchored) {
    return regex.test(path.segments.join("/"));
  }

  for (let i = 0; i < path.segments.length; i++) {
    if (regex.test(path.segments.slice(i).join("/"))) {
      return true;
    }
  }
  return false;
}

function patternToRegExp(body: string): RegExp {
  if (body.endsWith("/***")) {
    return new RegExp(`^${translateGlob(body.slice(0, -4))}(?:/.*)?$`);
  }
  return new RegExp(`^${translateGlob(body)}$`);
}

function translateGlob(glob: string): string {
  let out = "";
  let i = 0;

  while (i < glob.length) {
    const char = glob[i];

    if (char === "*") {
      if (glob[i + 1] === "*") {
        out += ".*";
        i += 2;
      } else {
        out += "[^/]*";
        i++;
      }
      continue;
    }

    if (char === "?") {
      out += "[^/]";
      i++;
      continue;
    }

    if (char === "\\" && i + 1 < glob.length) {
      out += escapeRegExp(glob[i + 1]);
      i += 2;
      continue;
    }

    if (char === "[") {
      const close = glob.indexOf("]", i + 2);
      if (close !== -1) {
        let members = glob.slice(i + 1, close);
        if (members.startsWith("!")) members = "^" + members.slice(1);
        out += `[${members.replace(/\\/g, "\\\\")}]`;
        i = close + 1;
        continue;
      }
    }

    out += escapeRegExp(char);
    i++;
  }

  return out;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}
