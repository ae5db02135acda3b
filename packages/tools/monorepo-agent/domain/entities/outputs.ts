// Command output types - immutable result types for all monorepo-agent commands

import type { SyncRule } from "./config.js";
import type { CompiledRule } from "./sync.js";

export type StatusOutput = {
  readonly status: string;
  readonly name?: string;
  readonly warnings?: readonly string[];
};

export type InitOutput = {
  readonly status: "initialized";
  readonly rootPath: string;
  readonly configPath: string;
  readonly submodules: readonly string[];
  readonly warnings?: readonly string[];
};

export type ListSubmoduleItem = {
  readonly name: string;
  readonly description?: string;
  readonly rules: readonly SyncRule[];
};

export type ListOutput = {
  readonly rootPath: string;
  readonly submodules: readonly ListSubmoduleItem[];
};

export type ShowOutput = {
  readonly name: string;
  readonly description?: string;
  readonly sourcePath: string;
  readonly siblingPath: string; // Derived, may not exist
  readonly rules: readonly SyncRule[];
  readonly compiled: readonly CompiledRule[] | null; // null when rules don't compile
  readonly compileError?: string;
};

export type ExplainItem = {
  readonly path: string;
  readonly disposition: "include" | "exclude";
  readonly rule: CompiledRule;
  readonly directory?: string;
};

export type ExplainOutput = {
  readonly name: string;
  readonly paths: readonly ExplainItem[];
};
