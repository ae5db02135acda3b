// monorepo-agent types

export {
  CONFIG_VERSION,
  DEFAULT_RULES,
  exclude,
  findSubmodule,
  include,
  RULE_KINDS,
} from "./domain/entities/config.js";
export type {
  MonorepoConfig,
  RuleKind,
  Submodule,
  SyncRule,
} from "./domain/entities/config.js";

export { MaError } from "./domain/entities/errors.js";
export type { MaErrorCode } from "./domain/entities/errors.js";

export { summarizeOutcomes } from "./domain/entities/sync.js";
export type {
  CompiledRule,
  SiblingBinding,
  SkipReason,
  SyncOutcome,
  SyncReport,
  SyncStatus,
} from "./domain/entities/sync.js";

export type {
  ExplainItem,
  ExplainOutput,
  InitOutput,
  ListOutput,
  ListSubmoduleItem,
  ShowOutput,
  StatusOutput,
} from "./domain/entities/outputs.js";
