// Main module exports for monorepo-agent

export * from "./types.js";

// ============================================================================
// Domain ports (interfaces)
// ============================================================================

export type { ConfigStore } from "./domain/ports/config-store.js";
export type { FileSystem } from "./domain/ports/filesystem.js";
export type {
  MirrorRequest,
  MirrorResult,
  MirrorService,
} from "./domain/ports/mirror-service.js";
export type {
  ProcessOptions,
  ProcessResult,
  ProcessRunner,
} from "./domain/ports/process-runner.js";
export type { VcsResult, VcsService } from "./domain/ports/vcs-service.js";

// ============================================================================
// Domain services and use cases
// ============================================================================

export {
  compileRules,
  evaluateRules,
  toFirstMatchOrder,
  validateRules,
} from "./domain/services/rule-engine.js";
export type { RuleDecision } from "./domain/services/rule-engine.js";
export {
  PathResolver,
  siblingPathFor,
  validateSubmoduleName,
} from "./domain/services/path-resolver.js";
export { SubmoduleRegistry } from "./domain/services/submodule-registry.js";
export type {
  InitializeInput,
  UpdateSubmoduleInput,
} from "./domain/services/submodule-registry.js";
export { SyncOrchestrator } from "./domain/services/sync-orchestrator.js";
export type {
  SyncInput,
  SyncTarget,
} from "./domain/services/sync-orchestrator.js";
export { ShowSubmoduleUseCase } from "./domain/use-cases/show-submodule.js";
export { ExplainRulesUseCase } from "./domain/use-cases/explain-rules.js";

// ============================================================================
// Adapters
// ============================================================================

export { NodeFileSystem } from "./adapters/filesystem/node-fs.js";
export { NodeProcessRunner } from "./adapters/process/node-process-runner.js";
export { GitVcsService } from "./adapters/git/git-vcs.js";
export {
  buildRsyncArgs,
  RsyncMirrorService,
} from "./adapters/mirror/rsync-mirror.js";
export {
  findMonorepoRoot,
  JsonConfigStore,
} from "./adapters/repositories/json-config-store.js";
export { loadSettings } from "./settings.js";
export type { Settings } from "./settings.js";
