// Mirror service port - interface for the file-mirroring collaborator

import type { CompiledRule } from "../entities/sync.js";

export type MirrorRequest = {
  readonly sourcePath: string;
  readonly destinationPath: string;
  readonly rules: readonly CompiledRule[];
  /** Remove destination entries no longer selected by the rules. */
  readonly deleteExtraneous: boolean;
  readonly dryRun: boolean;
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
};

export type MirrorResult = {
  readonly exitCode: number | null;
  readonly stdout: string; // Change listing on dry runs
  readonly stderr: string;
};

/**
 * One-way mirroring of a rule-selected subset of a directory.
 */
export interface MirrorService {
  mirror(request: MirrorRequest): Promise<MirrorResult>;
}
