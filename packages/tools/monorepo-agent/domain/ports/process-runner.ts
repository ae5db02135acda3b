// Process runner port - interface for spawning external processes

/**
 * Options for running an external process.
 */
export type ProcessOptions = {
  readonly cwd?: string;
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number; // Kills the process when exceeded
};

/**
 * Result of running an external process.
 * exitCode is null when the process was killed by a signal.
 */
export type ProcessResult = {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
};

/**
 * Service for running external processes (git, rsync).
 */
export interface ProcessRunner {
  /** Run a command with the given arguments and options. */
  run(cmd: readonly string[], options?: ProcessOptions): Promise<ProcessResult>;
}
