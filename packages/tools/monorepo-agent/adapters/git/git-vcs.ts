/**
 * Adapter: GitVcsService
 *
 * Concrete VcsService that shells out to the git CLI through a
 * ProcessRunner. Only exit status and stderr are interpreted.
 */

import type { ProcessRunner } from "../../domain/ports/process-runner.js";
import type { VcsResult, VcsService } from "../../domain/ports/vcs-service.js";

export class GitVcsService implements VcsService {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly gitBinary: string = "git",
  ) {}

  async isInRepo(cwd: string): Promise<boolean> {
    try {
      const result = await this.runner.run(
        [this.gitBinary, "rev-parse", "--show-toplevel"],
        { cwd },
      );
      return result.exitCode === 0;
    } catch {
      return false; // git not installed
    }
  }

  async track(cwd: string, path: string): Promise<VcsResult> {
    const result = await this.runner.run(
      [this.gitBinary, "add", "--", path],
      { cwd },
    );
    return { ok: result.exitCode === 0, stderr: result.stderr };
  }
}
