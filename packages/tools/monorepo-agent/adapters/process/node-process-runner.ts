/**
 * Adapter: NodeProcessRunner
 *
 * Concrete ProcessRunner implementation using child_process.spawn.
 * stdout and stderr are captured; the caller decides what to show.
 *
 * Dependencies: node:child_process.
 */

import { spawn } from "node:child_process";
import { MaError } from "../../domain/entities/errors.js";
import type {
  ProcessOptions,
  ProcessResult,
  ProcessRunner,
} from "../../domain/ports/process-runner.js";

export class NodeProcessRunner implements ProcessRunner {
  run(
    cmd: readonly string[],
    options?: ProcessOptions,
  ): Promise<ProcessResult> {
    const [executable, ...args] = cmd;
    if (!executable) {
      return Promise.reject(new MaError("invalid_args", "Empty command"));
    }

    return new Promise<ProcessResult>((resolve, reject) => {
      const child = spawn(executable, args, {
        cwd: options?.cwd,
        signal: options?.signal,
        timeout: options?.timeoutMs,
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("error", (e) => {
        if (e.name === "AbortError") {
          reject(new MaError("process_failed", `${executable} was cancelled`));
          return;
        }
        reject(
          new MaError(
            "process_failed",
            `Failed to run ${executable}: ${e.message}`,
          ),
        );
      });

      child.on("close", (code) => {
        resolve({ exitCode: code, stdout, stderr });
      });
    });
  }
}
