/**
 * Adapter: RsyncMirrorService
 *
 * MirrorService backed by rsync. Translates a compiled rule list into
 * --include/--exclude arguments in first-match order.
 *
 * Destination permissions, ownership and timestamps are left alone; only
 * content is transferred (--checksum decides what changed). With
 * deleteExtraneous, entries the rules no longer select are removed from the
 * destination, except the sibling's own /.git.
 */

import type {
  MirrorRequest,
  MirrorResult,
  MirrorService,
} from "../../domain/ports/mirror-service.js";
import type { ProcessRunner } from "../../domain/ports/process-runner.js";
import type { CompiledRule } from "../../domain/entities/sync.js";
import { toFirstMatchOrder } from "../../domain/services/rule-engine.js";

const BASE_FLAGS = [
  "--recursive",
  "--links",
  "--checksum",
  "--no-perms",
  "--no-owner",
  "--no-group",
] as const;

const PROTECTED = ["/.git"] as const;

export function buildRsyncArgs(request: MirrorRequest): string[] {
  const args: string[] = [...BASE_FLAGS];

  if (request.deleteExtraneous) {
    args.push("--delete", "--delete-excluded");
    for (const path of PROTECTED) {
      args.push(`--filter=protect ${path}`);
    }
  }
  if (request.dryRun) {
    args.push("--dry-run", "--itemize-changes");
  }

  args.push(...toFilterArgs(request.rules));

  args.push(withTrailingSlash(request.sourcePath));
  args.push(withTrailingSlash(request.destinationPath));
  return args;
}

export function toFilterArgs(rules: readonly CompiledRule[]): string[] {
  return toFirstMatchOrder(rules).map((rule) =>
    `--${rule.kind}=${rule.pattern}`
  );
}

function withTrailingSlash(path: string): string {
  return path.endsWith("/") ? path : `${path}/`;
}

export class RsyncMirrorService implements MirrorService {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly rsyncBinary: string = "rsync",
  ) {}

  async mirror(request: MirrorRequest): Promise<MirrorResult> {
    const result = await this.runner.run(
      [this.rsyncBinary, ...buildRsyncArgs(request)],
      { signal: request.signal, timeoutMs: request.timeoutMs },
    );
    return result;
  }
}
