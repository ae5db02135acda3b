import { expect, test } from "vitest";
import { InMemoryFileSystem } from "../../adapters/filesystem/in-memory-fs.js";
import { JsonConfigStore } from "../../adapters/repositories/json-config-store.js";
import {
  exclude,
  include,
  type MonorepoConfig,
  type Submodule,
} from "../entities/config.js";
import { MaError } from "../entities/errors.js";
import type { SyncOutcome } from "../entities/sync.js";
import type {
  MirrorRequest,
  MirrorResult,
  MirrorService,
} from "../ports/mirror-service.js";
import { SyncOrchestrator } from "./sync-orchestrator.js";

const ROOT = "/work/mono";
const CONFIG_PATH = "/work/mono/.monorepo/config.json";

// --- Fakes ---

type MirrorBehavior = (request: MirrorRequest) => Promise<MirrorResult>;

function createFakeMirror(
  behavior: MirrorBehavior = () =>
    Promise.resolve({ exitCode: 0, stdout: "", stderr: "" }),
): MirrorService & {
  requests: MirrorRequest[];
} {
  const requests: MirrorRequest[] = [];
  return {
    requests,
    mirror(request: MirrorRequest) {
      requests.push(request);
      return behavior(request);
    },
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const THREE: Submodule[] = [
  { name: "user_app", rules: [include("lib/***"), include("pubspec.yaml")] },
  { name: "admin_web", rules: [include("src/***")] },
  { name: "shared", rules: [include("**")] },
];

/**
 * Monorepo with a source directory per submodule; siblings are created
 * only for the names in `siblings`.
 */
async function setup(
  submodules: Submodule[],
  siblings: string[],
  mirror: MirrorService = createFakeMirror(),
  fs: InMemoryFileSystem = new InMemoryFileSystem(),
) {
  for (const submodule of submodules) {
    await fs.ensureDir(`${ROOT}/${submodule.name}`);
  }
  for (const name of siblings) {
    await fs.ensureDir(`/work/${name}`);
  }
  const store = new JsonConfigStore(fs, ROOT);
  const config: MonorepoConfig = {
    version: 1,
    root_path: ROOT,
    stage_config: false,
    submodules,
  };
  await store.save(config);
  const orchestrator = new SyncOrchestrator({ store, fs, mirror });
  return { fs, store, orchestrator };
}

function summary(outcomes: readonly SyncOutcome[]): string[] {
  return outcomes.map((o) => `${o.name}:${o.status}`);
}

// --- Batch behavior ---

test("SyncOrchestrator - skips a submodule without sibling and syncs the rest", async () => {
  const { orchestrator } = await setup(THREE, ["user_app", "admin_web"]);

  const report = await orchestrator.sync({ target: "all" });

  expect(summary(report.outcomes)).toEqual([
    "user_app:succeeded",
    "admin_web:succeeded",
    "shared:skipped",
  ]);
  expect(report.outcomes[2]).toEqual({
    status: "skipped",
    name: "shared",
    reason: "sibling_not_found",
    message: "Sibling directory /work/shared does not exist",
  });
  expect(report.succeeded).toBe(2);
  expect(report.failed).toBe(0);
  expect(report.skipped).toBe(1);
  expect(report.cancelled).toBe(false);
  expect(report.ok).toBe(true);
});

test("SyncOrchestrator - a failed mirror does not stop the batch", async () => {
  const mirror = createFakeMirror((request) =>
    Promise.resolve(
      request.destinationPath === "/work/admin_web"
        ? { exitCode: 23, stdout: "", stderr: "rsync: permission denied\n" }
        : { exitCode: 0, stdout: "", stderr: "" },
    )
  );
  const { orchestrator } = await setup(THREE, ["user_app", "admin_web"], mirror);

  const report = await orchestrator.sync({ target: "all" });

  expect(summary(report.outcomes)).toEqual([
    "user_app:succeeded",
    "admin_web:failed",
    "shared:skipped",
  ]);
  expect(report.outcomes[1]).toEqual({
    status: "failed",
    name: "admin_web",
    siblingPath: "/work/admin_web",
    exitCode: 23,
    diagnostic: "rsync: permission denied\n",
  });
  expect(report.ok).toBe(true);
});

test("SyncOrchestrator - not ok when nothing succeeded", async () => {
  const mirror = createFakeMirror(() =>
    Promise.resolve({ exitCode: 1, stdout: "", stderr: "" })
  );
  const { orchestrator } = await setup(THREE, ["user_app"], mirror);

  const report = await orchestrator.sync({ target: "all" });

  expect(summary(report.outcomes)).toEqual([
    "user_app:failed",
    "admin_web:skipped",
    "shared:skipped",
  ]);
  expect(report.outcomes[0]).toMatchObject({
    diagnostic: "mirror process exited with status 1",
  });
  expect(report.ok).toBe(false);
});

test("SyncOrchestrator - reports a terminated mirror process", async () => {
  const mirror = createFakeMirror(() =>
    Promise.resolve({ exitCode: null, stdout: "", stderr: "" })
  );
  const { orchestrator } = await setup([THREE[0]], ["user_app"], mirror);

  const report = await orchestrator.sync({ target: "all" });

  expect(report.outcomes[0]).toMatchObject({
    status: "failed",
    exitCode: null,
    diagnostic: "mirror process was terminated",
  });
});

test("SyncOrchestrator - a mirror that throws fails its submodule", async () => {
  const mirror = createFakeMirror(() =>
    Promise.reject(
      new MaError("process_failed", "Failed to run rsync: spawn rsync ENOENT"),
    )
  );
  const { orchestrator } = await setup([THREE[0]], ["user_app"], mirror);

  const report = await orchestrator.sync({ target: "all" });

  expect(report.outcomes).toEqual([
    {
      status: "failed",
      name: "user_app",
      siblingPath: "/work/user_app",
      exitCode: null,
      diagnostic: "Failed to run rsync: spawn rsync ENOENT",
    },
  ]);
});

test("SyncOrchestrator - skips submodules whose rules do not compile", async () => {
  const { orchestrator } = await setup(
    [{ name: "user_app", rules: [exclude("*")] }],
    ["user_app"],
  );

  const report = await orchestrator.sync({ target: "all" });

  expect(report.outcomes).toEqual([
    {
      status: "skipped",
      name: "user_app",
      reason: "vacuous_rule_set",
      message: "Rule set only excludes, nothing would be mirrored",
    },
  ]);
});

test("SyncOrchestrator - skips a submodule whose source is gone", async () => {
  const fs = new InMemoryFileSystem();
  await fs.ensureDir("/work/user_app");
  const store = new JsonConfigStore(fs, ROOT);
  await store.save({
    version: 1,
    root_path: ROOT,
    stage_config: false,
    submodules: [THREE[0]],
  });
  const orchestrator = new SyncOrchestrator({
    store,
    fs,
    mirror: createFakeMirror(),
  });

  const report = await orchestrator.sync({ target: "all" });

  expect(report.outcomes).toEqual([
    {
      status: "skipped",
      name: "user_app",
      reason: "not_a_subdirectory",
      message: "Source directory /work/mono/user_app does not exist",
    },
  ]);
});

// --- Mirror requests ---

test("SyncOrchestrator - passes compiled rules and paths to the mirror", async () => {
  const mirror = createFakeMirror();
  const { orchestrator } = await setup([THREE[0]], ["user_app"], mirror);

  await orchestrator.sync({ target: "all", timeoutMs: 5000 });

  expect(mirror.requests).toEqual([
    {
      sourcePath: "/work/mono/user_app",
      destinationPath: "/work/user_app",
      rules: [
        { pattern: "lib/***", kind: "include", implicit: false },
        { pattern: "pubspec.yaml", kind: "include", implicit: false },
        { pattern: "*", kind: "exclude", implicit: true },
      ],
      deleteExtraneous: true,
      dryRun: false,
      signal: undefined,
      timeoutMs: 5000,
    },
  ]);
});

test("SyncOrchestrator - dry run reports the pending changes", async () => {
  const mirror = createFakeMirror(() =>
    Promise.resolve({
      exitCode: 0,
      stdout: ">f+++++++++ lib/main.dart\n",
      stderr: "",
    })
  );
  const { orchestrator } = await setup([THREE[0]], ["user_app"], mirror);

  const report = await orchestrator.sync({ target: "all", dryRun: true });

  expect(mirror.requests[0].dryRun).toBe(true);
  expect(report.outcomes[0]).toMatchObject({
    status: "succeeded",
    changes: ">f+++++++++ lib/main.dart\n",
  });
});

test("SyncOrchestrator - createMissing creates the sibling first", async () => {
  const { orchestrator, fs } = await setup([THREE[2]], []);

  const report = await orchestrator.sync({
    target: "all",
    createMissing: true,
  });

  expect(summary(report.outcomes)).toEqual(["shared:succeeded"]);
  expect(await fs.isDirectory("/work/shared")).toBe(true);
});

class DeniedFileSystem extends InMemoryFileSystem {
  constructor(
    private readonly operation: "mkdir" | "realpath",
    private readonly denied: string,
  ) {
    super();
  }

  override ensureDir(path: string): Promise<void> {
    if (this.operation === "mkdir" && path === this.denied) {
      return Promise.reject(this.error(path));
    }
    return super.ensureDir(path);
  }

  override realPath(path: string): Promise<string> {
    if (this.operation === "realpath" && path === this.denied) {
      return Promise.reject(this.error(path));
    }
    return super.realPath(path);
  }

  private error(path: string): Error {
    return new Error(`EACCES: permission denied, ${this.operation} '${path}'`);
  }
}

test("SyncOrchestrator - a filesystem error fails only its submodule", async () => {
  const mirror = createFakeMirror();
  const { orchestrator } = await setup(
    THREE,
    [],
    mirror,
    new DeniedFileSystem("mkdir", "/work/admin_web"),
  );

  const report = await orchestrator.sync({
    target: "all",
    createMissing: true,
  });

  expect(summary(report.outcomes)).toEqual([
    "user_app:succeeded",
    "admin_web:failed",
    "shared:succeeded",
  ]);
  expect(report.outcomes[1]).toEqual({
    status: "failed",
    name: "admin_web",
    siblingPath: "/work/admin_web",
    exitCode: null,
    diagnostic: "EACCES: permission denied, mkdir '/work/admin_web'",
  });
  expect(mirror.requests.map((r) => r.destinationPath)).toEqual([
    "/work/user_app",
    "/work/shared",
  ]);
  expect(report.ok).toBe(true);
});

test("SyncOrchestrator - a failing real path lookup fails only its submodule", async () => {
  const { orchestrator } = await setup(
    THREE,
    ["user_app", "admin_web", "shared"],
    createFakeMirror(),
    new DeniedFileSystem("realpath", "/work/user_app"),
  );

  const report = await orchestrator.sync({ target: "all", concurrency: 2 });

  expect(summary(report.outcomes)).toEqual([
    "user_app:failed",
    "admin_web:succeeded",
    "shared:succeeded",
  ]);
  expect(report.outcomes[0]).toMatchObject({
    diagnostic: "EACCES: permission denied, realpath '/work/user_app'",
  });
});

test("SyncOrchestrator - leaves the configuration untouched", async () => {
  const { orchestrator, fs } = await setup(THREE, ["user_app", "admin_web"]);
  const before = fs.getAll().get(CONFIG_PATH);

  await orchestrator.sync({ target: "all" });

  expect(fs.getAll().get(CONFIG_PATH)).toBe(before);
});

// --- Target selection ---

test("SyncOrchestrator - syncs named submodules in the given order once", async () => {
  const mirror = createFakeMirror();
  const { orchestrator } = await setup(
    THREE,
    ["user_app", "admin_web", "shared"],
    mirror,
  );

  const report = await orchestrator.sync({
    target: ["shared", "user_app", "shared"],
  });

  expect(summary(report.outcomes)).toEqual([
    "shared:succeeded",
    "user_app:succeeded",
  ]);
  expect(mirror.requests.map((r) => r.destinationPath)).toEqual([
    "/work/shared",
    "/work/user_app",
  ]);
});

test("SyncOrchestrator - unknown names abort before mirroring", async () => {
  const mirror = createFakeMirror();
  const { orchestrator } = await setup(THREE, ["user_app"], mirror);

  let error: unknown;
  try {
    await orchestrator.sync({ target: ["user_app", "ghost"] });
  } catch (e) {
    error = e;
  }

  expect(error).toBeInstanceOf(MaError);
  expect(error).toMatchObject({
    code: "unknown_submodule",
    message: "Submodule not found: ghost",
  });
  expect(mirror.requests).toEqual([]);
});

test("SyncOrchestrator - empty registry gives an empty report", async () => {
  const { orchestrator } = await setup([], []);

  const report = await orchestrator.sync({ target: "all" });

  expect(report).toEqual({
    outcomes: [],
    succeeded: 0,
    failed: 0,
    skipped: 0,
    cancelled: false,
    ok: false,
  });
});

// --- Concurrency ---

test("SyncOrchestrator - rejects a non-positive concurrency", async () => {
  const { orchestrator } = await setup(THREE, []);

  await expect(orchestrator.sync({ target: "all", concurrency: 0 }))
    .rejects.toMatchObject({ code: "invalid_args" });
});

function createTrackingMirror() {
  let active = 0;
  let maxActive = 0;
  const mirror = createFakeMirror(async () => {
    active++;
    maxActive = Math.max(maxActive, active);
    await delay(10);
    active--;
    return { exitCode: 0, stdout: "", stderr: "" };
  });
  return { mirror, maxActive: () => maxActive };
}

test("SyncOrchestrator - mirrors distinct siblings in parallel", async () => {
  const tracking = createTrackingMirror();
  const { orchestrator } = await setup(
    THREE,
    ["user_app", "admin_web", "shared"],
    tracking.mirror,
  );

  const report = await orchestrator.sync({ target: "all", concurrency: 2 });

  expect(report.succeeded).toBe(3);
  expect(tracking.maxActive()).toBe(2);
});

test("SyncOrchestrator - never mirrors into the same directory twice at once", async () => {
  const tracking = createTrackingMirror();
  const { orchestrator, fs } = await setup(
    [THREE[0], THREE[1]],
    ["user_app"],
    tracking.mirror,
  );
  fs.setSymlink("/work/admin_web", "/work/user_app");

  const report = await orchestrator.sync({ target: "all", concurrency: 2 });

  expect(report.succeeded).toBe(2);
  expect(tracking.maxActive()).toBe(1);
});

// --- Cancellation ---

test("SyncOrchestrator - cancellation stops starting new submodules", async () => {
  const controller = new AbortController();
  const { orchestrator } = await setup(THREE, [
    "user_app",
    "admin_web",
    "shared",
  ]);

  const report = await orchestrator.sync({
    target: "all",
    signal: controller.signal,
    onOutcome: () => controller.abort(),
  });

  expect(summary(report.outcomes)).toEqual(["user_app:succeeded"]);
  expect(report.cancelled).toBe(true);
  expect(report.ok).toBe(true);
});

test("SyncOrchestrator - an aborted signal mirrors nothing", async () => {
  const controller = new AbortController();
  controller.abort();
  const mirror = createFakeMirror();
  const { orchestrator } = await setup(THREE, ["user_app"], mirror);

  const report = await orchestrator.sync({
    target: "all",
    signal: controller.signal,
  });

  expect(report.outcomes).toEqual([]);
  expect(report.cancelled).toBe(true);
  expect(report.ok).toBe(false);
  expect(mirror.requests).toEqual([]);
});
