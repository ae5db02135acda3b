import { mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { MaError } from "../../domain/entities/errors.js";
import { NodeFileSystem } from "./node-fs.js";

let tempDir: string;
const fs = new NodeFileSystem();

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "monorepo-agent-fs-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

test("NodeFileSystem - writes, renames and reads back", async () => {
  const temp = join(tempDir, "config.json.tmp");
  const target = join(tempDir, "config.json");

  await fs.writeFile(temp, "{}\n");
  await fs.rename(temp, target);

  expect(await fs.readFile(target)).toBe("{}\n");
  expect(await fs.exists(temp)).toBe(false);
});

test("NodeFileSystem - distinguishes files from directories", async () => {
  const file = join(tempDir, "file.txt");
  await writeFile(file, "x");
  await fs.ensureDir(join(tempDir, "a", "b"));

  expect(await fs.isDirectory(join(tempDir, "a", "b"))).toBe(true);
  expect(await fs.isDirectory(file)).toBe(false);
  expect(await fs.exists(file)).toBe(true);
  expect(await fs.isDirectory(join(file, "below"))).toBe(false);
  expect(await fs.exists(join(tempDir, "missing"))).toBe(false);
});

test("NodeFileSystem - missing files surface as io_error", async () => {
  let error: unknown;
  try {
    await fs.readFile(join(tempDir, "missing.json"));
  } catch (e) {
    error = e;
  }

  expect(error).toBeInstanceOf(MaError);
  expect(error).toMatchObject({
    code: "io_error",
    message: `File not found: ${join(tempDir, "missing.json")}`,
  });
});

test("NodeFileSystem - realPath follows symlinks and keeps missing paths", async () => {
  const target = join(tempDir, "user_app");
  const link = join(tempDir, "alias");
  await fs.ensureDir(target);
  await symlink(target, link);

  expect(await fs.realPath(link)).toBe(await fs.realPath(target));
  expect(await fs.realPath(join(tempDir, "nothing"))).toBe(
    join(tempDir, "nothing"),
  );
});

test("NodeFileSystem - remove deletes recursively and tolerates absence", async () => {
  const dir = join(tempDir, "gone");
  await fs.ensureDir(join(dir, "nested"));

  await fs.remove(dir);
  await fs.remove(dir);

  expect(await fs.exists(dir)).toBe(false);
});
