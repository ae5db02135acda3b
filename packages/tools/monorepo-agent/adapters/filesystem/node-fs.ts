/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs/promises.
 * Read/write failures surface as io_error.
 */

import {
  mkdir,
  open,
  readFile,
  realpath,
  rename,
  rm,
  stat,
} from "node:fs/promises";
import type { FileSystem } from "../../domain/ports/filesystem.js";
import { MaError } from "../../domain/entities/errors.js";

function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

function isMissing(e: unknown): boolean {
  const code = errorCode(e);
  return code === "ENOENT" || code === "ENOTDIR";
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf-8");
    } catch (e) {
      if (isMissing(e)) {
        throw new MaError("io_error", `File not found: ${path}`);
      }
      throw new MaError("io_error", `Failed to read file: ${path}`);
    }
  }

  /** Content is flushed to disk before this resolves. */
  async writeFile(path: string, content: string): Promise<void> {
    try {
      const handle = await open(path, "w");
      try {
        await handle.writeFile(content, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch {
      throw new MaError("io_error", `Failed to write file: ${path}`);
    }
  }

  async rename(from: string, to: string): Promise<void> {
    try {
      await rename(from, to);
    } catch {
      throw new MaError("io_error", `Failed to move ${from} to ${to}`);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (e) {
      if (isMissing(e)) {
        return false;
      }
      throw e;
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch (e) {
      if (isMissing(e)) {
        return false;
      }
      throw e;
    }
  }

  async ensureDir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  async realPath(path: string): Promise<string> {
    try {
      return await realpath(path);
    } catch (e) {
      if (isMissing(e)) {
        return path;
      }
      throw e;
    }
  }

  async remove(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
  }
}
