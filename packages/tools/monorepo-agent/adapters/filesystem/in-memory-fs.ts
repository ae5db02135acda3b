/**
 * Adapter: InMemoryFileSystem
 *
 * In-memory FileSystem implementation for testing.
 * Files live in a Map<string, string>, directories in a Set<string>,
 * symlinks in a Map from link path to target path.
 *
 * Dependencies: domain ports only.
 */

import type { FileSystem } from "../../domain/ports/filesystem.js";
import { MaError } from "../../domain/entities/errors.js";

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private dirs = new Set<string>();
  private links = new Map<string, string>();

  // --- FileSystem interface ---

  readFile(path: string): Promise<string> {
    const content = this.files.get(this.resolve(path));
    if (content === undefined) {
      return Promise.reject(
        new MaError("io_error", `File not found: ${path}`),
      );
    }
    return Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    const resolved = this.resolve(path);
    if (!this.dirs.has(parentOf(resolved))) {
      return Promise.reject(
        new MaError("io_error", `Failed to write file: ${path}`),
      );
    }
    this.files.set(resolved, content);
    return Promise.resolve();
  }

  rename(from: string, to: string): Promise<void> {
    const content = this.files.get(this.resolve(from));
    if (content === undefined) {
      return Promise.reject(
        new MaError("io_error", `Failed to move ${from} to ${to}`),
      );
    }
    this.files.delete(this.resolve(from));
    this.files.set(this.resolve(to), content);
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    const resolved = this.resolve(path);
    return Promise.resolve(this.files.has(resolved) || this.dirs.has(resolved));
  }

  isDirectory(path: string): Promise<boolean> {
    return Promise.resolve(this.dirs.has(this.resolve(path)));
  }

  ensureDir(path: string): Promise<void> {
    this.dirs.add(path);
    // Also add all parent directories
    const parts = path.split("/");
    for (let i = 1; i < parts.length; i++) {
      this.dirs.add(parts.slice(0, i).join("/") || "/");
    }
    return Promise.resolve();
  }

  realPath(path: string): Promise<string> {
    return Promise.resolve(this.resolve(path));
  }

  remove(path: string): Promise<void> {
    this.files.delete(this.resolve(path));
    return Promise.resolve();
  }

  // --- Test helpers ---

  /** Set a file directly (convenience for test setup). */
  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  /** Make `path` resolve to `target`. */
  setSymlink(path: string, target: string): void {
    this.links.set(path, target);
  }

  /** Get a snapshot of all stored files. */
  getAll(): Map<string, string> {
    return new Map(this.files);
  }

  private resolve(path: string): string {
    for (const [link, target] of this.links) {
      if (path === link) return target;
      if (path.startsWith(link + "/")) {
        return target + path.slice(link.length);
      }
    }
    return path;
  }
}

function parentOf(path: string): string {
  const index = path.lastIndexOf("/");
  return index <= 0 ? "/" : path.slice(0, index);
}
