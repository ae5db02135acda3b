// PathResolver - derive and validate a submodule's sibling checkout

import { basename, dirname, join, relative } from "node:path";
import { MaError } from "../entities/errors.js";
import type { SiblingBinding } from "../entities/sync.js";
import type { FileSystem } from "../ports/filesystem.js";

/**
 * Check a submodule name before it's used to build any path.
 * Names are single path segments; anything else could escape the parent.
 */
export function validateSubmoduleName(name: string): void {
  if (name.trim() === "") {
    throw new MaError("invalid_name", "Submodule name cannot be empty");
  }
  if (name === "." || name === "..") {
    throw new MaError("invalid_name", `Invalid submodule name: '${name}'`, name);
  }
  if (name === "all") {
    throw new MaError(
      "invalid_name",
      "'all' is reserved for syncing every submodule",
      name,
    );
  }
  if (/[/\\\u0000]/.test(name)) {
    throw new MaError(
      "invalid_name",
      `Submodule name must not contain path separators: '${name}'`,
      name,
    );
  }
}

/**
 * Sibling of the monorepo root named after the submodule:
 * `/work/vendroo-monorepo` + `user_app` -> `/work/user_app`.
 */
export function siblingPathFor(rootPath: string, name: string): string {
  validateSubmoduleName(name);

  const parent = dirname(rootPath);
  const sibling = join(parent, name);

  if (relative(parent, sibling) !== name) {
    throw new MaError(
      "invalid_name",
      `Submodule name '${name}' resolves outside ${parent}`,
      name,
    );
  }
  if (basename(rootPath) === name) {
    throw new MaError(
      "invalid_name",
      `Submodule '${name}' would mirror into the monorepo itself`,
      name,
    );
  }

  return sibling;
}

export function sourcePathFor(rootPath: string, name: string): string {
  validateSubmoduleName(name);
  return join(rootPath, name);
}

export class PathResolver {
  constructor(private readonly fs: FileSystem) {}

  /**
   * Resolve the binding for one submodule against the current filesystem.
   * Must be called on every sync: the sibling may have been removed or
   * recreated since the last run.
   */
  async resolve(rootPath: string, name: string): Promise<SiblingBinding> {
    const siblingPath = siblingPathFor(rootPath, name);

    if (!(await this.fs.isDirectory(siblingPath))) {
      const reason = (await this.fs.exists(siblingPath))
        ? "is not a directory"
        : "does not exist";
      throw new MaError(
        "sibling_not_found",
        `Sibling directory ${siblingPath} ${reason}`,
        name,
      );
    }

    return {
      name,
      sourcePath: sourcePathFor(rootPath, name),
      siblingPath,
    };
  }

  /**
   * Create the sibling directory when nothing exists at its path yet.
   * Returns true when a directory was created.
   */
  async ensureSibling(rootPath: string, name: string): Promise<boolean> {
    const siblingPath = siblingPathFor(rootPath, name);
    if (await this.fs.exists(siblingPath)) {
      return false;
    }
    await this.fs.ensureDir(siblingPath);
    return true;
  }
}
