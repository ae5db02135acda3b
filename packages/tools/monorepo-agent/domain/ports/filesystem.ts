// Filesystem port - interface for file system operations

/**
 * Abstraction over file system operations.
 * Allows the domain to be tested without real filesystem access.
 */
export interface FileSystem {
  /** Read a file as text. Throws on not found. */
  readFile(path: string): Promise<string>;

  /** Write text content to a file. Parent directory must exist. */
  writeFile(path: string, content: string): Promise<void>;

  /** Atomically move a file over another path. */
  rename(from: string, to: string): Promise<void>;

  /** Check if a file or directory exists. */
  exists(path: string): Promise<boolean>;

  /** Check if a path exists and is a directory (symlinks followed). */
  isDirectory(path: string): Promise<boolean>;

  /** Ensure a directory exists, creating it (and parents) if needed. */
  ensureDir(path: string): Promise<void>;

  /** Canonical path with symlinks resolved. Returns the input if it doesn't exist. */
  realPath(path: string): Promise<string>;

  /** Remove a file. Does not throw if file doesn't exist. */
  remove(path: string): Promise<void>;
}
