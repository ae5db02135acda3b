// Error types for monorepo-agent domain

export type MaErrorCode =
  | "not_initialized"
  | "already_initialized"
  | "duplicate_submodule"
  | "unknown_submodule"
  | "not_a_subdirectory"
  | "sibling_not_found"
  | "invalid_name"
  | "invalid_rule"
  | "vacuous_rule_set"
  | "config_corrupt"
  | "sync_failed"
  | "sync_skipped"
  | "invalid_args"
  | "io_error"
  | "process_failed";

export class MaError extends Error {
  constructor(
    public readonly code: MaErrorCode,
    message: string,
    public readonly submodule?: string,
  ) {
    super(message);
    this.name = "MaError";
  }

  toJSON(): {
    error: string;
    code: MaErrorCode;
    message: string;
    submodule?: string;
  } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
      ...(this.submodule !== undefined && { submodule: this.submodule }),
    };
  }
}
