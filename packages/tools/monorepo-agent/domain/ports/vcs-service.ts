// VCS service port - interface for version control bookkeeping

export type VcsResult = {
  readonly ok: boolean;
  readonly stderr: string;
};

/**
 * Service for interacting with the monorepo's version control system.
 */
export interface VcsService {
  /** Check if a directory is inside a repository. */
  isInRepo(cwd: string): Promise<boolean>;

  /** Record a path as tracked (e.g. stage it). */
  track(cwd: string, path: string): Promise<VcsResult>;
}
