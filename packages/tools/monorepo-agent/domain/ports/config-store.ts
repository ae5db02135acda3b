// Config store port - persistence interface for the monorepo configuration

import type { MonorepoConfig } from "../entities/config.js";

/**
 * Durable home of the MonorepoConfig.
 * Implementations must replace the artifact atomically on save.
 */
export interface ConfigStore {
  /** Absolute path of the configuration artifact. */
  readonly path: string;

  /** Load the configuration. Throws not_initialized or config_corrupt. */
  load(): Promise<MonorepoConfig>;

  /** Replace the configuration. Concurrent calls are serialized. */
  save(config: MonorepoConfig): Promise<void>;

  /** Check if the artifact exists (monorepo is initialized). */
  exists(): Promise<boolean>;
}
