// ShowSubmoduleUseCase - describe one submodule and its derived sibling

import { MaError } from "../entities/errors.js";
import type { ShowOutput } from "../entities/outputs.js";
import type { CompiledRule } from "../entities/sync.js";
import type { ConfigStore } from "../ports/config-store.js";
import { siblingPathFor, sourcePathFor } from "../services/path-resolver.js";
import { compileRules } from "../services/rule-engine.js";

export interface ShowSubmoduleInput {
  readonly name: string;
}

export class ShowSubmoduleUseCase {
  constructor(private readonly store: ConfigStore) {}

  async execute(input: ShowSubmoduleInput): Promise<ShowOutput> {
    const config = await this.store.load();
    const submodule = config.submodules.find((s) => s.name === input.name);
    if (!submodule) {
      throw new MaError(
        "unknown_submodule",
        `Submodule not found: ${input.name}`,
        input.name,
      );
    }

    let compiled: CompiledRule[] | null = null;
    let compileError: string | undefined;
    try {
      compiled = compileRules(submodule.rules, submodule.name);
    } catch (e) {
      if (!(e instanceof MaError)) throw e;
      compileError = e.message;
    }

    return {
      name: submodule.name,
      ...(submodule.description !== undefined &&
        { description: submodule.description }),
      sourcePath: sourcePathFor(config.root_path, submodule.name),
      siblingPath: siblingPathFor(config.root_path, submodule.name),
      rules: submodule.rules,
      compiled,
      ...(compileError !== undefined && { compileError }),
    };
  }
}
