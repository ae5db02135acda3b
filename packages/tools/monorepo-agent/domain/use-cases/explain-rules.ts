// ExplainRulesUseCase - report which rule decides each given path

import { MaError } from "../entities/errors.js";
import type { ExplainOutput } from "../entities/outputs.js";
import type { ConfigStore } from "../ports/config-store.js";
import { compileRules, evaluateRules } from "../services/rule-engine.js";

export interface ExplainRulesInput {
  readonly name: string;
  readonly paths: readonly string[]; // Relative to the submodule root
}

export class ExplainRulesUseCase {
  constructor(private readonly store: ConfigStore) {}

  async execute(input: ExplainRulesInput): Promise<ExplainOutput> {
    if (input.paths.length === 0) {
      throw new MaError("invalid_args", "No paths to explain", input.name);
    }

    const config = await this.store.load();
    const submodule = config.submodules.find((s) => s.name === input.name);
    if (!submodule) {
      throw new MaError(
        "unknown_submodule",
        `Submodule not found: ${input.name}`,
        input.name,
      );
    }

    const compiled = compileRules(submodule.rules, submodule.name);

    return {
      name: submodule.name,
      paths: input.paths.map((path) => ({
        path,
        ...evaluateRules(compiled, path),
      })),
    };
  }
}
