/**
 * Pass pipeline.
 *
 * Folds the enabled passes over a tree in list order. Enablement, the
 * instance parameter name and the logger come from explicit configuration;
 * fresh names come from the caller's per-unit counter.
 */

import type { Node } from "../ast/elixir-ast";
import type { PipelineConfig } from "../config";
import { DEFAULT_PIPELINE_CONFIG } from "../config";
import { LoweringError } from "../errors";
import { FreshNames } from "../fresh-names";
import type { Logger } from "../logger";
import { bitwiseImport } from "./bitwise-import";
import { clauseLocalResolution } from "./clause-local-resolution";
import { conditionalReassignment } from "./conditional-reassignment";
import { effectLifting } from "./effect-lifting";
import { enumPatternReconstruction } from "./enum-pattern-reconstruction";
import { loopReconstruction } from "./loop-reconstruction";
import { mutableToImmutablePass } from "./mutable-to-immutable";
import type { Pass, PassContext } from "./pass";
import { pipeOperator } from "./pipe-operator";
import { redundantNilInit } from "./redundant-nil-init";
import { statementContext } from "./statement-context";
import { stringInterpolation } from "./string-interpolation";
import { tempBindingCollapse } from "./temp-binding-collapse";
import { unusedPrivateFunctions } from "./unused-private-functions";
import { usageHygienePass } from "./usage-hygiene";

export const DEFAULT_PASSES: readonly Pass[] = [
  clauseLocalResolution,
  mutableToImmutablePass,
  conditionalReassignment,
  redundantNilInit,
  loopReconstruction,
  enumPatternReconstruction,
  tempBindingCollapse,
  effectLifting,
  statementContext,
  pipeOperator,
  stringInterpolation,
  unusedPrivateFunctions,
  bitwiseImport,
  usageHygienePass,
];

export class TransformPipeline {
  readonly passes: readonly Pass[];
  private readonly instanceParam: string;
  private readonly logger: Logger;

  constructor(passes: readonly Pass[], config: PipelineConfig = {}) {
    const toggles = config.passes ?? DEFAULT_PIPELINE_CONFIG.passes;
    this.passes = passes.map((p) => ({ ...p, enabled: toggles[p.name] ?? p.enabled }));
    this.instanceParam = config.instanceParam ?? DEFAULT_PIPELINE_CONFIG.instanceParam;
    this.logger = (config.logger ?? DEFAULT_PIPELINE_CONFIG.logger).child("pipeline");
  }

  /**
   * Run every enabled pass over `ast`. Pass `names` to share the fresh-name
   * counter with the printer of the same unit.
   */
  transform(ast: Node, names: FreshNames = new FreshNames()): Node {
    const ctx: PassContext = { names, instanceParam: this.instanceParam, logger: this.logger };

    return this.passes.reduce((node, pass) => {
      if (!pass.enabled) {
        this.logger.debug(`skip ${pass.name}`);
        return node;
      }
      this.logger.debug(`run ${pass.name}`);
      try {
        return pass.run(node, ctx);
      } catch (e) {
        if (e instanceof LoweringError) e.addNote(`in pass ${pass.name}`);
        throw e;
      }
    }, ast);
  }
}

export function createPipeline(config: PipelineConfig = {}): TransformPipeline {
  return new TransformPipeline(DEFAULT_PASSES, config);
}
