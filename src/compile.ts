/**
 * One-call lowering of a compilation unit: transform, then print.
 */

import type { Node } from "./ast/elixir-ast";
import { describeNode } from "./ast/analysis";
import type { LoweringConfig } from "./config";
import { DEFAULT_PIPELINE_CONFIG } from "./config";
import { FreshNames } from "./fresh-names";
import { createPipeline } from "./passes/pipeline";
import { printNode } from "./printer/printer";

export interface CompileResult {
  /** Tree after every enabled pass */
  ast: Node;
  source: string;
}

/**
 * Run the pipeline and the printer with one fresh-name counter, so loop
 * helpers and pass-generated names never clash within the unit.
 */
export function compileModule(node: Node, options: LoweringConfig = {}): CompileResult {
  const logger = (options.logger ?? DEFAULT_PIPELINE_CONFIG.logger).child("compile");
  logger.info(`lowering ${describeNode(node)}`);

  const names = new FreshNames();
  const ast = createPipeline(options).transform(node, names);
  const source = printNode(ast, { names, ...(options.indent !== undefined ? { indent: options.indent } : {}) });

  logger.debug(`printed ${source.split("\n").length} lines`);
  return { ast, source };
}
