import type { Node } from "../ast/elixir-ast";
import type { FreshNames } from "../fresh-names";
import type { Logger } from "../logger";

export const PASS_NAMES = [
  "clause-local-resolution",
  "mutable-to-immutable",
  "conditional-reassignment",
  "redundant-nil-init",
  "loop-reconstruction",
  "enum-pattern-reconstruction",
  "temp-binding-collapse",
  "effect-lifting",
  "statement-context",
  "pipe-operator",
  "string-interpolation",
  "unused-private-functions",
  "bitwise-import",
  "usage-hygiene",
] as const;

export type PassName = (typeof PASS_NAMES)[number];

export interface PassContext {
  /** Fresh identifiers for this compilation unit */
  names: FreshNames;
  /** Name of the parameter that carries the instance in struct methods */
  instanceParam: string;
  logger: Logger;
}

/**
 * A single rewrite over the whole tree. A pass returns the input unchanged
 * for any subtree it cannot rewrite with confidence.
 */
export interface Pass {
  name: PassName;
  enabled: boolean;
  run(node: Node, ctx: PassContext): Node;
}

export function isPassName(name: string): name is PassName {
  return PASS_NAMES.some((p) => p === name);
}
