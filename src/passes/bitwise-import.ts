/**
 * Adds `require Bitwise` to modules that use bitwise operators.
 */

import type { EModule, Node } from "../ast/elixir-ast";
import { eDirective } from "../ast/elixir-ast";
import { rewrite, visitChildren } from "../ast/traverse";
import type { Pass } from "./pass";

const BITWISE_OPS = new Set(["&", "|", "^", "<<", ">>", ">>>"]);

/** Bitwise use in `node`, not counting nested modules */
function usesBitwise(node: Node): boolean {
  if (node.tag === "binary" && BITWISE_OPS.has(node.op)) return true;
  if (node.tag === "unary" && node.op === "~") return true;
  let found = false;
  visitChildren(node, (child) => {
    if (!found && child.tag !== "module" && usesBitwise(child)) found = true;
  });
  return found;
}

function hasBitwiseDirective(module: EModule): boolean {
  return module.body.some(
    (n) => n.tag === "directive" && (n.kind === "require" || n.kind === "import") && n.module === "Bitwise"
  );
}

export function addBitwiseRequire(module: EModule): EModule {
  if (!usesBitwise(module) || hasBitwiseDirective(module)) return module;
  return { ...module, body: [eDirective("require", "Bitwise"), ...module.body] };
}

export const bitwiseImport: Pass = {
  name: "bitwise-import",
  enabled: true,
  run: (root) => rewrite(root, (node) => (node.tag === "module" ? addBitwiseRequire(node) : node)),
};
