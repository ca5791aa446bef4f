/**
 * String interpolation.
 *
 *   "Hello " <> name <> "!"   ->   "Hello #{name}!"
 *
 * Only chains that mix at least one string literal with at least one
 * other operand are rewritten.
 */

import type { InterpolationPart, Node } from "../ast/elixir-ast";
import { mapChildren } from "../ast/traverse";
import type { Pass } from "./pass";

function flattenConcat(node: Node): Node[] {
  if (node.tag === "binary" && node.op === "<>") return [...flattenConcat(node.left), ...flattenConcat(node.right)];
  return [node];
}

function pushText(parts: InterpolationPart[], value: string): void {
  const last = parts[parts.length - 1];
  if (last && last.kind === "text") parts[parts.length - 1] = { kind: "text", value: last.value + value };
  else parts.push({ kind: "text", value });
}

export function interpolate(node: Node): Node {
  if (node.tag !== "binary" || node.op !== "<>") return mapChildren(node, interpolate);

  const operands = flattenConcat(node).map(interpolate);
  const hasText = operands.some((o) => o.tag === "string" || o.tag === "interpolation");
  const hasExpr = operands.some((o) => o.tag !== "string" && o.tag !== "interpolation");
  if (!hasText || !hasExpr) return mapChildren(node, interpolate);

  const parts: InterpolationPart[] = [];
  for (const operand of operands) {
    if (operand.tag === "string") {
      pushText(parts, operand.value);
    } else if (operand.tag === "interpolation") {
      for (const part of operand.parts) {
        if (part.kind === "text") pushText(parts, part.value);
        else parts.push(part);
      }
    } else {
      parts.push({ kind: "expr", expr: operand });
    }
  }
  return { tag: "interpolation", parts, ...(node.meta ? { meta: node.meta } : {}) };
}

export const stringInterpolation: Pass = {
  name: "string-interpolation",
  enabled: true,
  run: (root) => interpolate(root),
};
