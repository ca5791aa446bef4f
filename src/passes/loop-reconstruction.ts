/**
 * Loop reconstruction.
 *
 * Upstream loop unrolling turns `[for (i in 0...3) f(i)]` into
 *
 *   g = []
 *   g = g ++ [f(0)]
 *   g = g ++ [f(1)]
 *   g = g ++ [f(2)]
 *   g
 *
 * and marks the block `unrolledLoop`. This pass recovers the element
 * template `f(i)` and emits `for i <- 0..2, do: f(i)`.
 */

import type { Node } from "../ast/elixir-ast";
import { eFor, eInt, eList, eRange, eVar, pVar } from "../ast/elixir-ast";
import { collectNames, nodesEqual, substituteVar } from "../ast/analysis";
import { mapChildren, rewrite, visitChildren } from "../ast/traverse";
import type { FreshNames } from "../fresh-names";
import type { Pass } from "./pass";

const INDEX_CANDIDATES = ["i", "j", "k", "n"];

function pickIndex(taken: ReadonlySet<string>, names: FreshNames): string {
  return INDEX_CANDIDATES.find((c) => !taken.has(c)) ?? names.next("idx");
}

/** Elements appended by `g = []; g = g ++ [e0]; ...; g`, or undefined. */
export function unrolledElements(block: Node): Node[] | undefined {
  if (block.tag !== "block" || block.exprs.length < 3) return undefined;
  const stmts = block.exprs;
  const first = stmts[0];
  const last = stmts[stmts.length - 1];

  if (first.tag !== "match" || first.pattern.tag !== "varPat") return undefined;
  const acc = first.pattern.name;
  if (first.value.tag !== "list" || first.value.elements.length !== 0) return undefined;
  if (last.tag !== "var" || last.name !== acc) return undefined;

  const elements: Node[] = [];
  for (const stmt of stmts.slice(1, -1)) {
    if (stmt.tag !== "match" || stmt.pattern.tag !== "varPat" || stmt.pattern.name !== acc) return undefined;
    const append = stmt.value;
    if (append.tag !== "binary" || append.op !== "++") return undefined;
    if (append.left.tag !== "var" || append.left.name !== acc) return undefined;
    if (append.right.tag !== "list" || append.right.elements.length !== 1) return undefined;
    elements.push(append.right.elements[0]);
  }
  return elements;
}

function children(node: Node): Node[] {
  const out: Node[] = [];
  visitChildren(node, (c) => out.push(c));
  return out;
}

/** Same node kind with the same non-node fields. */
function sameShell(a: Node, b: Node): boolean {
  return nodesEqual(
    mapChildren(a, () => eList([])),
    mapChildren(b, () => eList([]))
  );
}

/**
 * Generalize the first two elements: positions where they hold 0 and 1
 * become the index variable.
 */
function unify(a: Node, b: Node, index: string): Node | undefined {
  if (nodesEqual(a, b)) return a;
  if (a.tag === "integer" && b.tag === "integer" && a.value === 0 && b.value === 1) return eVar(index);
  if (!sameShell(a, b)) return undefined;

  const left = children(a);
  const right = children(b);
  if (left.length !== right.length) return undefined;

  const unified: Node[] = [];
  for (let i = 0; i < left.length; i++) {
    const u = unify(left[i], right[i], index);
    if (!u) return undefined;
    unified.push(u);
  }
  let next = 0;
  return mapChildren(a, () => unified[next++]);
}

/** A template T with T[index := k] equal to elements[k] for every k. */
export function deriveTemplate(elements: Node[], index: string): Node | undefined {
  if (elements.length === 0) return undefined;
  if (elements.length === 1) {
    const only = elements[0];
    return only.tag === "integer" && only.value === 0 ? eVar(index) : only;
  }

  const template = unify(elements[0], elements[1], index);
  if (!template) return undefined;
  const fits = elements.every((e, k) => nodesEqual(substituteVar(template, index, eInt(k)), e));
  return fits ? template : undefined;
}

function comprehension(index: string, count: number, body: Node): Node {
  return eFor([{ pattern: pVar(index), source: eRange(eInt(0), eInt(count - 1)) }], body);
}

/** `[e0, ..., eN-1]` as a comprehension over `index`, if a template fits. */
function reconstructList(elements: Node[], index: string): Node | undefined {
  const template = deriveTemplate(elements, index);
  return template ? comprehension(index, elements.length, template) : undefined;
}

export function reconstructLoop(block: Node, names: FreshNames): Node {
  if (block.tag !== "block" || !block.meta?.unrolledLoop) return block;
  const elements = unrolledElements(block);
  if (!elements || elements.length === 0) return block;

  const taken = collectNames(block);
  const outer = pickIndex(taken, names);

  // List elements get one inner reconstruction first
  let candidates = elements;
  if (elements.every((e) => e.tag === "list" && e.elements.length > 0)) {
    const inner = pickIndex(new Set([...taken, outer]), names);
    const rebuilt: Node[] = [];
    for (const e of elements) {
      const r = e.tag === "list" ? reconstructList(e.elements, inner) : undefined;
      if (!r) break;
      rebuilt.push(r);
    }
    if (rebuilt.length === elements.length) candidates = rebuilt;
  }

  return reconstructList(candidates, outer) ?? block;
}

export const loopReconstruction: Pass = {
  name: "loop-reconstruction",
  enabled: true,
  run: (root, ctx) =>
    rewrite(root, (node) => {
      const result = reconstructLoop(node, ctx.names);
      if (result === node && node.meta?.unrolledLoop) {
        ctx.logger.debug("unrolled loop kept as written: no element template");
      }
      return result;
    }),
};
