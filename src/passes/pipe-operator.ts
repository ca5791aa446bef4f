/**
 * Pipe chains.
 *
 *   v = String.trim(v)
 *   v = String.upcase(v)
 *
 * becomes `v = v |> String.trim() |> String.upcase()`.
 */

import type { EMatch, ERemoteCall, Node, VarPattern } from "../ast/elixir-ast";
import { eBinary, eMatch, eVar } from "../ast/elixir-ast";
import { readsVar } from "../ast/analysis";
import { rewrite } from "../ast/traverse";
import type { Pass } from "./pass";

interface Step {
  stmt: EMatch & { pattern: VarPattern };
  call: ERemoteCall;
}

/** `v = M.f(v, ...)` with M a module name */
function stepOf(stmt: Node): Step | undefined {
  if (stmt.tag !== "match" || stmt.pattern.tag !== "varPat") return undefined;
  const call = stmt.value;
  if (call.tag !== "remoteCall" || call.module.tag !== "alias") return undefined;
  const [first] = call.args;
  if (!first || first.tag !== "var" || first.name !== stmt.pattern.name) return undefined;
  return { stmt: { ...stmt, pattern: stmt.pattern }, call };
}

function pipeChain(run: Step[]): Node {
  const name = run[0].stmt.pattern.name;
  let chain: Node = eVar(name);
  for (const { call } of run) {
    chain = eBinary("|>", chain, { ...call, args: call.args.slice(1) });
  }
  return eMatch(run[0].stmt.pattern, chain);
}

/**
 * A later step joins the run only if its extra arguments do not read the
 * variable, since inside the chain they would see the value from before
 * the first call.
 */
function extendsRun(run: Step[], next: Step): boolean {
  const name = run[0].stmt.pattern.name;
  return next.stmt.pattern.name === name && !next.call.args.slice(1).some((a) => readsVar(a, name));
}

export function buildPipes(stmts: Node[]): Node[] {
  const out: Node[] = [];
  let run: Step[] = [];

  const flush = () => {
    if (run.length >= 2) out.push(pipeChain(run));
    else out.push(...run.map((s) => s.stmt));
    run = [];
  };

  for (const stmt of stmts) {
    const step = stepOf(stmt);
    if (step && run.length > 0 && extendsRun(run, step)) {
      run.push(step);
      continue;
    }
    flush();
    if (step) run.push(step);
    else out.push(stmt);
  }
  flush();
  return out;
}

export const pipeOperator: Pass = {
  name: "pipe-operator",
  enabled: true,
  run: (root) => rewrite(root, (node) => (node.tag === "block" ? { ...node, exprs: buildPipes(node.exprs) } : node)),
};
