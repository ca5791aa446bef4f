/**
 * Elixir Pretty-Printer
 *
 * Converts the Elixir AST to source text. Layout decisions (inline `do:`
 * versus `do ... end`, parentheses) are made here; no semantic rewriting.
 *
 * Printing functions return text whose first line carries no indentation;
 * every following line is indented absolutely, so callers can splice the
 * result after any prefix.
 */

import type {
  BinaryOp,
  CaseClause,
  EBinary,
  EFn,
  EFunctionDef,
  EModule,
  ETry,
  EWith,
  KeywordPair,
  LiteralNode,
  Node,
  Pattern,
  UnaryOp,
} from "../ast/elixir-ast";
import { isWhilePlaceholder } from "../ast/elixir-ast";
import { describeNode } from "../ast/analysis";
import { InternalCompilerError } from "../errors";
import { FreshNames } from "../fresh-names";
import {
  escapeInterpolationText,
  printAtom,
  printFloat,
  printKeywordKey,
  printString,
} from "./literals";
import { binaryPrecedence, isFunctionOp, isRightAssociative, operatorFunction } from "./precedence";

// ============================================================================
// Options
// ============================================================================

export interface PrintOptions {
  /** Indentation string (default: "  ") */
  indent?: string;
  /** Fresh names for loop helpers; share the pipeline's to keep names unit-unique */
  names?: FreshNames;
}

type Opts = Required<PrintOptions>;

const DEFAULT_INDENT = "  ";

// ============================================================================
// Main Entry Points
// ============================================================================

/**
 * Print a node at zero base indentation. A root block prints as a sequence
 * of statements.
 */
export function printNode(node: Node, options: PrintOptions = {}): string {
  const opts: Opts = {
    indent: options.indent ?? DEFAULT_INDENT,
    names: options.names ?? new FreshNames(),
  };
  return printStatements(flatStatements(node), opts, 0);
}

/**
 * Print a pattern (match left-hand side, clause head, parameter).
 */
export function printPattern(pattern: Pattern): string {
  switch (pattern.tag) {
    case "varPat":
      return pattern.name;
    case "litPat":
      return printLiteral(pattern.value);
    case "tuplePat":
      return `{${pattern.elements.map(printPattern).join(", ")}}`;
    case "listPat":
      return `[${pattern.elements.map(printPattern).join(", ")}]`;
    case "consPat":
      return `[${pattern.heads.map(printPattern).join(", ")} | ${printPattern(pattern.tail)}]`;
    case "mapPat":
      return `%{${pattern.pairs.map((p) => `${printLiteral(p.key)} => ${printPattern(p.value)}`).join(", ")}}`;
    case "structPat":
      return `%${pattern.module}{${pattern.fields
        .map((f) => `${printKeywordKey(f.key)} ${printPattern(f.pattern)}`)
        .join(", ")}}`;
    case "pinPat":
      return `^${pattern.name}`;
    case "wildcardPat":
      return "_";
    case "binPat":
      return `<<${pattern.segments.map((s) => printSegment(printPattern(s.pattern), s.size, s.type)).join(", ")}>>`;
    default: {
      const _exhaustive: never = pattern;
      return _exhaustive;
    }
  }
}

// ============================================================================
// Layout helpers
// ============================================================================

function ind(opts: Opts, depth: number): string {
  return opts.indent.repeat(depth);
}

/** Statements of a body; nested blocks are not scopes and are flattened. */
function flatStatements(node: Node): Node[] {
  return node.tag === "block" ? node.exprs.flatMap(flatStatements) : [node];
}

function printStatements(stmts: Node[], opts: Opts, depth: number): string {
  if (stmts.length === 0) return `${ind(opts, depth)}nil`;
  return stmts.map((s) => ind(opts, depth) + printExpr(s, opts, depth)).join("\n");
}

function printBody(body: Node, opts: Opts, depth: number): string {
  return printStatements(flatStatements(body), opts, depth);
}

/**
 * Eligible for single-line `do:` rendering. Assignments, empty blocks and
 * anything containing them are never simple.
 */
export function isSimple(node: Node): boolean {
  switch (node.tag) {
    case "var":
    case "integer":
    case "float":
    case "string":
    case "boolean":
    case "atom":
    case "alias":
    case "nil":
    case "underscore":
      return true;
    case "field":
      return isSimple(node.target);
    case "paren":
      return isSimple(node.expr);
    case "list":
    case "tuple":
      return node.elements.every(isSimple);
    case "map":
      return node.pairs.every((p) => isSimple(p.key) && isSimple(p.value));
    case "call":
      return !isWhilePlaceholder(node) && node.args.length <= 2 && node.args.every(isSimple);
    case "remoteCall":
      return isSimple(node.module) && node.args.length <= 2 && node.args.every(isSimple);
    case "applyFn":
      return isSimple(node.fn) && node.args.length <= 2 && node.args.every(isSimple);
    case "binary":
      return isSimple(node.left) && isSimple(node.right);
    case "unary":
      return isSimple(node.operand);
    default:
      return false;
  }
}

/** Conditionals used as values get parentheses in operand and slot position. */
function isConditional(node: Node): boolean {
  switch (node.tag) {
    case "if":
    case "case":
    case "cond":
    case "with":
    case "try":
    case "receive":
      return true;
    default:
      return false;
  }
}

/** Any position inside a container, call or clause head */
function printSlot(node: Node, opts: Opts, depth: number): string {
  const text = printExpr(node, opts, depth);
  return isConditional(node) ? `(${text})` : text;
}

function printArgs(args: Node[], opts: Opts, depth: number): string {
  return args.map((a) => printSlot(a, opts, depth)).join(", ");
}

function printKeywordPairs(pairs: KeywordPair[], opts: Opts, depth: number): string {
  return pairs.map((p) => `${printKeywordKey(p.key)} ${printSlot(p.value, opts, depth)}`).join(", ");
}

function printSegment(value: string, size: number | undefined, type: string | undefined): string {
  if (size !== undefined && type !== undefined) return `${value}::${type}-size(${size})`;
  if (size !== undefined) return `${value}::${size}`;
  if (type !== undefined) return `${value}::${type}`;
  return value;
}

/** `(fn -> ... end).()` so statements can sit where only an expression may */
function printImmediate(stmts: Node[], opts: Opts, depth: number): string {
  return `(fn ->\n${printStatements(stmts, opts, depth + 1)}\n${ind(opts, depth)}end).()`;
}

// ============================================================================
// Expressions
// ============================================================================

function printExpr(node: Node, opts: Opts, depth: number): string {
  switch (node.tag) {
    case "module":
      return printModule(node, opts, depth);

    case "def":
    case "defp":
    case "defmacro":
      return printFunctionDef(node, opts, depth);

    case "directive":
      return `${node.kind} ${node.module}`;

    case "attribute":
      return `@${node.name} ${printExpr(node.value, opts, depth)}`;

    case "if":
      return printIf(node.cond, node.then, node.else, opts, depth);

    case "case":
      return `case ${printSlot(node.subject, opts, depth)} do\n${printClauses(node.clauses, opts, depth + 1)}\n${ind(opts, depth)}end`;

    case "cond":
      return `cond do\n${node.clauses
        .map((c) => printArrowClause(printSlot(c.cond, opts, depth + 1), c.body, opts, depth + 1))
        .join("\n")}\n${ind(opts, depth)}end`;

    case "try":
      return printTry(node, opts, depth);

    case "with":
      return printWith(node, opts, depth);

    case "receive": {
      const lines = [`receive do`, printClauses(node.clauses, opts, depth + 1)];
      if (node.after) {
        lines.push(`${ind(opts, depth)}after`);
        lines.push(
          printArrowClause(printExpr(node.after.timeout, opts, depth + 1), node.after.body, opts, depth + 1)
        );
      }
      lines.push(`${ind(opts, depth)}end`);
      return lines.join("\n");
    }

    case "list":
      return `[${node.elements.map((e) => printSlot(e, opts, depth)).join(", ")}]`;

    case "tuple":
      return `{${node.elements.map((e) => printSlot(e, opts, depth)).join(", ")}}`;

    case "map":
      return `%{${node.pairs
        .map((p) => `${printSlot(p.key, opts, depth)} => ${printSlot(p.value, opts, depth)}`)
        .join(", ")}}`;

    case "keyword":
      return `[${printKeywordPairs(node.pairs, opts, depth)}]`;

    case "struct":
      return `%${node.module}{${printKeywordPairs(node.fields, opts, depth)}}`;

    case "update":
      return `%{${printExpr(node.target, opts, depth)} | ${printKeywordPairs(node.fields, opts, depth)}}`;

    case "bitstring":
      return `<<${node.segments
        .map((s) => printSegment(printExpr(s.value, opts, depth), s.size, s.type))
        .join(", ")}>>`;

    case "call":
      if (isWhilePlaceholder(node)) return printWhile(node.args[0], node.args[1], opts, depth);
      return `${node.name}(${printArgs(node.args, opts, depth)})`;

    case "remoteCall":
      return `${printReceiver(node.module, opts, depth)}.${node.name}(${printArgs(node.args, opts, depth)})`;

    case "applyFn":
      return `${printReceiver(node.fn, opts, depth)}.(${printArgs(node.args, opts, depth)})`;

    case "binary":
      return printBinary(node, opts, depth);

    case "unary":
      return printUnary(node.op, node.operand, opts, depth);

    case "field":
      return `${printReceiver(node.target, opts, depth)}.${node.field}`;

    case "access":
      return `${printReceiver(node.target, opts, depth)}[${printSlot(node.key, opts, depth)}]`;

    case "range": {
      const range = `${printOperand(node.start, opts, depth)}..${printOperand(node.end, opts, depth)}`;
      return node.step ? `${range}//${printOperand(node.step, opts, depth)}` : range;
    }

    case "interpolation":
      return `"${node.parts
        .map((p) => (p.kind === "text" ? escapeInterpolationText(p.value) : `#{${printExpr(p.expr, opts, depth)}}`))
        .join("")}"`;

    case "for":
      return printFor(node.generators, node.filters, node.into, node.body, opts, depth);

    case "paren":
      return `(${printExpr(node.expr, opts, depth)})`;

    case "block":
      if (node.exprs.length === 0) return "nil";
      if (node.exprs.length === 1) return printExpr(node.exprs[0], opts, depth);
      return printImmediate(flatStatements(node), opts, depth);

    case "match":
      return `${printPattern(node.pattern)} = ${printExpr(node.value, opts, depth)}`;

    case "fn":
      return printFn(node, opts, depth);

    case "fieldAssign":
      return `%{${printExpr(node.target, opts, depth)} | ${printKeywordKey(node.field)} ${printSlot(node.value, opts, depth)}}`;

    case "var":
      return node.name;

    case "integer":
    case "float":
    case "string":
    case "boolean":
    case "atom":
    case "nil":
      return printLiteral(node);

    case "alias":
      return node.name;

    case "underscore":
      return "_";

    case "raw":
      return node.code;

    default: {
      const _exhaustive: never = node;
      throw InternalCompilerError.unhandledNode("print", describeNode(_exhaustive));
    }
  }
}

function printLiteral(node: LiteralNode): string {
  switch (node.tag) {
    case "integer":
      return String(node.value);
    case "float":
      return printFloat(node.value);
    case "string":
      return printString(node.value);
    case "boolean":
      return node.value ? "true" : "false";
    case "atom":
      return printAtom(node.value);
    case "nil":
      return "nil";
    default: {
      const _exhaustive: never = node;
      return _exhaustive;
    }
  }
}

// ============================================================================
// Operators
// ============================================================================

/** Receiver of `.name`, `.()` or `[...]`: anything but a simple term is wrapped */
function printReceiver(node: Node, opts: Opts, depth: number): string {
  const text = printExpr(node, opts, depth);
  switch (node.tag) {
    case "var":
    case "alias":
    case "atom":
    case "field":
    case "access":
    case "call":
    case "remoteCall":
    case "applyFn":
    case "paren":
    case "map":
    case "list":
    case "tuple":
    case "struct":
      return text;
    default:
      return `(${text})`;
  }
}

/** Operand of a range or unary operator */
function printOperand(node: Node, opts: Opts, depth: number): string {
  const text = printExpr(node, opts, depth);
  const infix = node.tag === "binary" && binaryPrecedence(node.op) !== undefined;
  return infix || isConditional(node) || node.tag === "match" ? `(${text})` : text;
}

function needsParens(child: Node, parentOp: BinaryOp, side: "left" | "right"): boolean {
  if (isConditional(child) || child.tag === "match") return true;
  if (child.tag !== "binary") return false;

  const parentPrec = binaryPrecedence(parentOp);
  const childPrec = binaryPrecedence(child.op);
  if (parentPrec === undefined || childPrec === undefined) return false;

  // Subtraction nested in any infix operation is always wrapped
  if (child.op === "-") return true;
  if (childPrec !== parentPrec) return childPrec < parentPrec;
  return isRightAssociative(parentOp) ? side === "left" : side === "right";
}

function printBinary(node: EBinary, opts: Opts, depth: number): string {
  if (isFunctionOp(node.op)) {
    const fn = operatorFunction(node.op);
    return `${fn.module}.${fn.name}(${printArgs([node.left, node.right], opts, depth)})`;
  }

  const side = (child: Node, which: "left" | "right") => {
    const text = printExpr(child, opts, depth);
    return needsParens(child, node.op, which) ? `(${text})` : text;
  };
  return `${side(node.left, "left")} ${node.op} ${side(node.right, "right")}`;
}

function printUnary(op: UnaryOp, operand: Node, opts: Opts, depth: number): string {
  switch (op) {
    case "-": {
      const text = printOperand(operand, opts, depth);
      const negative = (operand.tag === "integer" || operand.tag === "float") && operand.value < 0;
      return negative || operand.tag === "unary" ? `-(${text})` : `-${text}`;
    }
    case "!":
      return `!${printOperand(operand, opts, depth)}`;
    case "not":
      return `not ${printOperand(operand, opts, depth)}`;
    case "~":
      return `Bitwise.bnot(${printSlot(operand, opts, depth)})`;
    case "increment":
      return `(${printOperand(operand, opts, depth)} + 1)`;
    case "decrement":
      return `(${printOperand(operand, opts, depth)} - 1)`;
    default: {
      const _exhaustive: never = op;
      return _exhaustive;
    }
  }
}

// ============================================================================
// Control forms
// ============================================================================

function printIf(cond: Node, thenNode: Node, elseNode: Node | undefined, opts: Opts, depth: number): string {
  const condText = printSlot(cond, opts, depth);
  if (isSimple(cond) && isSimple(thenNode) && (!elseNode || isSimple(elseNode))) {
    const thenText = printExpr(thenNode, opts, depth);
    return elseNode
      ? `if ${condText}, do: ${thenText}, else: ${printExpr(elseNode, opts, depth)}`
      : `if ${condText}, do: ${thenText}`;
  }

  const lines = [`if ${condText} do`, printBody(thenNode, opts, depth + 1)];
  if (elseNode) {
    lines.push(`${ind(opts, depth)}else`, printBody(elseNode, opts, depth + 1));
  }
  lines.push(`${ind(opts, depth)}end`);
  return lines.join("\n");
}

/**
 * `head -> body`; the body stays on the head's line when it is a single
 * statement that prints on one line.
 */
function printArrowClause(head: string, body: Node, opts: Opts, depth: number): string {
  const stmts = flatStatements(body);
  if (stmts.length === 1) {
    const text = printExpr(stmts[0], opts, depth + 1);
    if (!text.includes("\n")) return `${ind(opts, depth)}${head} -> ${text}`;
  }
  return `${ind(opts, depth)}${head} ->\n${printStatements(stmts, opts, depth + 1)}`;
}

function clauseHead(pattern: Pattern, guard: Node | undefined, opts: Opts, depth: number): string {
  const head = printPattern(pattern);
  return guard ? `${head} when ${printExpr(guard, opts, depth)}` : head;
}

function printClauses(clauses: CaseClause[], opts: Opts, depth: number): string {
  return clauses
    .map((c) => printArrowClause(clauseHead(c.pattern, c.guard, opts, depth), c.body, opts, depth))
    .join("\n");
}

function printTry(node: ETry, opts: Opts, depth: number): string {
  const lines = [`try do`, printBody(node.body, opts, depth + 1)];

  if (node.rescue.length > 0) {
    lines.push(`${ind(opts, depth)}rescue`);
    for (const r of node.rescue) {
      const exceptions =
        r.exceptions.length === 0 ? "" : r.exceptions.length === 1 ? r.exceptions[0] : `[${r.exceptions.join(", ")}]`;
      const head = exceptions ? `${printPattern(r.pattern)} in ${exceptions}` : printPattern(r.pattern);
      lines.push(printArrowClause(head, r.body, opts, depth + 1));
    }
  }

  if (node.catch.length > 0) {
    lines.push(`${ind(opts, depth)}catch`);
    for (const c of node.catch) {
      const value = clauseHead(c.pattern, c.guard, opts, depth + 1);
      const head = c.kind ? `${printPattern(c.kind)}, ${value}` : value;
      lines.push(printArrowClause(head, c.body, opts, depth + 1));
    }
  }

  if (node.else.length > 0) {
    lines.push(`${ind(opts, depth)}else`, printClauses(node.else, opts, depth + 1));
  }

  if (node.after) {
    lines.push(`${ind(opts, depth)}after`, printBody(node.after, opts, depth + 1));
  }

  lines.push(`${ind(opts, depth)}end`);
  return lines.join("\n");
}

function printWith(node: EWith, opts: Opts, depth: number): string {
  const continuation = ind(opts, depth) + " ".repeat("with ".length);
  const clauses = node.clauses.map((c) => {
    const head = clauseHead(c.pattern, c.guard, opts, depth);
    return `${head} ${c.bare ? "=" : "<-"} ${printSlot(c.expr, opts, depth)}`;
  });

  const lines = [`with ${clauses.join(`,\n${continuation}`)} do`, printBody(node.body, opts, depth + 1)];
  if (node.else.length > 0) {
    lines.push(`${ind(opts, depth)}else`, printClauses(node.else, opts, depth + 1));
  }
  lines.push(`${ind(opts, depth)}end`);
  return lines.join("\n");
}

function printFor(
  generators: { pattern: Pattern; source: Node }[],
  filters: Node[],
  into: Node | undefined,
  body: Node,
  opts: Opts,
  depth: number
): string {
  const heads = [
    ...generators.map((g) => `${printPattern(g.pattern)} <- ${printSlot(g.source, opts, depth)}`),
    ...filters.map((f) => printSlot(f, opts, depth)),
    ...(into ? [`into: ${printSlot(into, opts, depth)}`] : []),
  ].join(", ");

  if (isSimple(body)) return `for ${heads}, do: ${printExpr(body, opts, depth)}`;
  return `for ${heads} do\n${printBody(body, opts, depth + 1)}\n${ind(opts, depth)}end`;
}

/**
 * Loop placeholder: a self-applying anonymous function that recurses while
 * the condition holds and returns :ok once it fails.
 */
function printWhile(cond: Node, body: Node, opts: Opts, depth: number): string {
  const loop = opts.names.next("loop");
  const d1 = ind(opts, depth + 1);
  const d2 = ind(opts, depth + 2);
  const d3 = ind(opts, depth + 3);
  return [
    `(fn ->`,
    `${d1}${loop} = fn ${loop} ->`,
    `${d2}if ${printExpr(cond, opts, depth + 2)} do`,
    printBody(body, opts, depth + 3),
    `${d3}${loop}.(${loop})`,
    `${d2}else`,
    `${d3}:ok`,
    `${d2}end`,
    `${d1}end`,
    `${d1}${loop}.(${loop})`,
    `${ind(opts, depth)}end).()`,
  ].join("\n");
}

function printFn(node: EFn, opts: Opts, depth: number): string {
  const head = (params: Pattern[], guard: Node | undefined, d: number) => {
    const ps = params.map(printPattern).join(", ");
    return guard ? `${ps} when ${printExpr(guard, opts, d)}` : ps;
  };

  if (node.clauses.length === 1) {
    const [clause] = node.clauses;
    const params = head(clause.params, clause.guard, depth);
    const arrow = params ? `fn ${params} ->` : "fn ->";
    if (isSimple(clause.body)) {
      return `${arrow} ${printExpr(clause.body, opts, depth)} end`;
    }
    return `${arrow}\n${printBody(clause.body, opts, depth + 1)}\n${ind(opts, depth)}end`;
  }

  const clauses = node.clauses
    .map((c) => printArrowClause(head(c.params, c.guard, depth + 1), c.body, opts, depth + 1))
    .join("\n");
  return `fn\n${clauses}\n${ind(opts, depth)}end`;
}

// ============================================================================
// Definitions
// ============================================================================

function printFunctionDef(node: EFunctionDef, opts: Opts, depth: number): string {
  const params = node.params.length > 0 ? `(${node.params.map(printPattern).join(", ")})` : "";
  const guard = node.guard ? ` when ${printExpr(node.guard, opts, depth)}` : "";
  const signature = `${node.tag} ${node.name}${params}${guard}`;

  if (isSimple(node.body)) {
    return `${signature}, do: ${printExpr(node.body, opts, depth)}`;
  }
  return `${signature} do\n${printBody(node.body, opts, depth + 1)}\n${ind(opts, depth)}end`;
}

/** `name/arity` entries as a keyword list for `@compile` */
function nowarnList(entries: readonly string[]): string {
  const pairs = entries.map((entry) => {
    const slash = entry.lastIndexOf("/");
    return `${printKeywordKey(entry.slice(0, slash))} ${entry.slice(slash + 1)}`;
  });
  return `[${pairs.join(", ")}]`;
}

function printModule(node: EModule, opts: Opts, depth: number): string {
  const inner = ind(opts, depth + 1);
  const header: string[] = [];
  const items: string[] = [];

  for (const item of node.body) {
    if (item.tag === "directive") header.push(inner + printExpr(item, opts, depth + 1));
  }
  if (node.meta?.isException) header.push(`${inner}defexception [:message]`);
  const unused = node.meta?.unusedPrivateFunctions ?? [];
  if (unused.length > 0) {
    header.push(`${inner}@compile {:nowarn_unused_function, ${nowarnList(unused)}}`);
  }

  for (const item of node.body) {
    if (item.tag !== "directive") items.push(inner + printExpr(item, opts, depth + 1));
  }

  const sections = [header.join("\n"), items.join("\n\n")].filter((s) => s.length > 0);
  const body = sections.length > 0 ? `${sections.join("\n\n")}\n` : "";
  return `defmodule ${node.name} do\n${body}${ind(opts, depth)}end`;
}
