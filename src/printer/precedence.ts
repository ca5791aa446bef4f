/**
 * Elixir operator precedence.
 *
 * Higher numbers bind tighter. Operators that print as function calls
 * (`%` and the bitwise family) have no infix precedence.
 */

import type { BinaryOp } from "../ast/elixir-ast";

export const PREC = {
  OR: 4, // || or
  AND: 5, // && and
  EQUALITY: 6, // == != === !==
  COMPARISON: 7, // < > <= >=
  PIPE: 8, // |>
  IN: 9, // in
  CONCAT: 10, // ++ -- <> (right-associative)
  ADDITIVE: 11, // + -
  MULTIPLICATIVE: 12, // * /
  UNARY: 14,
} as const;

export type FunctionOp = "%" | "&" | "|" | "^" | "<<" | ">>" | ">>>";

/** Module and function an operator lowers to */
export function operatorFunction(op: FunctionOp): { module: string; name: string } {
  switch (op) {
    case "%":
      return { module: "Kernel", name: "rem" };
    case "&":
      return { module: "Bitwise", name: "band" };
    case "|":
      return { module: "Bitwise", name: "bor" };
    case "^":
      return { module: "Bitwise", name: "bxor" };
    case "<<":
      return { module: "Bitwise", name: "bsl" };
    case ">>":
    case ">>>":
      return { module: "Bitwise", name: "bsr" };
    default: {
      const _exhaustive: never = op;
      return _exhaustive;
    }
  }
}

/**
 * Precedence of an infix operator, or undefined for one that prints as a
 * function call.
 */
export function binaryPrecedence(op: BinaryOp): number | undefined {
  switch (op) {
    case "||":
    case "or":
      return PREC.OR;
    case "&&":
    case "and":
      return PREC.AND;
    case "==":
    case "!=":
    case "===":
    case "!==":
      return PREC.EQUALITY;
    case "<":
    case ">":
    case "<=":
    case ">=":
      return PREC.COMPARISON;
    case "|>":
      return PREC.PIPE;
    case "in":
      return PREC.IN;
    case "++":
    case "--":
    case "<>":
      return PREC.CONCAT;
    case "+":
    case "-":
      return PREC.ADDITIVE;
    case "*":
    case "/":
      return PREC.MULTIPLICATIVE;
    case "%":
    case "&":
    case "|":
    case "^":
    case "<<":
    case ">>":
    case ">>>":
      return undefined;
    default: {
      const _exhaustive: never = op;
      return _exhaustive;
    }
  }
}

export function isFunctionOp(op: BinaryOp): op is FunctionOp {
  return binaryPrecedence(op) === undefined;
}

export function isRightAssociative(op: BinaryOp): boolean {
  return op === "++" || op === "--" || op === "<>";
}
