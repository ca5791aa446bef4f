/**
 * Literal formatting: atoms, strings, keyword keys and floats.
 */

import { InternalCompilerError } from "../errors";

const BARE_ATOM = /^[A-Za-z_][A-Za-z0-9_]*[!?]?$/;

/** Escapes backslash, double quote, newline, carriage return and tab. */
export function escapeString(value: string): string {
  return value.replace(/[\\"\n\r\t]/g, (c) => {
    switch (c) {
      case "\\":
        return "\\\\";
      case '"':
        return '\\"';
      case "\n":
        return "\\n";
      case "\r":
        return "\\r";
      default:
        return "\\t";
    }
  });
}

export function printString(value: string): string {
  return `"${escapeString(value)}"`;
}

/** Text part of an interpolated string; a literal `#{` must not open a splice. */
export function escapeInterpolationText(value: string): string {
  return escapeString(value).replace(/#\{/g, "\\#{");
}

export function isBareAtom(name: string): boolean {
  return BARE_ATOM.test(name);
}

export function printAtom(name: string): string {
  return isBareAtom(name) ? `:${name}` : `:${printString(name)}`;
}

/** `name:` or `"my key":` */
export function printKeywordKey(name: string): string {
  return isBareAtom(name) ? `${name}:` : `${printString(name)}:`;
}

/** Always carries a decimal point: 1 prints as 1.0, 1e21 as 1.0e21. */
export function printFloat(value: number): string {
  if (!Number.isFinite(value)) {
    throw InternalCompilerError.unhandledNode("print", `non-finite float ${value}`);
  }
  const text = String(value);
  const at = text.indexOf("e");
  const mantissa = at === -1 ? text : text.slice(0, at);
  const exponent = at === -1 ? "" : `e${text.slice(at + 1).replace("+", "")}`;
  return `${mantissa.includes(".") ? mantissa : `${mantissa}.0`}${exponent}`;
}
