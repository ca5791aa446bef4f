/**
 * Compiler errors.
 *
 * `LoweringError` covers bad input and bad configuration. `InternalCompilerError`
 * marks a broken invariant inside the compiler itself: an extractor that
 * disagrees with its predicate, or a node shape the printer has no case for.
 * Internal errors are never caught and retried.
 */

export const ErrorCodes = {
  InvalidInput: "InvalidInput",
  InvalidConfig: "InvalidConfig",
  ExtractionDefect: "ExtractionDefect",
  UnhandledNode: "UnhandledNode",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ErrorStage = "input" | "config" | "pattern" | "transform" | "print";

export type ErrorNote = {
  message: string;
};

export class LoweringError extends Error {
  readonly code: ErrorCode;
  readonly stage: ErrorStage;
  notes: ErrorNote[];

  constructor(code: ErrorCode, message: string, stage: ErrorStage) {
    super(message);
    this.name = "LoweringError";
    this.code = code;
    this.stage = stage;
    this.notes = [];
  }

  addNote(message: string): this {
    this.notes.push({ message });
    return this;
  }
}

export class InternalCompilerError extends LoweringError {
  constructor(code: ErrorCode, message: string, stage: ErrorStage) {
    super(code, message, stage);
    this.name = "InternalCompilerError";
  }

  /**
   * An extractor returned nothing after its predicate accepted the subtree.
   */
  static extractionDefect(owner: string, subtree: string): InternalCompilerError {
    return new InternalCompilerError(
      ErrorCodes.ExtractionDefect,
      `${owner}: predicate matched but extraction failed on ${subtree}`,
      "pattern"
    );
  }

  static unhandledNode(stage: ErrorStage, what: string): InternalCompilerError {
    return new InternalCompilerError(
      ErrorCodes.UnhandledNode,
      `Unhandled node shape: ${what}`,
      stage
    );
  }
}
