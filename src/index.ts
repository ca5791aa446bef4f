/**
 * Elixir lowering back end: idiom recognition, tree rewriting and printing.
 */

// Intermediate AST
export * from "./ast/elixir-ast";
export {
  mapChildren,
  visitChildren,
  rewrite,
  forEachNode,
  someNode,
  withMeta,
  dropMeta,
  mapPattern,
  patternVars,
  pinnedVars,
  ownPatterns,
  mapOwnPatterns,
} from "./ast/traverse";
export type { NodeMapper, NodeVisitor, PatternMapper } from "./ast/traverse";
export { countReads, readsVar, bindsVar, isPure, nodesEqual, substituteVar, describeNode } from "./ast/analysis";

// Typed input tree
export * from "./typed/typed-ast";
export { TypedExprSchema, TypeRefSchema, TypedVarSchema, parseTypedExpr } from "./typed/schema";

// Pattern library
export {
  lowerIdiom,
  lowerWith,
  lowerInlineAccessor,
  lowerNullCoalescing,
  lowerArrayLoop,
  lowerIteratorProtocol,
  lowerMultiTempAccessor,
  isInlineAccessor,
  extractInlineAccessor,
  transformInlineAccessor,
  isMultiTempAccessor,
  extractMultiTempAccessor,
  transformMultiTempAccessor,
  isNullCoalescing,
  extractNullCoalescing,
  transformNullCoalescing,
  isArrayLoop,
  extractArrayLoop,
  transformArrayLoop,
  isIteratorProtocol,
  extractIteratorProtocol,
  transformIteratorProtocol,
} from "./patterns";
export type {
  PatternContext,
  IdiomPattern,
  InlineAccessorFields,
  MultiTempAccessorFields,
  NullCoalescingFields,
  ArrayLoopFields,
  IteratorProtocolFields,
} from "./patterns";

// Transformation pipeline
export { TransformPipeline, createPipeline, DEFAULT_PASSES } from "./passes/pipeline";
export { PASS_NAMES, isPassName } from "./passes/pass";
export type { Pass, PassContext, PassName } from "./passes/pass";

// Printer
export { printNode, printPattern, isSimple } from "./printer/printer";
export type { PrintOptions } from "./printer/printer";
export { printAtom, printString, printFloat, isBareAtom } from "./printer/literals";

// Entry point, configuration and diagnostics
export { compileModule } from "./compile";
export type { CompileResult } from "./compile";
export { DEFAULT_PIPELINE_CONFIG, LoweringConfigSchema, parsePipelineConfig } from "./config";
export type { PipelineConfig, LoweringConfig } from "./config";
export { ErrorCodes, LoweringError, InternalCompilerError } from "./errors";
export type { ErrorCode, ErrorStage, ErrorNote } from "./errors";
export { Logger, silentLogger } from "./logger";
export type { LogLevel, LoggerOptions } from "./logger";
export { FreshNames } from "./fresh-names";
