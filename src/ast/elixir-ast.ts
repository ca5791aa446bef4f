/**
 * Elixir AST Types
 *
 * The intermediate representation shared by the pattern library, the
 * transformation passes and the printer. Builders produce this AST from the
 * typed input tree, passes rewrite it, and the printer turns it into source.
 *
 * Nodes are immutable values: a pass that changes a node returns a new one.
 */

// ============================================================================
// Metadata
// ============================================================================

/** Hints passed between passes without changing node shape. */
export interface NodeMetadata {
  /** Source binding id -> resolved target name, for the subtree under this node */
  clauseLocals?: ReadonlyMap<number, string>;
  /** Render inline where possible; never collapse or lift */
  keepInline?: boolean;
  /** The module represents an exception type */
  isException?: boolean;
  /** `name/arity` of private functions nobody calls */
  unusedPrivateFunctions?: readonly string[];
  /** The block came from unrolling a loop */
  unrolledLoop?: boolean;
  /** Payload arity per integer tag, used when rebuilding enum tuple patterns */
  tagArities?: ReadonlyMap<number, number>;
}

interface NodeBase {
  meta?: NodeMetadata;
}

// ============================================================================
// Nodes
// ============================================================================

export type Node =
  // Module / definition forms
  | EModule
  | EFunctionDef
  | EDirective
  | EAttribute
  // Control forms
  | EIf
  | ECase
  | ECond
  | ETry
  | EWith
  | EReceive
  // Data literals
  | EList
  | ETuple
  | EMap
  | EKeyword
  | EStruct
  | EUpdate
  | EBitstring
  // Expressions
  | ECall
  | ERemoteCall
  | EApplyFn
  | EBinary
  | EUnary
  | EField
  | EAccess
  | ERange
  | EInterpolation
  | EFor
  | EParen
  | EBlock
  // Bindings
  | EMatch
  | EFn
  | EFieldAssign
  // Leaves
  | EVar
  | EInteger
  | EFloat
  | EString
  | EBoolean
  | EAtom
  | EAlias
  | ENil
  | EUnderscore
  | ERaw;

export type NodeTag = Node["tag"];

/** defmodule Name do ... end */
export interface EModule extends NodeBase {
  tag: "module";
  name: string;
  body: Node[];
}

export type FunctionKind = "def" | "defp" | "defmacro";

/** def / defp / defmacro name(params) when guard do body end */
export interface EFunctionDef extends NodeBase {
  tag: FunctionKind;
  name: string;
  params: Pattern[];
  guard?: Node;
  body: Node;
}

export type DirectiveKind = "import" | "alias" | "require" | "use";

/** import Mod / alias Mod / require Mod / use Mod */
export interface EDirective extends NodeBase {
  tag: "directive";
  kind: DirectiveKind;
  module: string;
}

/** @name value */
export interface EAttribute extends NodeBase {
  tag: "attribute";
  name: string;
  value: Node;
}

export interface EIf extends NodeBase {
  tag: "if";
  cond: Node;
  then: Node;
  else?: Node;
}

export interface CaseClause {
  pattern: Pattern;
  guard?: Node;
  body: Node;
}

export interface ECase extends NodeBase {
  tag: "case";
  subject: Node;
  clauses: CaseClause[];
}

export interface CondClause {
  cond: Node;
  body: Node;
}

export interface ECond extends NodeBase {
  tag: "cond";
  clauses: CondClause[];
}

/** rescue e in [Mod] -> body */
export interface RescueClause {
  pattern: Pattern;
  exceptions: string[];
  body: Node;
}

/** catch kind, value -> body */
export interface CatchClause {
  kind?: Pattern;
  pattern: Pattern;
  guard?: Node;
  body: Node;
}

export interface ETry extends NodeBase {
  tag: "try";
  body: Node;
  rescue: RescueClause[];
  catch: CatchClause[];
  else: CaseClause[];
  after?: Node;
}

/** pattern <- expr (or pattern = expr when `bare`) */
export interface WithClause {
  pattern: Pattern;
  guard?: Node;
  expr: Node;
  bare?: boolean;
}

export interface EWith extends NodeBase {
  tag: "with";
  clauses: WithClause[];
  body: Node;
  else: CaseClause[];
}

export interface EReceive extends NodeBase {
  tag: "receive";
  clauses: CaseClause[];
  after?: { timeout: Node; body: Node };
}

export interface EList extends NodeBase {
  tag: "list";
  elements: Node[];
}

export interface ETuple extends NodeBase {
  tag: "tuple";
  elements: Node[];
}

export interface MapPair {
  key: Node;
  value: Node;
}

/** %{key => value} */
export interface EMap extends NodeBase {
  tag: "map";
  pairs: MapPair[];
}

export interface KeywordPair {
  key: string;
  value: Node;
}

/** [key: value] */
export interface EKeyword extends NodeBase {
  tag: "keyword";
  pairs: KeywordPair[];
}

/** %Module{key: value} */
export interface EStruct extends NodeBase {
  tag: "struct";
  module: string;
  fields: KeywordPair[];
}

/** %{target | key: value} */
export interface EUpdate extends NodeBase {
  tag: "update";
  target: Node;
  fields: KeywordPair[];
}

export interface BitSegment {
  value: Node;
  size?: number;
  type?: string;
}

/** <<a::8, b::binary>> */
export interface EBitstring extends NodeBase {
  tag: "bitstring";
  segments: BitSegment[];
}

/** Local call: name(args) */
export interface ECall extends NodeBase {
  tag: "call";
  name: string;
  args: Node[];
}

/** Module-qualified or receiver-qualified call: Mod.name(args), expr.name(args) */
export interface ERemoteCall extends NodeBase {
  tag: "remoteCall";
  module: Node;
  name: string;
  args: Node[];
}

/** Anonymous function call: fun.(args) */
export interface EApplyFn extends NodeBase {
  tag: "applyFn";
  fn: Node;
  args: Node[];
}

export type BinaryOp =
  | "+" | "-" | "*" | "/"
  | "==" | "!=" | "===" | "!==" | "<" | ">" | "<=" | ">="
  | "and" | "or" | "&&" | "||"
  | "<>" | "++" | "--" | "|>" | "in"
  | "%"
  | "&" | "|" | "^" | "<<" | ">>" | ">>>";

export interface EBinary extends NodeBase {
  tag: "binary";
  op: BinaryOp;
  left: Node;
  right: Node;
}

/** `increment`/`decrement` only exist before mutable-to-immutable lowering */
export type UnaryOp = "-" | "not" | "!" | "~" | "increment" | "decrement";

export interface EUnary extends NodeBase {
  tag: "unary";
  op: UnaryOp;
  operand: Node;
  prefix?: boolean;
}

/** target.field */
export interface EField extends NodeBase {
  tag: "field";
  target: Node;
  field: string;
}

/** target[key] */
export interface EAccess extends NodeBase {
  tag: "access";
  target: Node;
  key: Node;
}

/** start..end//step */
export interface ERange extends NodeBase {
  tag: "range";
  start: Node;
  end: Node;
  step?: Node;
}

export type InterpolationPart =
  | { kind: "text"; value: string }
  | { kind: "expr"; expr: Node };

/** "text #{expr}" */
export interface EInterpolation extends NodeBase {
  tag: "interpolation";
  parts: InterpolationPart[];
}

export interface Generator {
  pattern: Pattern;
  source: Node;
}

/** for pattern <- source, filter, into: coll, do: body */
export interface EFor extends NodeBase {
  tag: "for";
  generators: Generator[];
  filters: Node[];
  into?: Node;
  body: Node;
}

export interface EParen extends NodeBase {
  tag: "paren";
  expr: Node;
}

/** Statement sequence; the value is the last expression */
export interface EBlock extends NodeBase {
  tag: "block";
  exprs: Node[];
}

/** pattern = value */
export interface EMatch extends NodeBase {
  tag: "match";
  pattern: Pattern;
  value: Node;
}

export interface FnClause {
  params: Pattern[];
  guard?: Node;
  body: Node;
}

export interface EFn extends NodeBase {
  tag: "fn";
  clauses: FnClause[];
}

/** target.field = value, before it is lowered to a struct update */
export interface EFieldAssign extends NodeBase {
  tag: "fieldAssign";
  target: Node;
  field: string;
  value: Node;
}

export interface EVar extends NodeBase {
  tag: "var";
  name: string;
  /** Binding id assigned by the front-end */
  sourceId?: number;
}

export interface EInteger extends NodeBase {
  tag: "integer";
  value: number;
}

export interface EFloat extends NodeBase {
  tag: "float";
  value: number;
}

export interface EString extends NodeBase {
  tag: "string";
  value: string;
}

export interface EBoolean extends NodeBase {
  tag: "boolean";
  value: boolean;
}

export interface EAtom extends NodeBase {
  tag: "atom";
  value: string;
}

/** Module name such as `Map` or `Enum` */
export interface EAlias extends NodeBase {
  tag: "alias";
  name: string;
}

export interface ENil extends NodeBase {
  tag: "nil";
}

export interface EUnderscore extends NodeBase {
  tag: "underscore";
}

/** Raw code injected verbatim; never rewritten */
export interface ERaw extends NodeBase {
  tag: "raw";
  code: string;
}

export type LiteralNode = EInteger | EFloat | EString | EBoolean | EAtom | ENil;

// ============================================================================
// Patterns (binding positions)
// ============================================================================

export type Pattern =
  | VarPattern
  | LiteralPattern
  | TuplePattern
  | ListPattern
  | ConsPattern
  | MapPattern
  | StructPattern
  | PinPattern
  | WildcardPattern
  | BinPattern;

export interface VarPattern {
  tag: "varPat";
  name: string;
  sourceId?: number;
}

export interface LiteralPattern {
  tag: "litPat";
  value: LiteralNode;
}

export interface TuplePattern {
  tag: "tuplePat";
  elements: Pattern[];
}

export interface ListPattern {
  tag: "listPat";
  elements: Pattern[];
}

/** [head1, head2 | tail] */
export interface ConsPattern {
  tag: "consPat";
  heads: Pattern[];
  tail: Pattern;
}

export interface MapPattern {
  tag: "mapPat";
  pairs: { key: LiteralNode; value: Pattern }[];
}

export interface StructPattern {
  tag: "structPat";
  module: string;
  fields: { key: string; pattern: Pattern }[];
}

/** ^name */
export interface PinPattern {
  tag: "pinPat";
  name: string;
}

export interface WildcardPattern {
  tag: "wildcardPat";
}

export interface BinPattern {
  tag: "binPat";
  segments: { pattern: Pattern; size?: number; type?: string }[];
}

// ============================================================================
// Constructors
// ============================================================================

export const eModule = (name: string, body: Node[], meta?: NodeMetadata): EModule => ({
  tag: "module",
  name,
  body,
  ...(meta ? { meta } : {}),
});

export const eDef = (name: string, params: Pattern[], body: Node, guard?: Node): EFunctionDef => ({
  tag: "def",
  name,
  params,
  body,
  ...(guard ? { guard } : {}),
});

export const eDefp = (name: string, params: Pattern[], body: Node, guard?: Node): EFunctionDef => ({
  tag: "defp",
  name,
  params,
  body,
  ...(guard ? { guard } : {}),
});

export const eDirective = (kind: DirectiveKind, module: string): EDirective => ({
  tag: "directive",
  kind,
  module,
});

export const eAttribute = (name: string, value: Node): EAttribute => ({
  tag: "attribute",
  name,
  value,
});

export const eIf = (cond: Node, thenNode: Node, elseNode?: Node): EIf => ({
  tag: "if",
  cond,
  then: thenNode,
  ...(elseNode ? { else: elseNode } : {}),
});

export const eCase = (subject: Node, clauses: CaseClause[]): ECase => ({
  tag: "case",
  subject,
  clauses,
});

export const eCond = (clauses: CondClause[]): ECond => ({
  tag: "cond",
  clauses,
});

export const eWith = (clauses: WithClause[], body: Node, elseClauses: CaseClause[] = []): EWith => ({
  tag: "with",
  clauses,
  body,
  else: elseClauses,
});

export const eList = (elements: Node[]): EList => ({
  tag: "list",
  elements,
});

export const eTuple = (elements: Node[]): ETuple => ({
  tag: "tuple",
  elements,
});

export const eMap = (pairs: MapPair[]): EMap => ({
  tag: "map",
  pairs,
});

export const eKeyword = (pairs: KeywordPair[]): EKeyword => ({
  tag: "keyword",
  pairs,
});

export const eStruct = (module: string, fields: KeywordPair[]): EStruct => ({
  tag: "struct",
  module,
  fields,
});

export const eUpdate = (target: Node, fields: KeywordPair[]): EUpdate => ({
  tag: "update",
  target,
  fields,
});

export const eCall = (name: string, args: Node[]): ECall => ({
  tag: "call",
  name,
  args,
});

/** Module-qualified call; a string module becomes an alias */
export const eRemote = (module: Node | string, name: string, args: Node[]): ERemoteCall => ({
  tag: "remoteCall",
  module: typeof module === "string" ? eAlias(module) : module,
  name,
  args,
});

export const eApplyFn = (fn: Node, args: Node[]): EApplyFn => ({
  tag: "applyFn",
  fn,
  args,
});

export const eBinary = (op: BinaryOp, left: Node, right: Node): EBinary => ({
  tag: "binary",
  op,
  left,
  right,
});

export const eUnary = (op: UnaryOp, operand: Node, prefix?: boolean): EUnary => ({
  tag: "unary",
  op,
  operand,
  ...(prefix !== undefined ? { prefix } : {}),
});

export const eField = (target: Node, field: string): EField => ({
  tag: "field",
  target,
  field,
});

export const eAccess = (target: Node, key: Node): EAccess => ({
  tag: "access",
  target,
  key,
});

export const eRange = (start: Node, end: Node, step?: Node): ERange => ({
  tag: "range",
  start,
  end,
  ...(step ? { step } : {}),
});

export const eFor = (generators: Generator[], body: Node, filters: Node[] = []): EFor => ({
  tag: "for",
  generators,
  filters,
  body,
});

export const eParen = (expr: Node): EParen => ({
  tag: "paren",
  expr,
});

export const eBlock = (exprs: Node[], meta?: NodeMetadata): EBlock => ({
  tag: "block",
  exprs,
  ...(meta ? { meta } : {}),
});

export const eMatch = (pattern: Pattern, value: Node): EMatch => ({
  tag: "match",
  pattern,
  value,
});

/** name = value */
export const eAssign = (name: string, value: Node): EMatch => eMatch(pVar(name), value);

export const eFn = (clauses: FnClause[]): EFn => ({
  tag: "fn",
  clauses,
});

/** Single-clause anonymous function */
export const eLambda = (params: Pattern[], body: Node): EFn => eFn([{ params, body }]);

export const eFieldAssign = (target: Node, field: string, value: Node): EFieldAssign => ({
  tag: "fieldAssign",
  target,
  field,
  value,
});

export const eVar = (name: string, sourceId?: number): EVar => ({
  tag: "var",
  name,
  ...(sourceId !== undefined ? { sourceId } : {}),
});

export const eInt = (value: number): EInteger => ({ tag: "integer", value });

export const eFloat = (value: number): EFloat => ({ tag: "float", value });

export const eString = (value: string): EString => ({ tag: "string", value });

export const eBool = (value: boolean): EBoolean => ({ tag: "boolean", value });

export const eAtom = (value: string): EAtom => ({ tag: "atom", value });

export const eAlias = (name: string): EAlias => ({ tag: "alias", name });

export const eNil: ENil = { tag: "nil" };

export const eUnderscore: EUnderscore = { tag: "underscore" };

export const eRaw = (code: string): ERaw => ({ tag: "raw", code });

// Pattern constructors
export const pVar = (name: string, sourceId?: number): VarPattern => ({
  tag: "varPat",
  name,
  ...(sourceId !== undefined ? { sourceId } : {}),
});

export const pLit = (value: LiteralNode): LiteralPattern => ({
  tag: "litPat",
  value,
});

export const pTuple = (elements: Pattern[]): TuplePattern => ({
  tag: "tuplePat",
  elements,
});

export const pList = (elements: Pattern[]): ListPattern => ({
  tag: "listPat",
  elements,
});

export const pCons = (heads: Pattern[], tail: Pattern): ConsPattern => ({
  tag: "consPat",
  heads,
  tail,
});

export const pPin = (name: string): PinPattern => ({
  tag: "pinPat",
  name,
});

export const pWildcard: WildcardPattern = { tag: "wildcardPat" };

// ============================================================================
// Placeholders
// ============================================================================

/** Local call name standing in for a loop until the printer lowers it */
export const WHILE_PLACEHOLDER = "__while__";

export const eWhile = (cond: Node, body: Node): ECall => eCall(WHILE_PLACEHOLDER, [cond, body]);

export function isWhilePlaceholder(node: Node): boolean {
  return node.tag === "call" && node.name === WHILE_PLACEHOLDER && node.args.length === 2;
}

// ============================================================================
// Small predicates
// ============================================================================

export function isLiteral(node: Node): node is LiteralNode {
  switch (node.tag) {
    case "integer":
    case "float":
    case "string":
    case "boolean":
    case "atom":
    case "nil":
      return true;
    default:
      return false;
  }
}

export function isVarNamed(node: Node, name: string): node is EVar {
  return node.tag === "var" && node.name === name;
}

/** Name bound by `name = ...`, if the match binds a single variable */
export function assignedName(node: Node): string | undefined {
  if (node.tag !== "match" || node.pattern.tag !== "varPat") return undefined;
  return node.pattern.name;
}

/** Statements of a body: the exprs of a block, or the node itself */
export function statementsOf(node: Node): Node[] {
  return node.tag === "block" ? node.exprs : [node];
}

/** Inverse of statementsOf: a single statement stays bare, none becomes nil */
export function fromStatements(stmts: Node[], meta?: NodeMetadata): Node {
  if (stmts.length === 0) return eNil;
  if (stmts.length === 1 && !meta) return stmts[0];
  return eBlock(stmts, meta);
}
