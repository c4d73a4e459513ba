import type { BaseNode } from "./base.ts";
import type { AlanType } from "./types.ts";

export enum ExprKind {
  IntLiteral = "IntLiteral",
  CharLiteral = "CharLiteral",
  Value = "ValueExpr",
  Call = "CallExpr",
  Sign = "SignExpr",
  Binary = "BinaryExpr",
}

/** Every expression carries the static type semantic analysis resolved for it. */
interface TypedNode extends BaseNode {
  type: AlanType;
}

/** Integer literal, typed `int`. */
export interface IntLiteral extends TypedNode {
  kind: "IntLiteral";
  value: number;
}

/** Character literal, typed `byte`. `value` is the character code. */
export interface CharLiteral extends TypedNode {
  kind: "CharLiteral";
  value: number;
}

/** Read of a variable, array element or string literal. */
export interface ValueExpr extends TypedNode {
  kind: "ValueExpr";
  lvalue: LValue;
}

/**
 * Call of a function or procedure.
 *
 * Depths are lexical nesting depths: the outermost function is depth 0, a
 * function declared inside it depth 1, and so on. `callerDepth` is the depth
 * of the function whose body contains the call, `calleeDepth` the depth of
 * the callee itself.
 */
export interface CallExpr extends TypedNode {
  kind: "CallExpr";
  calleeName: string;
  callerDepth: number;
  calleeDepth: number;
  args: Expression[];
}

export type SignOp = "+" | "-";

/** Unary `+e` / `-e`. */
export interface SignExpr extends TypedNode {
  kind: "SignExpr";
  operator: SignOp;
  operand: Expression;
}

export type ArithOp = "+" | "-" | "*" | "/" | "%";

/** Binary arithmetic `a op b`. */
export interface BinaryExpr extends TypedNode {
  kind: "BinaryExpr";
  operator: ArithOp;
  left: Expression;
  right: Expression;
}

export type Expression = IntLiteral | CharLiteral | ValueExpr | CallExpr | SignExpr | BinaryExpr;

// ─── Conditions ──────────────────────────────────────────────────────────────

export enum CondKind {
  Bool = "BoolCond",
  Not = "NotCond",
  Compare = "CompareCond",
  Logic = "LogicCond",
}

/** `true` / `false` */
export interface BoolCond extends BaseNode {
  kind: "BoolCond";
  value: boolean;
}

/** `!c` */
export interface NotCond extends BaseNode {
  kind: "NotCond";
  operand: Condition;
}

export type CompareOp = "==" | "!=" | "<" | ">" | "<=" | ">=";

/** Relational comparison of two expressions of the same type. */
export interface CompareCond extends BaseNode {
  kind: "CompareCond";
  operator: CompareOp;
  left: Expression;
  right: Expression;
}

export type LogicOp = "&" | "|";

/** Short-circuit conjunction (`&`) or disjunction (`|`). */
export interface LogicCond extends BaseNode {
  kind: "LogicCond";
  operator: LogicOp;
  left: Condition;
  right: Condition;
}

export type Condition = BoolCond | NotCond | CompareCond | LogicCond;

// ─── L-values ────────────────────────────────────────────────────────────────

export enum LValueKind {
  Id = "IdLValue",
  String = "StringLValue",
}

/**
 * Occurrence of a named variable, optionally subscripted.
 *
 * All resolution data comes from semantic analysis: `nestingDistance` is the
 * number of access-link hops from the current frame to the declaring frame,
 * `offset` the field index inside that frame (0 is the access link, so the
 * first parameter is at 1), and `type` the variable's declared type.
 */
export interface IdLValue extends BaseNode {
  kind: "IdLValue";
  name: string;
  nestingDistance: number;
  offset: number;
  isParameter: boolean;
  isReference: boolean;
  type: AlanType;
  index: Expression | null;
}

/** String literal used as a `byte` array. */
export interface StringLValue extends BaseNode {
  kind: "StringLValue";
  value: string;
}

export type LValue = IdLValue | StringLValue;
