import type { BaseNode } from "./base.ts";
import type { CallExpr, Condition, Expression, LValue } from "./expressions.ts";

export enum StmtKind {
  Empty = "EmptyStmt",
  Assign = "AssignStmt",
  Compound = "CompoundStmt",
  Call = "CallStmt",
  If = "IfStmt",
  While = "WhileStmt",
  Return = "ReturnStmt",
}

/** `;` */
export interface EmptyStmt extends BaseNode {
  kind: "EmptyStmt";
}

/** `target = value;` */
export interface AssignStmt extends BaseNode {
  kind: "AssignStmt";
  target: LValue;
  value: Expression;
}

/** Braced statement sequence `{ ... }`. */
export interface CompoundStmt extends BaseNode {
  kind: "CompoundStmt";
  statements: Statement[];
}

/** Procedure call used as a statement; any result is discarded. */
export interface CallStmt extends BaseNode {
  kind: "CallStmt";
  call: CallExpr;
}

/** `if (cond) thenBranch else elseBranch` */
export interface IfStmt extends BaseNode {
  kind: "IfStmt";
  condition: Condition;
  thenBranch: Statement;
  elseBranch: Statement | null;
}

/** `while (cond) body` */
export interface WhileStmt extends BaseNode {
  kind: "WhileStmt";
  condition: Condition;
  body: Statement;
}

/** `return;` or `return value;` */
export interface ReturnStmt extends BaseNode {
  kind: "ReturnStmt";
  value: Expression | null;
}

export type Statement =
  | EmptyStmt
  | AssignStmt
  | CompoundStmt
  | CallStmt
  | IfStmt
  | WhileStmt
  | ReturnStmt;
