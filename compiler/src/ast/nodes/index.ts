export type { BaseNode } from "./base.ts";

export { INT, BYTE, PROC, arrayOf } from "./types.ts";
export type { AlanType, IntType, ByteType, ArrayType, ProcType } from "./types.ts";

export { DeclKind } from "./declarations.ts";
export type { PassMode, Param, VarDecl, FunctionDecl, LocalDecl } from "./declarations.ts";

export { StmtKind } from "./statements.ts";
export type {
  EmptyStmt,
  AssignStmt,
  CompoundStmt,
  CallStmt,
  IfStmt,
  WhileStmt,
  ReturnStmt,
  Statement,
} from "./statements.ts";

export { ExprKind, CondKind, LValueKind } from "./expressions.ts";
export type {
  IntLiteral,
  CharLiteral,
  ValueExpr,
  CallExpr,
  SignOp,
  SignExpr,
  ArithOp,
  BinaryExpr,
  Expression,
  BoolCond,
  NotCond,
  CompareOp,
  CompareCond,
  LogicOp,
  LogicCond,
  Condition,
  IdLValue,
  StringLValue,
  LValue,
} from "./expressions.ts";

export type { Program } from "./program.ts";
