/**
 * Constructors for checked AST nodes.
 *
 * A front end hands the code generator fully resolved trees. These helpers
 * build such trees directly, filling in the resolution data (parent links,
 * frame offsets, nesting distances and depths) the same way semantic
 * analysis does.
 */

import type {
  AlanType,
  ArithOp,
  AssignStmt,
  BinaryExpr,
  BoolCond,
  CallExpr,
  CallStmt,
  CharLiteral,
  CompareCond,
  CompareOp,
  CompoundStmt,
  Condition,
  EmptyStmt,
  Expression,
  FunctionDecl,
  IdLValue,
  IfStmt,
  IntLiteral,
  LValue,
  LocalDecl,
  LogicCond,
  NotCond,
  Param,
  PassMode,
  Program,
  ReturnStmt,
  SignExpr,
  Statement,
  StringLValue,
  ValueExpr,
  VarDecl,
  WhileStmt,
} from "./nodes.ts";
import { BYTE, INT, PROC, arrayOf } from "./nodes.ts";

// ─── Declarations ───────────────────────────────────────────────────────────

export function param(name: string, type: AlanType, mode: PassMode = "value"): Param {
  return { kind: "Param", name, type, mode };
}

export function varDecl(name: string, type: AlanType): VarDecl {
  return { kind: "VarDecl", name, type };
}

export interface FunctionParts {
  params?: Param[];
  locals?: LocalDecl[];
  body?: Statement[];
  returnType?: AlanType;
  /** Defaults to `name`. */
  fullName?: string;
}

/**
 * Build a function declaration. Nested functions among `locals` get this
 * function as their parent; the body is usually attached afterwards with
 * `setBody`, once the declarations it refers to exist.
 */
export function functionDecl(name: string, parts: FunctionParts = {}): FunctionDecl {
  const decl: FunctionDecl = {
    kind: "FunctionDecl",
    name,
    fullName: parts.fullName ?? name,
    params: parts.params ?? [],
    locals: parts.locals ?? [],
    body: parts.body ?? [],
    returnType: parts.returnType ?? PROC,
    parent: null,
    frameType: null,
  };
  for (const local of decl.locals) {
    if (local.kind === "FunctionDecl") local.parent = decl;
  }
  return decl;
}

export function setBody(decl: FunctionDecl, ...body: Statement[]): FunctionDecl {
  decl.body = body;
  return decl;
}

export function program(main: FunctionDecl): Program {
  return { kind: "Program", main };
}

/** Lexical depth: 0 for a function without an enclosing function. */
export function depthOf(decl: FunctionDecl): number {
  let depth = 0;
  let current = decl;
  while (current.parent !== null && current.parent !== current) {
    current = current.parent;
    depth++;
  }
  return depth;
}

// ─── L-values ───────────────────────────────────────────────────────────────

/**
 * Resolve `name` as seen from the body of `scope`, searching outward through
 * the enclosing functions. Throws when no function in the chain declares it.
 */
export function variable(scope: FunctionDecl, name: string, index: Expression | null = null): IdLValue {
  let distance = 0;
  let current: FunctionDecl | null = scope;
  while (current !== null) {
    const paramIndex = current.params.findIndex((p) => p.name === name);
    const found = current.params[paramIndex];
    if (found) {
      return {
        kind: "IdLValue",
        name,
        nestingDistance: distance,
        offset: 1 + paramIndex,
        isParameter: true,
        isReference: found.mode === "reference" || found.type.kind === "array",
        type: found.type,
        index,
      };
    }
    const vars = current.locals.filter((l): l is VarDecl => l.kind === "VarDecl");
    const varIndex = vars.findIndex((v) => v.name === name);
    const local = vars[varIndex];
    if (local) {
      return {
        kind: "IdLValue",
        name,
        nestingDistance: distance,
        offset: 1 + current.params.length + varIndex,
        isParameter: false,
        isReference: false,
        type: local.type,
        index,
      };
    }
    current = current.parent === current ? null : current.parent;
    distance++;
  }
  throw new Error(`'${name}' is not visible from '${scope.fullName}'`);
}

/** UTF-8 encoding of a string literal, without the terminator. */
export function literalBytes(value: string): number[] {
  return Array.from(new TextEncoder().encode(value));
}

export function stringLit(value: string): StringLValue {
  return { kind: "StringLValue", value };
}

// ─── Expressions ────────────────────────────────────────────────────────────

export function int(value: number): IntLiteral {
  return { kind: "IntLiteral", value, type: INT };
}

/** Character literal from a one-character string or a character code. */
export function char(value: string | number): CharLiteral {
  const code = typeof value === "string" ? value.charCodeAt(0) : value;
  return { kind: "CharLiteral", value: code, type: BYTE };
}

/** Type an l-value denotes when read. */
export function lvalueType(lvalue: LValue): AlanType {
  if (lvalue.kind === "StringLValue") return arrayOf(BYTE, literalBytes(lvalue.value).length + 1);
  if (lvalue.index !== null && lvalue.type.kind === "array") return lvalue.type.element;
  return lvalue.type;
}

export function valueOf(lvalue: LValue): ValueExpr {
  return { kind: "ValueExpr", lvalue, type: lvalueType(lvalue) };
}

/** Call `callee` from the body of `caller`. */
export function call(caller: FunctionDecl, callee: FunctionDecl, ...args: Expression[]): CallExpr {
  return {
    kind: "CallExpr",
    calleeName: callee.fullName,
    callerDepth: depthOf(caller),
    calleeDepth: depthOf(callee),
    args,
    type: callee.returnType,
  };
}

/** Call a runtime routine, which takes no access link. */
export function callRuntime(name: string, returnType: AlanType, ...args: Expression[]): CallExpr {
  return { kind: "CallExpr", calleeName: name, callerDepth: 0, calleeDepth: 0, args, type: returnType };
}

export function sign(operator: "+" | "-", operand: Expression): SignExpr {
  return { kind: "SignExpr", operator, operand, type: operand.type };
}

export function binary(operator: ArithOp, left: Expression, right: Expression): BinaryExpr {
  return { kind: "BinaryExpr", operator, left, right, type: left.type };
}

// ─── Conditions ─────────────────────────────────────────────────────────────

export function bool(value: boolean): BoolCond {
  return { kind: "BoolCond", value };
}

export function not(operand: Condition): NotCond {
  return { kind: "NotCond", operand };
}

export function compare(operator: CompareOp, left: Expression, right: Expression): CompareCond {
  return { kind: "CompareCond", operator, left, right };
}

export function and(left: Condition, right: Condition): LogicCond {
  return { kind: "LogicCond", operator: "&", left, right };
}

export function or(left: Condition, right: Condition): LogicCond {
  return { kind: "LogicCond", operator: "|", left, right };
}

// ─── Statements ─────────────────────────────────────────────────────────────

export function empty(): EmptyStmt {
  return { kind: "EmptyStmt" };
}

export function assign(target: LValue, value: Expression): AssignStmt {
  return { kind: "AssignStmt", target, value };
}

export function compound(...statements: Statement[]): CompoundStmt {
  return { kind: "CompoundStmt", statements };
}

export function callStmt(call: CallExpr): CallStmt {
  return { kind: "CallStmt", call };
}

export function ifStmt(condition: Condition, thenBranch: Statement, elseBranch: Statement | null = null): IfStmt {
  return { kind: "IfStmt", condition, thenBranch, elseBranch };
}

export function whileStmt(condition: Condition, body: Statement): WhileStmt {
  return { kind: "WhileStmt", condition, body };
}

export function ret(value: Expression | null = null): ReturnStmt {
  return { kind: "ReturnStmt", value };
}
