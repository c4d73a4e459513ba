import type { AirStructType } from "../../air/air-types.ts";
import type { BaseNode } from "./base.ts";
import type { Statement } from "./statements.ts";
import type { AlanType } from "./types.ts";

export enum DeclKind {
  Function = "FunctionDecl",
  Var = "VarDecl",
  Param = "Param",
}

/** How an argument reaches the callee. Arrays are always passed by reference. */
export type PassMode = "value" | "reference";

/** Declared function/procedure parameter. */
export interface Param extends BaseNode {
  kind: "Param";
  name: string;
  type: AlanType;
  mode: PassMode;
}

/** Local variable declaration. Occupies one frame slot. */
export interface VarDecl extends BaseNode {
  kind: "VarDecl";
  name: string;
  type: AlanType;
}

/**
 * Function or procedure declaration.
 *
 * `parent` is the statically enclosing function; semantic analysis fills it in
 * for every nested function, and the code generator points the outermost
 * function at itself. `frameType` is the activation record type, written
 * exactly once during code generation.
 */
export interface FunctionDecl extends BaseNode {
  kind: "FunctionDecl";
  name: string;
  /** Globally unique, qualified name used for the emitted callable. */
  fullName: string;
  params: Param[];
  locals: LocalDecl[];
  body: Statement[];
  returnType: AlanType;
  parent: FunctionDecl | null;
  frameType: AirStructType | null;
}

/** A local declaration is either a stack variable or a nested function. */
export type LocalDecl = VarDecl | FunctionDecl;
