/**
 * AIR (Alan Intermediate Representation) node types.
 * Uses discriminated unions with a `kind` field, matching AST conventions.
 *
 * AIR is a low-level, typed, SSA-based IR that sits between the checked AST
 * and a target backend. It uses basic blocks with explicit terminators and
 * phi nodes for value merging at control-flow join points. Nested scopes
 * do not exist at this level: every function reaches enclosing variables
 * through explicit frame pointers.
 */

export * from "./identifiers.ts";
export * from "./types.ts";
export * from "./module.ts";
export * from "./function.ts";
export * from "./instructions.ts";
export * from "./terminators.ts";
