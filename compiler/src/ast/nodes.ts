/**
 * AST node types for checked Alan programs.
 * Uses discriminated unions with a `kind` field.
 */

export * from "./nodes/index.ts";
