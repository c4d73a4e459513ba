// ─── Language types ──────────────────────────────────────────────────────────

/**
 * Resolved types of the source language, as computed by semantic analysis.
 * `proc` only appears as the return type of a procedure.
 */
export type AlanType = IntType | ByteType | ArrayType | ProcType;

/** 16-bit signed integer. */
export interface IntType {
  kind: "int";
}

/** 8-bit unsigned integer (also used for characters). */
export interface ByteType {
  kind: "byte";
}

/** Fixed-size array. The element is always `int` or `byte` in a checked program. */
export interface ArrayType {
  kind: "array";
  element: AlanType;
  size: number;
}

/** Return type of a procedure, which yields no value. */
export interface ProcType {
  kind: "proc";
}

export const INT: IntType = { kind: "int" };
export const BYTE: ByteType = { kind: "byte" };
export const PROC: ProcType = { kind: "proc" };

export function arrayOf(element: AlanType, size: number): ArrayType {
  return { kind: "array", element, size };
}
