// ─── AIR Types ───────────────────────────────────────────────────────────────

/** Union of all AIR-level type representations. */
export type AirType =
  | AirIntType
  | AirBoolType
  | AirVoidType
  | AirPtrType
  | AirStructType
  | AirArrayType
  | AirFunctionType;

/**
 * Fixed-width integer. Integers carry no sign: signedness is a property of
 * the operations (`sdiv` vs `udiv`, `slt` vs `ult`, ...).
 */
export interface AirIntType {
  kind: "int";
  bits: 8 | 16;
}

/** One-bit truth value produced by comparisons. */
export interface AirBoolType {
  kind: "bool";
}

/** Void type in AIR — used for functions with no return value. */
export interface AirVoidType {
  kind: "void";
}

/** Typed pointer. */
export interface AirPtrType {
  kind: "ptr";
  pointee: AirType;
}

/** Named field within an AIR struct type. */
export interface AirField {
  name: string;
  type: AirType;
}

/** Named struct type, laid out as a flat sequence of fields addressed by index. */
export interface AirStructType {
  kind: "struct";
  name: string;
  fields: AirField[];
}

/** Fixed-length array type in AIR. */
export interface AirArrayType {
  kind: "array";
  element: AirType;
  length: number;
}

/** Callable signature. */
export interface AirFunctionType {
  kind: "function";
  params: AirType[];
  returnType: AirType;
}

export const I8: AirIntType = { kind: "int", bits: 8 };
export const I16: AirIntType = { kind: "int", bits: 16 };
export const BOOL: AirBoolType = { kind: "bool" };
export const VOID: AirVoidType = { kind: "void" };

export function ptrTo(pointee: AirType): AirPtrType {
  return { kind: "ptr", pointee };
}

/**
 * Structural type equality. Structs are nominal: two struct types are equal
 * when their names are.
 */
export function sameType(a: AirType, b: AirType): boolean {
  switch (a.kind) {
    case "int":
      return b.kind === "int" && a.bits === b.bits;
    case "bool":
    case "void":
      return a.kind === b.kind;
    case "ptr":
      return b.kind === "ptr" && sameType(a.pointee, b.pointee);
    case "struct":
      return b.kind === "struct" && a.name === b.name;
    case "array":
      return b.kind === "array" && a.length === b.length && sameType(a.element, b.element);
    case "function":
      return (
        b.kind === "function" &&
        sameType(a.returnType, b.returnType) &&
        a.params.length === b.params.length &&
        a.params.every((p, i) => {
          const other = b.params[i];
          return other !== undefined && sameType(p, other);
        })
      );
  }
}
