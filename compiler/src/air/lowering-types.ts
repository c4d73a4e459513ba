/**
 * Type mapping from language types to AIR types and parameter-passing
 * conventions. Pure functions: every caller passes the fault context to
 * report against.
 */

import type { AlanType, Param } from "../ast/nodes.ts";
import { CodegenError, CodegenFault, type FaultContext } from "../errors/index.ts";
import type { AirType } from "./air-types.ts";
import { I16, I8, VOID, ptrTo } from "./air-types.ts";

function typeName(t: AlanType): string {
  return t.kind === "array" ? `array<${typeName(t.element)}, ${t.size}>` : t.kind;
}

/** Map a scalar type; arrays of arrays or of `proc` are rejected. */
function lowerScalarType(t: AlanType, context: FaultContext): AirType {
  switch (t.kind) {
    case "int":
      return I16;
    case "byte":
      return I8;
    default:
      throw new CodegenError(
        CodegenFault.TypeMapping,
        `'${typeName(t)}' is not a scalar value type`,
        context
      );
  }
}

/** Map the type of a stored value: `int`, `byte` or an array of them (inline). */
export function lowerValueType(t: AlanType, context: FaultContext): AirType {
  if (t.kind === "array") {
    return { kind: "array", element: lowerScalarType(t.element, context), length: t.size };
  }
  return lowerScalarType(t, context);
}

/** Map a function's return type; `proc` becomes `void`. */
export function lowerReturnType(t: AlanType, context: FaultContext): AirType {
  if (t.kind === "proc") return VOID;
  if (t.kind === "array") {
    throw new CodegenError(
      CodegenFault.TypeMapping,
      `'${typeName(t)}' cannot be returned`,
      context
    );
  }
  return lowerScalarType(t, context);
}

/**
 * Map the passed form of a parameter. Scalars by value travel as themselves,
 * scalars by reference as a pointer to the caller's storage, and arrays (in
 * either mode) as a pointer to their first element.
 */
export function lowerParamType(param: Param, context: FaultContext): AirType {
  if (param.type.kind === "array") {
    return ptrTo(lowerScalarType(param.type.element, context));
  }
  const scalar = lowerScalarType(param.type, context);
  return param.mode === "reference" ? ptrTo(scalar) : scalar;
}

/** Element type of an array value type. */
export function lowerElementType(t: AlanType, context: FaultContext): AirType {
  if (t.kind !== "array") {
    throw new CodegenError(CodegenFault.TypeMismatch, `'${typeName(t)}' is not an array`, context);
  }
  return lowerScalarType(t.element, context);
}
