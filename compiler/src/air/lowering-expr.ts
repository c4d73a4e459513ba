/**
 * Expression and l-value lowering methods for AirLowerer.
 * Extracted from lowering.ts for modularity.
 */

import type {
  AlanType,
  ArithOp,
  BinaryExpr,
  Expression,
  IdLValue,
  LValue,
  SignExpr,
  StringLValue,
  ValueExpr,
} from "../ast/nodes.ts";
import { literalBytes } from "../ast/builders.ts";
import { CodegenFault } from "../errors/index.ts";
import type { AirArrayType, AirIntType, AirType, BinOp, VarId } from "./air-types.ts";
import { I16, I8 } from "./air-types.ts";
import type { AirLowerer } from "./lowering.ts";
import { lowerElementType } from "./lowering-types.ts";

/** An address together with the type of what it points to. */
export interface Address {
  ptr: VarId;
  type: AirType;
}

/**
 * Whether two operands share a signed (`int`) or unsigned (`byte`) integer
 * type. Anything else is a fault: mixed arithmetic never survives checking.
 */
export function operandSignedness(
  self: AirLowerer,
  left: AlanType,
  right: AlanType,
  construct: string
): "signed" | "unsigned" {
  if (left.kind === "int" && right.kind === "int") return "signed";
  if (left.kind === "byte" && right.kind === "byte") return "unsigned";
  throw self.fault(
    CodegenFault.TypeMismatch,
    `operands are '${left.kind}' and '${right.kind}', expected both 'int' or both 'byte'`,
    construct
  );
}

// Two's complement add/sub/mul are the same for int and byte
const ARITH_OPS: Record<ArithOp, Record<"signed" | "unsigned", BinOp>> = {
  "+": { signed: "add", unsigned: "add" },
  "-": { signed: "sub", unsigned: "sub" },
  "*": { signed: "mul", unsigned: "mul" },
  "/": { signed: "sdiv", unsigned: "udiv" },
  "%": { signed: "srem", unsigned: "urem" },
};

function intTypeFor(signedness: "signed" | "unsigned"): AirIntType {
  return signedness === "signed" ? I16 : I8;
}

// ─── Expressions ─────────────────────────────────────────────────────────

export function lowerExpr(this: AirLowerer, expr: Expression): VarId {
  switch (expr.kind) {
    case "IntLiteral":
      return this.emitConstInt(expr.value);
    case "CharLiteral": {
      const dest = this.freshVar();
      this.emit({ kind: "const_int", dest, type: I8, value: expr.value });
      return dest;
    }
    case "ValueExpr":
      return this.lowerValueExpr(expr);
    case "CallExpr": {
      const result = this.lowerCall(expr);
      if (result === null) {
        throw this.fault(
          CodegenFault.TypeMismatch,
          `procedure '${expr.calleeName}' used as a value`,
          "CallExpr"
        );
      }
      return result;
    }
    case "SignExpr":
      return this.lowerSignExpr(expr);
    case "BinaryExpr":
      return this.lowerBinaryExpr(expr);
  }
}

/**
 * Read a variable. Arrays (and string literals) denote the address of their
 * first element and are not loaded.
 */
export function lowerValueExpr(this: AirLowerer, expr: ValueExpr): VarId {
  const lvalue = expr.lvalue;
  if (lvalue.kind === "StringLValue") {
    return this.lowerStringLValue(lvalue).ptr;
  }
  const address = this.lowerIdLValue(lvalue);
  if (lvalue.type.kind === "array" && lvalue.index === null) {
    return address.ptr;
  }
  const dest = this.freshVar();
  this.emit({ kind: "load", dest, ptr: address.ptr, type: address.type });
  return dest;
}

export function lowerSignExpr(this: AirLowerer, expr: SignExpr): VarId {
  const operand = this.lowerExpr(expr.operand);
  if (expr.operator === "+") return operand;

  const t = expr.operand.type;
  if (t.kind !== "int" && t.kind !== "byte") {
    throw this.fault(CodegenFault.TypeMismatch, `cannot negate '${t.kind}'`, "SignExpr");
  }
  const dest = this.freshVar();
  this.emit({ kind: "neg", dest, operand, type: t.kind === "int" ? I16 : I8 });
  return dest;
}

export function lowerBinaryExpr(this: AirLowerer, expr: BinaryExpr): VarId {
  const signedness = operandSignedness(this, expr.left.type, expr.right.type, "BinaryExpr");
  const lhs = this.lowerExpr(expr.left);
  const rhs = this.lowerExpr(expr.right);

  const op = ARITH_OPS[expr.operator][signedness];
  const dest = this.freshVar();
  this.emit({ kind: "bin_op", op, dest, lhs, rhs, type: intTypeFor(signedness) });
  return dest;
}

// ─── L-values ────────────────────────────────────────────────────────────

/** Resolve an l-value to the address of its storage. */
export function lowerLValue(this: AirLowerer, lvalue: LValue): Address {
  return lvalue.kind === "StringLValue"
    ? this.lowerStringLValue(lvalue)
    : this.lowerIdLValue(lvalue);
}

/**
 * Resolve a variable occurrence: walk to the declaring frame, then find the
 * storage according to how the variable lives in that frame.
 */
export function lowerIdLValue(this: AirLowerer, lvalue: IdLValue): Address {
  const construct = "IdLValue";
  const { ptr: frame, owner } = this.walkAccessLinks(lvalue.nestingDistance, construct);
  const frameType = this.requireFrameType(owner);
  const field = frameType.fields[lvalue.offset];
  if (lvalue.offset < 1 || !field) {
    throw this.fault(
      CodegenFault.MissingContext,
      `'${lvalue.name}' refers to slot ${lvalue.offset}, which '${owner.fullName}' does not have`,
      construct
    );
  }

  const context = { functionName: this.currentFunctionName ?? undefined, construct };
  let base: VarId;
  let pointee: AirType;

  if (lvalue.isParameter) {
    if (lvalue.type.kind === "array") {
      // The slot holds a pointer to the caller's first element
      base = this.emitLoad(this.emitFieldPtr(frame, lvalue.offset, field.type), field.type);
      pointee = lowerElementType(lvalue.type, context);
    } else if (lvalue.isReference) {
      // The slot holds a pointer to the caller's storage
      base = this.emitLoad(this.emitFieldPtr(frame, lvalue.offset, field.type), field.type);
      pointee = field.type.kind === "ptr" ? field.type.pointee : field.type;
    } else {
      base = this.emitFieldPtr(frame, lvalue.offset, field.type);
      pointee = field.type;
    }
  } else if (lvalue.type.kind === "array") {
    // Arrays live inline in the frame
    const arrayPtr = this.emitFieldPtr(frame, lvalue.offset, field.type);
    pointee = lowerElementType(lvalue.type, context);
    base = this.freshVar();
    this.emit({ kind: "array_decay", dest: base, base: arrayPtr, type: pointee });
  } else {
    base = this.emitFieldPtr(frame, lvalue.offset, field.type);
    pointee = field.type;
  }

  if (lvalue.index === null) {
    return { ptr: base, type: pointee };
  }
  if (lvalue.type.kind !== "array") {
    throw this.fault(
      CodegenFault.TypeMismatch,
      `'${lvalue.name}' is subscripted but is not an array`,
      construct
    );
  }
  const index = this.lowerExpr(lvalue.index);
  const dest = this.freshVar();
  this.emit({ kind: "index_ptr", dest, base, index, type: pointee });
  return { ptr: dest, type: pointee };
}

/** Place a string literal in a read-only global and point at its first byte. */
export function lowerStringLValue(this: AirLowerer, lvalue: StringLValue): Address {
  const name = `.str.${this.stringCounter++}`;
  const bytes = literalBytes(lvalue.value);
  const type: AirArrayType = { kind: "array", element: I8, length: bytes.length + 1 };
  this.globals.push({ name, type, bytes });

  const globalPtr = this.freshVar();
  this.emit({ kind: "global_ptr", dest: globalPtr, name, type });
  const dest = this.freshVar();
  this.emit({ kind: "array_decay", dest, base: globalPtr, type: I8 });
  return { ptr: dest, type: I8 };
}
