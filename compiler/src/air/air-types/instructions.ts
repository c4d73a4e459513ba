import type { VarId } from "./identifiers.ts";
import type { AirIntType, AirType } from "./types.ts";

// ─── Instructions ────────────────────────────────────────────────────────────

/** Union of all AIR instructions (everything except terminators). */
export type AirInst =
  // Memory
  | AirStackAlloc
  | AirLoad
  | AirStore
  | AirFieldPtr
  | AirIndexPtr
  | AirArrayDecay
  | AirGlobalPtr
  // Arithmetic, logic & comparison
  | AirBinOp
  | AirIcmp
  | AirNeg
  | AirNot
  // Constants
  | AirConstInt
  | AirConstBool
  // Type ops
  | AirCast
  // Functions
  | AirCall
  | AirCallVoid;

// ── Memory ───────────────────────────────────────────────────────────────────

/** Allocate stack storage; `dest` is a pointer to it. */
export interface AirStackAlloc {
  kind: "stack_alloc";
  dest: VarId;
  type: AirType;
}

/** Load a value of `type` from a pointer. */
export interface AirLoad {
  kind: "load";
  dest: VarId;
  ptr: VarId;
  type: AirType;
}

/** Store a value through a pointer. */
export interface AirStore {
  kind: "store";
  ptr: VarId;
  value: VarId;
}

/** Pointer to field `index` of the struct `base` points to. `type` is the field type. */
export interface AirFieldPtr {
  kind: "field_ptr";
  dest: VarId;
  base: VarId;
  index: number;
  type: AirType;
}

/** `base + index` elements, where `base` points to an element of `type`. No bounds check. */
export interface AirIndexPtr {
  kind: "index_ptr";
  dest: VarId;
  base: VarId;
  index: VarId;
  type: AirType;
}

/** Pointer to the first element of the array `base` points to. `type` is the element type. */
export interface AirArrayDecay {
  kind: "array_decay";
  dest: VarId;
  base: VarId;
  type: AirType;
}

/** Address of a module-level global. `type` is the global's type. */
export interface AirGlobalPtr {
  kind: "global_ptr";
  dest: VarId;
  name: string;
  type: AirType;
}

// ── Arithmetic, logic & comparison ───────────────────────────────────────────

/** Binary operations whose operands and result share one type. */
export type BinOp = "add" | "sub" | "mul" | "sdiv" | "udiv" | "srem" | "urem" | "and" | "or";

/** Binary operation on two SSA values of `type`. */
export interface AirBinOp {
  kind: "bin_op";
  op: BinOp;
  dest: VarId;
  lhs: VarId;
  rhs: VarId;
  type: AirType;
}

/** Integer comparison predicates; `s*` are signed, `u*` unsigned. */
export type IcmpPred = "eq" | "ne" | "slt" | "sle" | "sgt" | "sge" | "ult" | "ule" | "ugt" | "uge";

/** Integer comparison producing a `bool`. */
export interface AirIcmp {
  kind: "icmp";
  pred: IcmpPred;
  dest: VarId;
  lhs: VarId;
  rhs: VarId;
}

/** Arithmetic negation (`-x`). */
export interface AirNeg {
  kind: "neg";
  dest: VarId;
  operand: VarId;
  type: AirIntType;
}

/** Logical NOT of a `bool`. */
export interface AirNot {
  kind: "not";
  dest: VarId;
  operand: VarId;
}

// ── Constants ────────────────────────────────────────────────────────────────

/** Integer constant. */
export interface AirConstInt {
  kind: "const_int";
  dest: VarId;
  type: AirIntType;
  value: number;
}

/** Boolean constant (`true` / `false`). */
export interface AirConstBool {
  kind: "const_bool";
  dest: VarId;
  value: boolean;
}

// ── Type operations ──────────────────────────────────────────────────────────

/** Integer width conversion: zero extension or truncation. */
export interface AirCast {
  kind: "cast";
  op: "zext" | "trunc";
  dest: VarId;
  value: VarId;
  targetType: AirIntType;
}

// ── Function calls ───────────────────────────────────────────────────────────

/** Call a function that returns a value. */
export interface AirCall {
  kind: "call";
  dest: VarId;
  func: string;
  args: VarId[];
  type: AirType;
}

/** Call a void-returning function. */
export interface AirCallVoid {
  kind: "call_void";
  func: string;
  args: VarId[];
}
