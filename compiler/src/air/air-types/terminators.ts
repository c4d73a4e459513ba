import type { BlockId, VarId } from "./identifiers.ts";

// ─── Terminators ─────────────────────────────────────────────────────────────

/** Union of all block terminators — exactly one per basic block. */
export type AirTerminator = AirRet | AirRetVoid | AirJump | AirBranch | AirUnreachable;

/** Return a value from the function. */
export interface AirRet {
  kind: "ret";
  value: VarId;
}

/** Return void from the function. */
export interface AirRetVoid {
  kind: "ret_void";
}

/** Unconditional jump to a target block. */
export interface AirJump {
  kind: "jump";
  target: BlockId;
}

/** Conditional branch — jumps to `thenBlock` if `cond` is true, else `elseBlock`. */
export interface AirBranch {
  kind: "br";
  cond: VarId;
  thenBlock: BlockId;
  elseBlock: BlockId;
}

/** Marks a block control never reaches (e.g. code after a `return`). */
export interface AirUnreachable {
  kind: "unreachable";
}
