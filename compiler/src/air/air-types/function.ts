import type { BlockId, VarId } from "./identifiers.ts";
import type { AirInst } from "./instructions.ts";
import type { AirTerminator } from "./terminators.ts";
import type { AirType } from "./types.ts";

// ─── Function ────────────────────────────────────────────────────────────────

/** An AIR function — a list of basic blocks in SSA form. The first block is the entry. */
export interface AirFunction {
  name: string;
  params: AirParam[];
  returnType: AirType;
  blocks: AirBlock[];
  localCount: number;
  /**
   * The first parameter is the caller-supplied pointer to the frame of the
   * statically enclosing function.
   */
  needsAccessLink: boolean;
}

/** Named function parameter, bound to the SSA value `%<name>`. */
export interface AirParam {
  name: string;
  type: AirType;
}

// ─── Basic Block ─────────────────────────────────────────────────────────────

/**
 * A basic block — a straight-line sequence of instructions ending with
 * exactly one terminator. May have phi nodes at the top for SSA merges.
 */
export interface AirBlock {
  id: BlockId;
  phis: AirPhi[];
  instructions: AirInst[];
  terminator: AirTerminator;
}

// ─── Phi Node ────────────────────────────────────────────────────────────────

/** SSA phi node — selects a value based on which predecessor block executed. */
export interface AirPhi {
  dest: VarId;
  type: AirType;
  incoming: { value: VarId; from: BlockId }[];
}
