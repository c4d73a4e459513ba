/**
 * Basic emit helpers and utility methods for AirLowerer.
 * Extracted from lowering.ts for modularity.
 */

import { CodegenError, type CodegenFault } from "../errors/index.ts";
import type { AirBlock, AirInst, AirTerminator, AirType, BlockId, VarId } from "./air-types.ts";
import { I16 } from "./air-types.ts";
import type { AirLowerer } from "./lowering.ts";

export function freshVar(this: AirLowerer): VarId {
  return `%${this.varCounter++}`;
}

export function freshBlockId(this: AirLowerer, prefix: string): BlockId {
  return `${prefix}.${this.blockCounter++}`;
}

export function emit(this: AirLowerer, inst: AirInst): void {
  this.currentInsts.push(inst);
}

/** Emit an `int` (16-bit) constant. */
export function emitConstInt(this: AirLowerer, value: number): VarId {
  const dest = this.freshVar();
  this.emit({ kind: "const_int", dest, type: I16, value });
  return dest;
}

/** Emit a stack_alloc and return the pointer VarId. */
export function emitStackAlloc(this: AirLowerer, type: AirType): VarId {
  const dest = this.freshVar();
  this.emit({ kind: "stack_alloc", dest, type });
  return dest;
}

/** Emit field_ptr to field `index` (of type `type`) and return the pointer VarId. */
export function emitFieldPtr(this: AirLowerer, base: VarId, index: number, type: AirType): VarId {
  const dest = this.freshVar();
  this.emit({ kind: "field_ptr", dest, base, index, type });
  return dest;
}

export function emitLoad(this: AirLowerer, ptr: VarId, type: AirType): VarId {
  const dest = this.freshVar();
  this.emit({ kind: "load", dest, ptr, type });
  return dest;
}

export function setTerminator(this: AirLowerer, term: AirTerminator): void {
  // Only set terminator if block hasn't been terminated yet
  if (!this.isBlockTerminated()) {
    this.pendingTerminator = term;
  }
}

export function isBlockTerminated(this: AirLowerer): boolean {
  return this.pendingTerminator !== null;
}

/** Close the current block. A block nothing terminated is unreachable. */
export function sealCurrentBlock(this: AirLowerer): void {
  const block: AirBlock = {
    id: this.currentBlockId,
    phis: this.currentPhis,
    instructions: this.currentInsts,
    terminator: this.pendingTerminator ?? { kind: "unreachable" },
  };
  this.blocks.push(block);
  this.currentPhis = [];
  this.currentInsts = [];
  this.pendingTerminator = null;
}

export function startBlock(this: AirLowerer, id: BlockId): void {
  this.currentBlockId = id;
  this.currentPhis = [];
  this.currentInsts = [];
  this.pendingTerminator = null;
}

/** Terminate a body that falls off its end. */
export function ensureTerminator(this: AirLowerer, returnType: AirType): void {
  if (!this.isBlockTerminated()) {
    if (returnType.kind === "void") {
      this.setTerminator({ kind: "ret_void" });
    } else {
      // A checked function always returns a value; falling off the end cannot happen
      this.setTerminator({ kind: "unreachable" });
    }
  }
}

/** Reset per-function state to prepare for lowering a new function body. */
export function beginFunctionBody(this: AirLowerer, name: string): void {
  this.currentFunctionName = name;
  this.currentFrame = "";
  this.blocks = [];
  this.varCounter = 0;
  this.blockCounter = 0;
  this.startBlock("entry");
}

/** Build a fault carrying the function and construct being lowered; callers throw it. */
export function fault(this: AirLowerer, kind: CodegenFault, detail: string, construct?: string): CodegenError {
  return new CodegenError(kind, detail, {
    functionName: this.currentFunctionName ?? undefined,
    construct,
  });
}
