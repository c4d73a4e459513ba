/**
 * Test utilities for AIR lowering.
 */

import { program } from "../../src/ast/builders.ts";
import type { FunctionDecl } from "../../src/ast/nodes.ts";
import type { AirBlock, AirFunction, AirInst, AirModule, AirTerminator } from "../../src/air/air-types.ts";
import type { CodegenOptions } from "../../src/air/lowering.ts";
import { generateModule } from "../../src/air/lowering.ts";
import { printAir } from "../../src/air/printer.ts";

/** Lower and verify a program whose outermost function is `main`. */
export function lower(main: FunctionDecl, options: Partial<CodegenOptions> = {}): AirModule {
  return generateModule(program(main), options);
}

/** Lower without the runtime and return the printed AIR text. */
export function lowerAndPrint(main: FunctionDecl): string {
  return printAir(lower(main, { includeRuntime: false }));
}

/** Lower and return a specific function by name. */
export function lowerFunction(main: FunctionDecl, name: string): AirFunction {
  return findFunction(lower(main), name);
}

export function findFunction(mod: AirModule, name: string): AirFunction {
  const fn = mod.functions.find((f) => f.name === name);
  if (!fn) {
    const available = mod.functions.map((f) => f.name).join(", ");
    throw new Error(`Function '${name}' not found. Available: ${available}`);
  }
  return fn;
}

/** Get all instructions of a given kind from a function. */
export function getInstructions<K extends AirInst["kind"]>(
  fn: AirFunction,
  kind: K
): Extract<AirInst, { kind: K }>[] {
  const result: Extract<AirInst, { kind: K }>[] = [];
  for (const block of fn.blocks) {
    for (const inst of block.instructions) {
      if (isKind(inst, kind)) {
        result.push(inst);
      }
    }
  }
  return result;
}

function isKind<K extends AirInst["kind"]>(inst: AirInst, kind: K): inst is Extract<AirInst, { kind: K }> {
  return inst.kind === kind;
}

/** Get all terminators of a given kind from a function. */
export function getTerminators(fn: AirFunction, kind: AirTerminator["kind"]): AirTerminator[] {
  return fn.blocks.map((b) => b.terminator).filter((t) => t.kind === kind);
}

/** Get a block by its id; throws when it does not exist. */
export function getBlock(fn: AirFunction, id: string): AirBlock {
  const block = fn.blocks.find((b) => b.id === id);
  if (!block) {
    throw new Error(`Block '${id}' not found in ${fn.name}`);
  }
  return block;
}

export function blockIds(fn: AirFunction): string[] {
  return fn.blocks.map((b) => b.id);
}

/** Count total instructions across all blocks. */
export function countInstructions(fn: AirFunction, kind?: AirInst["kind"]): number {
  let count = 0;
  for (const block of fn.blocks) {
    for (const inst of block.instructions) {
      if (!kind || inst.kind === kind) count++;
    }
  }
  return count;
}

/** Module holding only the given functions. */
export function moduleOf(...functions: AirFunction[]): AirModule {
  return { name: "test", globals: [], externs: [], functions };
}
