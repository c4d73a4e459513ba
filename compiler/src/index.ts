/**
 * Code generator for checked Alan programs: lowers nested-scope functions to
 * AIR, a typed SSA intermediate representation.
 */

export { generateModule, lowerToAir, AirLowerer, defaultCodegenOptions } from "./air/lowering.ts";
export type { CodegenOptions } from "./air/lowering.ts";
export { RUNTIME_EXTERNS } from "./air/lowering-runtime.ts";
export { printAir, printType } from "./air/printer.ts";
export { verifyModule, assertValidModule } from "./air/verify.ts";
export { buildCFG, successors } from "./air/cfg.ts";
export type { CFG, DanglingEdge } from "./air/cfg.ts";
export { computeDominators, dominates } from "./air/dominance.ts";
export * from "./air/air-types.ts";

export * from "./ast/nodes.ts";
export * from "./ast/builders.ts";

export { CodegenError, CodegenFault } from "./errors/index.ts";
export type { FaultContext } from "./errors/index.ts";
