import type { AirFunction, AirParam } from "./function.ts";
import type { AirArrayType, AirFunctionType, AirType } from "./types.ts";

// ─── Module ──────────────────────────────────────────────────────────────────

/** Top-level AIR module — the unit of compilation. */
export interface AirModule {
  name: string;
  globals: AirGlobal[];
  externs: AirExtern[];
  functions: AirFunction[];
}

/** Read-only, null-terminated byte string at module scope. */
export interface AirGlobal {
  name: string;
  type: AirArrayType;
  /** UTF-8 contents without the terminator; `type.length` is `bytes.length + 1`. */
  bytes: number[];
}

/** External (runtime-provided) function declaration — no body. */
export interface AirExtern {
  name: string;
  params: AirParam[];
  returnType: AirType;
}

/** Entry of the module's callable namespace. */
export interface AirCallable {
  name: string;
  type: AirFunctionType;
  needsAccessLink: boolean;
}
