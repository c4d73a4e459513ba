import type { BaseNode } from "./base.ts";
import type { FunctionDecl } from "./declarations.ts";

/** Root of a checked program: the single outermost function. */
export interface Program extends BaseNode {
  kind: "Program";
  main: FunctionDecl;
}
