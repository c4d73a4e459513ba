/** Classes of internal-consistency faults the code generator can hit. */
export enum CodegenFault {
  /** A value or return type outside the supported set. */
  TypeMapping = "type-mapping",
  /** A missing parent, frame type or enclosing frame. */
  MissingContext = "missing-context",
  /** A call naming a callee absent from the callable namespace. */
  UnresolvedCallee = "unresolved-callee",
  /** Operands or arguments whose static types do not fit the operation. */
  TypeMismatch = "type-mismatch",
  /** The finished module failed structural verification. */
  InvalidModule = "invalid-module",
  /** Two callables registered under one name. */
  DuplicateSymbol = "duplicate-symbol",
}

export interface FaultContext {
  /** Qualified name of the function being compiled, when there is one. */
  functionName?: string;
  /** The construct being lowered, e.g. `"CallExpr"`. */
  construct?: string;
}

/**
 * Unrecoverable code generation fault. Semantic analysis is expected to have
 * rejected every program that could trigger one, so any `CodegenError`
 * aborts compilation of the whole program.
 */
export class CodegenError extends Error {
  readonly fault: CodegenFault;
  readonly functionName: string | null;
  readonly construct: string | null;
  readonly detail: string;

  constructor(fault: CodegenFault, detail: string, context: FaultContext = {}) {
    const where = context.functionName ? ` in ${context.functionName}` : "";
    const what = context.construct ? ` (${context.construct})` : "";
    super(`${fault}${where}${what}: ${detail}`);
    this.name = "CodegenError";
    this.fault = fault;
    this.functionName = context.functionName ?? null;
    this.construct = context.construct ?? null;
    this.detail = detail;
  }
}
