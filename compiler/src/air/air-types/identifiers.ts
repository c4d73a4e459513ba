// ─── Identifiers ─────────────────────────────────────────────────────────────

/** SSA variable identifier, e.g. `"%0"`, `"%n"`. */
export type VarId = string;

/** Basic block label, e.g. `"entry"`, `"if.then.0"`, `"while.cond.3"`. */
export type BlockId = string;

/** The SSA value a function parameter is bound to on entry. */
export function paramVarId(name: string): VarId {
  return `%${name}`;
}
