/**
 * AIR verifier — structural and type checks over a finished module.
 *
 * Problems are collected rather than thrown so that a single run reports
 * everything wrong with a module; `assertValidModule` turns a non-empty
 * list into a `CodegenError`.
 */

import { CodegenError, CodegenFault } from "../errors/index.ts";
import type {
  AirBlock,
  AirFunction,
  AirFunctionType,
  AirInst,
  AirModule,
  AirTerminator,
  AirType,
  BlockId,
  VarId,
} from "./air-types.ts";
import { BOOL, paramVarId, ptrTo, sameType } from "./air-types.ts";
import type { CFG } from "./cfg.ts";
import { buildCFG } from "./cfg.ts";
import { computeDominators, dominates } from "./dominance.ts";
import { printType } from "./printer.ts";

/** Where an SSA value is defined. Parameters have no block. */
interface Definition {
  type: AirType;
  block: BlockId | null;
  /** -1 for phis, the instruction index otherwise. */
  position: number;
}

/** Position of a terminator within its block. */
function terminatorPosition(block: AirBlock): number {
  return block.instructions.length;
}

export function verifyModule(module: AirModule): string[] {
  const problems: string[] = [];
  const callables = new Map<string, AirFunctionType>();

  const declare = (name: string, type: AirFunctionType) => {
    if (callables.has(name)) {
      problems.push(`duplicate callable '${name}'`);
      return;
    }
    callables.set(name, type);
  };
  for (const ext of module.externs) {
    declare(ext.name, {
      kind: "function",
      params: ext.params.map((p) => p.type),
      returnType: ext.returnType,
    });
  }
  for (const fn of module.functions) {
    declare(fn.name, {
      kind: "function",
      params: fn.params.map((p) => p.type),
      returnType: fn.returnType,
    });
  }

  const globals = new Map<string, AirType>();
  for (const global of module.globals) {
    if (globals.has(global.name)) problems.push(`duplicate global '${global.name}'`);
    if (global.type.length !== global.bytes.length + 1) {
      problems.push(`global '${global.name}' has length ${global.type.length} for ${global.bytes.length} bytes`);
    }
    const bad = global.bytes.find((b) => !Number.isInteger(b) || b < 0 || b > 0xff);
    if (bad !== undefined) problems.push(`global '${global.name}' holds ${bad}, which is not a byte`);
    globals.set(global.name, global.type);
  }

  for (const fn of module.functions) {
    const verifier = new FunctionVerifier(fn, callables, globals);
    problems.push(...verifier.verify());
  }
  return problems;
}

/** Throws `InvalidModule` listing every problem `verifyModule` finds. */
export function assertValidModule(module: AirModule): void {
  const problems = verifyModule(module);
  if (problems.length > 0) {
    throw new CodegenError(CodegenFault.InvalidModule, problems.join("; "));
  }
}

// ─── Per-function checks ────────────────────────────────────────────────────

class FunctionVerifier {
  private problems: string[] = [];
  private defs = new Map<VarId, Definition>();
  private cfg: CFG;
  private idom: Map<BlockId, BlockId>;
  private reachable: Set<BlockId>;

  constructor(
    private fn: AirFunction,
    private callables: Map<string, AirFunctionType>,
    private globals: Map<string, AirType>,
  ) {
    this.cfg = buildCFG(fn.blocks);
    this.idom = computeDominators(this.cfg);
    this.reachable = this.cfg.reachable;
  }

  verify(): string[] {
    if (this.fn.blocks.length === 0) {
      this.report(null, "has no blocks");
      return this.problems;
    }
    this.checkLabels();
    this.collectDefinitions();

    for (const block of this.fn.blocks) {
      this.checkPhis(block);
      block.instructions.forEach((inst, i) => this.checkInst(block, inst, i));
      this.checkTerminator(block, block.terminator);
    }
    return this.problems;
  }

  private report(block: BlockId | null, message: string): void {
    const where = block === null ? this.fn.name : `${this.fn.name}/${block}`;
    this.problems.push(`${where}: ${message}`);
  }

  // ── Labels & edges ──────────────────────────────────────────────────────

  private checkLabels(): void {
    const seen = new Set<BlockId>();
    for (const block of this.fn.blocks) {
      if (seen.has(block.id)) this.report(block.id, "duplicate block label");
      seen.add(block.id);
    }
    for (const edge of this.cfg.dangling) {
      this.report(edge.from, `branch to unknown block '${edge.target}'`);
    }
    const entry = this.cfg.entry;
    if (entry !== null && (this.cfg.preds.get(entry) ?? []).length > 0) {
      this.report(entry, "entry block has predecessors");
    }
  }

  // ── Definitions ─────────────────────────────────────────────────────────

  private define(dest: VarId, def: Definition): void {
    if (this.defs.has(dest)) {
      this.report(def.block, `${dest} is defined more than once`);
      return;
    }
    this.defs.set(dest, def);
  }

  private collectDefinitions(): void {
    for (const param of this.fn.params) {
      this.define(paramVarId(param.name), { type: param.type, block: null, position: -1 });
    }
    for (const block of this.fn.blocks) {
      for (const phi of block.phis) {
        this.define(phi.dest, { type: phi.type, block: block.id, position: -1 });
      }
      block.instructions.forEach((inst, position) => {
        const type = resultType(inst);
        if (type && "dest" in inst) {
          this.define(inst.dest, { type, block: block.id, position });
        }
      });
    }
  }

  /**
   * Type of a used value, or null after reporting it. A use in a reachable
   * block must be dominated by the definition.
   */
  private use(value: VarId, block: BlockId, position: number): AirType | null {
    const def = this.defs.get(value);
    if (!def) {
      this.report(block, `use of undefined value ${value}`);
      return null;
    }
    if (def.block !== null && this.reachable.has(block)) {
      const ok =
        def.block === block ? def.position < position : dominates(this.idom, def.block, block);
      if (!ok) this.report(block, `${value} does not dominate its use`);
    }
    return def.type;
  }

  private expect(block: BlockId, value: VarId, position: number, expected: AirType, role: string): void {
    const actual = this.use(value, block, position);
    if (actual && !sameType(actual, expected)) {
      this.report(block, `${role} ${value} is ${printType(actual)}, expected ${printType(expected)}`);
    }
  }

  // ── Phis ────────────────────────────────────────────────────────────────

  private checkPhis(block: AirBlock): void {
    const preds = this.cfg.preds.get(block.id) ?? [];
    for (const phi of block.phis) {
      const froms = phi.incoming.map((inc) => inc.from);
      const missing = preds.filter((p) => !froms.includes(p));
      const extra = froms.filter((f) => !preds.includes(f));
      const repeated = froms.filter((f, i) => froms.indexOf(f) !== i);
      if (missing.length > 0 || extra.length > 0 || repeated.length > 0) {
        this.report(
          block.id,
          `phi ${phi.dest} incoming [${froms.join(", ")}] does not match predecessors [${preds.join(", ")}]`,
        );
      }
      for (const inc of phi.incoming) {
        // The incoming value is used at the end of its predecessor
        const from = this.fn.blocks.find((b) => b.id === inc.from);
        if (!from) continue;
        this.expect(from.id, inc.value, terminatorPosition(from), phi.type, `phi ${phi.dest} incoming`);
      }
    }
  }

  // ── Instructions ────────────────────────────────────────────────────────

  private checkInst(block: AirBlock, inst: AirInst, position: number): void {
    const at = block.id;
    switch (inst.kind) {
      case "stack_alloc":
      case "const_bool":
        return;
      case "const_int": {
        const min = -(2 ** (inst.type.bits - 1));
        const max = 2 ** inst.type.bits - 1;
        if (!Number.isInteger(inst.value) || inst.value < min || inst.value > max) {
          this.report(at, `constant ${inst.value} does not fit ${printType(inst.type)}`);
        }
        return;
      }
      case "load":
        this.expect(at, inst.ptr, position, ptrTo(inst.type), "load pointer");
        return;
      case "store": {
        const ptr = this.use(inst.ptr, at, position);
        if (!ptr) {
          this.use(inst.value, at, position);
          return;
        }
        if (ptr.kind !== "ptr") {
          this.report(at, `store through non-pointer ${inst.ptr}`);
          return;
        }
        this.expect(at, inst.value, position, ptr.pointee, "stored value");
        return;
      }
      case "field_ptr": {
        const base = this.use(inst.base, at, position);
        if (!base) return;
        if (base.kind !== "ptr" || base.pointee.kind !== "struct") {
          this.report(at, `field_ptr base ${inst.base} is not a struct pointer`);
          return;
        }
        const field = base.pointee.fields[inst.index];
        if (!field) {
          this.report(at, `field ${inst.index} out of range for ${base.pointee.name}`);
        } else if (!sameType(field.type, inst.type)) {
          this.report(at, `field ${inst.index} of ${base.pointee.name} is ${printType(field.type)}, not ${printType(inst.type)}`);
        }
        return;
      }
      case "index_ptr": {
        this.expect(at, inst.base, position, ptrTo(inst.type), "index base");
        const index = this.use(inst.index, at, position);
        if (index && index.kind !== "int") this.report(at, `index ${inst.index} is not an integer`);
        return;
      }
      case "array_decay": {
        const base = this.use(inst.base, at, position);
        if (!base) return;
        if (base.kind !== "ptr" || base.pointee.kind !== "array" || !sameType(base.pointee.element, inst.type)) {
          this.report(at, `array_decay base ${inst.base} is not a pointer to an array of ${printType(inst.type)}`);
        }
        return;
      }
      case "global_ptr": {
        const global = this.globals.get(inst.name);
        if (!global) this.report(at, `unknown global '${inst.name}'`);
        else if (!sameType(global, inst.type)) this.report(at, `global '${inst.name}' type mismatch`);
        return;
      }
      case "bin_op": {
        const arithmetic = inst.op !== "and" && inst.op !== "or";
        if (arithmetic ? inst.type.kind !== "int" : inst.type.kind !== "int" && inst.type.kind !== "bool") {
          this.report(at, `${inst.op} on ${printType(inst.type)}`);
        }
        this.expect(at, inst.lhs, position, inst.type, `${inst.op} lhs`);
        this.expect(at, inst.rhs, position, inst.type, `${inst.op} rhs`);
        return;
      }
      case "icmp": {
        const lhs = this.use(inst.lhs, at, position);
        const rhs = this.use(inst.rhs, at, position);
        if (!lhs || !rhs) return;
        if (lhs.kind !== "int" || !sameType(lhs, rhs)) {
          this.report(at, `icmp on ${printType(lhs)} and ${printType(rhs)}`);
        }
        return;
      }
      case "neg":
        this.expect(at, inst.operand, position, inst.type, "neg operand");
        return;
      case "not":
        this.expect(at, inst.operand, position, BOOL, "not operand");
        return;
      case "cast": {
        const source = this.use(inst.value, at, position);
        if (!source) return;
        const target = inst.targetType.bits;
        const ok =
          source.kind === "int" && (inst.op === "zext" ? source.bits < target : source.bits > target);
        if (!ok) {
          this.report(at, `${inst.op} from ${printType(source)} to ${printType(inst.targetType)}`);
        }
        return;
      }
      case "call":
      case "call_void": {
        const callee = this.callables.get(inst.func);
        for (const arg of inst.args) this.use(arg, at, position);
        if (!callee) {
          this.report(at, `call to unknown function '${inst.func}'`);
          return;
        }
        if (inst.kind === "call") {
          if (callee.returnType.kind === "void" || !sameType(callee.returnType, inst.type)) {
            this.report(at, `call to '${inst.func}' expects ${printType(inst.type)}, callee returns ${printType(callee.returnType)}`);
          }
        } else if (callee.returnType.kind !== "void") {
          this.report(at, `call_void to '${inst.func}', which returns ${printType(callee.returnType)}`);
        }
        if (callee.params.length !== inst.args.length) {
          this.report(at, `call to '${inst.func}' passes ${inst.args.length} arguments, expected ${callee.params.length}`);
          return;
        }
        inst.args.forEach((arg, i) => {
          const actual = this.defs.get(arg)?.type;
          const expected = callee.params[i];
          if (actual && expected && !sameType(actual, expected)) {
            this.report(at, `argument ${i} of '${inst.func}' is ${printType(actual)}, expected ${printType(expected)}`);
          }
        });
        return;
      }
    }
  }

  // ── Terminators ─────────────────────────────────────────────────────────

  private checkTerminator(block: AirBlock, term: AirTerminator): void {
    const at = block.id;
    const position = terminatorPosition(block);
    switch (term.kind) {
      case "ret":
        if (this.fn.returnType.kind === "void") {
          this.report(at, "ret with a value in a void function");
          this.use(term.value, at, position);
        } else {
          this.expect(at, term.value, position, this.fn.returnType, "returned value");
        }
        return;
      case "ret_void":
        if (this.fn.returnType.kind !== "void") this.report(at, "ret_void in a function returning a value");
        return;
      case "br":
        this.expect(at, term.cond, position, BOOL, "branch condition");
        return;
      case "jump":
      case "unreachable":
        return;
    }
  }
}

/** Type of the value an instruction defines, or null when it defines none. */
function resultType(inst: AirInst): AirType | null {
  switch (inst.kind) {
    case "stack_alloc":
    case "field_ptr":
    case "index_ptr":
    case "array_decay":
    case "global_ptr":
      return ptrTo(inst.type);
    case "load":
    case "bin_op":
    case "neg":
    case "const_int":
    case "call":
      return inst.type;
    case "icmp":
    case "not":
    case "const_bool":
      return BOOL;
    case "cast":
      return inst.targetType;
    case "store":
    case "call_void":
      return null;
  }
}
