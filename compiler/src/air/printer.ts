/**
 * AIR text format printer — human-readable debug output.
 */

import type {
  AirBlock,
  AirExtern,
  AirFunction,
  AirGlobal,
  AirInst,
  AirModule,
  AirPhi,
  AirStructType,
  AirTerminator,
  AirType,
} from "./air-types.ts";

export function printAir(module: AirModule): string {
  const lines: string[] = [];

  lines.push(`module ${module.name}`);

  // Frame layouts
  for (const frame of collectStructs(module)) {
    lines.push("");
    lines.push(printStruct(frame));
  }

  for (const ext of module.externs) {
    lines.push("");
    lines.push(printExtern(ext));
  }

  for (const g of module.globals) {
    lines.push("");
    lines.push(printGlobal(g));
  }

  for (const fn of module.functions) {
    lines.push("");
    lines.push(printFunction(fn));
  }

  return `${lines.join("\n")}\n`;
}

/** Struct types allocated anywhere in the module, in first-allocation order. */
function collectStructs(module: AirModule): AirStructType[] {
  const seen = new Map<string, AirStructType>();
  for (const fn of module.functions) {
    for (const block of fn.blocks) {
      for (const inst of block.instructions) {
        if (inst.kind === "stack_alloc" && inst.type.kind === "struct" && !seen.has(inst.type.name)) {
          seen.set(inst.type.name, inst.type);
        }
      }
    }
  }
  return [...seen.values()];
}

function printStruct(struct: AirStructType): string {
  const fields = struct.fields.map((f, i) => `  ${i} ${f.name}: ${printType(f.type)}`).join("\n");
  return `type ${struct.name} = struct {\n${fields}\n}`;
}

function printExtern(ext: AirExtern): string {
  const params = ext.params.map((p) => `${p.name}: ${printType(p.type)}`).join(", ");
  return `extern fn ${ext.name}(${params}): ${printType(ext.returnType)}`;
}

function printGlobal(g: AirGlobal): string {
  return `global ${g.name}: ${printType(g.type)} = c"${escapeBytes(g.bytes)}\\00"`;
}

/** Printable ASCII stays as is; every other byte becomes `\XX`. */
function escapeBytes(bytes: number[]): string {
  let out = "";
  for (const byte of bytes) {
    const ch = String.fromCharCode(byte);
    if (byte >= 0x20 && byte < 0x7f && ch !== '"' && ch !== "\\") {
      out += ch;
    } else {
      out += `\\${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    }
  }
  return out;
}

function printFunction(fn: AirFunction): string {
  const params = fn.params.map((p) => `${p.name}: ${printType(p.type)}`).join(", ");
  const lines: string[] = [];
  lines.push(`fn ${fn.name}(${params}): ${printType(fn.returnType)} {`);

  for (const block of fn.blocks) {
    lines.push(printBlock(block));
  }

  lines.push("}");
  return lines.join("\n");
}

function printBlock(block: AirBlock): string {
  const lines: string[] = [];
  lines.push(`${block.id}:`);

  for (const phi of block.phis) {
    lines.push(`  ${printPhi(phi)}`);
  }

  for (const inst of block.instructions) {
    lines.push(`  ${printInst(inst)}`);
  }

  lines.push(`  ${printTerminator(block.terminator)}`);

  return lines.join("\n");
}

function printPhi(phi: AirPhi): string {
  const incoming = phi.incoming.map((e) => `${e.value} from ${e.from}`).join(", ");
  return `${phi.dest} = phi ${printType(phi.type)} [${incoming}]`;
}

export function printInst(inst: AirInst): string {
  switch (inst.kind) {
    case "stack_alloc":
      return `${inst.dest} = stack_alloc ${printType(inst.type)}`;
    case "load":
      return `${inst.dest} = load ${printType(inst.type)}, ${inst.ptr}`;
    case "store":
      return `store ${inst.ptr}, ${inst.value}`;
    case "field_ptr":
      return `${inst.dest} = field_ptr ${inst.base}, ${inst.index}`;
    case "index_ptr":
      return `${inst.dest} = index_ptr ${inst.base}, ${inst.index}`;
    case "array_decay":
      return `${inst.dest} = array_decay ${inst.base}`;
    case "global_ptr":
      return `${inst.dest} = global_ptr ${inst.name}`;
    case "bin_op":
      return `${inst.dest} = ${inst.op} ${printType(inst.type)} ${inst.lhs}, ${inst.rhs}`;
    case "icmp":
      return `${inst.dest} = icmp ${inst.pred} ${inst.lhs}, ${inst.rhs}`;
    case "neg":
      return `${inst.dest} = neg ${printType(inst.type)} ${inst.operand}`;
    case "not":
      return `${inst.dest} = not ${inst.operand}`;
    case "const_int":
      return `${inst.dest} = const_int ${printType(inst.type)} ${inst.value}`;
    case "const_bool":
      return `${inst.dest} = const_bool ${inst.value}`;
    case "cast":
      return `${inst.dest} = ${inst.op} ${inst.value}, ${printType(inst.targetType)}`;
    case "call":
      return `${inst.dest} = call ${inst.func}(${inst.args.join(", ")})`;
    case "call_void":
      return `call_void ${inst.func}(${inst.args.join(", ")})`;
  }
}

function printTerminator(term: AirTerminator): string {
  switch (term.kind) {
    case "ret":
      return `ret ${term.value}`;
    case "ret_void":
      return "ret_void";
    case "jump":
      return `jump ${term.target}`;
    case "br":
      return `br ${term.cond}, ${term.thenBlock}, ${term.elseBlock}`;
    case "unreachable":
      return "unreachable";
  }
}

export function printType(t: AirType): string {
  switch (t.kind) {
    case "int":
      return `i${t.bits}`;
    case "bool":
      return "bool";
    case "void":
      return "void";
    case "ptr":
      return `ptr<${printType(t.pointee)}>`;
    case "struct":
      return t.name;
    case "array":
      return `array<${printType(t.element)}, ${t.length}>`;
    case "function": {
      const params = t.params.map(printType).join(", ");
      return `fn(${params}): ${printType(t.returnType)}`;
    }
  }
}
