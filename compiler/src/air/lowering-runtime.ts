/**
 * Runtime support for generated programs.
 *
 * I/O and string primitives are provided by the runtime library and only
 * declared here. The byte conversions and byte I/O are glue defined in
 * terms of them, so they get bodies.
 */

import type { AirParam, AirType, VarId } from "./air-types.ts";
import { I16, I8, VOID, paramVarId, ptrTo } from "./air-types.ts";
import type { AirLowerer } from "./lowering.ts";

const STRING = ptrTo(I8);

interface RuntimeSignature {
  name: string;
  params: AirParam[];
  returnType: AirType;
}

export const RUNTIME_EXTERNS: RuntimeSignature[] = [
  { name: "writeInteger", params: [{ name: "n", type: I16 }], returnType: VOID },
  { name: "writeChar", params: [{ name: "c", type: I8 }], returnType: VOID },
  { name: "writeString", params: [{ name: "s", type: STRING }], returnType: VOID },
  { name: "readInteger", params: [], returnType: I16 },
  { name: "readChar", params: [], returnType: I8 },
  {
    name: "readString",
    params: [
      { name: "n", type: I16 },
      { name: "s", type: STRING },
    ],
    returnType: VOID,
  },
  { name: "strlen", params: [{ name: "s", type: STRING }], returnType: I16 },
  {
    name: "strcmp",
    params: [
      { name: "s1", type: STRING },
      { name: "s2", type: STRING },
    ],
    returnType: I16,
  },
  {
    name: "strcpy",
    params: [
      { name: "trg", type: STRING },
      { name: "src", type: STRING },
    ],
    returnType: VOID,
  },
  {
    name: "strcat",
    params: [
      { name: "trg", type: STRING },
      { name: "src", type: STRING },
    ],
    returnType: VOID,
  },
];

/** Register a callable that takes no access link. */
function registerPlain(self: AirLowerer, sig: RuntimeSignature): void {
  self.registerCallable({
    name: sig.name,
    type: { kind: "function", params: sig.params.map((p) => p.type), returnType: sig.returnType },
    needsAccessLink: false,
  });
}

/** Define a helper whose body is emitted by `body`, which must terminate it. */
function defineHelper(self: AirLowerer, sig: RuntimeSignature, body: () => void): void {
  registerPlain(self, sig);
  self.beginFunctionBody(sig.name);
  body();
  self.sealCurrentBlock();
  self.functions.push({
    name: sig.name,
    params: sig.params,
    returnType: sig.returnType,
    blocks: self.blocks,
    localCount: self.varCounter,
    needsAccessLink: false,
  });
}

function emitCallValue(self: AirLowerer, func: string, args: VarId[], type: AirType): VarId {
  const dest = self.freshVar();
  self.emit({ kind: "call", dest, func, args, type });
  return dest;
}

export function declareRuntime(this: AirLowerer): void {
  for (const ext of RUNTIME_EXTERNS) {
    registerPlain(this, ext);
    this.externs.push({ name: ext.name, params: ext.params, returnType: ext.returnType });
  }

  // extend(b: byte): int
  defineHelper(this, { name: "extend", params: [{ name: "b", type: I8 }], returnType: I16 }, () => {
    const dest = this.freshVar();
    this.emit({ kind: "cast", op: "zext", dest, value: paramVarId("b"), targetType: I16 });
    this.setTerminator({ kind: "ret", value: dest });
  });

  // writeByte(b: byte)
  defineHelper(this, { name: "writeByte", params: [{ name: "b", type: I8 }], returnType: VOID }, () => {
    const wide = emitCallValue(this, "extend", [paramVarId("b")], I16);
    this.emit({ kind: "call_void", func: "writeInteger", args: [wide] });
    this.setTerminator({ kind: "ret_void" });
  });

  // shrink(i: int): byte
  defineHelper(this, { name: "shrink", params: [{ name: "i", type: I16 }], returnType: I8 }, () => {
    const dest = this.freshVar();
    this.emit({ kind: "cast", op: "trunc", dest, value: paramVarId("i"), targetType: I8 });
    this.setTerminator({ kind: "ret", value: dest });
  });

  // readByte(): byte
  defineHelper(this, { name: "readByte", params: [], returnType: I8 }, () => {
    const wide = emitCallValue(this, "readInteger", [], I16);
    const narrow = emitCallValue(this, "shrink", [wide], I8);
    this.setTerminator({ kind: "ret", value: narrow });
  });

  this.currentFunctionName = null;
}
