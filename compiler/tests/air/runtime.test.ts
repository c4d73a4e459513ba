import { describe, expect, test } from "vitest";
import { RUNTIME_EXTERNS } from "../../src/air/lowering-runtime.ts";
import { printAir } from "../../src/air/printer.ts";
import { callRuntime, callStmt, functionDecl, lvalueType, setBody, stringLit, valueOf } from "../../src/ast/builders.ts";
import { BYTE, PROC } from "../../src/ast/nodes.ts";
import { findFunction, lower } from "./helpers.ts";

const I8 = { kind: "int", bits: 8 };
const I16 = { kind: "int", bits: 16 };

describe("AIR: runtime support", () => {
  test("runtime primitives are declared as externs", () => {
    const mod = lower(functionDecl("main"));
    expect(mod.externs.map((e) => e.name)).toEqual([
      "writeInteger",
      "writeChar",
      "writeString",
      "readInteger",
      "readChar",
      "readString",
      "strlen",
      "strcmp",
      "strcpy",
      "strcat",
    ]);
    expect(mod.externs).toEqual(RUNTIME_EXTERNS);
  });

  test("glue helpers come before the program's functions", () => {
    const mod = lower(functionDecl("main"));
    expect(mod.functions.map((f) => f.name)).toEqual(["extend", "writeByte", "shrink", "readByte", "main"]);
    expect(mod.functions.every((f) => !f.needsAccessLink)).toBe(true);
  });

  test("extend zero-extends a byte", () => {
    const fn = findFunction(lower(functionDecl("main")), "extend");
    expect(fn.params).toEqual([{ name: "b", type: I8 }]);
    expect(fn.blocks).toEqual([
      {
        id: "entry",
        phis: [],
        instructions: [{ kind: "cast", op: "zext", dest: "%0", value: "%b", targetType: I16 }],
        terminator: { kind: "ret", value: "%0" },
      },
    ]);
  });

  test("shrink truncates an int", () => {
    const fn = findFunction(lower(functionDecl("main")), "shrink");
    expect(fn.blocks[0].instructions).toEqual([
      { kind: "cast", op: "trunc", dest: "%0", value: "%i", targetType: I8 },
    ]);
  });

  test("writeByte writes the extended value", () => {
    const fn = findFunction(lower(functionDecl("main")), "writeByte");
    expect(fn.blocks[0].instructions).toEqual([
      { kind: "call", dest: "%0", func: "extend", args: ["%b"], type: I16 },
      { kind: "call_void", func: "writeInteger", args: ["%0"] },
    ]);
    expect(fn.blocks[0].terminator).toEqual({ kind: "ret_void" });
  });

  test("readByte shrinks the integer read", () => {
    const fn = findFunction(lower(functionDecl("main")), "readByte");
    expect(fn.blocks[0].instructions).toEqual([
      { kind: "call", dest: "%0", func: "readInteger", args: [], type: I16 },
      { kind: "call", dest: "%1", func: "shrink", args: ["%0"], type: I8 },
    ]);
    expect(fn.blocks[0].terminator).toEqual({ kind: "ret", value: "%1" });
  });

  test("without the runtime only program functions are emitted", () => {
    const mod = lower(functionDecl("main"), { includeRuntime: false });
    expect(mod.externs).toEqual([]);
    expect(mod.functions.map((f) => f.name)).toEqual(["main"]);
  });
});

describe("AIR: string literals", () => {
  test("string literal becomes a terminated global passed by address", () => {
    const main = functionDecl("main");
    setBody(main, callStmt(callRuntime("writeString", PROC, valueOf(stringLit("hi\n")))));
    const mod = lower(main);

    expect(mod.globals).toEqual([{ name: ".str.0", type: { kind: "array", element: I8, length: 4 }, bytes: [104, 105, 10] }]);
    expect(findFunction(mod, "main").blocks[0].instructions.slice(1)).toEqual([
      { kind: "global_ptr", dest: "%1", name: ".str.0", type: { kind: "array", element: I8, length: 4 } },
      { kind: "array_decay", dest: "%2", base: "%1", type: I8 },
      { kind: "call_void", func: "writeString", args: ["%2"] },
    ]);
    expect(printAir(mod)).toContain('global .str.0: array<i8, 4> = c"hi\\0A\\00"');
  });

  test("each literal gets its own global", () => {
    const main = functionDecl("main");
    setBody(
      main,
      callStmt(callRuntime("strcpy", PROC, valueOf(stringLit("a")), valueOf(stringLit("bc"))))
    );
    const mod = lower(main);
    expect(mod.globals.map((g) => [g.name, g.type.length])).toEqual([
      [".str.0", 2],
      [".str.1", 3],
    ]);
  });

  test("non-ASCII literals are stored as UTF-8 bytes", () => {
    const main = functionDecl("main");
    setBody(
      main,
      callStmt(callRuntime("writeString", PROC, valueOf(stringLit("€")))),
      callStmt(callRuntime("writeString", PROC, valueOf(stringLit("😀"))))
    );
    const mod = lower(main);
    expect(mod.globals).toEqual([
      { name: ".str.0", type: { kind: "array", element: I8, length: 4 }, bytes: [0xe2, 0x82, 0xac] },
      { name: ".str.1", type: { kind: "array", element: I8, length: 5 }, bytes: [0xf0, 0x9f, 0x98, 0x80] },
    ]);
    const text = printAir(mod);
    expect(text).toContain('global .str.0: array<i8, 4> = c"\\E2\\82\\AC\\00"');
    expect(text).toContain('global .str.1: array<i8, 5> = c"\\F0\\9F\\98\\80\\00"');
  });

  test("literal type counts encoded bytes", () => {
    expect(lvalueType(stringLit("é!"))).toEqual({ kind: "array", element: BYTE, size: 4 });
  });
});
