import { describe, expect, test } from "vitest";
import { printType } from "../../src/air/printer.ts";
import {
  assign,
  functionDecl,
  int,
  param,
  ret,
  setBody,
  valueOf,
  varDecl,
  variable,
} from "../../src/ast/builders.ts";
import type { FunctionDecl } from "../../src/ast/nodes.ts";
import { BYTE, INT, arrayOf } from "../../src/ast/nodes.ts";
import { CodegenError, CodegenFault } from "../../src/errors/index.ts";
import { findFunction, getInstructions, lower } from "./helpers.ts";

function fieldsOf(decl: FunctionDecl): [string, string][] {
  return (decl.frameType?.fields ?? []).map((f) => [f.name, printType(f.type)]);
}

/** main { var x: int; var buf: byte[10]; fn f(n: int, ref r: int, a: int[5]): int { var t: byte; return 0 } } */
function buildProgram() {
  const f = functionDecl("f", {
    params: [param("n", INT), param("r", INT, "reference"), param("a", arrayOf(INT, 5))],
    locals: [varDecl("t", BYTE)],
    returnType: INT,
  });
  setBody(f, ret(int(0)));
  const main = functionDecl("main", {
    locals: [varDecl("x", INT), varDecl("buf", arrayOf(BYTE, 10)), f],
  });
  setBody(main, assign(variable(main, "x"), int(1)));
  return { main, f };
}

describe("AIR: frame layout", () => {
  test("outermost frame links to the placeholder parent", () => {
    const { main } = buildProgram();
    lower(main);
    expect(main.frameType?.name).toBe("frame.main");
    expect(fieldsOf(main)).toEqual([
      ["access_link", "ptr<bool>"],
      ["x", "i16"],
      ["buf", "array<i8, 10>"],
    ]);
  });

  test("nested frame has access link, params in passed form, then locals", () => {
    const { main, f } = buildProgram();
    lower(main);
    expect(fieldsOf(f)).toEqual([
      ["access_link", "ptr<frame.main>"],
      ["n", "i16"],
      ["r", "ptr<i16>"],
      ["a", "ptr<i16>"],
      ["t", "i8"],
    ]);
  });

  test("frame has one field per param and local plus the access link", () => {
    const { main, f } = buildProgram();
    lower(main);
    expect(f.frameType?.fields.length).toBe(1 + f.params.length + 1);
    // Nested functions take no slot
    expect(main.frameType?.fields.length).toBe(3);
  });

  test("nested function signature starts with the access link", () => {
    const { main } = buildProgram();
    const fn = findFunction(lower(main), "f");
    expect(fn.needsAccessLink).toBe(true);
    expect(fn.params.map((p) => [p.name, printType(p.type)])).toEqual([
      ["__link", "ptr<frame.main>"],
      ["n", "i16"],
      ["r", "ptr<i16>"],
      ["a", "ptr<i16>"],
    ]);
    expect(printType(fn.returnType)).toBe("i16");
  });

  test("outermost function takes no access link", () => {
    const { main } = buildProgram();
    const fn = findFunction(lower(main), "main");
    expect(fn.needsAccessLink).toBe(false);
    expect(fn.params).toEqual([]);
  });

  test("entry block allocates the frame first", () => {
    const { main } = buildProgram();
    const mod = lower(main);
    const fn = findFunction(mod, "main");
    expect(fn.blocks[0].instructions[0]).toEqual({ kind: "stack_alloc", dest: "%0", type: main.frameType });
  });

  test("incoming link and params are spilled into consecutive slots", () => {
    const { main } = buildProgram();
    const fn = findFunction(lower(main), "f");
    const fieldPtrs = getInstructions(fn, "field_ptr").map((i) => i.index);
    const stores = getInstructions(fn, "store").map((s) => s.value);
    expect(fieldPtrs).toEqual([0, 1, 2, 3]);
    expect(stores).toEqual(["%__link", "%n", "%r", "%a"]);
  });

  test("outermost access-link slot is never written", () => {
    const { main } = buildProgram();
    const fn = findFunction(lower(main), "main");
    expect(getInstructions(fn, "field_ptr").filter((i) => i.index === 0)).toEqual([]);
  });

  test("outermost params start at slot 1", () => {
    const main = functionDecl("main", { params: [param("argc", INT)] });
    setBody(main, assign(variable(main, "argc"), valueOf(variable(main, "argc"))));
    const fn = findFunction(lower(main, { includeRuntime: false }), "main");
    const entry = fn.blocks[0].instructions;
    expect(entry[1]).toEqual({ kind: "field_ptr", dest: "%1", base: "%0", index: 1, type: { kind: "int", bits: 16 } });
    expect(entry[2]).toEqual({ kind: "store", ptr: "%1", value: "%argc" });
  });

  test("frame type is assigned once", () => {
    const { main } = buildProgram();
    lower(main);
    expect(() => lower(main)).toThrow("missing-context in main: frame type of 'main' is already set");
  });

  test("nested function without a parent link is rejected", () => {
    const { main, f } = buildProgram();
    f.parent = null;
    try {
      lower(main);
      expect.unreachable("expected a CodegenError");
    } catch (err) {
      expect(err).toBeInstanceOf(CodegenError);
      if (err instanceof CodegenError) {
        expect(err.fault).toBe(CodegenFault.MissingContext);
        expect(err.message).toBe(
          "missing-context in main (FunctionDecl): nested function 'f' is not linked to its enclosing function"
        );
      }
    }
  });
});
