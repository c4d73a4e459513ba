import { describe, expect, test } from "vitest";
import type { AirBlock, AirFunction, AirInst, AirModule, AirParam, AirTerminator, AirType } from "../../src/air/air-types.ts";
import { BOOL, I16, I8, VOID, ptrTo } from "../../src/air/air-types.ts";
import { assertValidModule, verifyModule } from "../../src/air/verify.ts";
import { generateModule, lowerToAir } from "../../src/air/lowering.ts";
import { assign, functionDecl, int, program, ret, setBody, varDecl, variable } from "../../src/ast/builders.ts";
import { INT } from "../../src/ast/nodes.ts";
import { CodegenError, CodegenFault } from "../../src/errors/index.ts";
import { moduleOf } from "./helpers.ts";

function block(id: string, instructions: AirInst[], terminator: AirTerminator): AirBlock {
  return { id, phis: [], instructions, terminator };
}

function fn(returnType: AirType, blocks: AirBlock[], params: AirParam[] = []): AirFunction {
  return { name: "f", params, returnType, blocks, localCount: 0, needsAccessLink: false };
}

/** entry branches on %c to a or b, both jump to join. */
function diamond(a: AirInst[], join: AirBlock["phis"], joinTerm: AirTerminator): AirBlock[] {
  return [
    block("entry", [{ kind: "const_bool", dest: "%c", value: true }], {
      kind: "br",
      cond: "%c",
      thenBlock: "a",
      elseBlock: "b",
    }),
    block("a", a, { kind: "jump", target: "join" }),
    block("b", [], { kind: "jump", target: "join" }),
    { id: "join", phis: join, instructions: [], terminator: joinTerm },
  ];
}

describe("AIR: verifier structure", () => {
  test("minimal function is valid", () => {
    expect(verifyModule(moduleOf(fn(VOID, [block("entry", [], { kind: "ret_void" })])))).toEqual([]);
  });

  test("function without blocks", () => {
    expect(verifyModule(moduleOf(fn(VOID, [])))).toEqual(["f: has no blocks"]);
  });

  test("duplicate block labels", () => {
    const blocks = [block("entry", [], { kind: "ret_void" }), block("entry", [], { kind: "ret_void" })];
    expect(verifyModule(moduleOf(fn(VOID, blocks)))).toEqual(["f/entry: duplicate block label"]);
  });

  test("branch to a missing block", () => {
    const blocks = [block("entry", [], { kind: "jump", target: "nowhere" })];
    expect(verifyModule(moduleOf(fn(VOID, blocks)))).toEqual(["f/entry: branch to unknown block 'nowhere'"]);
  });

  test("entry block with a predecessor", () => {
    const blocks = [block("entry", [], { kind: "jump", target: "loop" }), block("loop", [], { kind: "jump", target: "entry" })];
    expect(verifyModule(moduleOf(fn(VOID, blocks)))).toEqual(["f/entry: entry block has predecessors"]);
  });

  test("duplicate callable names", () => {
    const mod = moduleOf(fn(VOID, [block("entry", [], { kind: "ret_void" })]));
    mod.externs.push({ name: "f", params: [], returnType: VOID });
    expect(verifyModule(mod)).toEqual(["duplicate callable 'f'"]);
  });
});

describe("AIR: verifier SSA", () => {
  test("value defined twice", () => {
    const blocks = [
      block(
        "entry",
        [
          { kind: "const_int", dest: "%0", type: I16, value: 1 },
          { kind: "const_int", dest: "%0", type: I16, value: 2 },
        ],
        { kind: "ret_void" }
      ),
    ];
    expect(verifyModule(moduleOf(fn(VOID, blocks)))).toEqual(["f/entry: %0 is defined more than once"]);
  });

  test("use of an undefined value", () => {
    const blocks = [block("entry", [], { kind: "ret", value: "%0" })];
    expect(verifyModule(moduleOf(fn(I16, blocks)))).toEqual(["f/entry: use of undefined value %0"]);
  });

  test("use before definition in the same block", () => {
    const blocks = [
      block(
        "entry",
        [
          { kind: "neg", dest: "%1", operand: "%0", type: I16 },
          { kind: "const_int", dest: "%0", type: I16, value: 1 },
        ],
        { kind: "ret_void" }
      ),
    ];
    expect(verifyModule(moduleOf(fn(VOID, blocks)))).toEqual(["f/entry: %0 does not dominate its use"]);
  });

  test("definition on one arm used after the join", () => {
    const blocks = diamond([{ kind: "const_int", dest: "%0", type: I16, value: 1 }], [], { kind: "ret", value: "%0" });
    expect(verifyModule(moduleOf(fn(I16, blocks)))).toEqual(["f/join: %0 does not dominate its use"]);
  });

  test("phi over both arms is valid", () => {
    const blocks = diamond(
      [{ kind: "const_int", dest: "%0", type: I16, value: 1 }],
      [{ dest: "%p", type: I16, incoming: [{ value: "%0", from: "a" }, { value: "%n", from: "b" }] }],
      { kind: "ret", value: "%p" }
    );
    expect(verifyModule(moduleOf(fn(I16, blocks, [{ name: "n", type: I16 }])))).toEqual([]);
  });

  test("phi missing a predecessor", () => {
    const blocks = diamond(
      [{ kind: "const_int", dest: "%0", type: I16, value: 1 }],
      [{ dest: "%p", type: I16, incoming: [{ value: "%0", from: "a" }] }],
      { kind: "ret", value: "%p" }
    );
    expect(verifyModule(moduleOf(fn(I16, blocks)))).toEqual([
      "f/join: phi %p incoming [a] does not match predecessors [a, b]",
    ]);
  });

  test("uses in unreachable blocks are not dominance-checked", () => {
    const blocks = [
      block("entry", [{ kind: "const_int", dest: "%0", type: I16, value: 1 }], { kind: "ret", value: "%0" }),
      block("dead.0", [{ kind: "neg", dest: "%1", operand: "%0", type: I16 }], { kind: "unreachable" }),
    ];
    expect(verifyModule(moduleOf(fn(I16, blocks)))).toEqual([]);
  });
});

describe("AIR: verifier types", () => {
  const entryWith = (instructions: AirInst[], returnType: AirType = VOID, params: AirParam[] = []) =>
    moduleOf(fn(returnType, [block("entry", instructions, { kind: "ret_void" })], params));

  test("store of the wrong width", () => {
    const mod = entryWith([
      { kind: "stack_alloc", dest: "%0", type: I16 },
      { kind: "const_int", dest: "%1", type: I8, value: 1 },
      { kind: "store", ptr: "%0", value: "%1" },
    ]);
    expect(verifyModule(mod)).toEqual(["f/entry: stored value %1 is i8, expected i16"]);
  });

  test("constant out of range", () => {
    const mod = entryWith([{ kind: "const_int", dest: "%0", type: I8, value: 256 }]);
    expect(verifyModule(mod)).toEqual(["f/entry: constant 256 does not fit i8"]);
  });

  test("field index out of range", () => {
    const frame = { kind: "struct" as const, name: "frame.f", fields: [{ name: "access_link", type: ptrTo(BOOL) }] };
    const mod = entryWith([
      { kind: "stack_alloc", dest: "%0", type: frame },
      { kind: "field_ptr", dest: "%1", base: "%0", index: 1, type: I16 },
    ]);
    expect(verifyModule(mod)).toEqual(["f/entry: field 1 out of range for frame.f"]);
  });

  test("branch on a non-bool", () => {
    const blocks = [
      block("entry", [{ kind: "const_int", dest: "%0", type: I16, value: 0 }], {
        kind: "br",
        cond: "%0",
        thenBlock: "x",
        elseBlock: "x",
      }),
      block("x", [], { kind: "ret_void" }),
    ];
    expect(verifyModule(moduleOf(fn(VOID, blocks)))).toEqual(["f/entry: branch condition %0 is i16, expected bool"]);
  });

  test("zext must widen", () => {
    const mod = entryWith([{ kind: "cast", op: "zext", dest: "%0", value: "%n", targetType: I8 }], VOID, [
      { name: "n", type: I16 },
    ]);
    expect(verifyModule(mod)).toEqual(["f/entry: zext from i16 to i8"]);
  });

  test("call with the wrong argument count", () => {
    const mod = entryWith([{ kind: "call_void", func: "g", args: [] }]);
    mod.externs.push({ name: "g", params: [{ name: "x", type: I16 }], returnType: VOID });
    expect(verifyModule(mod)).toEqual(["f/entry: call to 'g' passes 0 arguments, expected 1"]);
  });

  test("call with a mistyped argument", () => {
    const mod = entryWith([
      { kind: "const_int", dest: "%0", type: I8, value: 1 },
      { kind: "call_void", func: "g", args: ["%0"] },
    ]);
    mod.externs.push({ name: "g", params: [{ name: "x", type: I16 }], returnType: VOID });
    expect(verifyModule(mod)).toEqual(["f/entry: argument 0 of 'g' is i8, expected i16"]);
  });

  test("call to an unknown function", () => {
    const mod = entryWith([{ kind: "call_void", func: "g", args: [] }]);
    expect(verifyModule(mod)).toEqual(["f/entry: call to unknown function 'g'"]);
  });

  test("ret_void in a value function", () => {
    expect(verifyModule(entryWith([], I16))).toEqual(["f/entry: ret_void in a function returning a value"]);
  });

  test("unknown global", () => {
    const mod = entryWith([{ kind: "global_ptr", dest: "%0", name: ".str.9", type: { kind: "array", element: I8, length: 1 } }]);
    expect(verifyModule(mod)).toEqual(["f/entry: unknown global '.str.9'"]);
  });
});

describe("AIR: verifier rejects malformed globals", () => {
  function withGlobal(length: number, bytes: number[]): AirModule {
    return { name: "test", globals: [{ name: ".str.0", type: { kind: "array", element: I8, length }, bytes }], externs: [], functions: [] };
  }

  test("length counts encoded bytes plus the terminator", () => {
    expect(verifyModule(withGlobal(4, [0xe2, 0x82, 0xac]))).toEqual([]);
    expect(verifyModule(withGlobal(2, [0xe2, 0x82, 0xac]))).toEqual(["global '.str.0' has length 2 for 3 bytes"]);
  });

  test("every entry must fit in a byte", () => {
    expect(verifyModule(withGlobal(2, [0x20ac]))).toEqual(["global '.str.0' holds 8364, which is not a byte"]);
  });
});

describe("AIR: module assertion", () => {
  test("invalid module raises an invalid-module fault", () => {
    try {
      assertValidModule(moduleOf(fn(VOID, [])));
      expect.unreachable("expected a CodegenError");
    } catch (err) {
      expect(err).toBeInstanceOf(CodegenError);
      if (err instanceof CodegenError) {
        expect(err.fault).toBe(CodegenFault.InvalidModule);
        expect(err.message).toBe("invalid-module: f: has no blocks");
      }
    }
  });

  test("generateModule verifies what it lowers", () => {
    // A procedure returning a value lowers, but does not verify
    const main = functionDecl("main", { locals: [varDecl("x", INT)] });
    setBody(main, assign(variable(main, "x"), int(1)), ret(int(1)));
    expect(() => lowerToAir(program(main))).not.toThrow();
    expect(() => generateModule(program(functionDecl("main")))).not.toThrow();

    const again = functionDecl("main");
    setBody(again, ret(int(1)));
    expect(() => generateModule(program(again))).toThrow("invalid-module: main/entry: ret with a value in a void function");
  });
});
