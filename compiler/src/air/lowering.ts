/**
 * AST → AIR lowering pass.
 *
 * Takes a checked program (a tree of nested functions whose identifiers are
 * already resolved to frame slots and nesting distances) and produces an
 * AirModule. Nested lexical scoping is implemented with per-activation frames
 * linked by access links: every frame's slot 0 points to the frame of the
 * statically enclosing function.
 *
 * Method implementations are split across:
 *   - lowering-decl.ts     (function compiler: declare, recurse, emit body)
 *   - lowering-frame.ts    (frame layout and access-link walks)
 *   - lowering-types.ts    (language type → AIR type mapping)
 *   - lowering-call.ts     (call resolution and access-link arguments)
 *   - lowering-expr.ts     (expression and l-value lowering)
 *   - lowering-cond.ts     (boolean conditions, short-circuit and/or)
 *   - lowering-stmt.ts     (statement / control-flow lowering)
 *   - lowering-runtime.ts  (runtime primitives and glue helpers)
 *   - lowering-utils.ts    (basic emit helpers)
 */

import type { FunctionDecl, Program } from "../ast/nodes.ts";
import type {
  AirBlock,
  AirCallable,
  AirExtern,
  AirFunction,
  AirGlobal,
  AirInst,
  AirModule,
  AirPhi,
  AirTerminator,
  BlockId,
  VarId,
} from "./air-types.ts";
import { assertValidModule } from "./verify.ts";

// Import extracted method implementations
import * as callMethods from "./lowering-call.ts";
import * as condMethods from "./lowering-cond.ts";
import * as declMethods from "./lowering-decl.ts";
import * as exprMethods from "./lowering-expr.ts";
import * as frameMethods from "./lowering-frame.ts";
import * as runtimeMethods from "./lowering-runtime.ts";
import * as stmtMethods from "./lowering-stmt.ts";
import * as utilMethods from "./lowering-utils.ts";

// ─── Options ─────────────────────────────────────────────────────────────────

export interface CodegenOptions {
  /** Name of the emitted module. */
  moduleName: string;
  /** Declare the runtime primitives and define the byte I/O helpers. */
  includeRuntime: boolean;
}

export const defaultCodegenOptions: CodegenOptions = {
  moduleName: "alan",
  includeRuntime: true,
};

// ─── Lowerer ─────────────────────────────────────────────────────────────────

export class AirLowerer {
  program: Program;
  options: CodegenOptions;

  // Current function state
  currentFunction: FunctionDecl | null = null;
  currentFunctionName: string | null = null;
  /** Pointer to the current activation's frame. */
  currentFrame: VarId = "";
  blocks: AirBlock[] = [];
  currentBlockId: BlockId = "entry";
  currentPhis: AirPhi[] = [];
  currentInsts: AirInst[] = [];
  pendingTerminator: AirTerminator | null = null;
  varCounter = 0;
  blockCounter = 0;

  // Callable namespace: filled by the declare phase, read by call sites
  callables: Map<string, AirCallable> = new Map();
  /** Declared source functions awaiting (or holding) their bodies. */
  functionShells: Map<string, AirFunction> = new Map();

  // Collected module-level items
  functions: AirFunction[] = [];
  externs: AirExtern[] = [];
  globals: AirGlobal[] = [];
  stringCounter = 0;

  constructor(program: Program, options: Partial<CodegenOptions> = {}) {
    this.program = program;
    this.options = { ...defaultCodegenOptions, ...options };
  }

  lower(): AirModule {
    if (this.options.includeRuntime) {
      this.declareRuntime();
    }

    // The outermost function is its own parent
    const main = this.program.main;
    main.parent = main;

    this.declareFunction(main);
    this.compileFunction(main);

    return {
      name: this.options.moduleName,
      globals: this.globals,
      externs: this.externs,
      functions: this.functions,
    };
  }

  // ─── Function compiler (from lowering-decl.ts) ──────────────────────────
  declare declareFunction: typeof declMethods.declareFunction;
  declare compileFunction: typeof declMethods.compileFunction;
  declare emitFunctionBody: typeof declMethods.emitFunctionBody;
  declare registerCallable: typeof declMethods.registerCallable;

  // ─── Frame methods (from lowering-frame.ts) ────────────────────────────
  declare parentFrameTypeOf: typeof frameMethods.parentFrameTypeOf;
  declare assignFrameType: typeof frameMethods.assignFrameType;
  declare requireFrameType: typeof frameMethods.requireFrameType;
  declare walkAccessLinks: typeof frameMethods.walkAccessLinks;

  // ─── Call methods (from lowering-call.ts) ──────────────────────────────
  declare lowerCall: typeof callMethods.lowerCall;
  declare lowerArgument: typeof callMethods.lowerArgument;
  declare resolveCallee: typeof callMethods.resolveCallee;

  // ─── Expression methods (from lowering-expr.ts) ────────────────────────
  declare lowerExpr: typeof exprMethods.lowerExpr;
  declare lowerValueExpr: typeof exprMethods.lowerValueExpr;
  declare lowerSignExpr: typeof exprMethods.lowerSignExpr;
  declare lowerBinaryExpr: typeof exprMethods.lowerBinaryExpr;
  declare lowerLValue: typeof exprMethods.lowerLValue;
  declare lowerIdLValue: typeof exprMethods.lowerIdLValue;
  declare lowerStringLValue: typeof exprMethods.lowerStringLValue;

  // ─── Condition methods (from lowering-cond.ts) ─────────────────────────
  declare lowerCondition: typeof condMethods.lowerCondition;
  declare lowerCompareCond: typeof condMethods.lowerCompareCond;
  declare lowerLogicCond: typeof condMethods.lowerLogicCond;

  // ─── Statement methods (from lowering-stmt.ts) ─────────────────────────
  declare lowerStatements: typeof stmtMethods.lowerStatements;
  declare lowerStatement: typeof stmtMethods.lowerStatement;
  declare lowerAssignStmt: typeof stmtMethods.lowerAssignStmt;
  declare lowerIfStmt: typeof stmtMethods.lowerIfStmt;
  declare lowerWhileStmt: typeof stmtMethods.lowerWhileStmt;
  declare lowerReturnStmt: typeof stmtMethods.lowerReturnStmt;

  // ─── Runtime methods (from lowering-runtime.ts) ────────────────────────
  declare declareRuntime: typeof runtimeMethods.declareRuntime;

  // ─── Utility methods (from lowering-utils.ts) ──────────────────────────
  declare freshVar: typeof utilMethods.freshVar;
  declare freshBlockId: typeof utilMethods.freshBlockId;
  declare emit: typeof utilMethods.emit;
  declare emitConstInt: typeof utilMethods.emitConstInt;
  declare emitStackAlloc: typeof utilMethods.emitStackAlloc;
  declare emitFieldPtr: typeof utilMethods.emitFieldPtr;
  declare emitLoad: typeof utilMethods.emitLoad;
  declare setTerminator: typeof utilMethods.setTerminator;
  declare isBlockTerminated: typeof utilMethods.isBlockTerminated;
  declare sealCurrentBlock: typeof utilMethods.sealCurrentBlock;
  declare startBlock: typeof utilMethods.startBlock;
  declare ensureTerminator: typeof utilMethods.ensureTerminator;
  declare beginFunctionBody: typeof utilMethods.beginFunctionBody;
  declare fault: typeof utilMethods.fault;
}

// ─── Attach extracted methods to AirLowerer prototype ─────────────────────────

// Function compiler
AirLowerer.prototype.declareFunction = declMethods.declareFunction;
AirLowerer.prototype.compileFunction = declMethods.compileFunction;
AirLowerer.prototype.emitFunctionBody = declMethods.emitFunctionBody;
AirLowerer.prototype.registerCallable = declMethods.registerCallable;

// Frame methods
AirLowerer.prototype.parentFrameTypeOf = frameMethods.parentFrameTypeOf;
AirLowerer.prototype.assignFrameType = frameMethods.assignFrameType;
AirLowerer.prototype.requireFrameType = frameMethods.requireFrameType;
AirLowerer.prototype.walkAccessLinks = frameMethods.walkAccessLinks;

// Call methods
AirLowerer.prototype.lowerCall = callMethods.lowerCall;
AirLowerer.prototype.lowerArgument = callMethods.lowerArgument;
AirLowerer.prototype.resolveCallee = callMethods.resolveCallee;

// Expression methods
AirLowerer.prototype.lowerExpr = exprMethods.lowerExpr;
AirLowerer.prototype.lowerValueExpr = exprMethods.lowerValueExpr;
AirLowerer.prototype.lowerSignExpr = exprMethods.lowerSignExpr;
AirLowerer.prototype.lowerBinaryExpr = exprMethods.lowerBinaryExpr;
AirLowerer.prototype.lowerLValue = exprMethods.lowerLValue;
AirLowerer.prototype.lowerIdLValue = exprMethods.lowerIdLValue;
AirLowerer.prototype.lowerStringLValue = exprMethods.lowerStringLValue;

// Condition methods
AirLowerer.prototype.lowerCondition = condMethods.lowerCondition;
AirLowerer.prototype.lowerCompareCond = condMethods.lowerCompareCond;
AirLowerer.prototype.lowerLogicCond = condMethods.lowerLogicCond;

// Statement methods
AirLowerer.prototype.lowerStatements = stmtMethods.lowerStatements;
AirLowerer.prototype.lowerStatement = stmtMethods.lowerStatement;
AirLowerer.prototype.lowerAssignStmt = stmtMethods.lowerAssignStmt;
AirLowerer.prototype.lowerIfStmt = stmtMethods.lowerIfStmt;
AirLowerer.prototype.lowerWhileStmt = stmtMethods.lowerWhileStmt;
AirLowerer.prototype.lowerReturnStmt = stmtMethods.lowerReturnStmt;

// Runtime methods
AirLowerer.prototype.declareRuntime = runtimeMethods.declareRuntime;

// Utility methods
AirLowerer.prototype.freshVar = utilMethods.freshVar;
AirLowerer.prototype.freshBlockId = utilMethods.freshBlockId;
AirLowerer.prototype.emit = utilMethods.emit;
AirLowerer.prototype.emitConstInt = utilMethods.emitConstInt;
AirLowerer.prototype.emitStackAlloc = utilMethods.emitStackAlloc;
AirLowerer.prototype.emitFieldPtr = utilMethods.emitFieldPtr;
AirLowerer.prototype.emitLoad = utilMethods.emitLoad;
AirLowerer.prototype.setTerminator = utilMethods.setTerminator;
AirLowerer.prototype.isBlockTerminated = utilMethods.isBlockTerminated;
AirLowerer.prototype.sealCurrentBlock = utilMethods.sealCurrentBlock;
AirLowerer.prototype.startBlock = utilMethods.startBlock;
AirLowerer.prototype.ensureTerminator = utilMethods.ensureTerminator;
AirLowerer.prototype.beginFunctionBody = utilMethods.beginFunctionBody;
AirLowerer.prototype.fault = utilMethods.fault;

// ─── Public API ──────────────────────────────────────────────────────────────

/** Lower a program to AIR without verifying the result. */
export function lowerToAir(program: Program, options: Partial<CodegenOptions> = {}): AirModule {
  const lowerer = new AirLowerer(program, options);
  return lowerer.lower();
}

/**
 * Lower a program to AIR and verify the module. Throws a `CodegenError` on
 * the first fault; there is no partial output.
 */
export function generateModule(program: Program, options: Partial<CodegenOptions> = {}): AirModule {
  const module = lowerToAir(program, options);
  assertValidModule(module);
  return module;
}
