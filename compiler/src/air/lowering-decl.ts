/**
 * Function compiler methods for AirLowerer.
 *
 * A function is compiled in three steps that never interleave with a
 * sibling's: its signature and frame type are declared (by whoever compiles
 * its parent), then all of its nested functions are declared and compiled,
 * and only then is its own body emitted.
 */

import type { FunctionDecl } from "../ast/nodes.ts";
import { CodegenFault } from "../errors/index.ts";
import type { AirCallable, AirFunction, AirParam } from "./air-types.ts";
import { paramVarId, ptrTo } from "./air-types.ts";
import { buildFrame } from "./lowering-frame.ts";
import type { AirLowerer } from "./lowering.ts";
import { lowerParamType, lowerReturnType } from "./lowering-types.ts";

/** Name of the parameter carrying the caller-supplied access link. */
export const ACCESS_LINK_PARAM = "__link";

/** Add a callable to the module namespace. Each name is registered once. */
export function registerCallable(this: AirLowerer, callable: AirCallable): void {
  if (this.callables.has(callable.name)) {
    throw this.fault(CodegenFault.DuplicateSymbol, `callable '${callable.name}' is declared twice`);
  }
  this.callables.set(callable.name, callable);
}

/**
 * Declare a function's signature in the callable namespace and build its
 * frame type. Requires the parent's frame type to exist already.
 */
export function declareFunction(this: AirLowerer, decl: FunctionDecl): void {
  this.currentFunctionName = decl.fullName;
  const context = { functionName: decl.fullName, construct: "FunctionDecl" };
  const parentFrame = this.parentFrameTypeOf(decl);
  const needsAccessLink = decl.parent !== decl;

  const params: AirParam[] = decl.params.map((p) => ({
    name: p.name,
    type: lowerParamType(p, context),
  }));
  if (needsAccessLink) {
    params.unshift({ name: ACCESS_LINK_PARAM, type: ptrTo(parentFrame) });
  }
  const returnType = lowerReturnType(decl.returnType, context);

  this.registerCallable({
    name: decl.fullName,
    type: { kind: "function", params: params.map((p) => p.type), returnType },
    needsAccessLink,
  });

  const fn: AirFunction = {
    name: decl.fullName,
    params,
    returnType,
    blocks: [],
    localCount: 0,
    needsAccessLink,
  };
  this.functions.push(fn);
  this.functionShells.set(decl.fullName, fn);

  this.assignFrameType(
    decl,
    buildFrame(decl.fullName, decl.params, decl.locals, parentFrame, context)
  );
}

/** Compile an already-declared function together with everything nested in it. */
export function compileFunction(this: AirLowerer, decl: FunctionDecl): void {
  const nested: FunctionDecl[] = [];
  for (const local of decl.locals) {
    if (local.kind !== "FunctionDecl") continue;
    if (local.parent !== decl) {
      this.currentFunctionName = decl.fullName;
      throw this.fault(
        CodegenFault.MissingContext,
        `nested function '${local.fullName}' is not linked to its enclosing function`,
        "FunctionDecl"
      );
    }
    nested.push(local);
  }

  // Declare every nested function before compiling any, so siblings can call
  // each other regardless of order
  for (const child of nested) {
    this.declareFunction(child);
  }
  for (const child of nested) {
    this.compileFunction(child);
  }

  this.emitFunctionBody(decl);
}

/**
 * Emit a function's body: allocate its frame, spill the incoming access link
 * and parameters into it, then lower the statements.
 */
export function emitFunctionBody(this: AirLowerer, decl: FunctionDecl): void {
  const fn = this.functionShells.get(decl.fullName);
  if (!fn) {
    throw this.fault(CodegenFault.MissingContext, `'${decl.fullName}' was never declared`);
  }

  this.beginFunctionBody(decl.fullName);
  this.currentFunction = decl;

  const frameType = this.requireFrameType(decl);
  this.currentFrame = this.emitStackAlloc(frameType);

  // Incoming values land in consecutive slots; without an access link the
  // first parameter still goes to slot 1
  const firstSlot = fn.needsAccessLink ? 0 : 1;
  fn.params.forEach((param, i) => {
    const slot = firstSlot + i;
    const field = frameType.fields[slot];
    if (!field) {
      throw this.fault(CodegenFault.MissingContext, `frame has no slot ${slot} for '${param.name}'`);
    }
    const ptr = this.emitFieldPtr(this.currentFrame, slot, field.type);
    this.emit({ kind: "store", ptr, value: paramVarId(param.name) });
  });

  this.lowerStatements(decl.body);

  this.ensureTerminator(fn.returnType);
  this.sealCurrentBlock();

  fn.blocks = this.blocks;
  fn.localCount = this.varCounter;
  this.currentFunction = null;
}
