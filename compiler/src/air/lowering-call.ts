/**
 * Call resolution for AirLowerer.
 *
 * A callee that needs an access link receives, as an extra leading argument,
 * the frame of its statically enclosing function. That frame is found by
 * walking `callerDepth - calleeDepth + 1` links from the caller's frame:
 * 0 hops for a function nested directly in the caller, 1 for a sibling or a
 * recursive call, and so on outward.
 */

import type { CallExpr, Expression } from "../ast/nodes.ts";
import { CodegenFault } from "../errors/index.ts";
import type { AirCallable, AirType, VarId } from "./air-types.ts";
import type { AirLowerer } from "./lowering.ts";

export function resolveCallee(this: AirLowerer, call: CallExpr): AirCallable {
  const callee = this.callables.get(call.calleeName);
  if (!callee) {
    throw this.fault(
      CodegenFault.UnresolvedCallee,
      `function '${call.calleeName}' not found`,
      "CallExpr"
    );
  }
  return callee;
}

/**
 * Emit a call. Returns the result value, or null when the callee returns
 * void.
 */
export function lowerCall(this: AirLowerer, call: CallExpr): VarId | null {
  const callee = this.resolveCallee(call);
  const formals = callee.needsAccessLink ? callee.type.params.slice(1) : callee.type.params;

  if (formals.length !== call.args.length) {
    throw this.fault(
      CodegenFault.TypeMismatch,
      `'${callee.name}' takes ${formals.length} argument(s), ${call.args.length} supplied`,
      "CallExpr"
    );
  }

  // Arguments first, left to right, then the access link
  const args = call.args.map((arg, i) => this.lowerArgument(arg, formals[i]));

  if (callee.needsAccessLink) {
    const hops = call.callerDepth - call.calleeDepth + 1;
    if (hops < 0) {
      throw this.fault(
        CodegenFault.MissingContext,
        `caller at depth ${call.callerDepth} cannot reach the parent of '${callee.name}' at depth ${call.calleeDepth}`,
        "CallExpr"
      );
    }
    args.unshift(this.walkAccessLinks(hops, "CallExpr").ptr);
  }

  const returnType = callee.type.returnType;
  if (returnType.kind === "void") {
    this.emit({ kind: "call_void", func: callee.name, args });
    return null;
  }
  const dest = this.freshVar();
  this.emit({ kind: "call", dest, func: callee.name, args, type: returnType });
  return dest;
}

/**
 * Lower one actual argument. A variable passed to a pointer formal (a
 * by-reference scalar or an array) is passed by address.
 */
export function lowerArgument(this: AirLowerer, arg: Expression, formal: AirType | undefined): VarId {
  if (formal?.kind === "ptr" && arg.kind === "ValueExpr") {
    return this.lowerLValue(arg.lvalue).ptr;
  }
  return this.lowerExpr(arg);
}
