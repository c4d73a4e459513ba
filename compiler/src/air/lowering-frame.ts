/**
 * Frame (activation record) layout and access-link walks.
 *
 * A frame is a struct:
 *   slot 0          pointer to the enclosing function's frame (access link)
 *   slots 1..k      declared parameters, in their passed form
 *   slots k+1..k+m  local variables, arrays inline
 * Nested functions contribute no slots.
 */

import type { FunctionDecl, LocalDecl, Param } from "../ast/nodes.ts";
import { CodegenFault, type FaultContext } from "../errors/index.ts";
import type { AirField, AirStructType, AirType, VarId } from "./air-types.ts";
import { ptrTo } from "./air-types.ts";
import type { AirLowerer } from "./lowering.ts";
import { lowerParamType, lowerValueType } from "./lowering-types.ts";

/** Stand-in for the frame of the outermost function's (nonexistent) parent. */
export const PLACEHOLDER_PARENT_FRAME: AirType = { kind: "bool" };

export const ACCESS_LINK_FIELD = "access_link";

/** Build the frame type of a function from its parameters, locals and parent frame. */
export function buildFrame(
  fullName: string,
  params: Param[],
  locals: LocalDecl[],
  parentFrameType: AirType,
  context: FaultContext = { functionName: fullName }
): AirStructType {
  const fields: AirField[] = [{ name: ACCESS_LINK_FIELD, type: ptrTo(parentFrameType) }];
  for (const param of params) {
    fields.push({ name: param.name, type: lowerParamType(param, context) });
  }
  for (const local of locals) {
    if (local.kind === "VarDecl") {
      fields.push({ name: local.name, type: lowerValueType(local.type, context) });
    }
  }
  return { kind: "struct", name: `frame.${fullName}`, fields };
}

/** Frame type a function's access link points to. */
export function parentFrameTypeOf(this: AirLowerer, decl: FunctionDecl): AirType {
  const parent = decl.parent;
  if (parent === null) {
    throw this.fault(CodegenFault.MissingContext, `function '${decl.fullName}' does not have a parent`);
  }
  if (parent === decl) return PLACEHOLDER_PARENT_FRAME;
  if (parent.frameType === null) {
    throw this.fault(
      CodegenFault.MissingContext,
      `parent function '${parent.fullName}' of '${decl.fullName}' does not have a frame type`
    );
  }
  return parent.frameType;
}

/** Store a function's frame type. The slot is written once. */
export function assignFrameType(this: AirLowerer, decl: FunctionDecl, frameType: AirStructType): void {
  if (decl.frameType !== null) {
    throw this.fault(CodegenFault.MissingContext, `frame type of '${decl.fullName}' is already set`);
  }
  decl.frameType = frameType;
}

export function requireFrameType(this: AirLowerer, decl: FunctionDecl): AirStructType {
  if (decl.frameType === null) {
    throw this.fault(CodegenFault.MissingContext, `frame type of '${decl.fullName}' read before it was built`);
  }
  return decl.frameType;
}

/**
 * Follow `hops` access links from the current frame. Returns the frame
 * pointer reached and the function owning that frame; 0 hops is the current
 * frame itself.
 */
export function walkAccessLinks(
  this: AirLowerer,
  hops: number,
  construct: string
): { ptr: VarId; owner: FunctionDecl } {
  let owner = this.currentFunction;
  if (owner === null) {
    throw this.fault(CodegenFault.MissingContext, "no current frame", construct);
  }
  let ptr = this.currentFrame;
  for (let i = 0; i < hops; i++) {
    const parent: FunctionDecl | null = owner.parent;
    if (parent === null || parent === owner) {
      throw this.fault(
        CodegenFault.MissingContext,
        `no enclosing frame ${hops} level(s) above '${this.currentFunction?.fullName}'`,
        construct
      );
    }
    const linkType = ptrTo(this.requireFrameType(parent));
    const linkPtr = this.emitFieldPtr(ptr, 0, linkType);
    ptr = this.emitLoad(linkPtr, linkType);
    owner = parent;
  }
  return { ptr, owner };
}
