/**
 * Statement lowering methods for AirLowerer.
 * Extracted from lowering.ts for modularity.
 *
 * Every method returns whether the statement is terminal, i.e. control
 * cannot fall through past it. Only `return` is terminal, transitively
 * through compound statements. Terminal status decides whether a
 * fallthrough branch is appended; it never suppresses emission.
 */

import type {
  AssignStmt,
  IfStmt,
  ReturnStmt,
  Statement,
  WhileStmt,
} from "../ast/nodes.ts";
import { CodegenFault } from "../errors/index.ts";
import type { AirLowerer } from "./lowering.ts";

// ─── Statements ──────────────────────────────────────────────────────────

/** Lower a sequence; terminal if any member is. */
export function lowerStatements(this: AirLowerer, stmts: Statement[]): boolean {
  let terminal = false;
  for (const stmt of stmts) {
    // Lower every statement even after a terminal one
    terminal = this.lowerStatement(stmt) || terminal;
  }
  return terminal;
}

export function lowerStatement(this: AirLowerer, stmt: Statement): boolean {
  // Code after a return still gets emitted, into a block nothing jumps to
  if (this.isBlockTerminated() && stmt.kind !== "EmptyStmt" && stmt.kind !== "CompoundStmt") {
    this.sealCurrentBlock();
    this.startBlock(this.freshBlockId("dead"));
  }

  switch (stmt.kind) {
    case "EmptyStmt":
      return false;
    case "AssignStmt":
      this.lowerAssignStmt(stmt);
      return false;
    case "CompoundStmt":
      return this.lowerStatements(stmt.statements);
    case "CallStmt":
      // Any result is discarded
      this.lowerCall(stmt.call);
      return false;
    case "IfStmt":
      return this.lowerIfStmt(stmt);
    case "WhileStmt":
      return this.lowerWhileStmt(stmt);
    case "ReturnStmt":
      return this.lowerReturnStmt(stmt);
  }
}

export function lowerAssignStmt(this: AirLowerer, stmt: AssignStmt): void {
  if (stmt.target.kind === "StringLValue") {
    throw this.fault(CodegenFault.TypeMismatch, "cannot assign to a string literal", "AssignStmt");
  }
  const value = this.lowerExpr(stmt.value);
  const address = this.lowerIdLValue(stmt.target);
  this.emit({ kind: "store", ptr: address.ptr, value });
}

export function lowerIfStmt(this: AirLowerer, stmt: IfStmt): boolean {
  const condId = this.lowerCondition(stmt.condition);
  const thenLabel = this.freshBlockId("if.then");
  const elseLabel = stmt.elseBranch ? this.freshBlockId("if.else") : null;
  const endLabel = this.freshBlockId("if.end");

  this.setTerminator({
    kind: "br",
    cond: condId,
    thenBlock: thenLabel,
    elseBlock: elseLabel ?? endLabel,
  });

  // Then block
  this.sealCurrentBlock();
  this.startBlock(thenLabel);
  if (!this.lowerStatement(stmt.thenBranch)) {
    this.setTerminator({ kind: "jump", target: endLabel });
  }

  // Else block
  if (stmt.elseBranch && elseLabel) {
    this.sealCurrentBlock();
    this.startBlock(elseLabel);
    if (!this.lowerStatement(stmt.elseBranch)) {
      this.setTerminator({ kind: "jump", target: endLabel });
    }
  }

  // End block. Reached even when both arms return; it then has no
  // predecessors and whatever follows lands in dead code.
  this.sealCurrentBlock();
  this.startBlock(endLabel);
  return false;
}

export function lowerWhileStmt(this: AirLowerer, stmt: WhileStmt): boolean {
  const condLabel = this.freshBlockId("while.cond");
  const bodyLabel = this.freshBlockId("while.body");
  const endLabel = this.freshBlockId("while.end");

  this.setTerminator({ kind: "jump", target: condLabel });

  // Condition
  this.sealCurrentBlock();
  this.startBlock(condLabel);
  const condId = this.lowerCondition(stmt.condition);
  this.setTerminator({
    kind: "br",
    cond: condId,
    thenBlock: bodyLabel,
    elseBlock: endLabel,
  });

  // Body
  this.sealCurrentBlock();
  this.startBlock(bodyLabel);
  if (!this.lowerStatement(stmt.body)) {
    this.setTerminator({ kind: "jump", target: condLabel });
  }

  // End
  this.sealCurrentBlock();
  this.startBlock(endLabel);
  return false;
}

export function lowerReturnStmt(this: AirLowerer, stmt: ReturnStmt): boolean {
  if (stmt.value) {
    const value = this.lowerExpr(stmt.value);
    this.setTerminator({ kind: "ret", value });
  } else {
    this.setTerminator({ kind: "ret_void" });
  }
  return true;
}
