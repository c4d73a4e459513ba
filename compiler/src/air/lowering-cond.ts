/**
 * Boolean condition lowering methods for AirLowerer.
 *
 * Short-circuit `&` / `|` lower to a diamond: the left operand decides whether
 * the `middle` block (which evaluates the right operand) runs at all, and a
 * phi in the `merge` block picks the left value or the combined value.
 */

import type { CompareCond, CompareOp, Condition, LogicCond } from "../ast/nodes.ts";
import type { IcmpPred, VarId } from "./air-types.ts";
import { BOOL } from "./air-types.ts";
import { operandSignedness } from "./lowering-expr.ts";
import type { AirLowerer } from "./lowering.ts";

const COMPARE_PREDS: Record<CompareOp, Record<"signed" | "unsigned", IcmpPred>> = {
  "==": { signed: "eq", unsigned: "eq" },
  "!=": { signed: "ne", unsigned: "ne" },
  "<": { signed: "slt", unsigned: "ult" },
  ">": { signed: "sgt", unsigned: "ugt" },
  "<=": { signed: "sle", unsigned: "ule" },
  ">=": { signed: "sge", unsigned: "uge" },
};

export function lowerCondition(this: AirLowerer, cond: Condition): VarId {
  switch (cond.kind) {
    case "BoolCond": {
      const dest = this.freshVar();
      this.emit({ kind: "const_bool", dest, value: cond.value });
      return dest;
    }
    case "NotCond": {
      const operand = this.lowerCondition(cond.operand);
      const dest = this.freshVar();
      this.emit({ kind: "not", dest, operand });
      return dest;
    }
    case "CompareCond":
      return this.lowerCompareCond(cond);
    case "LogicCond":
      return this.lowerLogicCond(cond);
  }
}

export function lowerCompareCond(this: AirLowerer, cond: CompareCond): VarId {
  const signedness = operandSignedness(this, cond.left.type, cond.right.type, "CompareCond");
  const lhs = this.lowerExpr(cond.left);
  const rhs = this.lowerExpr(cond.right);
  const dest = this.freshVar();
  this.emit({ kind: "icmp", pred: COMPARE_PREDS[cond.operator][signedness], dest, lhs, rhs });
  return dest;
}

export function lowerLogicCond(this: AirLowerer, cond: LogicCond): VarId {
  const isAnd = cond.operator === "&";
  const prefix = isAnd ? "and" : "or";

  const lhs = this.lowerCondition(cond.left);
  // The left operand may itself have branched; the edge into merge leaves
  // from wherever its evaluation ended
  const shortCircuitFrom = this.currentBlockId;

  const middleLabel = this.freshBlockId(`${prefix}.middle`);
  const mergeLabel = this.freshBlockId(`${prefix}.merge`);

  this.setTerminator(
    isAnd
      ? { kind: "br", cond: lhs, thenBlock: middleLabel, elseBlock: mergeLabel }
      : { kind: "br", cond: lhs, thenBlock: mergeLabel, elseBlock: middleLabel }
  );

  // Middle: evaluate the right operand and combine
  this.sealCurrentBlock();
  this.startBlock(middleLabel);
  const rhs = this.lowerCondition(cond.right);
  const combined = this.freshVar();
  this.emit({ kind: "bin_op", op: prefix, dest: combined, lhs, rhs, type: BOOL });
  const evaluatedFrom = this.currentBlockId;
  this.setTerminator({ kind: "jump", target: mergeLabel });

  // Merge
  this.sealCurrentBlock();
  this.startBlock(mergeLabel);
  const dest = this.freshVar();
  this.currentPhis.push({
    dest,
    type: BOOL,
    incoming: [
      { value: lhs, from: shortCircuitFrom },
      { value: combined, from: evaluatedFrom },
    ],
  });
  return dest;
}
