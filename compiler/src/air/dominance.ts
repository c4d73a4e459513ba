/**
 * Dominance computation — iterative dominator algorithm.
 *
 * Uses the Cooper-Harvey-Kennedy iterative algorithm for immediate
 * dominators over the RPO of the reachable blocks.
 */

import type { BlockId } from "./air-types.ts";
import type { CFG } from "./cfg.ts";

// ─── Dominance (Cooper, Harvey, Kennedy) ────────────────────────────────────

/**
 * Compute immediate dominators. The entry block is its own immediate
 * dominator; unreachable blocks have no entry in the result.
 */
export function computeDominators(cfg: CFG): Map<BlockId, BlockId> {
  const { blockOrder, preds } = cfg;
  if (blockOrder.length === 0) return new Map();

  // Work on RPO indices: a lower index is closer to the entry
  const rpoIndex = new Map<BlockId, number>();
  blockOrder.forEach((id, i) => rpoIndex.set(id, i));

  const idom: number[] = blockOrder.map(() => -1);
  idom[0] = 0;

  /** Nearest common dominator of two processed blocks. */
  function intersect(b1: number, b2: number): number {
    let a = b1;
    let b = b2;
    while (a !== b) {
      while (a > b) a = idom[a];
      while (b > a) b = idom[b];
    }
    return a;
  }

  let changed = true;
  while (changed) {
    changed = false;
    for (let i = 1; i < blockOrder.length; i++) {
      let newIdom = -1;
      for (const pred of preds.get(blockOrder[i]) ?? []) {
        const p = rpoIndex.get(pred);
        // Skip unreachable and not-yet-processed predecessors
        if (p === undefined || idom[p] === -1) continue;
        newIdom = newIdom === -1 ? p : intersect(p, newIdom);
      }
      if (newIdom !== -1 && idom[i] !== newIdom) {
        idom[i] = newIdom;
        changed = true;
      }
    }
  }

  const result = new Map<BlockId, BlockId>();
  blockOrder.forEach((id, i) => result.set(id, blockOrder[idom[i]]));
  return result;
}

/** Whether block `a` dominates block `b` (every block dominates itself). */
export function dominates(idom: Map<BlockId, BlockId>, a: BlockId, b: BlockId): boolean {
  let current = b;
  for (;;) {
    if (current === a) return true;
    const up = idom.get(current);
    if (up === undefined || up === current) return false;
    current = up;
  }
}
