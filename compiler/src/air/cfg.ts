/**
 * Control-flow graph of one AIR function.
 *
 * Edges come from `jump` and `br`; `ret`, `ret_void` and `unreachable` end a
 * path. A branch to a label that names no block is kept aside as a dangling
 * edge for the verifier to report. The `dead.N` blocks the lowerer opens after
 * a `return` have no path from the entry and are left out of `blockOrder`.
 */

import type { AirBlock, AirTerminator, BlockId } from "./air-types.ts";

export interface DanglingEdge {
  from: BlockId;
  target: BlockId;
}

export interface CFG {
  /** First block, or null for a function without blocks. */
  entry: BlockId | null;
  preds: Map<BlockId, BlockId[]>;
  succs: Map<BlockId, BlockId[]>;
  /** Blocks reachable from the entry, in reverse post-order. */
  blockOrder: BlockId[];
  reachable: Set<BlockId>;
  dangling: DanglingEdge[];
}

/** Labels a terminator may transfer control to, in branch order. */
export function successors(term: AirTerminator): BlockId[] {
  switch (term.kind) {
    case "jump":
      return [term.target];
    case "br":
      return [term.thenBlock, term.elseBlock];
    case "ret":
    case "ret_void":
    case "unreachable":
      return [];
  }
}

export function buildCFG(blocks: AirBlock[]): CFG {
  const known = new Set(blocks.map((b) => b.id));
  const preds = new Map<BlockId, BlockId[]>();
  const succs = new Map<BlockId, BlockId[]>();
  const dangling: DanglingEdge[] = [];
  for (const id of known) preds.set(id, []);

  for (const block of blocks) {
    const out: BlockId[] = [];
    for (const target of successors(block.terminator)) {
      if (!known.has(target)) {
        dangling.push({ from: block.id, target });
      } else if (!out.includes(target)) {
        // A `br` with both arms on one label is a single edge
        out.push(target);
        preds.get(target)?.push(block.id);
      }
    }
    succs.set(block.id, out);
  }

  const entry = blocks.length > 0 ? blocks[0].id : null;
  const { order, reachable } = reversePostOrder(entry, succs);
  return { entry, preds, succs, blockOrder: order, reachable, dangling };
}

/** Depth-first walk from `entry` with an explicit stack. */
function reversePostOrder(
  entry: BlockId | null,
  succs: Map<BlockId, BlockId[]>,
): { order: BlockId[]; reachable: Set<BlockId> } {
  const order: BlockId[] = [];
  const reachable = new Set<BlockId>();
  if (entry === null) return { order, reachable };

  const stack: { id: BlockId; next: number }[] = [{ id: entry, next: 0 }];
  reachable.add(entry);
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    const out = succs.get(top.id) ?? [];
    if (top.next < out.length) {
      const succ = out[top.next];
      top.next++;
      if (!reachable.has(succ)) {
        reachable.add(succ);
        stack.push({ id: succ, next: 0 });
      }
    } else {
      stack.pop();
      order.push(top.id);
    }
  }
  order.reverse();
  return { order, reachable };
}
