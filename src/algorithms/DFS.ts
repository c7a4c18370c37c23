import type { SearchResult, SearchStep } from "../interfaces/interfaces";
import type { Cell } from "../model/Cell";
import type { Grid } from "../model/Grid";
import type { PredecessorMap } from "../types/types";

interface Frame {
  cell: Cell;
  next: number; // index of the next neighbor to look at
}

// Depth-first with an explicit frame stack, so depth is bounded by the grid
// size rather than the call stack.
export function* algoDFS(
  grid: Grid,
  start: Cell,
  end: Cell
): Generator<SearchStep, SearchResult, void> {
  const visited = new Set<number>([start.id]);
  const parents: PredecessorMap = new Map();
  const stack: Frame[] = [{ cell: start, next: 0 }];
  let round = 0;

  while (stack.length) {
    const top = stack[stack.length - 1];
    const nbs = grid.neighborsOf(top.cell);
    if (top.next >= nbs.length) {
      stack.pop(); // dead end, back to the parent's next neighbor
      continue;
    }
    const m = nbs[top.next++];

    if (visited.has(m.id)) {
      // re-encounters are painted Visited even when they were never expanded
      if (m !== start) m.makeVisited();
      continue;
    }

    parents.set(m.id, top.cell.id);
    if (top.cell !== start) top.cell.makeVisited();

    yield {
      round: ++round,
      current: m,
      nodesExpanded: visited.size,
      frontierSize: stack.length,
    };

    if (m === end) return { found: true, parents };

    visited.add(m.id);
    m.makeFrontier();
    stack.push({ cell: m, next: 0 });
  }
  return { found: false, parents };
}
