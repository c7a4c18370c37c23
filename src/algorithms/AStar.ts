import type { SearchResult, SearchStep } from "../interfaces/interfaces";
import type { Cell } from "../model/Cell";
import type { Grid } from "../model/Grid";
import type { PredecessorMap } from "../types/types";
import { manhattan } from "../utils/heuristic/heuristic";
import { MinHeap } from "../utils/MinHeap/MinHeap";

export function* algoAStar(
  grid: Grid,
  start: Cell,
  end: Cell
): Generator<SearchStep, SearchResult, void> {
  // keyed on f; MinHeap breaks ties by insertion order
  const heap = new MinHeap<Cell>();
  const g = new Float64Array(grid.size).fill(Infinity);
  const f = new Float64Array(grid.size).fill(Infinity);
  g[start.id] = 0;
  f[start.id] = manhattan(start, end);
  const parents: PredecessorMap = new Map();
  const open = new Set<number>([start.id]);
  let round = 0;

  heap.push(f[start.id], start);

  while (heap.size()) {
    const n = heap.pop();
    if (n === undefined) break;
    open.delete(n.id);

    if (n === end) return { found: true, parents };

    for (const m of grid.neighborsOf(n)) {
      const ng = g[n.id] + 1;
      if (ng >= g[m.id]) continue;
      g[m.id] = ng;
      f[m.id] = ng + manhattan(m, end);
      parents.set(m.id, n.id);
      if (!open.has(m.id)) {
        heap.push(f[m.id], m);
        open.add(m.id);
        if (m !== end) m.makeFrontier();
      }
    }

    yield {
      round: ++round,
      current: n,
      nodesExpanded: round,
      frontierSize: open.size,
    };

    if (n !== start) n.makeVisited();
  }
  return { found: false, parents };
}
