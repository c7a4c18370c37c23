import type { SearchResult, SearchStep } from "../interfaces/interfaces";
import type { Cell } from "../model/Cell";
import type { Grid } from "../model/Grid";
import type { PredecessorMap } from "../types/types";

export function* algoBFS(
  grid: Grid,
  start: Cell,
  end: Cell
): Generator<SearchStep, SearchResult, void> {
  const openQ: Cell[] = [start];
  let head = 0;
  const visited = new Set<number>([start.id]);
  const parents: PredecessorMap = new Map();
  let round = 0;

  while (head < openQ.length) {
    const n = openQ[head++];

    if (n === end) return { found: true, parents };

    for (const m of grid.neighborsOf(n)) {
      if (visited.has(m.id)) continue;
      openQ.push(m);
      parents.set(m.id, n.id);
      visited.add(m.id);
      if (m !== end) m.makeFrontier();
    }

    yield {
      round: ++round,
      current: n,
      nodesExpanded: round,
      frontierSize: openQ.length - head,
    };

    if (n !== start) n.makeVisited();
  }
  return { found: false, parents };
}
