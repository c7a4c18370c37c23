import { InvariantError } from "../errors/errors";
import type { Cell } from "../model/Cell";
import type { Grid } from "../model/Grid";
import type { PredecessorMap } from "../types/types";

/**
 * Walk the predecessor map back from `end` and tag the cells in between as
 * Path. The result runs end first, start excluded, so its length is the
 * number of moves.
 */
export function tracePath(grid: Grid, parents: PredecessorMap, end: Cell): Cell[] {
  const path: Cell[] = [end];
  let cur = parents.get(end.id);
  if (cur === undefined) {
    throw new InvariantError(`end ${end} was reached without a predecessor`);
  }
  while (cur !== undefined) {
    const prev = parents.get(cur);
    if (prev === undefined) break; // cur is the start cell
    if (path.length >= grid.size) {
      throw new InvariantError(`predecessor cycle through ${grid.cellById(cur)}`);
    }
    const cell = grid.cellById(cur);
    cell.makePath();
    path.push(cell);
    cur = prev;
  }
  return path;
}
