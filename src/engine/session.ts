import { algoAStar } from "../algorithms/AStar";
import { algoBFS } from "../algorithms/BFS";
import { algoDFS } from "../algorithms/DFS";
import { InvalidInputError } from "../errors/errors";
import type {
  SearchReport,
  SearchResult,
  SearchStats,
  SearchStep,
  SearchStrategy,
} from "../interfaces/interfaces";
import type { Cell } from "../model/Cell";
import type { Grid } from "../model/Grid";
import type { AlgoKey, PredecessorMap, SearchOutcome } from "../types/types";
import { tracePath } from "./path";

export const STRATEGIES: Record<AlgoKey, SearchStrategy> = {
  BFS: algoBFS,
  DFS: algoDFS,
  "A*": algoAStar,
};

export function checkEndpoints(
  grid: Grid,
  start: Cell | null | undefined,
  end: Cell | null | undefined
): { start: Cell; end: Cell } {
  if (!start) throw new InvalidInputError("no start cell has been set");
  if (!end) throw new InvalidInputError("no end cell has been set");
  if (start.equals(end)) {
    throw new InvalidInputError(`start and end are the same cell ${start}`);
  }
  if (!grid.contains(start)) throw new InvalidInputError(`start ${start} is not a cell of this grid`);
  if (!grid.contains(end)) throw new InvalidInputError(`end ${end} is not a cell of this grid`);
  return { start, end };
}

/**
 * One run of a strategy, advanced a round at a time by whoever owns the
 * loop: {@link search} for blocking callers, the animation frame loop in
 * the app.
 */
export class SearchSession {
  readonly algo: AlgoKey;
  readonly grid: Grid;
  readonly start: Cell;
  readonly end: Cell;
  private readonly gen: Generator<SearchStep, SearchResult, void>;
  private _outcome: SearchOutcome | null = null;
  private _path: Cell[] = [];
  private _parents: PredecessorMap = new Map();
  private meta: SearchStats = { rounds: 0, nodesExpanded: 0, peakFrontier: 0, runtimeMs: 0 };

  constructor(algo: AlgoKey, grid: Grid, start: Cell | null, end: Cell | null) {
    const checked = checkEndpoints(grid, start, end);
    this.algo = algo;
    this.grid = grid;
    this.start = checked.start;
    this.end = checked.end;
    grid.recomputeAdjacency();
    this.gen = STRATEGIES[algo](grid, this.start, this.end);
  }

  get outcome(): SearchOutcome | null {
    return this._outcome;
  }

  get done() {
    return this._outcome !== null;
  }

  get path(): Cell[] {
    return this._path;
  }

  get parents(): PredecessorMap {
    return this._parents;
  }

  get stats(): SearchStats {
    return { ...this.meta };
  }

  /** Advance one round. `null` once the run has finished or been cancelled. */
  step(): SearchStep | null {
    if (this._outcome !== null) return null;
    const begin = performance.now();
    const res = this.gen.next();
    if (res.done) {
      this._parents = res.value.parents;
      if (res.value.found) {
        this._path = tracePath(this.grid, this._parents, this.end);
        this._outcome = "Found";
      } else {
        this._outcome = "NotFound";
      }
      this.meta.runtimeMs += performance.now() - begin;
      return null;
    }
    const step = res.value;
    this.meta.rounds = step.round;
    this.meta.nodesExpanded = step.nodesExpanded;
    this.meta.peakFrontier = Math.max(this.meta.peakFrontier, step.frontierSize);
    this.meta.runtimeMs += performance.now() - begin;
    return step;
  }

  // Leaves every tag as it is
  cancel() {
    if (this._outcome !== null) return;
    this._outcome = "Cancelled";
    this.gen.return({ found: false, parents: this._parents });
  }

  report(): SearchReport {
    return {
      outcome: this._outcome ?? "Cancelled",
      path: this._path,
      stats: this.stats,
    };
  }
}
