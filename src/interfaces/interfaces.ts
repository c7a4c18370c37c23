import type { Cell } from "../model/Cell";
import type { Grid } from "../model/Grid";
import type { PredecessorMap, SearchOutcome } from "../types/types";

// What a strategy reports at the end of each round, right before it yields.
export interface SearchStep {
  round: number;
  current: Cell; // cell expanded (BFS, A*) or entered (DFS) this round
  nodesExpanded: number;
  frontierSize: number;
}

export interface SearchResult {
  found: boolean;
  parents: PredecessorMap;
}

/**
 * A traversal over `grid` from `start` to `end`. Every `yield` ends a round
 * and is the only point where the caller gets control back.
 */
export type SearchStrategy = (
  grid: Grid,
  start: Cell,
  end: Cell
) => Generator<SearchStep, SearchResult, void>;

export interface SearchObserver {
  /** Redraw hook, once per round. Return `false` to cancel the run. */
  onStep(step: SearchStep): boolean | void;
  /** Path sink, end first and start excluded. Called at most once. */
  onSuccess(path: Cell[], parents: PredecessorMap): void;
}

export interface CancellationToken {
  readonly cancelled: boolean;
}

export interface SearchStats {
  rounds: number;
  nodesExpanded: number;
  peakFrontier: number;
  runtimeMs: number;
}

export interface SearchReport {
  outcome: SearchOutcome;
  path: Cell[];
  stats: SearchStats;
}

export interface RunConfig {
  rows: number;
  cols: number;
  density: number; // for Random
  seed: number;
}
