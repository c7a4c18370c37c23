import type {
  CancellationToken,
  SearchObserver,
  SearchReport,
} from "../interfaces/interfaces";
import type { Cell } from "../model/Cell";
import type { Grid } from "../model/Grid";
import type { AlgoKey } from "../types/types";
import { SearchSession } from "./session";

/**
 * Run `algo` to completion, handing control to `observer.onStep` after every
 * round. Throws InvalidInputError before touching the grid when the
 * endpoints are unusable. The token is polled once per round.
 */
export function search(
  algo: AlgoKey,
  grid: Grid,
  start: Cell | null,
  end: Cell | null,
  observer: SearchObserver,
  token?: CancellationToken
): SearchReport {
  const session = new SearchSession(algo, grid, start, end);
  while (!session.done) {
    if (token?.cancelled) {
      session.cancel();
      break;
    }
    const step = session.step();
    if (step && observer.onStep(step) === false) session.cancel();
  }
  if (session.outcome === "Found") observer.onSuccess(session.path, session.parents);
  return session.report();
}

type Runner = (
  grid: Grid,
  start: Cell | null,
  end: Cell | null,
  observer: SearchObserver,
  token?: CancellationToken
) => SearchReport;

export const bfs: Runner = (grid, start, end, observer, token) =>
  search("BFS", grid, start, end, observer, token);

export const dfs: Runner = (grid, start, end, observer, token) =>
  search("DFS", grid, start, end, observer, token);

export const aStar: Runner = (grid, start, end, observer, token) =>
  search("A*", grid, start, end, observer, token);
