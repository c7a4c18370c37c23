import { describe, expect, it, vi } from "vitest";
import { InvalidInputError } from "../errors/errors";
import type { SearchObserver, SearchStep } from "../interfaces/interfaces";
import type { Cell } from "../model/Cell";
import { Grid } from "../model/Grid";
import { COLUMN_TWO_WALL, coords, layout, type RC } from "../test/grids";
import type { AlgoKey } from "../types/types";
import { ALGO_KEYS } from "../utils/constants";
import { generateRandom } from "../utils/mapGen/mapGen";
import { aStar, bfs, dfs, search } from "./search";

function board(walls: RC[] = [], end: RC = [4, 4]): Grid {
  const grid = layout(5, 5, walls);
  grid.markStart(grid.at(0, 0));
  grid.markEnd(grid.at(end[0], end[1]));
  return grid;
}

function recorder() {
  const steps: SearchStep[] = [];
  const paths: Cell[][] = [];
  const observer: SearchObserver = {
    onStep: (step) => {
      steps.push(step);
    },
    onSuccess: (path) => {
      paths.push(path);
    },
  };
  return { steps, paths, observer };
}

describe("search", () => {
  it.each(ALGO_KEYS)("%s finds a path on an open grid", (algo: AlgoKey) => {
    const grid = board();
    const { paths, observer } = recorder();
    const report = search(algo, grid, grid.start, grid.end, observer);

    expect(report.outcome).toBe("Found");
    expect(paths).toEqual([report.path]);
    expect(report.path[0]).toBe(grid.end);
    expect(grid.at(0, 0).state).toBe("Start");
    expect(grid.at(4, 4).state).toBe("End");
    expect(report.path.slice(1).every((cell) => cell.isPath())).toBe(true);
  });

  it("BFS returns a shortest path of 8 moves", () => {
    const grid = board();
    const report = bfs(grid, grid.start, grid.end, recorder().observer);
    expect(coords(report.path)).toEqual([
      [4, 4], [4, 3], [4, 2], [4, 1], [4, 0], [3, 0], [2, 0], [1, 0],
    ]);
    expect(report.stats.rounds).toBe(24);
    expect(report.stats.nodesExpanded).toBe(24);
    expect(report.stats.peakFrontier).toBe(5);
  });

  it("A* matches BFS in length, DFS may wander", () => {
    const lengths = ALGO_KEYS.map((algo) => {
      const grid = board();
      return search(algo, grid, grid.start, grid.end, recorder().observer).path.length;
    });
    expect(lengths).toEqual([8, 24, 8]);
  });

  // corner to corner on seeded random fields: [rows, cols, density, seed, moves]
  it.each([
    [12, 12, 0.3, 7, 22],
    [10, 14, 0.25, 1, 22],
    [16, 16, 0.3, 1, 30],
  ])("A* is as short as BFS on a %ix%i field (density %f, seed %i)", (rows, cols, density, seed, moves) => {
    const run = (algo: AlgoKey) => {
      const grid = new Grid(rows, cols);
      grid.markStart(grid.at(0, 0));
      grid.markEnd(grid.at(rows - 1, cols - 1));
      grid.loadObstacles(generateRandom(rows, cols, density, seed));
      return search(algo, grid, grid.start, grid.end, recorder().observer);
    };
    const shortest = run("BFS");
    const astar = run("A*");

    expect(shortest.outcome).toBe("Found");
    expect(astar.outcome).toBe("Found");
    expect(shortest.path).toHaveLength(moves);
    expect(astar.path).toHaveLength(moves);
  });

  it("A* is as short as BFS around the wall", () => {
    const lengths = (["BFS", "A*"] as const).map((algo) => {
      const grid = board(COLUMN_TWO_WALL);
      return search(algo, grid, grid.start, grid.end, recorder().observer).path.length;
    });
    expect(lengths).toEqual([8, 8]);
  });

  it.each(ALGO_KEYS)("%s steps once when the end is next to the start", (algo: AlgoKey) => {
    const grid = new Grid(1, 2);
    grid.markStart(grid.at(0, 0));
    grid.markEnd(grid.at(0, 1));
    const { steps, paths, observer } = recorder();
    const report = search(algo, grid, grid.start, grid.end, observer);

    expect(report.outcome).toBe("Found");
    expect(steps).toHaveLength(1);
    expect(report.stats.rounds).toBe(1);
    expect(paths).toEqual([[grid.at(0, 1)]]);
  });

  it.each(ALGO_KEYS)("%s goes around the wall through (4,2)", (algo: AlgoKey) => {
    const grid = board(COLUMN_TWO_WALL);
    const report = search(algo, grid, grid.start, grid.end, recorder().observer);
    expect(report.outcome).toBe("Found");
    expect(report.path).toContain(grid.at(4, 2));
    expect(grid.at(4, 2).state).toBe("Path");
  });

  it.each(ALGO_KEYS)("%s reports NotFound when the end is walled in", (algo: AlgoKey) => {
    const grid = board([
      [3, 4],
      [4, 3],
    ]);
    const { paths, observer } = recorder();
    const report = search(algo, grid, grid.start, grid.end, observer);

    expect(report.outcome).toBe("NotFound");
    expect(report.path).toEqual([]);
    expect(paths).toEqual([]);
    expect([...grid.cells()].some((cell) => cell.isPath())).toBe(false);
  });

  it.each(ALGO_KEYS)("%s rejects start == end without touching the grid", (algo: AlgoKey) => {
    const grid = board();
    const cell = grid.at(2, 2);
    grid.takeDirty();
    const { steps, observer } = recorder();

    expect(() => search(algo, grid, cell, grid.at(2, 2), observer)).toThrow(InvalidInputError);
    expect(grid.takeDirty()).toEqual([]);
    expect(steps).toEqual([]);
  });

  it("rejects missing and foreign endpoints", () => {
    const grid = new Grid(3, 3);
    const other = new Grid(3, 3);
    const { observer } = recorder();
    expect(() => search("BFS", grid, null, grid.at(2, 2), observer)).toThrow(
      "no start cell has been set"
    );
    expect(() => search("DFS", grid, grid.at(0, 0), null, observer)).toThrow(
      "no end cell has been set"
    );
    expect(() => search("A*", grid, other.at(0, 0), grid.at(2, 2), observer)).toThrow(
      InvalidInputError
    );
  });

  it("polls the token once per round and leaves tags as they are", () => {
    const grid = board();
    const token = { cancelled: false };
    const onSuccess = vi.fn();
    let calls = 0;
    const report = search("BFS", grid, grid.start, grid.end, {
      onStep: () => {
        calls++;
        if (calls === 3) token.cancelled = true;
      },
      onSuccess,
    }, token);

    expect(report.outcome).toBe("Cancelled");
    expect(report.stats.rounds).toBe(3);
    expect(onSuccess).not.toHaveBeenCalled();
    expect(grid.at(1, 0).state).toBe("Visited");
    // third expanded cell was never resumed, so it keeps its Frontier tag
    expect(grid.at(0, 1).state).toBe("Frontier");
  });

  it("cancels when onStep answers false", () => {
    const grid = board();
    const onSuccess = vi.fn();
    const report = aStar(grid, grid.start, grid.end, {
      onStep: (step) => step.round < 2,
      onSuccess,
    });
    expect(report.outcome).toBe("Cancelled");
    expect(report.stats.rounds).toBe(2);
    expect(onSuccess).not.toHaveBeenCalled();
  });

  it("does not start when the token is already cancelled", () => {
    const grid = board();
    const { steps, observer } = recorder();
    const report = dfs(grid, grid.start, grid.end, observer, { cancelled: true });
    expect(report.outcome).toBe("Cancelled");
    expect(steps).toEqual([]);
  });

  it("gives A* identical step sequences on identical grids", () => {
    const trace = () => {
      const grid = board(COLUMN_TWO_WALL);
      const { steps, observer } = recorder();
      aStar(grid, grid.start, grid.end, observer);
      return steps.map((s) => [s.round, s.current.id, s.frontierSize]);
    };
    expect(trace()).toEqual(trace());
  });

  it("picks up obstacles placed since the last run", () => {
    const grid = new Grid(1, 3);
    grid.markStart(grid.at(0, 0));
    grid.markEnd(grid.at(0, 2));
    grid.markObstacle(grid.at(0, 1));
    const report = bfs(grid, grid.start, grid.end, recorder().observer);
    expect(report.outcome).toBe("NotFound");
  });
});
