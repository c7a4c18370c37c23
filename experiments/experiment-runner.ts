// experiments/experiment-runner.ts
//
// Offline experiments for the visualizer's search engine.
// Runs BFS, DFS and A* headless on many random/maze grids and writes a CSV
// file with rounds, expansions, frontier size, path length and optimality.
//
// Run with:
//   npm run experiments
//
// CSV output: experiments/results.csv

import { writeFileSync } from "fs";
import { search } from "../src/engine/search";
import type { RunConfig, SearchObserver } from "../src/interfaces/interfaces";
import { Grid } from "../src/model/Grid";
import type { AlgoKey, MapType, SearchOutcome } from "../src/types/types";
import { ALGO_KEYS } from "../src/utils/constants";
import { generateMaze, generateRandom, pickOpenEnds } from "../src/utils/mapGen/mapGen";

interface AlgoResult {
  algo: AlgoKey;
  outcome: SearchOutcome;
  rounds: number;
  nodesExpanded: number;
  peakFrontier: number;
  runtimeMs: number;
  pathLength: number | null;
  optimal: boolean | null; // null when BFS found nothing to compare with
}

// ---------- Experiment parameters ----------
const OUTPUT_CSV = "experiments/results.csv";

// how many seeds per configuration
const NUM_TRIALS = 50;

// square grid sizes to test
const SIZES = [16, 32, 64];

const MAP_TYPES: MapType[] = ["Random", "Maze"];

// densities for Random maps
const DENSITIES = [0.2, 0.3];

const headless: SearchObserver = {
  onStep: () => true,
  onSuccess: () => undefined,
};

function buildGrid(cfg: RunConfig, mapType: MapType): Grid | null {
  const blocks =
    mapType === "Maze"
      ? generateMaze(cfg.rows, cfg.cols, cfg.seed)
      : generateRandom(cfg.rows, cfg.cols, cfg.density, cfg.seed);
  const grid = new Grid(cfg.rows, cfg.cols);
  if (mapType === "Maze") {
    const ends = pickOpenEnds(blocks);
    if (!ends) return null;
    grid.loadObstacles(blocks);
    grid.markStart(grid.cellById(ends.start));
    grid.markEnd(grid.cellById(ends.end));
  } else {
    grid.markStart(grid.at(0, 0));
    grid.markEnd(grid.at(cfg.rows - 1, cfg.cols - 1));
    grid.loadObstacles(blocks);
  }
  return grid;
}

function runAll(cfg: RunConfig, mapType: MapType): AlgoResult[] {
  const results: AlgoResult[] = [];
  let bfsLength: number | null = null;
  for (const algo of ALGO_KEYS) {
    const grid = buildGrid(cfg, mapType);
    if (!grid) return [];
    const report = search(algo, grid, grid.start, grid.end, headless);
    const pathLength = report.outcome === "Found" ? report.path.length : null;
    if (algo === "BFS") bfsLength = pathLength;
    results.push({
      algo,
      outcome: report.outcome,
      ...report.stats,
      pathLength,
      optimal:
        bfsLength === null || pathLength === null ? null : pathLength === bfsLength,
    });
  }
  return results;
}

function toCsv(rows: string[][]): string {
  return rows.map((r) => r.join(",")).join("\n") + "\n";
}

function main() {
  const header = [
    "size",
    "mapType",
    "density",
    "seed",
    "algo",
    "outcome",
    "rounds",
    "nodesExpanded",
    "peakFrontier",
    "runtimeMs",
    "pathLength",
    "optimal",
  ];
  const lines: string[][] = [header];
  const begin = performance.now();

  for (const size of SIZES) {
    for (const mapType of MAP_TYPES) {
      const densities = mapType === "Random" ? DENSITIES : [0];
      for (const density of densities) {
        for (let trial = 0; trial < NUM_TRIALS; trial++) {
          const cfg: RunConfig = { rows: size, cols: size, density, seed: 1000 + trial };
          for (const r of runAll(cfg, mapType)) {
            lines.push([
              String(size),
              mapType,
              density.toFixed(2),
              String(cfg.seed),
              r.algo,
              r.outcome,
              String(r.rounds),
              String(r.nodesExpanded),
              String(r.peakFrontier),
              r.runtimeMs.toFixed(3),
              r.pathLength === null ? "" : String(r.pathLength),
              r.optimal === null ? "" : String(r.optimal),
            ]);
          }
        }
        console.log(
          `done size=${size} map=${mapType} density=${density.toFixed(2)} (${NUM_TRIALS} trials)`
        );
      }
    }
  }

  writeFileSync(OUTPUT_CSV, toCsv(lines));
  console.log(
    `wrote ${lines.length - 1} rows to ${OUTPUT_CSV} in ${((performance.now() - begin) / 1000).toFixed(1)} s`
  );
}

main();
