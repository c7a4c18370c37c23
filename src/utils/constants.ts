import type { AlgoKey, CellState, MapType } from "../types/types";

export const map_color_constants: Record<CellState, string> = {
  Free: "#f8fafc",
  Obstacle: "#0f172a",
  Start: "#22c55e",
  End: "#8b5cf6",
  Frontier: "#bfdbfe", // blue-200
  Visited: "#fde68a", // amber-200
  Path: "#f9a8d4", // pink-300
};

export const gridLineColor = "#e2e8f0";

export const grid_defaults = {
  rows: 20,
  cols: 30,
  minSize: 2,
  maxSize: 200,
  cellPx: 24,
  density: 0.25,
  seed: 12345,
};

export const speed_limits = {
  initial: 20, // rounds per second
  min: 1,
  max: 120,
};

export const ALGO_KEYS: AlgoKey[] = ["BFS", "DFS", "A*"];

export const MAP_TYPES: MapType[] = ["Empty", "Random", "Maze"];
