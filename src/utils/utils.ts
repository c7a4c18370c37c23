import type { Coord } from "../types/types";

export const idOf = (cols: number, r: number, c: number) => r * cols + c;
export const rcOf = (cols: number, id: number): Coord => ({
  r: Math.floor(id / cols),
  c: id % cols,
});

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

// down, up, right, left; this order drives BFS/DFS tie-breaking
export const DELTAS: ReadonlyArray<readonly [number, number]> = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

// Map a point relative to the canvas' top-left corner to a grid cell
export function cellAtPoint(
  x: number,
  y: number,
  cellPx: number,
  rows: number,
  cols: number
): Coord | null {
  const r = Math.floor(y / cellPx);
  const c = Math.floor(x / cellPx);
  if (r < 0 || r >= rows || c < 0 || c >= cols) return null;
  return { r, c };
}

export const clamp = (v: number, lo: number, hi: number) =>
  Math.max(lo, Math.min(hi, v));
