import type { Coord } from "../../types/types";
import { DELTAS, idOf, rngLCG } from "../utils";

// ---------- Map Generation ----------
// Masks are rows*cols long: 0 free, 1 wall.
export function generateEmpty(rows: number, cols: number) {
  return new Uint8Array(rows * cols);
}

export function generateRandom(
  rows: number,
  cols: number,
  density: number,
  seed: number
) {
  const blocks = new Uint8Array(rows * cols);
  const R = rngLCG(seed);
  for (let i = 0; i < rows * cols; i++) {
    blocks[i] = R.next().value < density ? 1 : 0;
  }
  return blocks;
}

/**
 * Perfect maze carved by a randomized backtracker. Rooms sit on odd/odd
 * coordinates inside the border; a step of two cells along one of the
 * neighbor deltas reaches the next room, and the cell in between is the wall
 * that gets knocked out. Grids too small to hold a room come back open.
 */
export function generateMaze(rows: number, cols: number, seed: number) {
  if (rows < 3 || cols < 3) return generateEmpty(rows, cols);

  const blocks = new Uint8Array(rows * cols).fill(1);
  const R = rngLCG(seed);
  const isRoom = (r: number, c: number) =>
    r % 2 === 1 && c % 2 === 1 && r < rows - 1 && c < cols - 1 && r > 0 && c > 0;
  // rooms stay walled until the carver reaches them
  const isSealed = (r: number, c: number) => isRoom(r, c) && blocks[idOf(cols, r, c)] === 1;
  const open = (r: number, c: number) => {
    blocks[idOf(cols, r, c)] = 0;
  };

  open(1, 1);
  const trail: Coord[] = [{ r: 1, c: 1 }];
  while (trail.length) {
    const { r, c } = trail[trail.length - 1];
    const exits = DELTAS.filter(([dr, dc]) => isSealed(r + 2 * dr, c + 2 * dc));
    if (!exits.length) {
      trail.pop();
      continue;
    }
    const [dr, dc] = exits[Math.floor(R.next().value * exits.length)];
    open(r + dr, c + dc);
    open(r + 2 * dr, c + 2 * dc);
    trail.push({ r: r + 2 * dr, c: c + 2 * dc });
  }
  return blocks;
}

// First and last open cells of a mask, a far-apart start/end pair for mazes
export function pickOpenEnds(blocks: Uint8Array): { start: number; end: number } | null {
  const first = blocks.indexOf(0);
  const last = blocks.lastIndexOf(0);
  if (first === -1 || first === last) return null;
  return { start: first, end: last };
}
