import type { Cell } from "../../model/Cell";
import type { Grid } from "../../model/Grid";
import { gridLineColor, map_color_constants } from "../constants";

// ---------- Canvas Drawing ----------

const paint = (ctx: CanvasRenderingContext2D, cell: Cell, cellPx: number) => {
  const x = cell.c * cellPx,
    y = cell.r * cellPx;
  ctx.fillStyle = map_color_constants[cell.state];
  ctx.fillRect(x, y, cellPx, cellPx);
  ctx.strokeStyle = gridLineColor;
  ctx.lineWidth = 0.5;
  ctx.strokeRect(x, y, cellPx, cellPx);
};

export const drawGrid = (
  ctx: CanvasRenderingContext2D,
  grid: Grid,
  cellPx: number
) => {
  ctx.clearRect(0, 0, grid.cols * cellPx, grid.rows * cellPx);
  for (const cell of grid.cells()) paint(ctx, cell, cellPx);
};

// Repaint only the given cells
export const drawCells = (
  ctx: CanvasRenderingContext2D,
  cells: Iterable<Cell>,
  cellPx: number
) => {
  for (const cell of cells) paint(ctx, cell, cellPx);
};
