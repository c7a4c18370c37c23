import { InvalidInputError } from "../errors/errors";
import { DELTAS, idOf } from "../utils/utils";
import { Cell } from "./Cell";

export class Grid {
  readonly rows: number;
  readonly cols: number;
  private readonly grid: Cell[][];
  private adjacency: Cell[][] = [];
  private dirty = new Map<number, Cell>();
  private _start: Cell | null = null;
  private _end: Cell | null = null;

  constructor(rows: number, cols: number) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
      throw new InvalidInputError(`grid must be at least 1x1, got ${rows}x${cols}`);
    }
    this.rows = rows;
    this.cols = cols;
    const track = (cell: Cell) => this.dirty.set(cell.id, cell);
    this.grid = [];
    for (let r = 0; r < rows; r++) {
      const row: Cell[] = [];
      for (let c = 0; c < cols; c++) {
        row.push(new Cell(r, c, idOf(cols, r, c), track));
      }
      this.grid.push(row);
    }
    this.recomputeAdjacency();
  }

  get start(): Cell | null {
    return this._start;
  }

  get end(): Cell | null {
    return this._end;
  }

  get size() {
    return this.rows * this.cols;
  }

  inBounds(r: number, c: number) {
    return r >= 0 && r < this.rows && c >= 0 && c < this.cols;
  }

  at(r: number, c: number): Cell {
    if (!this.inBounds(r, c)) {
      throw new InvalidInputError(`(${r},${c}) is outside a ${this.rows}x${this.cols} grid`);
    }
    return this.grid[r][c];
  }

  cellById(id: number): Cell {
    return this.at(Math.floor(id / this.cols), id % this.cols);
  }

  // Same coordinate alone is not enough: the cell has to be this grid's instance.
  contains(cell: Cell) {
    return this.inBounds(cell.r, cell.c) && this.grid[cell.r][cell.c] === cell;
  }

  *cells(): IterableIterator<Cell> {
    for (const row of this.grid) yield* row;
  }

  /** Neighbors as of the last {@link recomputeAdjacency} call. */
  neighborsOf(cell: Cell): readonly Cell[] {
    return this.adjacency[cell.id] ?? [];
  }

  recomputeAdjacency() {
    const adjacency: Cell[][] = [];
    for (const cell of this.cells()) {
      const out: Cell[] = [];
      if (!cell.isObstacle()) {
        for (const [dr, dc] of DELTAS) {
          const nr = cell.r + dr,
            nc = cell.c + dc;
          if (!this.inBounds(nr, nc)) continue;
          const nb = this.grid[nr][nc];
          if (!nb.isObstacle()) out.push(nb);
        }
      }
      adjacency[cell.id] = out;
    }
    this.adjacency = adjacency;
  }

  markStart(cell: Cell) {
    this.release(cell);
    if (this._start && this._start !== cell) this._start.reset();
    cell.makeStart();
    this._start = cell;
  }

  markEnd(cell: Cell) {
    this.release(cell);
    if (this._end && this._end !== cell) this._end.reset();
    cell.makeEnd();
    this._end = cell;
  }

  markObstacle(cell: Cell) {
    this.release(cell);
    cell.makeObstacle();
  }

  resetCell(cell: Cell) {
    this.release(cell);
    cell.reset();
  }

  clear() {
    for (const cell of this.cells()) cell.reset();
    this._start = null;
    this._end = null;
  }

  // Drop the traces of a run, keep the layout
  clearSearch() {
    for (const cell of this.cells()) {
      if (cell.isFrontier() || cell.isVisited() || cell.isPath()) cell.reset();
    }
  }

  loadObstacles(blocks: Uint8Array) {
    if (blocks.length !== this.size) {
      throw new InvalidInputError(
        `obstacle mask has ${blocks.length} entries, grid has ${this.size} cells`
      );
    }
    for (const cell of this.cells()) {
      if (cell === this._start || cell === this._end) continue;
      if (blocks[cell.id] === 1) cell.makeObstacle();
      else cell.reset();
    }
  }

  takeDirty(): Cell[] {
    const out = [...this.dirty.values()];
    this.dirty.clear();
    return out;
  }

  private release(cell: Cell) {
    if (cell === this._start) this._start = null;
    if (cell === this._end) this._end = null;
  }
}
