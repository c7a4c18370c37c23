import type { CellState } from "../types/types";

/**
 * A single grid unit. Identity is the (r, c) coordinate and never changes;
 * `state` is display state and changes freely during a run.
 */
export class Cell {
  readonly r: number;
  readonly c: number;
  readonly id: number;
  private _state: CellState = "Free";
  private readonly onChange?: (cell: Cell) => void;

  constructor(r: number, c: number, id: number, onChange?: (cell: Cell) => void) {
    this.r = r;
    this.c = c;
    this.id = id;
    this.onChange = onChange;
  }

  get state(): CellState {
    return this._state;
  }

  set state(next: CellState) {
    if (next === this._state) return;
    this._state = next;
    this.onChange?.(this);
  }

  equals(other: Cell | null | undefined): boolean {
    return other != null && other.r === this.r && other.c === this.c;
  }

  isFree() {
    return this._state === "Free";
  }
  isObstacle() {
    return this._state === "Obstacle";
  }
  isStart() {
    return this._state === "Start";
  }
  isEnd() {
    return this._state === "End";
  }
  isFrontier() {
    return this._state === "Frontier";
  }
  isVisited() {
    return this._state === "Visited";
  }
  isPath() {
    return this._state === "Path";
  }

  reset() {
    this.state = "Free";
  }
  makeStart() {
    this.state = "Start";
  }
  makeEnd() {
    this.state = "End";
  }
  makeObstacle() {
    this.state = "Obstacle";
  }
  makeFrontier() {
    this.state = "Frontier";
  }
  makeVisited() {
    this.state = "Visited";
  }
  makePath() {
    this.state = "Path";
  }

  toString() {
    return `(${this.r},${this.c})`;
  }
}
