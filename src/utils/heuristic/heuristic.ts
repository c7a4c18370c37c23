import type { Coord } from "../../types/types";

// Admissible and consistent for 4-connected unit-cost moves
export const manhattan = (a: Coord, b: Coord) =>
  Math.abs(a.r - b.r) + Math.abs(a.c - b.c);
