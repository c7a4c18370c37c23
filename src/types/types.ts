export type Coord = { r: number; c: number };

export type CellState =
  | "Free"
  | "Obstacle"
  | "Start"
  | "End"
  | "Frontier"
  | "Visited"
  | "Path";

export type MapType = "Empty" | "Random" | "Maze";

export type AlgoKey = "BFS" | "DFS" | "A*";

export type SearchOutcome = "Found" | "NotFound" | "Cancelled";

// reached cell id -> id of the cell it was first reached from
export type PredecessorMap = Map<number, number>;
