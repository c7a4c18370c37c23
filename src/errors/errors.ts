// Start/end missing, identical or foreign to the grid; bad grid dimensions.
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

// Broken engine bookkeeping, e.g. a cycle in the predecessor map.
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}
