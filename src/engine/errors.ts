/**
 * Base error class for the minesweeper engine.
 */
export class MinesweeperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MinesweeperError";
  }
}

/**
 * Thrown when the knowledge base contradicts itself (a cell both safe and a mine,
 * a constraint with more mines than cells). Indicates a bug or inconsistent
 * observations; never recoverable.
 */
export class InvariantViolationError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

/**
 * Thrown when an observation handed to the engine is out of range.
 */
export class ObservationError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "ObservationError";
  }
}

/**
 * Thrown when a game configuration is invalid (e.g., more mines than cells).
 */
export class ConfigurationError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
