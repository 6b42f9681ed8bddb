// ─────────────────────────────────────────────
//  Puzzle Errors
//  Thrown for programming and data errors only.
//  Rejected player edits are returned as EditResult values instead.
// ─────────────────────────────────────────────

export type GridErrorCode = 'OUT_OF_BOUNDS' | 'INVALID_DIMENSIONS';

export type LevelGenerationErrorCode =
  | 'INVALID_LEVEL_SPEC'
  | 'UNSOLVABLE_LEVEL'
  | 'TRIVIAL_LEVEL';

export class PuzzleError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PuzzleError';
  }
}

export class GridError extends PuzzleError {
  declare readonly code: GridErrorCode;

  constructor(code: GridErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GridError';
  }
}

/** A generator defect: must surface in tests, never in front of a player. */
export class LevelGenerationError extends PuzzleError {
  declare readonly code: LevelGenerationErrorCode;

  constructor(code: LevelGenerationErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'LevelGenerationError';
  }
}

export class LevelCatalogError extends PuzzleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CATALOG', message, details);
    this.name = 'LevelCatalogError';
  }
}
