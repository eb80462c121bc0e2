/**
 * Error classes for the chess core
 */

/**
 * Base error class for chess errors
 */
export class ChessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChessError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ChessError);
    }
  }
}

/**
 * Error thrown when a caller breaks the search or engine contract
 * (negative depth, missing position, unmatched unmake)
 */
export class ContractViolationError extends ChessError {
  constructor(message: string) {
    super(`Contract violation: ${message}`);
    this.name = 'ContractViolationError';
  }
}

/**
 * Error thrown when a move string is not legal in the current position
 */
export class IllegalMoveError extends ChessError {
  constructor(
    public readonly input: string,
    public readonly fen: string,
  ) {
    super(`Illegal or unrecognized move "${input}" in ${fen}`);
    this.name = 'IllegalMoveError';
  }
}

/**
 * Error thrown when the rules engine rejects a FEN
 */
export class InvalidFenError extends ChessError {
  constructor(
    public readonly fen: string,
    cause?: Error,
  ) {
    super(`Invalid FEN "${fen}"${cause ? `: ${cause.message}` : ''}`);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error raised while loading the opening book file
 */
export class OpeningBookError extends ChessError {
  constructor(
    public readonly bookPath: string,
    cause?: Error,
  ) {
    super(`Opening book unavailable at ${bookPath}${cause ? `: ${cause.message}` : ''}`);
    this.name = 'OpeningBookError';
  }
}
