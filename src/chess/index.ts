/**
 * Chess Module
 *
 * Fixed-depth chess move selection:
 * - Rules engine adapter over chess.js
 * - Static evaluation (material, piece-square tables, king placement, mobility)
 * - Negamax search with alpha-beta pruning and captures-first ordering
 * - Opening book
 * - AI player with last-resort fallback
 *
 * @module chess
 */

// Rules Engine
export {
  ChessEngine,
  createChessEngine,
  isValidFen,
} from './ChessEngine.js';

// Evaluation
export {
  ChessEvaluator,
  createChessEvaluator,
} from './ChessEvaluator.js';

export {
  PIECE_SQUARE_TABLES,
  parsePieceSquareTables,
  squareIndex,
  mirrorSquare,
} from './tables.js';

// Search
export {
  ChessSearch,
  createChessSearch,
  orderMoves,
  toWhitePerspective,
} from './ChessSearch.js';

// Opening Book
export {
  ChessOpenings,
  NullOpeningBook,
  createChessOpenings,
  DEFAULT_BOOK_PATH,
} from './ChessOpenings.js';

// AI Player
export {
  ChessAI,
  createChessAI,
  clampDepth,
} from './ChessAI.js';

export type { ChessAIDependencies } from './ChessAI.js';

// Errors
export {
  ChessError,
  ContractViolationError,
  IllegalMoveError,
  InvalidFenError,
  OpeningBookError,
} from './errors.js';

// Types
export type {
  Color,
  PieceType,
  Square,
  Piece,
  PieceOnBoard,
  Board,
  Move,
  Position,
  OpeningBook,
  GameEndReason,
  GameResult,
  EvaluationBreakdown,
  EvalConfig,
  SearchConfig,
  MoveSource,
  SearchResult,
  AIConfig,
  AIMove,
  BookMove,
  Opening,
} from './types.js';

// Constants
export {
  movesEqual,
  STARTING_FEN,
  PIECE_VALUES,
  PIECE_UNICODE,
  MATE_SCORE,
  INFINITY_SCORE,
  MOBILITY_WEIGHT,
  MIN_DEPTH,
  MAX_DEPTH,
  DEFAULT_DEPTH,
  FILES,
  DEFAULT_EVAL_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_AI_CONFIG,
} from './types.js';
