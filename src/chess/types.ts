/**
 * Chess Module Type Definitions
 *
 * Shared vocabulary for the rules-engine adapter, the evaluator, the search
 * and the console front end. Square and piece names follow chess.js.
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Square notation (a1-h8) */
export type Square =
  | 'a1' | 'a2' | 'a3' | 'a4' | 'a5' | 'a6' | 'a7' | 'a8'
  | 'b1' | 'b2' | 'b3' | 'b4' | 'b5' | 'b6' | 'b7' | 'b8'
  | 'c1' | 'c2' | 'c3' | 'c4' | 'c5' | 'c6' | 'c7' | 'c8'
  | 'd1' | 'd2' | 'd3' | 'd4' | 'd5' | 'd6' | 'd7' | 'd8'
  | 'e1' | 'e2' | 'e3' | 'e4' | 'e5' | 'e6' | 'e7' | 'e8'
  | 'f1' | 'f2' | 'f3' | 'f4' | 'f5' | 'f6' | 'f7' | 'f8'
  | 'g1' | 'g2' | 'g3' | 'g4' | 'g5' | 'g6' | 'g7' | 'g8'
  | 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6' | 'h7' | 'h8';

// =============================================================================
// Piece Representation
// =============================================================================

/** A piece on the board */
export interface Piece {
  type: PieceType;
  color: Color;
}

/** A piece with its position */
export interface PieceOnBoard extends Piece {
  square: Square;
}

/** 8x8 board, rank 8 first (chess.js layout) */
export type Board = (Piece | null)[][];

// =============================================================================
// Move Representation
// =============================================================================

/** Full move information (from chess.js verbose mode) */
export interface Move {
  /** Source square */
  from: Square;
  /** Target square */
  to: Square;
  /** Standard Algebraic Notation (e.g., "Nf3", "O-O") */
  san: string;
  /** Long Algebraic Notation (e.g., "g1f3", "e7e8q") */
  lan: string;
  /** Piece type that moved */
  piece: PieceType;
  /** Piece type captured (if any) */
  captured?: PieceType;
  /** Piece type promoted to (if pawn promotion) */
  promotion?: PieceType;
  /** Move flags ('c' capture, 'e' en passant, 'p' promotion, ...) */
  flags: string;
  /** Color of the player who made the move */
  color: Color;
}

/** Two moves are the same transition when their long algebraic forms match */
export function movesEqual(a: Move, b: Move): boolean {
  return a.lan === b.lan;
}

// =============================================================================
// Collaborator Contracts
// =============================================================================

/**
 * Game position as seen by the evaluator and the search.
 *
 * Board state belongs to the rules engine; the core only reads it and changes
 * it through `makeMove`/`unmakeMove`, which must pair up last-in-first-out.
 */
export interface Position {
  turn(): Color;
  /** Legal moves in the engine's generation order */
  legalMoves(): Move[];
  isCapture(move: Move): boolean;
  makeMove(move: Move): void;
  unmakeMove(): void;
  isGameOver(): boolean;
  isCheckmate(): boolean;
  isCheck(): boolean;
  /** Every piece on the board with its square */
  pieces(): PieceOnBoard[];
  fen(): string;
}

/** Opening book oracle: a move for the position, or null for no suggestion */
export interface OpeningBook {
  probe(position: Position): Move | null;
}

// =============================================================================
// Game State
// =============================================================================

/** Game termination reasons */
export type GameEndReason =
  | 'checkmate'
  | 'stalemate'
  | 'insufficient_material'
  | 'threefold_repetition'
  | 'fifty_move_rule';

/** Game result */
export interface GameResult {
  /** Winner color, or null for a draw */
  winner: Color | null;
  reason: GameEndReason;
  score: '1-0' | '0-1' | '1/2-1/2';
}

// =============================================================================
// Evaluation Types
// =============================================================================

/** Individual evaluation terms, all from White's perspective */
export interface EvaluationBreakdown {
  /** Set when the position is game over; the other terms are then zero */
  terminal: 'checkmate' | 'draw' | null;
  material: number;
  pieceSquares: number;
  kingSafety: number;
  mobility: number;
  /** Total non-king material of both sides divided by 100 */
  phase: number;
  total: number;
}

/** Evaluator configuration */
export interface EvalConfig {
  /** Phase at or above which the middlegame king table applies */
  middlegamePhaseThreshold: number;
}

// =============================================================================
// Search Types
// =============================================================================

/** Search configuration */
export interface SearchConfig {
  /** Depth used when search() is called without one */
  maxDepth: number;
  /** Alpha-beta cutoffs; false gives the exhaustive full-width negamax */
  usePruning: boolean;
  /** Captures-first ordering */
  orderMoves: boolean;
  /** Wall-clock budget in ms, 0 for none */
  maxTime: number;
}

/** Where a selected move came from */
export type MoveSource = 'book' | 'search';

/** Search result */
export interface SearchResult {
  /** Best move, or null at a terminal root, depth 0 or an early abort */
  move: Move | null;
  /** Centipawns from White's perspective; null for book moves and aborts before any root move */
  score: number | null;
  source: MoveSource;
  /** Requested depth */
  depth: number;
  /** Interior nodes expanded */
  nodes: number;
  /** Static evaluations performed */
  evaluations: number;
  /** Beta cutoffs taken */
  betaCutoffs: number;
  /** Search time in ms */
  time: number;
  /** Whether the deadline stopped the search */
  aborted: boolean;
}

// =============================================================================
// AI Types
// =============================================================================

/** AI player configuration */
export interface AIConfig {
  /** Search depth in plies, clamped to [MIN_DEPTH, MAX_DEPTH] */
  depth: number;
  useOpeningBook: boolean;
  /** Wall-clock budget in ms, 0 for none */
  maxTime: number;
}

/** Move chosen by the AI player */
export interface AIMove {
  move: Move;
  /** Centipawns from White's perspective; null for book and fallback moves */
  score: number | null;
  source: MoveSource | 'fallback';
  /** The underlying search result, when a search ran */
  search?: SearchResult;
  /** Opening name when the move came from the book */
  openingName?: string;
}

// =============================================================================
// Opening Book Types
// =============================================================================

/** Candidate move in a book position */
export interface BookMove {
  /** Move in SAN */
  move: string;
  /** Number of book lines continuing with this move */
  weight: number;
}

/** Named opening line */
export interface Opening {
  eco: string;
  name: string;
  moves: string[];
}

// =============================================================================
// Constants
// =============================================================================

export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** Material values in centipawns; the king carries none */
export const PIECE_VALUES: Readonly<Record<PieceType, number>> = Object.freeze({
  p: 100,
  n: 320,
  b: 330,
  r: 500,
  q: 900,
  k: 0,
});

/** Score of a delivered checkmate */
export const MATE_SCORE = 99999;

/** Search window bound, an order of magnitude above any mate score */
export const INFINITY_SCORE = 1_000_000;

/** Centipawns per legal move of the side to move */
export const MOBILITY_WEIGHT = 2;

export const MIN_DEPTH = 1;
export const MAX_DEPTH = 5;
export const DEFAULT_DEPTH = 3;

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/** Unicode piece symbols: [white, black] */
export const PIECE_UNICODE: Readonly<Record<PieceType, readonly [string, string]>> = Object.freeze({
  p: ['♙', '♟'],
  n: ['♘', '♞'],
  b: ['♗', '♝'],
  r: ['♖', '♜'],
  q: ['♕', '♛'],
  k: ['♔', '♚'],
});

export const DEFAULT_EVAL_CONFIG: Readonly<EvalConfig> = Object.freeze({
  middlegamePhaseThreshold: 24,
});

export const DEFAULT_SEARCH_CONFIG: Readonly<SearchConfig> = Object.freeze({
  maxDepth: DEFAULT_DEPTH,
  usePruning: true,
  orderMoves: true,
  maxTime: 0,
});

export const DEFAULT_AI_CONFIG: Readonly<AIConfig> = Object.freeze({
  depth: DEFAULT_DEPTH,
  useOpeningBook: true,
  maxTime: 0,
});
