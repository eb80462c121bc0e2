/**
 * ChessEngine - Rules engine wrapper around chess.js
 *
 * Implements the Position contract used by the evaluator and the search, and
 * adds the move parsing and game-status helpers the console front end needs.
 * Legality, check and draw detection and SAN are entirely chess.js's.
 */

import { Chess } from 'chess.js';
import type { Move as ChessJsMove } from 'chess.js';
import { ContractViolationError, IllegalMoveError, InvalidFenError } from './errors.js';
import { STARTING_FEN } from './types.js';
import type {
  Board,
  Color,
  GameEndReason,
  GameResult,
  Move,
  PieceOnBoard,
  Position,
} from './types.js';

const UCI_PATTERN = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

/**
 * ChessEngine wraps chess.js as a Position
 */
export class ChessEngine implements Position {
  private chess: Chess;

  constructor(fen: string = STARTING_FEN) {
    this.chess = createChess(fen);
  }

  // ===========================================================================
  // Position Contract
  // ===========================================================================

  /** Get current turn */
  turn(): Color {
    return this.chess.turn();
  }

  /** Legal moves in chess.js generation order */
  legalMoves(): Move[] {
    return this.chess.moves({ verbose: true }).map(convertMove);
  }

  /** Captures include en passant */
  isCapture(move: Move): boolean {
    return move.captured !== undefined || move.flags.includes('c') || move.flags.includes('e');
  }

  /**
   * Play a move generated by legalMoves()
   */
  makeMove(move: Move): void {
    this.chess.move({ from: move.from, to: move.to, promotion: move.promotion });
  }

  /**
   * Take back the most recent move
   */
  unmakeMove(): void {
    if (this.chess.undo() === null) {
      throw new ContractViolationError('unmakeMove() without a matching makeMove()');
    }
  }

  /** Is the game over */
  isGameOver(): boolean {
    return this.chess.isGameOver();
  }

  /** Is the game over by checkmate */
  isCheckmate(): boolean {
    return this.chess.isCheckmate();
  }

  /** Is the current player in check */
  isCheck(): boolean {
    return this.chess.isCheck();
  }

  /**
   * Get all pieces on the board
   */
  pieces(): PieceOnBoard[] {
    const pieces: PieceOnBoard[] = [];
    for (const row of this.chess.board()) {
      for (const cell of row) {
        if (cell) {
          pieces.push({ type: cell.type, color: cell.color, square: cell.square });
        }
      }
    }
    return pieces;
  }

  /** Get FEN string */
  fen(): string {
    return this.chess.fen();
  }

  // ===========================================================================
  // Game Management
  // ===========================================================================

  /**
   * Load a position from FEN, clearing the move history
   */
  load(fen: string): void {
    this.chess = createChess(fen);
  }

  /** Reset to the starting position */
  reset(): void {
    this.chess.reset();
  }

  /**
   * Parse a move typed by a player: UCI ("e2e4", "e7e8q") first, then SAN
   * ("Nf3", "exd5", "O-O", "e8=Q").
   * @returns The legal move, or null if the input names none
   */
  parseMove(input: string): Move | null {
    const text = input.trim();
    if (!text) return null;

    const legal = this.legalMoves();

    const lower = text.toLowerCase();
    if (UCI_PATTERN.test(lower)) {
      const uci = legal.find(m => m.lan === lower);
      if (uci) return uci;
    }

    const bare = stripCheckSuffix(text);
    const san = legal.find(m => stripCheckSuffix(m.san) === bare);
    if (san) return san;

    // Lenient SAN ("e8Q", "0-0", "Pe4"); chess.js throws on anything illegal
    try {
      const parsed = this.chess.move(text, { strict: false });
      this.chess.undo();
      return convertMove(parsed);
    } catch {
      return null;
    }
  }

  /**
   * Apply a move typed by a player
   * @throws IllegalMoveError when the input names no legal move
   */
  applyMove(input: string): Move {
    const move = this.parseMove(input);
    if (!move) {
      throw new IllegalMoveError(input, this.fen());
    }
    this.makeMove(move);
    return move;
  }

  /**
   * Undo the last move
   * @returns The undone move, or null if no moves to undo
   */
  undo(): Move | null {
    const result = this.chess.undo();
    return result ? convertMove(result) : null;
  }

  /** Legal moves as sorted, comma-separated SAN */
  listLegalMoves(): string {
    return this.legalMoves()
      .map(m => m.san)
      .sort()
      .join(', ');
  }

  // ===========================================================================
  // Game State Queries
  // ===========================================================================

  /** Get move history as SAN strings */
  history(): string[] {
    return this.chess.history();
  }

  /** Get the board as 2D array, rank 8 first */
  board(): Board {
    return this.chess.board().map(row =>
      row.map(cell => (cell ? { type: cell.type, color: cell.color } : null))
    );
  }

  /** Get half-move clock */
  halfMoveClock(): number {
    const parts = this.chess.fen().split(' ');
    return parseInt(parts[4] ?? '0', 10);
  }

  /** Is the game over by stalemate */
  isStalemate(): boolean {
    return this.chess.isStalemate();
  }

  /** Is the game a draw */
  isDraw(): boolean {
    return this.chess.isDraw();
  }

  /** Is it threefold repetition */
  isThreefoldRepetition(): boolean {
    return this.chess.isThreefoldRepetition();
  }

  /** Is it insufficient material */
  isInsufficientMaterial(): boolean {
    return this.chess.isInsufficientMaterial();
  }

  /** Is the 50-move rule in effect */
  isFiftyMoveRule(): boolean {
    return this.halfMoveClock() >= 100;
  }

  /** Get game result if game is over */
  getGameResult(): GameResult | null {
    if (!this.isGameOver()) return null;

    if (this.isCheckmate()) {
      const winner: Color = this.turn() === 'w' ? 'b' : 'w';
      return {
        winner,
        reason: 'checkmate',
        score: winner === 'w' ? '1-0' : '0-1',
      };
    }

    let reason: GameEndReason;
    if (this.isStalemate()) reason = 'stalemate';
    else if (this.isInsufficientMaterial()) reason = 'insufficient_material';
    else if (this.isThreefoldRepetition()) reason = 'threefold_repetition';
    else reason = 'fifty_move_rule';

    return {
      winner: null,
      reason,
      score: '1/2-1/2',
    };
  }

  /**
   * Copy of the current position (move history is not carried over)
   */
  clone(): ChessEngine {
    return new ChessEngine(this.fen());
  }
}

// =============================================================================
// Helpers
// =============================================================================

function createChess(fen: string): Chess {
  try {
    return new Chess(fen);
  } catch (err) {
    throw new InvalidFenError(fen, err instanceof Error ? err : undefined);
  }
}

function convertMove(m: ChessJsMove): Move {
  return {
    from: m.from,
    to: m.to,
    san: m.san,
    lan: m.lan,
    piece: m.piece,
    captured: m.captured,
    promotion: m.promotion,
    flags: m.flags,
    color: m.color,
  };
}

function stripCheckSuffix(san: string): string {
  return san.replace(/[+#]+$/, '');
}

/**
 * Validate a FEN string
 */
export function isValidFen(fen: string): boolean {
  try {
    new Chess(fen);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a new chess engine instance
 */
export function createChessEngine(fen?: string): ChessEngine {
  return new ChessEngine(fen);
}
