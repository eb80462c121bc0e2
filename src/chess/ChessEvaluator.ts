/**
 * ChessEvaluator - Static position evaluation
 *
 * Scores a position in centipawns from White's perspective (positive = White
 * advantage) from four terms:
 * - Material (king excluded)
 * - Piece-square tables for pawns, knights, bishops, rooks and queens
 * - King placement, with a middlegame or endgame table chosen by a coarse phase
 * - Mobility of the side to move
 *
 * Checkmate and drawn positions short-circuit to the mate sentinel or zero.
 */

import { PIECE_SQUARE_TABLES, mirrorSquare, squareIndex } from './tables.js';
import {
  DEFAULT_EVAL_CONFIG,
  MATE_SCORE,
  MOBILITY_WEIGHT,
  PIECE_VALUES,
} from './types.js';
import type { EvalConfig, EvaluationBreakdown, PieceOnBoard, Position } from './types.js';

// =============================================================================
// ChessEvaluator Class
// =============================================================================

export class ChessEvaluator {
  private readonly config: Readonly<EvalConfig>;

  constructor(config: Partial<EvalConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_EVAL_CONFIG, ...config });
  }

  /**
   * Evaluate a position
   * @returns Evaluation in centipawns (positive = white advantage)
   */
  evaluate(position: Position): number {
    return this.getEvaluationBreakdown(position).total;
  }

  /**
   * Get detailed evaluation breakdown
   */
  getEvaluationBreakdown(position: Position): EvaluationBreakdown {
    if (position.isGameOver()) {
      return this.terminalBreakdown(position);
    }

    const pieces = position.pieces();

    let whiteMaterial = 0;
    let blackMaterial = 0;
    let pieceSquares = 0;

    for (const piece of pieces) {
      if (piece.color === 'w') {
        whiteMaterial += PIECE_VALUES[piece.type];
      } else {
        blackMaterial += PIECE_VALUES[piece.type];
      }
      if (piece.type !== 'k') {
        pieceSquares += tableScore(PIECE_SQUARE_TABLES[piece.type], piece);
      }
    }

    const material = whiteMaterial - blackMaterial;
    const phase = Math.floor((whiteMaterial + blackMaterial) / 100);
    const kingTable = phase >= this.config.middlegamePhaseThreshold
      ? PIECE_SQUARE_TABLES.kingMiddlegame
      : PIECE_SQUARE_TABLES.kingEndgame;

    let kingSafety = 0;
    for (const piece of pieces) {
      if (piece.type === 'k') {
        kingSafety += tableScore(kingTable, piece);
      }
    }

    const mobility = this.evaluateMobility(position);

    return {
      terminal: null,
      material,
      pieceSquares,
      kingSafety,
      mobility,
      phase,
      total: material + pieceSquares + kingSafety + mobility,
    };
  }

  /** Current configuration */
  getConfig(): Readonly<EvalConfig> {
    return this.config;
  }

  /**
   * Mate or draw: the sentinel signed against the mated side, or zero
   */
  private terminalBreakdown(position: Position): EvaluationBreakdown {
    const empty = { material: 0, pieceSquares: 0, kingSafety: 0, mobility: 0, phase: 0 };

    if (position.isCheckmate()) {
      // The side to move has been mated
      const total = position.turn() === 'w' ? -MATE_SCORE : MATE_SCORE;
      return { terminal: 'checkmate', ...empty, total };
    }

    return { terminal: 'draw', ...empty, total: 0 };
  }

  /**
   * Legal-move count of the side to move only, signed by whose turn it is
   */
  private evaluateMobility(position: Position): number {
    const count = position.legalMoves().length;
    return position.turn() === 'w' ? MOBILITY_WEIGHT * count : -MOBILITY_WEIGHT * count;
  }
}

/**
 * Table bonus for White, penalty for Black on the mirrored square
 */
function tableScore(table: readonly number[], piece: PieceOnBoard): number {
  const index = squareIndex(piece.square);
  return piece.color === 'w' ? table[index] : -table[mirrorSquare(index)];
}

/**
 * Create a new evaluator instance
 */
export function createChessEvaluator(config?: Partial<EvalConfig>): ChessEvaluator {
  return new ChessEvaluator(config);
}
