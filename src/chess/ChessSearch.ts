/**
 * ChessSearch - Fixed-depth negamax with alpha-beta pruning
 *
 * - Optional opening book probe before searching
 * - Captures-first move ordering (stable, generation order otherwise)
 * - Fail-soft alpha-beta, mover-relative scores inside the recursion
 * - Mate scores shortened by ply so nearer mates rank higher
 * - Optional wall-clock deadline
 *
 * Results are reported from White's perspective. The search keeps no state
 * between calls: the same position and depth always give the same result.
 */

import { ChessEvaluator } from './ChessEvaluator.js';
import { ContractViolationError } from './errors.js';
import { DEFAULT_SEARCH_CONFIG, INFINITY_SCORE, MATE_SCORE } from './types.js';
import type {
  Color,
  Move,
  OpeningBook,
  Position,
  SearchConfig,
  SearchResult,
} from './types.js';

/** Score and move of one node, from the perspective of the side to move there */
interface NodeResult {
  score: number;
  move: Move | null;
}

interface SearchStats {
  nodes: number;
  evaluations: number;
  betaCutoffs: number;
}

// =============================================================================
// ChessSearch Class
// =============================================================================

export class ChessSearch {
  private readonly config: SearchConfig;
  private evaluator: ChessEvaluator;
  private book: OpeningBook | null;

  // Per-call state, reset by search()
  private stats: SearchStats = initStats();
  private deadline = 0;
  private stopSearch = false;

  constructor(
    evaluator?: ChessEvaluator,
    config?: Partial<SearchConfig>,
    book: OpeningBook | null = null,
  ) {
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
    this.evaluator = evaluator ?? new ChessEvaluator();
    this.book = book;
  }

  /**
   * Search for the best move
   * @param position - Position to search; restored before returning
   * @param maxDepth - Depth in plies (0 returns the static evaluation)
   * @param useBook - Probe the opening book first
   */
  search(position: Position, maxDepth: number = this.config.maxDepth, useBook: boolean = false): SearchResult {
    if (!position) {
      throw new ContractViolationError('search() requires a position');
    }
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new ContractViolationError(`search depth must be a non-negative integer, got ${maxDepth}`);
    }

    const startTime = Date.now();
    this.stats = initStats();
    this.stopSearch = false;
    this.deadline = this.config.maxTime > 0 ? startTime + this.config.maxTime : 0;

    if (useBook) {
      const bookMove = this.probeBook(position);
      if (bookMove) {
        return this.buildResult(bookMove, null, 'book', maxDepth, startTime);
      }
    }

    const rootTurn = position.turn();
    const root = this.negamax(position, maxDepth, -INFINITY_SCORE, INFINITY_SCORE, 0);

    // An abort before the first root move finished leaves nothing to report
    const score = this.stopSearch && !root.move ? null : toWhitePerspective(root.score, rootTurn);

    return this.buildResult(root.move, score, 'search', maxDepth, startTime);
  }

  /**
   * Negamax with alpha-beta. Scores are relative to the side to move.
   */
  private negamax(
    position: Position,
    depth: number,
    alpha: number,
    beta: number,
    ply: number,
  ): NodeResult {
    if (this.shouldStop()) {
      this.stopSearch = true;
      return { score: 0, move: null };
    }

    if (depth === 0 || position.isGameOver()) {
      return { score: this.leafScore(position, ply), move: null };
    }

    this.stats.nodes++;

    const moves = position.legalMoves();
    if (moves.length === 0) {
      // Rules engine reported a live position with nothing to play
      console.warn(`[ChessSearch] No legal moves in non-terminal position ${position.fen()}; using static evaluation`);
      return { score: this.leafScore(position, ply), move: null };
    }

    const ordered = this.config.orderMoves ? orderMoves(position, moves) : moves;

    let bestScore = -INFINITY_SCORE;
    let bestMove: Move | null = null;

    for (const move of ordered) {
      position.makeMove(move);
      let score: number;
      try {
        score = -this.negamax(position, depth - 1, -beta, -alpha, ply + 1).score;
      } finally {
        position.unmakeMove();
      }

      if (this.stopSearch) break;

      if (score > bestScore) {
        bestScore = score;
        bestMove = move;
      }
      if (bestScore > alpha) {
        alpha = bestScore;
      }
      if (this.config.usePruning && alpha >= beta) {
        this.stats.betaCutoffs++;
        break;
      }
    }

    return { score: bestScore, move: bestMove };
  }

  /**
   * Static evaluation turned to the mover's sign, mates shortened by ply
   */
  private leafScore(position: Position, ply: number): number {
    this.stats.evaluations++;
    let score = toMoverPerspective(this.evaluator.evaluate(position), position.turn());

    if (score >= MATE_SCORE) {
      score -= ply;
    } else if (score <= -MATE_SCORE) {
      score += ply;
    }
    return score;
  }

  /**
   * Book lookups never fail the search: any error is a miss
   */
  private probeBook(position: Position): Move | null {
    if (!this.book) return null;
    try {
      return this.book.probe(position);
    } catch {
      return null;
    }
  }

  /**
   * Check if we should stop searching
   */
  private shouldStop(): boolean {
    if (this.stopSearch) return true;
    return this.deadline > 0 && Date.now() >= this.deadline;
  }

  private buildResult(
    move: Move | null,
    score: number | null,
    source: SearchResult['source'],
    depth: number,
    startTime: number,
  ): SearchResult {
    return {
      move,
      score,
      source,
      depth,
      nodes: this.stats.nodes,
      evaluations: this.stats.evaluations,
      betaCutoffs: this.stats.betaCutoffs,
      time: Date.now() - startTime,
      aborted: this.stopSearch,
    };
  }

  /**
   * Get statistics of the last search
   */
  getStats(): SearchStats {
    return { ...this.stats };
  }

  /** Current configuration */
  getConfig(): Readonly<SearchConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Captures first; otherwise the rules engine's order is kept
 */
export function orderMoves(position: Position, moves: Move[]): Move[] {
  const captures: Move[] = [];
  const quiet: Move[] = [];
  for (const move of moves) {
    if (position.isCapture(move)) {
      captures.push(move);
    } else {
      quiet.push(move);
    }
  }
  return captures.concat(quiet);
}

/** White-relative score to the given mover's perspective */
function toMoverPerspective(score: number, mover: Color): number {
  return mover === 'w' ? score : -score;
}

/** Mover-relative score at the root to White's perspective */
export function toWhitePerspective(score: number, rootMover: Color): number {
  return rootMover === 'w' ? score : -score;
}

function initStats(): SearchStats {
  return { nodes: 0, evaluations: 0, betaCutoffs: 0 };
}

/**
 * Create a new search instance
 */
export function createChessSearch(
  evaluator?: ChessEvaluator,
  config?: Partial<SearchConfig>,
  book?: OpeningBook | null,
): ChessSearch {
  return new ChessSearch(evaluator, config, book);
}
