/**
 * ChessAI - AI Player
 *
 * The caller side of the search: clamps the requested depth, runs the search
 * (book first when enabled) and turns its result into a move that can always
 * be played. When the search comes back without a usable move the first legal
 * move is played instead and the result is tagged 'fallback'.
 */

import type { ChessEngine } from './ChessEngine.js';
import { ChessEvaluator } from './ChessEvaluator.js';
import { ChessOpenings } from './ChessOpenings.js';
import { ChessSearch } from './ChessSearch.js';
import {
  DEFAULT_AI_CONFIG,
  DEFAULT_DEPTH,
  MAX_DEPTH,
  MIN_DEPTH,
  movesEqual,
} from './types.js';
import type { AIConfig, AIMove } from './types.js';

/** Collaborators, mainly for tests; built from the config when omitted */
export interface ChessAIDependencies {
  search?: ChessSearch;
  evaluator?: ChessEvaluator;
  /** null disables the book regardless of config; with an injected search it only names openings */
  openings?: ChessOpenings | null;
}

// =============================================================================
// ChessAI Class
// =============================================================================

export class ChessAI {
  private config: AIConfig;
  private search: ChessSearch;
  private openings: ChessOpenings | null;

  constructor(config: Partial<AIConfig> = {}, deps: ChessAIDependencies = {}) {
    const merged = { ...DEFAULT_AI_CONFIG, ...config };
    this.config = { ...merged, depth: clampDepth(merged.depth) };

    // An injected search brings its own book; ours only names openings
    const buildBook = deps.openings === undefined && !deps.search && this.config.useOpeningBook;
    this.openings = buildBook ? new ChessOpenings() : (deps.openings ?? null);

    this.search = deps.search ?? new ChessSearch(
      deps.evaluator ?? new ChessEvaluator(),
      { maxDepth: this.config.depth, maxTime: this.config.maxTime },
      this.openings,
    );
  }

  /**
   * Pick a move for the side to move
   * @returns The move, or null when the game is over
   */
  chooseMove(engine: ChessEngine): AIMove | null {
    if (engine.isGameOver()) return null;

    const result = this.search.search(engine, this.config.depth, this.config.useOpeningBook);
    const legal = engine.legalMoves();
    const chosen = result.move;

    if (chosen && legal.some(m => movesEqual(m, chosen))) {
      return {
        move: chosen,
        score: result.score,
        source: result.source,
        search: result,
        openingName: result.source === 'book'
          ? this.openings?.getOpeningName([...engine.history(), chosen.san])
          : undefined,
      };
    }

    const fallback = legal[0];
    if (!fallback) return null;

    console.warn(
      `[ChessAI] Search returned ${chosen ? `illegal move "${chosen.lan}"` : 'no move'} ` +
      `for ${engine.fen()}; falling back to first legal move ${fallback.san}`
    );

    return {
      move: fallback,
      score: null,
      source: 'fallback',
      search: result,
    };
  }

  /**
   * Choose a move and play it on the engine
   */
  playMove(engine: ChessEngine): AIMove | null {
    const choice = this.chooseMove(engine);
    if (choice) {
      engine.makeMove(choice.move);
    }
    return choice;
  }

  /**
   * Set search depth (clamped to the supported range)
   */
  setDepth(depth: number): void {
    this.config = { ...this.config, depth: clampDepth(depth) };
  }

  /** Current configuration */
  getConfig(): Readonly<AIConfig> {
    return { ...this.config };
  }
}

/**
 * Clamp a requested depth into [MIN_DEPTH, MAX_DEPTH]; non-numbers give the default
 */
export function clampDepth(depth: number): number {
  if (!Number.isFinite(depth)) return DEFAULT_DEPTH;
  return Math.max(MIN_DEPTH, Math.min(MAX_DEPTH, Math.trunc(depth)));
}

/**
 * Create a new AI player
 */
export function createChessAI(config?: Partial<AIConfig>, deps?: ChessAIDependencies): ChessAI {
  return new ChessAI(config, deps);
}
