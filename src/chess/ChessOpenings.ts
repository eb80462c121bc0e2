/**
 * ChessOpenings - Opening Book
 *
 * Builds a position -> candidate moves table from named opening lines stored
 * in data/opening-book.json. Every position along a line records the line's
 * next move; a move's weight is the number of lines continuing with it.
 *
 * The book is a soft oracle: if the file is missing or malformed the book is
 * simply empty and every probe misses.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Chess } from 'chess.js';
import { z } from 'zod';
import { OpeningBookError } from './errors.js';
import type { BookMove, Move, Opening, OpeningBook, Position } from './types.js';

export const DEFAULT_BOOK_PATH = fileURLToPath(new URL('../../data/opening-book.json', import.meta.url));

const OpeningSchema = z.object({
  eco: z.string(),
  name: z.string().min(1),
  moves: z.array(z.string().min(1)).min(1),
});

const BookFileSchema = z.object({
  openings: z.array(OpeningSchema),
});

// =============================================================================
// ChessOpenings Class
// =============================================================================

export class ChessOpenings implements OpeningBook {
  private book: Map<string, BookMove[]> = new Map();
  private openings: Opening[] = [];
  private loadError: OpeningBookError | null = null;

  constructor(bookPath: string = DEFAULT_BOOK_PATH) {
    try {
      this.openings = readBookFile(bookPath);
      this.buildBook();
    } catch (err) {
      this.loadError = err instanceof OpeningBookError
        ? err
        : new OpeningBookError(bookPath, err instanceof Error ? err : undefined);
      this.openings = [];
      this.book.clear();
    }
  }

  /**
   * Highest-weight book move that is legal in the position (first listed on
   * a tie), or null if the position is not in the book
   */
  probe(position: Position): Move | null {
    const legal = position.legalMoves();
    const candidates = this.book.get(bookKey(position.fen(), legal));
    if (!candidates) return null;

    const ranked = [...candidates].sort((a, b) => b.weight - a.weight);
    for (const candidate of ranked) {
      const move = legal.find(m => m.san === candidate.move);
      if (move) return move;
    }
    return null;
  }

  /**
   * Get all book moves for a position
   * @param fen - Position in FEN notation
   */
  getMoves(fen: string): BookMove[] {
    const key = keyFromFen(fen);
    if (!key) return [];
    return (this.book.get(key) ?? []).map(m => ({ ...m }));
  }

  /**
   * Check if position is in book
   * @param fen - Position in FEN notation
   */
  inBook(fen: string): boolean {
    const key = keyFromFen(fen);
    return key !== null && this.book.has(key);
  }

  /**
   * Name of the longest book line the game has followed so far
   * @param history - Game moves in SAN from the starting position
   */
  getOpeningName(history: string[]): string | undefined {
    let best: Opening | undefined;
    for (const opening of this.openings) {
      if (opening.moves.length > history.length) continue;
      if (!opening.moves.every((move, i) => history[i] === move)) continue;
      if (!best || opening.moves.length > best.moves.length) {
        best = opening;
      }
    }
    return best?.name;
  }

  /**
   * Get all known opening names
   */
  getOpeningList(): Array<{ eco: string; name: string }> {
    return this.openings.map(o => ({ eco: o.eco, name: o.name }));
  }

  /** Whether the book file loaded */
  isAvailable(): boolean {
    return this.loadError === null;
  }

  /** Why the book is empty, if it failed to load */
  getLoadError(): OpeningBookError | null {
    return this.loadError;
  }

  /**
   * Replay each line from the starting position. A line stops at its first
   * illegal move; the legal prefix stays in the book.
   */
  private buildBook(): void {
    const chess = new Chess();

    for (const opening of this.openings) {
      chess.reset();

      for (const san of opening.moves) {
        const key = bookKey(chess.fen(), chess.moves({ verbose: true }));

        let played: string;
        try {
          played = chess.move(san).san;
        } catch {
          break;
        }

        const existing = this.book.get(key) ?? [];
        const entry = existing.find(m => m.move === played);
        if (entry) {
          entry.weight += 1;
        } else {
          existing.push({ move: played, weight: 1 });
          this.book.set(key, existing);
        }
      }
    }
  }
}

/**
 * Book that never has a suggestion
 */
export class NullOpeningBook implements OpeningBook {
  probe(): Move | null {
    return null;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function readBookFile(bookPath: string): Opening[] {
  let raw: string;
  try {
    raw = readFileSync(bookPath, 'utf8');
  } catch (err) {
    throw new OpeningBookError(bookPath, err instanceof Error ? err : undefined);
  }

  const parsed = BookFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new OpeningBookError(bookPath, parsed.error);
  }
  return parsed.data.openings;
}

/**
 * Placement, side, castling and en passant square. The en passant square
 * only counts when a capture onto it is legal, so transpositions share a key.
 */
function bookKey(fen: string, legalMoves: ReadonlyArray<{ flags: string }>): string {
  const [placement = '', turn = 'w', castling = '-', enPassant = '-'] = fen.split(' ');
  const epLive = enPassant !== '-' && legalMoves.some(m => m.flags.includes('e'));
  return [placement, turn, castling, epLive ? enPassant : '-'].join(' ');
}

function keyFromFen(fen: string): string | null {
  try {
    const chess = new Chess(fen);
    return bookKey(chess.fen(), chess.moves({ verbose: true }));
  } catch {
    return null;
  }
}

/**
 * Create opening book instance
 */
export function createChessOpenings(bookPath?: string): ChessOpenings {
  return new ChessOpenings(bookPath);
}
