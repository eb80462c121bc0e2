/**
 * Opening book tests: weights, tie-breaking, opening names and the
 * behavior when the book file is missing or broken
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ChessEngine } from '../src/chess/ChessEngine.js';
import { ChessOpenings, NullOpeningBook } from '../src/chess/ChessOpenings.js';
import { OpeningBookError } from '../src/chess/errors.js';
import { STARTING_FEN } from '../src/chess/types.js';

function positionAfter(...sans: string[]): ChessEngine {
  const engine = new ChessEngine();
  for (const san of sans) {
    engine.applyMove(san);
  }
  return engine;
}

describe('ChessOpenings', () => {
  const book = new ChessOpenings();

  it('should load the bundled book', () => {
    expect(book.isAvailable()).toBe(true);
    expect(book.getLoadError()).toBeNull();
    expect(book.getOpeningList()).toHaveLength(24);
  });

  const answers: Array<[string[], string]> = [
    [[], 'e4'],
    [['e4'], 'e5'],
    [['e4', 'e5'], 'Nf3'],
    [['e4', 'e5', 'Nf3'], 'Nc6'],
    [['e4', 'e5', 'Nf3', 'Nc6'], 'Bc4'],
    [['d4'], 'd5'],
    [['d4', 'd5'], 'c4'],
    [['c4'], 'c5'],
  ];

  it.each(answers)('should answer %j with %s', (sans, expected) => {
    expect(book.probe(positionAfter(...sans))?.san).toBe(expected);
  });

  it('should break ties in favour of the first line listed', () => {
    const position = positionAfter('e4', 'e5', 'Nf3', 'Nc6', 'Bc4');
    const moves = book.getMoves(position.fen());

    expect(moves).toEqual([
      { move: 'Bc5', weight: 1 },
      { move: 'Nf6', weight: 1 },
    ]);
    expect(book.probe(position)?.san).toBe('Bc5');
  });

  it('should weight moves by the number of lines through them', () => {
    expect(book.getMoves(STARTING_FEN)).toEqual([
      { move: 'e4', weight: 16 },
      { move: 'd4', weight: 5 },
      { move: 'c4', weight: 2 },
      { move: 'Nf3', weight: 1 },
    ]);
  });

  it('should return copies of its entries', () => {
    const moves = book.getMoves(STARTING_FEN);
    const first = moves[0];
    if (first) first.weight = 0;

    expect(book.getMoves(STARTING_FEN)[0]?.weight).toBe(16);
  });

  it('should miss positions outside the book', () => {
    const position = positionAfter('a4');

    expect(book.probe(position)).toBeNull();
    expect(book.inBook(position.fen())).toBe(false);
    expect(book.inBook(STARTING_FEN)).toBe(true);
    expect(book.getMoves('not a fen')).toEqual([]);
  });

  it('should find transposed positions regardless of move counters', () => {
    const fen = positionAfter('e4').fen().replace(/ 0 1$/, ' 7 12');
    expect(book.getMoves(fen)[0]).toEqual({ move: 'e5', weight: 8 });
  });

  it('should name the longest line the game follows', () => {
    expect(book.getOpeningName(['e4', 'e5', 'Nf3', 'Nc6', 'Bc4', 'Bc5', 'c3'])).toBe('Giuoco Piano');
    expect(book.getOpeningName(['e4', 'e5', 'Nf3', 'Nc6', 'Bc4'])).toBe('Italian Game');
    expect(book.getOpeningName(['e4'])).toBeUndefined();
  });

  describe('unusable book files', () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), 'pocket-chess-book-'));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    function bookFile(name: string, content: string): string {
      const path = join(dir, name);
      writeFileSync(path, content, 'utf8');
      return path;
    }

    it('should be empty when the file is missing', () => {
      const missing = new ChessOpenings(join(dir, 'missing.json'));

      expect(missing.isAvailable()).toBe(false);
      expect(missing.getLoadError()).toBeInstanceOf(OpeningBookError);
      expect(missing.probe(new ChessEngine())).toBeNull();
      expect(missing.getOpeningList()).toEqual([]);
    });

    it('should be empty when the file is not JSON', () => {
      const broken = new ChessOpenings(bookFile('broken.json', '{ "openings": ['));

      expect(broken.isAvailable()).toBe(false);
      expect(broken.probe(new ChessEngine())).toBeNull();
    });

    it('should be empty when the file does not match the schema', () => {
      const wrong = new ChessOpenings(bookFile('wrong.json', '{ "openings": [{ "eco": "X00" }] }'));

      expect(wrong.isAvailable()).toBe(false);
      expect(wrong.getLoadError()?.message).toContain('wrong.json');
      expect(wrong.inBook(STARTING_FEN)).toBe(false);
    });

    it('should keep the legal prefix of a line with an illegal move', () => {
      const partial = new ChessOpenings(bookFile('partial.json', JSON.stringify({
        openings: [{ eco: 'X01', name: 'Broken Line', moves: ['e4', 'e4', 'Nf3'] }],
      })));

      expect(partial.isAvailable()).toBe(true);
      expect(partial.probe(new ChessEngine())?.san).toBe('e4');
      expect(partial.probe(positionAfter('e4'))).toBeNull();
    });
  });
});

describe('NullOpeningBook', () => {
  it('should never suggest a move', () => {
    expect(new NullOpeningBook().probe()).toBeNull();
  });
});
