/**
 * Rules engine adapter tests: move parsing, make/unmake pairing and game
 * status reporting on top of chess.js
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ChessEngine, isValidFen } from '../src/chess/ChessEngine.js';
import { ContractViolationError, IllegalMoveError, InvalidFenError } from '../src/chess/errors.js';
import { STARTING_FEN } from '../src/chess/types.js';

const PROMOTION = '8/P7/8/8/8/8/8/k6K w - - 0 1';
const FOOLS_MATE = 'rnb1kbnr/pppp1ppp/8/4p3/6Pq/5P2/PPPPP2P/RNBQKBNR w KQkq - 1 3';
const STALEMATE = 'k7/8/1Q6/8/8/8/8/7K b - - 0 1';
const KINGS_ONLY = '4k3/8/8/8/8/8/8/4K3 w - - 0 1';
const FIFTY_MOVES = '4k3/8/8/8/8/8/8/R3K3 w - - 100 80';

describe('ChessEngine', () => {
  let engine: ChessEngine;

  beforeEach(() => {
    engine = new ChessEngine();
  });

  // ===========================================================================
  // Move parsing
  // ===========================================================================

  describe('parseMove', () => {
    it('should parse UCI moves', () => {
      const move = engine.parseMove('e2e4');
      expect(move?.san).toBe('e4');
      expect(move?.lan).toBe('e2e4');
    });

    it('should accept upper-case UCI', () => {
      expect(engine.parseMove('G1F3')?.san).toBe('Nf3');
    });

    it('should parse SAN moves', () => {
      expect(engine.parseMove('Nf3')?.lan).toBe('g1f3');
      expect(engine.parseMove('  d4 ')?.lan).toBe('d2d4');
    });

    it('should parse promotions in both notations', () => {
      const promo = new ChessEngine(PROMOTION);
      expect(promo.parseMove('a7a8n')?.san).toBe('a8=N');
      expect(promo.parseMove('a8=N')?.lan).toBe('a7a8n');
    });

    it('should ignore a missing or extra check suffix', () => {
      const promo = new ChessEngine(PROMOTION);
      expect(promo.parseMove('a8=Q')?.san).toBe('a8=Q+');
      expect(engine.parseMove('Nf3+')?.san).toBe('Nf3');
    });

    it('should return null for illegal or unreadable input', () => {
      expect(engine.parseMove('e5')).toBeNull();
      expect(engine.parseMove('e2e5')).toBeNull();
      expect(engine.parseMove('castle')).toBeNull();
      expect(engine.parseMove('')).toBeNull();
    });

    it('should not change the position', () => {
      engine.parseMove('Nf3');
      engine.parseMove('nonsense');
      expect(engine.fen()).toBe(STARTING_FEN);
      expect(engine.history()).toEqual([]);
    });
  });

  describe('applyMove', () => {
    it('should play a legal move', () => {
      const move = engine.applyMove('e4');
      expect(move.lan).toBe('e2e4');
      expect(engine.turn()).toBe('b');
      expect(engine.history()).toEqual(['e4']);
    });

    it('should throw IllegalMoveError for an illegal move', () => {
      expect(() => engine.applyMove('Ke2')).toThrow(IllegalMoveError);
      expect(engine.history()).toEqual([]);
    });
  });

  // ===========================================================================
  // Position contract
  // ===========================================================================

  describe('makeMove / unmakeMove', () => {
    it('should restore the position', () => {
      const [first] = engine.legalMoves();
      expect(first).toBeDefined();
      if (!first) return;

      engine.makeMove(first);
      expect(engine.fen()).not.toBe(STARTING_FEN);
      engine.unmakeMove();
      expect(engine.fen()).toBe(STARTING_FEN);
    });

    it('should throw when there is nothing to unmake', () => {
      expect(() => engine.unmakeMove()).toThrow(ContractViolationError);
    });

    it('should list twenty legal moves at the start', () => {
      expect(engine.legalMoves()).toHaveLength(20);
    });

    it('should report pieces with their squares', () => {
      const pieces = engine.pieces();
      expect(pieces).toHaveLength(32);
      expect(pieces).toContainEqual({ type: 'k', color: 'w', square: 'e1' });
      expect(pieces).toContainEqual({ type: 'q', color: 'b', square: 'd8' });
    });

    it('should identify captures', () => {
      const position = new ChessEngine('rnbqkbnr/ppp1pppp/8/3p4/4P3/8/PPPP1PPP/RNBQKBNR w KQkq d6 0 2');
      const capture = position.parseMove('exd5');
      const quiet = position.parseMove('e5');

      expect(capture && position.isCapture(capture)).toBe(true);
      expect(quiet && position.isCapture(quiet)).toBe(false);
    });
  });

  // ===========================================================================
  // Game management
  // ===========================================================================

  describe('game management', () => {
    it('should undo the last move', () => {
      engine.applyMove('e4');
      expect(engine.undo()?.san).toBe('e4');
      expect(engine.undo()).toBeNull();
    });

    it('should list legal moves as sorted SAN', () => {
      expect(engine.listLegalMoves().startsWith('Na3, Nc3, Nf3, Nh3, a3, a4, b3, b4')).toBe(true);
    });

    it('should load and reset positions', () => {
      engine.load(KINGS_ONLY);
      expect(engine.fen()).toBe(KINGS_ONLY);
      engine.reset();
      expect(engine.fen()).toBe(STARTING_FEN);
    });

    it('should reject an invalid FEN', () => {
      expect(() => new ChessEngine('not a position')).toThrow(InvalidFenError);
      expect(() => engine.load('8/8/8 w - - 0 1')).toThrow(InvalidFenError);
      expect(engine.fen()).toBe(STARTING_FEN);
    });

    it('should validate FEN strings', () => {
      expect(isValidFen(STARTING_FEN)).toBe(true);
      expect(isValidFen('rnbqkbnr/pppppppp/8/8')).toBe(false);
    });

    it('should clone without sharing state', () => {
      engine.applyMove('e4');
      const copy = engine.clone();
      copy.applyMove('e5');

      expect(engine.turn()).toBe('b');
      expect(copy.turn()).toBe('w');
      expect(copy.history()).toEqual(['e5']);
    });

    it('should read the half-move clock', () => {
      expect(engine.halfMoveClock()).toBe(0);
      engine.applyMove('Nf3');
      expect(engine.halfMoveClock()).toBe(1);
    });
  });

  // ===========================================================================
  // Results
  // ===========================================================================

  describe('getGameResult', () => {
    it('should be null while the game is running', () => {
      expect(engine.getGameResult()).toBeNull();
    });

    it('should report checkmate', () => {
      const mated = new ChessEngine(FOOLS_MATE);
      expect(mated.isCheckmate()).toBe(true);
      expect(mated.getGameResult()).toEqual({ winner: 'b', reason: 'checkmate', score: '0-1' });
    });

    it('should report stalemate', () => {
      expect(new ChessEngine(STALEMATE).getGameResult()).toEqual({
        winner: null,
        reason: 'stalemate',
        score: '1/2-1/2',
      });
    });

    it('should report insufficient material', () => {
      const bare = new ChessEngine(KINGS_ONLY);
      expect(bare.isDraw()).toBe(true);
      expect(bare.isStalemate()).toBe(false);
      expect(bare.getGameResult()?.reason).toBe('insufficient_material');
    });

    it('should report the fifty-move rule', () => {
      const position = new ChessEngine(FIFTY_MOVES);
      expect(position.isFiftyMoveRule()).toBe(true);
      expect(position.getGameResult()?.reason).toBe('fifty_move_rule');
    });

    it('should report threefold repetition', () => {
      for (const san of ['Nf3', 'Nf6', 'Ng1', 'Ng8', 'Nf3', 'Nf6', 'Ng1', 'Ng8']) {
        engine.applyMove(san);
      }
      expect(engine.isThreefoldRepetition()).toBe(true);
      expect(engine.getGameResult()?.reason).toBe('threefold_repetition');
    });
  });
});
