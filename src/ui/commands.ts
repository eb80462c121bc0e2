/**
 * Console command interpreter
 *
 * Turns one line of user input into an outcome. Board changes (moves, undo)
 * are applied to the engine here; everything else is left to the caller.
 */

import type { ChessEngine } from '../chess/ChessEngine.js';
import type { Color, Move } from '../chess/types.js';

export type CommandOutcome =
  | { kind: 'empty' }
  | { kind: 'message'; text: string }
  | { kind: 'moved'; move: Move }
  | { kind: 'undone'; moves: Move[]; text: string }
  | { kind: 'illegal'; text: string }
  | { kind: 'quit'; text: string };

export const HELP_TEXT =
  "Commands: help, moves, fen, undo, quit. Enter moves as UCI (e2e4, e7e8q) or SAN (Nf3, O-O).";

const QUIT_WORDS = new Set(['quit', 'q', 'exit']);

/**
 * Interpret a line typed by the human playing `humanColor`
 */
export function runCommand(engine: ChessEngine, input: string, humanColor: Color): CommandOutcome {
  const text = input.trim();
  if (!text) return { kind: 'empty' };

  const command = text.toLowerCase();

  if (command === 'help' || command === 'h') {
    return { kind: 'message', text: HELP_TEXT };
  }
  if (command === 'moves') {
    return { kind: 'message', text: `Legal moves: ${engine.listLegalMoves()}` };
  }
  if (command === 'fen') {
    return { kind: 'message', text: engine.fen() };
  }
  if (command === 'undo') {
    return undoTurn(engine, humanColor);
  }
  if (QUIT_WORDS.has(command)) {
    return { kind: 'quit', text: 'Goodbye!' };
  }

  if (engine.isGameOver()) {
    return { kind: 'message', text: 'The game is over.' };
  }
  if (engine.turn() !== humanColor) {
    return { kind: 'message', text: 'Wait for the AI to move.' };
  }

  const move = engine.parseMove(text);
  if (!move) {
    return {
      kind: 'illegal',
      text: `Unrecognized or illegal move "${text}". Type 'moves' to list legal moves.`,
    };
  }

  engine.makeMove(move);
  return { kind: 'moved', move };
}

/**
 * Take back half-moves until it is the human's turn again
 */
function undoTurn(engine: ChessEngine, humanColor: Color): CommandOutcome {
  const undone: Move[] = [];
  do {
    const move = engine.undo();
    if (!move) break;
    undone.push(move);
  } while (engine.turn() !== humanColor);

  if (undone.length === 0) {
    return { kind: 'message', text: 'Nothing to undo.' };
  }

  const sans = undone.map(m => m.san).reverse().join(' ');
  return { kind: 'undone', moves: undone, text: `Took back ${sans}.` };
}
