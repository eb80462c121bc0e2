/**
 * Text rendering for the console: board diagram, status lines, game result
 * and the AI move line. Pure functions over the engine so they can be tested
 * without a terminal.
 */

import chalk from 'chalk';
import type { ChessEngine } from '../chess/ChessEngine.js';
import { FILES, PIECE_UNICODE } from '../chess/types.js';
import type { AIMove, Color, Piece } from '../chess/types.js';

export interface RenderOptions {
  /** Black at the bottom */
  flipped?: boolean;
  /** Style labels and pieces with chalk */
  color?: boolean;
}

const EMPTY_SQUARE = '·';
const INNER_WIDTH = 17;

// =============================================================================
// Board
// =============================================================================

/**
 * Board diagram, one string per line, rank 8 at the top unless flipped
 */
export function renderBoard(engine: ChessEngine, options: RenderOptions = {}): string[] {
  const { flipped = false, color = false } = options;
  const label = color ? chalk.cyan : (s: string) => s;

  const ranks = engine.board();
  const rowOrder = flipped ? [...ranks].reverse() : ranks;
  const files = flipped ? [...FILES].reverse() : [...FILES];

  const fileLabels = label(`    ${files.join(' ')}`);
  const lines: string[] = [fileLabels, `  ┌${'─'.repeat(INNER_WIDTH)}┐`];

  rowOrder.forEach((row, i) => {
    const rank = flipped ? i + 1 : 8 - i;
    const cells = flipped ? [...row].reverse() : row;
    const squares = cells.map(cell => pieceSymbol(cell, color)).join(' ');
    lines.push(`${label(String(rank))} │ ${squares} │ ${label(String(rank))}`);
  });

  lines.push(`  └${'─'.repeat(INNER_WIDTH)}┘`, fileLabels);
  return lines;
}

function pieceSymbol(piece: Piece | null, color: boolean): string {
  if (!piece) return EMPTY_SQUARE;
  const [white, black] = PIECE_UNICODE[piece.type];
  if (piece.color === 'w') {
    return color ? chalk.blueBright(white) : white;
  }
  return color ? chalk.red(black) : black;
}

/**
 * "Side to move: White", followed by "Check!" when the side to move is in
 * check and the game is still going
 */
export function renderStatus(engine: ChessEngine): string[] {
  const lines = [`Side to move: ${colorName(engine.turn())}`];
  if (engine.isCheck() && !engine.isGameOver()) {
    lines.push('Check!');
  }
  return lines;
}

// =============================================================================
// Results
// =============================================================================

/**
 * End-of-game line, or null while the game is running
 */
export function describeResult(engine: ChessEngine): string | null {
  const result = engine.getGameResult();
  if (!result) return null;

  switch (result.reason) {
    case 'checkmate':
      return `Checkmate! ${result.winner === 'b' ? 'Black' : 'White'} wins.`;
    case 'stalemate':
      return 'Stalemate.';
    case 'insufficient_material':
      return 'Draw by insufficient material.';
    case 'threefold_repetition':
      return 'Draw by threefold repetition.';
    case 'fifty_move_rule':
      return 'Draw by the fifty-move rule.';
  }
}

/**
 * "AI plays: Nf3 (g1f3) [0.42s]" for searched moves, the opening name for
 * book moves, and a separate prefix for the fallback move
 */
export function formatAIMove(choice: AIMove, elapsedMs: number): string {
  const { san, lan } = choice.move;

  switch (choice.source) {
    case 'fallback':
      return `AI fallback plays: ${san} (${lan})`;
    case 'book':
      return `AI plays: ${san} (${lan}) [book${choice.openingName ? `: ${choice.openingName}` : ''}]`;
    case 'search':
      return `AI plays: ${san} (${lan}) [${(elapsedMs / 1000).toFixed(2)}s]`;
  }
}

function colorName(color: Color): string {
  return color === 'w' ? 'White' : 'Black';
}
