#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import meow from 'meow';
import chalk from 'chalk';
import { parseCliOptions } from './cli.js';
import { ChessAI } from './chess/ChessAI.js';
import { ChessEngine } from './chess/ChessEngine.js';
import { ChessOpenings } from './chess/ChessOpenings.js';
import { DEFAULT_DEPTH, MAX_DEPTH, MIN_DEPTH } from './chess/types.js';
import ChessConsole from './ui/ChessConsole.js';

const cli = meow(`
	Usage
	  $ pocket-chess

	Description
	  Play chess in the terminal against a fixed-depth alpha-beta search

	Options
	  --side <w|b>        Side you play (default: w)
	  --depth <n>         Search depth in plies, ${MIN_DEPTH}-${MAX_DEPTH} (default: ${DEFAULT_DEPTH})
	  --no-book           Do not use the opening book
	  --book-path <path>  Opening book file (default: data/opening-book.json)
	  --fen <fen>         Start from this position
	  --max-time <ms>     Stop each search after this many milliseconds (default: no limit)

	Examples
	  $ pocket-chess
	  $ pocket-chess --side b --depth 4
	  $ pocket-chess --fen "8/8/8/4k3/8/8/8/4K2R w K - 0 1" --no-book
`, {
	importMeta: import.meta,
	flags: {
		side: {
			type: 'string',
			default: 'w',
		},
		depth: {
			type: 'number',
			default: DEFAULT_DEPTH,
		},
		book: {
			type: 'boolean',
			default: true,
		},
		bookPath: {
			type: 'string',
		},
		fen: {
			type: 'string',
		},
		maxTime: {
			type: 'number',
			default: 0,
		},
	},
});

// ============================================================
// Options
// ============================================================
const parsed = parseCliOptions(cli.flags);
if (!parsed.ok) {
  for (const error of parsed.errors) {
    console.error(chalk.red(`Error: ${error}`));
  }
  process.exit(1);
}
const { options } = parsed;

// ============================================================
// Game Setup
// ============================================================
const engine = new ChessEngine(options.fen);

let openings: ChessOpenings | null = null;
if (options.book) {
  openings = new ChessOpenings(options.bookPath);
  const loadError = openings.getLoadError();
  if (loadError) {
    console.warn(`[ChessOpenings] ${loadError.message}; playing without the book`);
  }
}

const ai = new ChessAI(
  { depth: options.depth, useOpeningBook: options.book, maxTime: options.maxTime },
  { openings },
);

// ============================================================
// Render
// ============================================================
const { waitUntilExit } = render(
  <ChessConsole engine={engine} ai={ai} humanColor={options.side} />
);

await waitUntilExit();
