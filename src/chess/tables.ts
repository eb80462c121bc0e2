/**
 * Piece-square tables
 *
 * Loaded once from data/piece-square-tables.json and frozen. Each table has 64
 * entries indexed by square number: a1 = 0, b1 = 1, ..., h1 = 7, a2 = 8, ...,
 * h8 = 63. Black reads the rank-mirrored square.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Square } from './types.js';

const TABLE_FILE = new URL('../../data/piece-square-tables.json', import.meta.url);

const TableSchema = z.array(z.number().int()).length(64);

const PieceSquareTablesSchema = z.object({
  p: TableSchema,
  n: TableSchema,
  b: TableSchema,
  r: TableSchema,
  q: TableSchema,
  kingMiddlegame: TableSchema,
  kingEndgame: TableSchema,
});

export type PieceSquareTables = z.infer<typeof PieceSquareTablesSchema>;

/**
 * Parse and validate table data
 * @throws ZodError on anything other than seven 64-entry integer tables
 */
export function parsePieceSquareTables(data: unknown): Readonly<PieceSquareTables> {
  const tables = PieceSquareTablesSchema.parse(data);
  for (const table of Object.values(tables)) {
    Object.freeze(table);
  }
  return Object.freeze(tables);
}

function loadPieceSquareTables(): Readonly<PieceSquareTables> {
  return parsePieceSquareTables(JSON.parse(readFileSync(TABLE_FILE, 'utf8')));
}

export const PIECE_SQUARE_TABLES = loadPieceSquareTables();

/**
 * Square number with a1 = 0 and h8 = 63
 */
export function squareIndex(square: Square): number {
  const file = square.charCodeAt(0) - 97;
  const rank = square.charCodeAt(1) - 49;
  return rank * 8 + file;
}

/** Same file, opposite rank */
export function mirrorSquare(index: number): number {
  return index ^ 56;
}
