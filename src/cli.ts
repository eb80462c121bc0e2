/**
 * Command-line option validation
 */

import { z } from 'zod';
import { clampDepth } from './chess/ChessAI.js';
import { isValidFen } from './chess/ChessEngine.js';
import type { Color } from './chess/types.js';

const CliOptionsSchema = z.object({
  side: z
    .string()
    .transform(side => side.trim().toLowerCase())
    .pipe(z.enum(['w', 'b', 'white', 'black']))
    .transform((side): Color => (side.startsWith('b') ? 'b' : 'w')),
  depth: z.number().transform(clampDepth),
  book: z.boolean(),
  bookPath: z.string().min(1).optional(),
  fen: z
    .string()
    .optional()
    .refine(fen => fen === undefined || isValidFen(fen), { message: 'not a valid FEN position' }),
  maxTime: z.number().int().nonnegative(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export type CliParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; errors: string[] };

/**
 * Validate raw flag values
 */
export function parseCliOptions(flags: unknown): CliParseResult {
  const parsed = CliOptionsSchema.safeParse(flags);
  if (parsed.success) {
    return { ok: true, options: parsed.data };
  }
  return {
    ok: false,
    errors: parsed.error.issues.map(issue => `--${toFlagName(issue.path.join('.'))}: ${issue.message}`),
  };
}

function toFlagName(key: string): string {
  return key.replace(/[A-Z]/g, c => `-${c.toLowerCase()}`);
}
