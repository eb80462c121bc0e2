#!/usr/bin/env npx tsx
/**
 * Search Benchmark
 *
 * Runs the search on a handful of positions with and without alpha-beta
 * pruning and compares node counts. Both searches must agree on the move and
 * the score; any disagreement fails the run.
 *
 * Usage:
 *   npx tsx scripts/benchmark.ts [--quick] [--verbose] [--output <file>]
 *
 * Options:
 *   --quick    Depth 2 instead of 3
 *   --verbose  Show per-position statistics
 *   --output   Save JSON report to file
 *
 * @module scripts/benchmark
 */

import { writeFileSync } from 'node:fs';
import { ChessEngine } from '../src/chess/ChessEngine.js';
import { ChessEvaluator } from '../src/chess/ChessEvaluator.js';
import { ChessSearch } from '../src/chess/ChessSearch.js';
import type { SearchResult } from '../src/chess/types.js';

// =============================================================================
// Types
// =============================================================================

interface BenchmarkPosition {
  name: string;
  fen: string;
}

interface PositionResult {
  name: string;
  fen: string;
  move: string | null;
  score: number | null;
  agree: boolean;
  prunedNodes: number;
  fullNodes: number;
  betaCutoffs: number;
  /** Share of the exhaustive tree that was not visited, in percent */
  saved: number;
  prunedTime: number;
  fullTime: number;
}

interface BenchmarkReport {
  timestamp: string;
  depth: number;
  positions: PositionResult[];
  totalPrunedNodes: number;
  totalFullNodes: number;
  allAgree: boolean;
}

// =============================================================================
// Positions
// =============================================================================

const POSITIONS: BenchmarkPosition[] = [
  { name: 'Starting position', fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1' },
  { name: 'Open game', fen: 'r1bqkbnr/pppp1ppp/2n5/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R w KQkq - 2 3' },
  { name: 'Mate on f7', fen: 'r1bqkb1r/pppp1ppp/2n2n2/4p2Q/2B1P3/8/PPPP1PPP/RNB1K1NR w KQkq - 4 4' },
  { name: 'Rook endgame', fen: '4k3/8/8/8/3K4/8/8/R7 w - - 0 1' },
  { name: 'Black to move', fen: 'rnbqkbnr/pppp1ppp/8/4p3/6P1/5P2/PPPPP2P/RNBQKBNR b KQkq g3 0 2' },
];

// =============================================================================
// Benchmark
// =============================================================================

function runPosition(pos: BenchmarkPosition, depth: number): PositionResult {
  const evaluator = new ChessEvaluator();
  const pruned = new ChessSearch(evaluator, { usePruning: true });
  const full = new ChessSearch(evaluator, { usePruning: false });

  const a = pruned.search(new ChessEngine(pos.fen), depth);
  const b = full.search(new ChessEngine(pos.fen), depth);

  return {
    name: pos.name,
    fen: pos.fen,
    move: a.move?.san ?? null,
    score: a.score,
    agree: sameResult(a, b),
    prunedNodes: a.nodes,
    fullNodes: b.nodes,
    betaCutoffs: a.betaCutoffs,
    saved: b.nodes > 0 ? (1 - a.nodes / b.nodes) * 100 : 0,
    prunedTime: a.time,
    fullTime: b.time,
  };
}

function sameResult(a: SearchResult, b: SearchResult): boolean {
  return a.score === b.score && a.move?.lan === b.move?.lan;
}

function printResult(result: PositionResult, verbose: boolean): void {
  const status = result.agree ? '✅' : '❌';
  console.log(`${status} ${result.name.padEnd(20)} ${String(result.move).padEnd(8)} score ${String(result.score).padStart(7)}  nodes ${result.prunedNodes.toLocaleString().padStart(8)} / ${result.fullNodes.toLocaleString().padStart(8)}  (-${result.saved.toFixed(1)}%)`);
  if (verbose) {
    console.log(`   FEN: ${result.fen}`);
    console.log(`   Beta cutoffs: ${result.betaCutoffs}, time: ${result.prunedTime}ms pruned / ${result.fullTime}ms exhaustive`);
    console.log();
  }
}

function main(): void {
  const args = process.argv.slice(2);
  const quick = args.includes('--quick');
  const verbose = args.includes('--verbose');
  const outputIdx = args.indexOf('--output');
  const outputFile = outputIdx >= 0 ? args[outputIdx + 1] : undefined;
  const depth = quick ? 2 : 3;

  console.log('╔════════════════════════════════════════════════════════════════╗');
  console.log('║              Alpha-Beta Pruning Benchmark                      ║');
  console.log('╚════════════════════════════════════════════════════════════════╝');
  console.log(`Depth ${depth}, ${POSITIONS.length} positions (pruned / exhaustive nodes)\n`);

  const results: PositionResult[] = [];
  for (const pos of POSITIONS) {
    const result = runPosition(pos, depth);
    results.push(result);
    printResult(result, verbose);
  }

  const report: BenchmarkReport = {
    timestamp: new Date().toISOString(),
    depth,
    positions: results,
    totalPrunedNodes: results.reduce((sum, r) => sum + r.prunedNodes, 0),
    totalFullNodes: results.reduce((sum, r) => sum + r.fullNodes, 0),
    allAgree: results.every(r => r.agree),
  };

  console.log(`\nTotal nodes: ${report.totalPrunedNodes.toLocaleString()} pruned, ${report.totalFullNodes.toLocaleString()} exhaustive`);

  if (outputFile) {
    writeFileSync(outputFile, JSON.stringify(report, null, 2));
    console.log(`\n📄 Report saved to: ${outputFile}`);
  }

  if (!report.allAgree) {
    console.log('\n❌ Pruned and exhaustive search disagree!');
    process.exit(1);
  }

  console.log('\n✅ Benchmark completed successfully!');
}

main();
