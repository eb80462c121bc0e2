/**
 * ChessConsole.tsx - Terminal chess against the search AI
 *
 * - Board diagram with side to move and check marker
 * - Text input for moves (UCI or SAN) and console commands
 * - AI replies on a timer tick so the "thinking" line renders first
 * - Final board and result line when the game ends
 */

import React, { useState, useEffect, useCallback } from 'react';
import { Box, Text, useApp } from 'ink';
import TextInput from 'ink-text-input';
import type { ChessAI } from '../chess/ChessAI.js';
import type { ChessEngine } from '../chess/ChessEngine.js';
import type { Color } from '../chess/types.js';
import { describeResult, formatAIMove, renderBoard, renderStatus } from './board.js';
import { runCommand } from './commands.js';

// =============================================================================
// Types
// =============================================================================

interface ChessConsoleProps {
  engine: ChessEngine;
  ai: ChessAI;
  humanColor: Color;
}

interface Feedback {
  text: string;
  tone: 'info' | 'error';
}

// Delay before the AI starts searching, so the thinking line is drawn
const AI_REPLY_DELAY_MS = 50;

// =============================================================================
// Main Component
// =============================================================================

const ChessConsole: React.FC<ChessConsoleProps> = ({ engine, ai, humanColor }) => {
  const { exit } = useApp();

  // The engine is mutable; the FEN is what triggers a re-render
  const [fen, setFen] = useState(() => engine.fen());
  const [moveInput, setMoveInput] = useState('');
  const [feedback, setFeedback] = useState<Feedback | null>(null);
  const [aiLine, setAiLine] = useState<string | null>(null);
  const [thinking, setThinking] = useState(false);

  const isGameOver = engine.isGameOver();
  const aiToMove = !isGameOver && engine.turn() !== humanColor;

  const refresh = useCallback(() => setFen(engine.fen()), [engine]);

  // AI move
  useEffect(() => {
    if (!aiToMove) return;
    setThinking(true);

    const t = setTimeout(() => {
      const started = Date.now();
      try {
        const choice = ai.playMove(engine);
        if (choice) {
          setAiLine(formatAIMove(choice, Date.now() - started));
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        setFeedback({ text: `AI error: ${message}`, tone: 'error' });
      } finally {
        setThinking(false);
        refresh();
      }
    }, AI_REPLY_DELAY_MS);

    return () => clearTimeout(t);
  }, [aiToMove, fen, ai, engine, refresh]);

  // Leave the final board on screen and exit
  useEffect(() => {
    if (isGameOver) {
      const t = setTimeout(exit, 0);
      return () => clearTimeout(t);
    }
  }, [isGameOver, exit]);

  const handleSubmit = useCallback((input: string) => {
    const outcome = runCommand(engine, input, humanColor);
    setMoveInput('');

    switch (outcome.kind) {
      case 'empty':
        return;
      case 'quit':
        setFeedback({ text: outcome.text, tone: 'info' });
        exit();
        return;
      case 'moved':
        setFeedback(null);
        break;
      case 'undone':
        setAiLine(null);
        setFeedback({ text: outcome.text, tone: 'info' });
        break;
      case 'message':
        setFeedback({ text: outcome.text, tone: 'info' });
        break;
      case 'illegal':
        setFeedback({ text: outcome.text, tone: 'error' });
        break;
    }
    refresh();
  }, [engine, humanColor, exit, refresh]);

  const result = describeResult(engine);

  return (
    <Box flexDirection="column" padding={1}>
      {/* Header */}
      <Box marginBottom={1}>
        <Text bold color="cyan">Pocket Chess</Text>
        <Text dimColor>
          {' '}• You play {humanColor === 'w' ? 'White' : 'Black'} • depth {ai.getConfig().depth}
        </Text>
      </Box>

      {/* Board */}
      {renderBoard(engine, { flipped: humanColor === 'b', color: true }).map((line, i) => (
        <Text key={i}>{line}</Text>
      ))}

      <Box flexDirection="column" marginTop={1}>
        {renderStatus(engine).map(line => (
          <Text key={line} color={line === 'Check!' ? 'red' : undefined} bold={line === 'Check!'}>
            {line}
          </Text>
        ))}
        {aiLine && <Text color="blue">{aiLine}</Text>}
        {thinking && <Text color="yellow">AI thinking...</Text>}
        {feedback && (
          <Text color={feedback.tone === 'error' ? 'red' : 'green'}>{feedback.text}</Text>
        )}
      </Box>

      {/* Game over or input */}
      {result ? (
        <Box marginTop={1}>
          <Text bold color="yellow">{result}</Text>
        </Box>
      ) : (
        !aiToMove && (
          <Box marginTop={1}>
            <Text color="yellow">Your move&gt; </Text>
            <TextInput
              value={moveInput}
              onChange={setMoveInput}
              onSubmit={handleSubmit}
              placeholder="e2e4, Nf3, help..."
            />
          </Box>
        )
      )}
    </Box>
  );
};

export default ChessConsole;
