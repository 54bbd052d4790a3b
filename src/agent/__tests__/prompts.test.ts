/**
 * Tests for prompts.ts: move prompt construction.
 */

import { describe, it, expect } from 'vitest';
import { buildMovePrompt, extractLegalMovesFromPrompt, formatLegalMoves } from '../prompts';

const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

describe('buildMovePrompt', () => {
  it('should lay out position, history, legal moves and instructions', () => {
    const prompt = buildMovePrompt({ fen: START_FEN, history: ['e2e4', 'e7e5'], legalMoves: ['g1f3', 'b1c3'] });
    const lines = prompt.split('\n');

    expect(lines[0]).toBe(`Chess state: ${START_FEN}`);
    expect(lines[1]).toBe('Move history: e2e4 e7e5');
    expect(lines[2]).toBe('Legal moves: g1f3, b1c3');
    expect(lines[3]).toBe('');
    expect(lines[4]).toBe('IMPORTANT INSTRUCTIONS:');
    expect(lines[lines.length - 1]).toBe('Your UCI move:');
  });

  it('should be deterministic', () => {
    const input = { fen: START_FEN, history: [], legalMoves: ['e2e4'] };
    expect(buildMovePrompt(input)).toBe(buildMovePrompt(input));
  });

  it('should leave the history empty on the first move', () => {
    const prompt = buildMovePrompt({ fen: START_FEN, history: [], legalMoves: ['e2e4'] });
    expect(prompt.split('\n')[1]).toBe('Move history: ');
  });
});

describe('formatLegalMoves', () => {
  it('should join moves with commas', () => {
    expect(formatLegalMoves(['a2a3', 'a2a4'])).toBe('a2a3, a2a4');
  });
});

describe('extractLegalMovesFromPrompt', () => {
  it('should read back the legal moves', () => {
    const prompt = buildMovePrompt({ fen: START_FEN, history: [], legalMoves: ['e2e4', 'd2d4'] });
    expect(extractLegalMovesFromPrompt(prompt)).toEqual(['e2e4', 'd2d4']);
  });

  it('should return an empty list when the prompt has no legal moves line', () => {
    expect(extractLegalMovesFromPrompt('Play something good')).toEqual([]);
  });
});
