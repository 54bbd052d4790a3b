/**
 * Prompt construction for move requests.
 *
 * The prompt is deterministic for a given position and history so that
 * audit entries can be compared across attempts.
 */

import type { Move } from '../rules/types';

export const POSITION_LABEL = 'Chess state:';
export const HISTORY_LABEL = 'Move history:';
export const LEGAL_MOVES_LABEL = 'Legal moves:';

export interface MovePromptInput {
  /** Position in FEN */
  fen: string;
  history: readonly Move[];
  legalMoves: readonly Move[];
}

export function formatLegalMoves(moves: readonly Move[]): string {
  return moves.join(', ');
}

export function buildMovePrompt(input: MovePromptInput): string {
  return [
    `${POSITION_LABEL} ${input.fen}`,
    `${HISTORY_LABEL} ${input.history.join(' ')}`,
    `${LEGAL_MOVES_LABEL} ${formatLegalMoves(input.legalMoves)}`,
    '',
    'IMPORTANT INSTRUCTIONS:',
    'Reply with ONLY one line containing exactly one move from the legal moves list above, in UCI form.',
    'Do NOT add commentary, reasoning, or any other text.',
    'Example: e2e4',
    '',
    'Your UCI move:',
  ].join('\n');
}

/**
 * Reads the legal-move list back out of a prompt. Used by the mock
 * transport, which only sees the prompt text.
 */
export function extractLegalMovesFromPrompt(prompt: string): Move[] {
  const line = prompt.split('\n').find((l) => l.startsWith(LEGAL_MOVES_LABEL));
  if (!line) return [];
  return line
    .slice(LEGAL_MOVES_LABEL.length)
    .split(',')
    .map((m) => m.trim())
    .filter((m) => m.length > 0);
}
