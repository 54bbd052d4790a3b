/**
 * Human move intake for cooperative games.
 *
 * The policy is strict: anything other than a legal move ends the game.
 * Asking for help shows the legal moves and also ends the game.
 */

import type { Move, Side } from '../rules/types';

export interface HumanMoveRequest {
  side: Side;
  fen: string;
  legalMoves: readonly Move[];
}

/**
 * The boundary to whatever collects the human's input (terminal, UI).
 */
export interface HumanMoveSource {
  /** Resolves with the raw input, or null when nothing was entered */
  readMove(request: HumanMoveRequest): Promise<string | null>;
  showLegalMoves(moves: readonly Move[]): void | Promise<void>;
}

export type HumanInputRejection = 'empty' | 'unparseable' | 'illegal';

export type HumanInputVerdict =
  | { kind: 'move'; move: Move }
  | { kind: 'help' }
  | { kind: 'rejected'; reason: HumanInputRejection; input: string };

const HELP_WORDS = new Set(['help', '?']);
const COORDINATE_MOVE = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

export function evaluateHumanInput(raw: string | null, legalMoves: readonly Move[]): HumanInputVerdict {
  const input = (raw ?? '').trim().toLowerCase();
  if (input.length === 0) {
    return { kind: 'rejected', reason: 'empty', input };
  }
  if (HELP_WORDS.has(input)) {
    return { kind: 'help' };
  }
  if (!COORDINATE_MOVE.test(input)) {
    return { kind: 'rejected', reason: 'unparseable', input };
  }
  if (!legalMoves.includes(input)) {
    return { kind: 'rejected', reason: 'illegal', input };
  }
  return { kind: 'move', move: input };
}

export function describeRejection(verdict: Extract<HumanInputVerdict, { kind: 'rejected' }>): string {
  switch (verdict.reason) {
    case 'empty':
      return "You didn't provide a move. Game ended.";
    case 'unparseable':
      return `${verdict.input} is not valid syntax. Game ended.`;
    case 'illegal':
      return `${verdict.input} is not a legal move. Game ended.`;
  }
}
