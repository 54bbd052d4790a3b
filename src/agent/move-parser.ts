/**
 * Move extraction from free-form agent output.
 *
 * This is a lexical scan, not a parser: agents wrap their move in prose,
 * markdown, reasoning traces, or several alternatives, so we collect every
 * coordinate-shaped token and let the legal-move set decide.
 */

import type { Move } from '../rules/types';

const COORDINATE_TOKEN = /\b([a-h][1-8][a-h][1-8][qrbnQRBN]?)\b/g;

/**
 * All coordinate-shaped tokens in the text, in order of appearance.
 * Promotion letters are lower-cased.
 */
export function findCoordinateTokens(text: string): Move[] {
  const tokens: Move[] = [];
  for (const match of text.matchAll(COORDINATE_TOKEN)) {
    tokens.push(match[1].toLowerCase());
  }
  return tokens;
}

export interface MoveExtraction {
  /** First token that is in the legal set, or null */
  move: Move | null;
  candidates: Move[];
}

export function extractMove(text: string, legalMoves: Iterable<Move>): MoveExtraction {
  const legal = new Set(legalMoves);
  const candidates = findCoordinateTokens(text);
  const move = candidates.find((c) => legal.has(c)) ?? null;
  return { move, candidates };
}
