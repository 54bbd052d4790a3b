/**
 * Tests for human-intake.ts: strict validation of human moves.
 */

import { describe, it, expect } from 'vitest';
import { describeRejection, evaluateHumanInput, type HumanInputVerdict } from '../human-intake';

const legal = ['e2e4', 'd2d4', 'g1f3'];

function rejected(verdict: HumanInputVerdict): string {
  if (verdict.kind !== 'rejected') throw new Error(`Expected a rejection, got ${verdict.kind}`);
  return describeRejection(verdict);
}

describe('evaluateHumanInput', () => {
  it('should accept a legal move, ignoring case and whitespace', () => {
    expect(evaluateHumanInput('  E2E4 \n', legal)).toEqual({ kind: 'move', move: 'e2e4' });
  });

  it('should recognize a help request', () => {
    expect(evaluateHumanInput('help', legal)).toEqual({ kind: 'help' });
    expect(evaluateHumanInput('?', legal)).toEqual({ kind: 'help' });
  });

  it('should reject missing input', () => {
    expect(rejected(evaluateHumanInput(null, legal))).toBe("You didn't provide a move. Game ended.");
    expect(rejected(evaluateHumanInput('   ', legal))).toBe("You didn't provide a move. Game ended.");
  });

  it('should reject input that is not a coordinate move', () => {
    expect(rejected(evaluateHumanInput('Nf3', legal))).toBe('nf3 is not valid syntax. Game ended.');
  });

  it('should reject a well-formed move that is not legal', () => {
    expect(rejected(evaluateHumanInput('e2e5', legal))).toBe('e2e5 is not a legal move. Game ended.');
  });
});
