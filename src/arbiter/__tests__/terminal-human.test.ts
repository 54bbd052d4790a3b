/**
 * Tests for terminal-human.ts: reading human moves from a terminal.
 */

import { describe, it, expect, vi } from 'vitest';
import { PassThrough } from 'stream';
import { ask, createTerminalHuman } from '../terminal-human';
import type { HumanMoveRequest } from '../human-intake';

const request: HumanMoveRequest = { side: 'white', fen: 'start', legalMoves: ['e2e4', 'd2d4'] };

function written(stream: PassThrough): string {
  const chunk: unknown = stream.read();
  return chunk === null ? '' : String(chunk);
}

describe('ask', () => {
  it('should resolve with the typed line', async () => {
    const input = new PassThrough();
    const output = new PassThrough();

    const answer = ask('Move? ', { input, output, terminal: false });
    input.write('e2e4\n');

    await expect(answer).resolves.toBe('e2e4');
    expect(written(output)).toBe('Move? ');
  });

  it('should resolve with an empty answer when input ends', async () => {
    const input = new PassThrough();
    const answer = ask('Move? ', { input, output: new PassThrough(), terminal: false });
    input.end();

    await expect(answer).resolves.toBe('');
  });

  it('should resolve with an empty answer and report Ctrl+C', async () => {
    const input = new PassThrough();
    const onInterrupt = vi.fn();

    const answer = ask('Move? ', { input, output: new PassThrough(), terminal: true, onInterrupt });
    input.write('\x03');

    await expect(answer).resolves.toBe('');
    expect(onInterrupt).toHaveBeenCalledTimes(1);
  });
});

describe('createTerminalHuman', () => {
  it('should return the typed move', async () => {
    const input = new PassThrough();
    const human = createTerminalHuman({ input, output: new PassThrough(), terminal: false });

    const move = human.readMove(request);
    input.write('e2e4\n');

    await expect(move).resolves.toBe('e2e4');
  });

  it('should return null for a blank line', async () => {
    const input = new PassThrough();
    const human = createTerminalHuman({ input, output: new PassThrough(), terminal: false });

    const move = human.readMove(request);
    input.write('   \n');

    await expect(move).resolves.toBeNull();
  });

  it('should return null after Ctrl+C at the prompt', async () => {
    const input = new PassThrough();
    const onInterrupt = vi.fn();
    const human = createTerminalHuman({ input, output: new PassThrough(), terminal: true, onInterrupt });

    const move = human.readMove(request);
    input.write('\x03');

    await expect(move).resolves.toBeNull();
    expect(onInterrupt).toHaveBeenCalledTimes(1);
  });

  it('should print the legal moves', () => {
    const output = new PassThrough();
    const human = createTerminalHuman({ input: new PassThrough(), output, terminal: false });

    human.showLegalMoves(['e2e4', 'd2d4']);

    expect(written(output)).toBe('Legal moves: e2e4, d2d4\n');
  });
});
