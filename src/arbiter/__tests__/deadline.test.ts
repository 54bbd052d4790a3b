/**
 * Tests for deadline.ts: outer deadline around agent work.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { runWithDeadline } from '../deadline';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('runWithDeadline', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should hand back the value of a task that finishes in time', async () => {
    const outcome = await runWithDeadline(async () => 'e2e4', 1000);
    expect(outcome).toEqual({ status: 'completed', value: 'e2e4' });
  });

  it('should expire and abort the task signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const outcome = await runWithDeadline((signal) => {
      seen.signal = signal;
      return new Promise<string>(() => {});
    }, 10);

    expect(outcome).toEqual({ status: 'expired' });
    expect(seen.signal?.aborted).toBe(true);
  });

  it('should discard a result that arrives after the deadline', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const outcome = await runWithDeadline(async () => {
      await delay(40);
      return 'e2e4';
    }, 5);
    await delay(60);

    expect(outcome).toEqual({ status: 'expired' });
    expect(warn).toHaveBeenCalledWith('Discarding agent result that arrived after the deadline.');
  });

  it('should propagate a failure that arrives in time', async () => {
    await expect(
      runWithDeadline(async () => {
        throw new Error('agent exploded');
      }, 1000),
    ).rejects.toThrow('agent exploded');
  });
});
