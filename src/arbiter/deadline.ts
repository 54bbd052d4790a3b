/**
 * Outer deadline for agent work.
 *
 * The task runs independently of the caller; the caller waits for a single
 * handoff or the deadline, whichever comes first. On expiry the task's
 * signal is aborted so it starts no further attempts, and anything it
 * produces later is discarded.
 */

export type DeadlineOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'expired' };

export function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  deadlineMs: number,
): Promise<DeadlineOutcome<T>> {
  const controller = new AbortController();

  return new Promise((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      controller.abort();
      resolve({ status: 'expired' });
    }, deadlineMs);

    task(controller.signal).then(
      (value) => {
        if (settled) {
          console.warn('Discarding agent result that arrived after the deadline.');
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve({ status: 'completed', value });
      },
      (error: unknown) => {
        if (settled) {
          console.warn(`Discarding agent failure that arrived after the deadline: ${error}`);
          return;
        }
        settled = true;
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
