/**
 * Move retry logic: a bounded, paced retry loop for one agent on one turn,
 * with retry metrics tracking.
 */

import type { Move, RulesAdapter } from '../rules/types';
import type { AgentIdentity, AttemptFailureKind, MoveSource } from './types';

/**
 * Configuration for move retry behavior.
 */
export interface MoveRetryConfig {
  /** Maximum number of attempts. Default: 5 */
  maxAttempts: number;
  /** Delay between failed attempts in ms. Default: 1000 */
  pacingDelayMs: number;
}

export const DEFAULT_MOVE_RETRY_CONFIG: MoveRetryConfig = {
  maxAttempts: 5,
  pacingDelayMs: 1000,
};

/**
 * Metrics accumulated across turn resolutions.
 */
export interface MoveRetryMetrics {
  /** Agent requests made (including retries) */
  totalAttempts: number;
  /** Turns resolved on the first attempt */
  firstTrySuccesses: number;
  /** Turns resolved after at least one failure */
  retrySuccesses: number;
  /** Turns that used every attempt without a legal move */
  exhaustedTurns: number;
  /** Per-failure-kind counts */
  failureCounts: Map<AttemptFailureKind, number>;
}

export function createRetryMetrics(): MoveRetryMetrics {
  return {
    totalAttempts: 0,
    firstTrySuccesses: 0,
    retrySuccesses: 0,
    exhaustedTurns: 0,
    failureCounts: new Map(),
  };
}

/**
 * Format retry metrics for logging.
 */
export function formatRetryMetrics(metrics: MoveRetryMetrics): string {
  const turns = metrics.firstTrySuccesses + metrics.retrySuccesses + metrics.exhaustedTurns;
  if (turns === 0) return 'Move Retry Metrics: No turns resolved';

  const lines = [
    `Move Retry Metrics:`,
    `  Turns: ${turns} (${metrics.totalAttempts} attempts)`,
    `  First-try success: ${metrics.firstTrySuccesses}`,
    `  Retry success: ${metrics.retrySuccesses}`,
    `  Exhausted: ${metrics.exhaustedTurns}`,
  ];

  if (metrics.failureCounts.size > 0) {
    lines.push(`  Failure types:`);
    for (const [kind, count] of metrics.failureCounts) {
      lines.push(`    ${kind}: ${count}`);
    }
  }

  return lines.join('\n');
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * One failed attempt, for logging.
 */
export interface AttemptRecord {
  attempt: number;
  kind: AttemptFailureKind;
  candidates: Move[];
}

/**
 * Why the loop stopped.
 * - resolved: a legal move was found
 * - exhausted: every attempt failed
 * - terminal: the position became terminal before an attempt
 * - cancelled: the caller's signal fired before an attempt
 */
export type ResolveStopReason = 'resolved' | 'exhausted' | 'terminal' | 'cancelled';

export interface ResolveTurnResult {
  move: Move | null;
  /** Failed attempts consumed */
  failures: number;
  reason: ResolveStopReason;
  failedAttempts: AttemptRecord[];
}

export interface ResolveTurnOptions extends Partial<MoveRetryConfig> {
  /** Stops further attempts once aborted; an in-flight attempt still completes */
  signal?: AbortSignal;
  /** Per-attempt limit handed to the move source */
  timeoutMs?: number;
  metrics?: MoveRetryMetrics;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Called after every failed attempt */
  onAttemptFailed?: (record: AttemptRecord) => void;
}

/**
 * Ask one agent for a move up to `maxAttempts` times.
 *
 * Attempts are strictly sequential. The candidate is re-checked against the
 * live position, since the move source saw the position at prompt time.
 * The pacing delay separates attempts and is never taken after the last one.
 */
export async function resolveTurn<P>(
  source: MoveSource<P>,
  rules: RulesAdapter<P>,
  identity: AgentIdentity,
  position: P,
  history: readonly Move[],
  options: ResolveTurnOptions = {},
): Promise<ResolveTurnResult> {
  const { maxAttempts, pacingDelayMs } = { ...DEFAULT_MOVE_RETRY_CONFIG, ...options };
  const wait = options.sleep ?? sleep;
  const metrics = options.metrics;
  const failedAttempts: AttemptRecord[] = [];
  let failures = 0;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (rules.isTerminal(position)) {
      return { move: null, failures, reason: 'terminal', failedAttempts };
    }
    if (options.signal?.aborted) {
      return { move: null, failures, reason: 'cancelled', failedAttempts };
    }

    if (metrics) metrics.totalAttempts++;
    const request = await source.requestMove(identity, position, history, { timeoutMs: options.timeoutMs });

    if (request.move !== null && rules.isLegal(position, request.move)) {
      if (metrics) {
        if (failures === 0) metrics.firstTrySuccesses++;
        else metrics.retrySuccesses++;
      }
      return { move: request.move, failures, reason: 'resolved', failedAttempts };
    }

    failures++;
    const kind: AttemptFailureKind = request.move !== null
      ? 'agent_illegal_move'
      : request.failure ?? 'agent_malformed_output';
    const record: AttemptRecord = { attempt: attempt + 1, kind, candidates: request.candidates };
    failedAttempts.push(record);
    if (metrics) metrics.failureCounts.set(kind, (metrics.failureCounts.get(kind) ?? 0) + 1);
    options.onAttemptFailed?.(record);

    if (attempt < maxAttempts - 1) {
      console.log(`${identity}: retrying move (${attempt + 1}/${maxAttempts})...`);
      await wait(pacingDelayMs);
    }
  }

  if (metrics) metrics.exhaustedTurns++;
  return { move: null, failures, reason: 'exhausted', failedAttempts };
}
