/**
 * Runs one Retry Coordinator resolution under the outer deadline.
 * Shared by both arbiters.
 */

import type { RulesAdapter } from '../rules/types';
import { AgentSpawnError, type AgentIdentity, type MoveSource } from '../agent/types';
import { resolveTurn, type MoveRetryMetrics, type ResolveTurnResult } from '../agent/move-retry';
import type { GameLogger } from '../server/game-logger';
import { computeTurnDeadlineMs, type EngineConfig } from '../session/config';
import { runWithDeadline } from './deadline';
import type { TurnContext } from './types';

export interface ArbiterDeps<P> {
  rules: RulesAdapter<P>;
  source: MoveSource<P>;
  config: EngineConfig;
  metrics?: MoveRetryMetrics;
  logger?: GameLogger;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export type AgentResolution =
  | { status: 'completed'; result: ResolveTurnResult }
  | { status: 'expired'; deadlineMs: number }
  | { status: 'unavailable'; error: AgentSpawnError };

export async function runAgentResolution<P>(
  deps: ArbiterDeps<P>,
  identity: AgentIdentity,
  context: TurnContext<P>,
): Promise<AgentResolution> {
  const deadlineMs = computeTurnDeadlineMs(deps.config);
  const history = [...context.history];

  try {
    const outcome = await runWithDeadline(
      (signal) =>
        resolveTurn(deps.source, deps.rules, identity, context.position, history, {
          maxAttempts: deps.config.maxRetries,
          pacingDelayMs: deps.config.pacingDelayMs,
          timeoutMs: deps.config.agentTimeoutMs,
          signal,
          metrics: deps.metrics,
          sleep: deps.sleep,
          onAttemptFailed: (record) =>
            deps.logger?.attemptFailed(identity, record.attempt, record.kind, record.candidates),
        }),
      deadlineMs,
    );
    if (outcome.status === 'expired') {
      return { status: 'expired', deadlineMs };
    }
    return { status: 'completed', result: outcome.value };
  } catch (error) {
    if (error instanceof AgentSpawnError) {
      return { status: 'unavailable', error };
    }
    throw error;
  }
}
