/**
 * Autonomous mode: one agent per side.
 *
 * SELECT_AGENT -> RESOLVE -> APPLY | SKIP | ABORT
 */

import type { Side } from '../rules/types';
import type { AgentIdentity } from '../agent/types';
import { runAgentResolution, type ArbiterDeps } from './agent-resolution';
import type { AutonomousSeats, TurnArbiter, TurnContext, TurnDecision } from './types';

export class AutonomousArbiter<P> implements TurnArbiter<P> {
  readonly mode = 'autonomous' as const;
  private deps: ArbiterDeps<P>;
  private seats: AutonomousSeats;

  constructor(deps: ArbiterDeps<P>, seats: AutonomousSeats) {
    this.deps = deps;
    this.seats = seats;
  }

  actorFor(side: Side): AgentIdentity {
    return this.seats[side];
  }

  async playTurn(context: TurnContext<P>): Promise<TurnDecision> {
    const { rules, config } = this.deps;
    const side = rules.activeSide(context.position);
    const agent = this.actorFor(side);

    const resolution = await runAgentResolution(this.deps, agent, context);

    if (resolution.status === 'unavailable') {
      return { kind: 'abort', side, reason: 'agent_unavailable', detail: resolution.error.message };
    }
    if (resolution.status === 'expired') {
      console.error(`${agent} timed out or gave no response within ${resolution.deadlineMs}ms.`);
      return {
        kind: 'abort',
        side,
        reason: 'deadline_exceeded',
        detail: `${agent} gave no result within ${resolution.deadlineMs}ms`,
      };
    }

    const { move, failures } = resolution.result;
    if (move !== null) {
      return { kind: 'apply', side, actor: agent, move, failures };
    }
    if (failures >= config.maxRetries) {
      console.log(`${agent} exhausted ${config.maxRetries} attempts. Skipping turn...`);
      return { kind: 'skip', side, agent, failures };
    }
    // Only reachable when the loop stopped early, e.g. on a terminal position.
    return {
      kind: 'abort',
      side,
      reason: 'early_termination',
      detail: `No move from ${agent} after ${failures} failed attempts (${resolution.result.reason})`,
    };
  }
}
