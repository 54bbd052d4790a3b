/**
 * Cooperative mode: a human against two agents sharing one side.
 *
 * Human turn: strict intake, anything but a legal move ends the game.
 * Agent turn (an episode): SELECT_LEADER -> RESOLVE_ONE -> APPLY | ESCALATE,
 * bounded by a FailureLedger. Each failed resolution costs the leader a
 * penalty of maxRetries, which hands leadership to the co-agent; when the
 * combined weight reaches maxTotalFail the turn goes back to the human.
 */

import { opponentOf, type Side } from '../rules/types';
import type { AgentIdentity } from '../agent/types';
import { sleep } from '../agent/move-retry';
import { runAgentResolution, type ArbiterDeps } from './agent-resolution';
import { createFailureLedger, penalize, selectLeader, totalWeight } from './failure-ledger';
import { describeRejection, evaluateHumanInput, type HumanMoveSource } from './human-intake';
import type { CooperativeSeats, TurnArbiter, TurnContext, TurnDecision } from './types';

export class CooperativeArbiter<P> implements TurnArbiter<P> {
  readonly mode = 'cooperative' as const;
  private deps: ArbiterDeps<P>;
  private seats: CooperativeSeats;
  private human: HumanMoveSource;

  constructor(deps: ArbiterDeps<P>, seats: CooperativeSeats, human: HumanMoveSource) {
    this.deps = deps;
    this.seats = seats;
    this.human = human;
  }

  actorFor(side: Side): AgentIdentity | 'human' {
    if (side === this.seats.humanSide) return 'human';
    return this.seats.agents.join(' + ');
  }

  playTurn(context: TurnContext<P>): Promise<TurnDecision> {
    const side = this.deps.rules.activeSide(context.position);
    return side === this.seats.humanSide
      ? this.humanTurn(context, side)
      : this.agentEpisode(context, side);
  }

  private async humanTurn(context: TurnContext<P>, side: Side): Promise<TurnDecision> {
    const { rules } = this.deps;
    const legalMoves = rules.legalMoves(context.position);
    const raw = await this.human.readMove({
      side,
      fen: rules.toStandardNotation(context.position),
      legalMoves,
    });
    const verdict = evaluateHumanInput(raw, legalMoves);

    switch (verdict.kind) {
      case 'move':
        return { kind: 'apply', side, actor: 'human', move: verdict.move, failures: 0 };
      case 'help':
        await this.human.showLegalMoves(legalMoves);
        return {
          kind: 'abort',
          side,
          reason: 'human_requested_moves',
          detail: 'Legal moves shown. Game ended.',
        };
      case 'rejected':
        return { kind: 'abort', side, reason: 'human_input_rejected', detail: describeRejection(verdict) };
    }
  }

  private async agentEpisode(context: TurnContext<P>, side: Side): Promise<TurnDecision> {
    const { config } = this.deps;
    const wait = this.deps.sleep ?? sleep;
    const [first, second] = this.seats.agents;
    let ledger = createFailureLedger();

    while (totalWeight(ledger) < config.maxTotalFail) {
      const leader = selectLeader(ledger);
      const agent = leader === 0 ? first : second;
      const partner = leader === 0 ? second : first;

      const resolution = await runAgentResolution(this.deps, agent, context);

      if (resolution.status === 'unavailable') {
        return { kind: 'abort', side, reason: 'agent_unavailable', detail: resolution.error.message };
      }
      if (resolution.status === 'completed') {
        const { move, failures, reason } = resolution.result;
        if (move !== null) {
          return { kind: 'apply', side, actor: agent, move, failures };
        }
        if (reason === 'terminal') {
          return {
            kind: 'abort',
            side,
            reason: 'early_termination',
            detail: `Position became terminal while ${agent} was moving`,
          };
        }
        console.log(`${agent} exhausted ${config.maxRetries} attempts. Switching to ${partner}.`);
      } else {
        console.log(`${agent} gave no result within ${resolution.deadlineMs}ms. Switching to ${partner}.`);
      }

      // The penalty equals a full budget whether the attempts ran or not.
      ledger = penalize(ledger, leader, config.maxRetries);
      await wait(config.pacingDelayMs);
    }

    console.warn(`Agents exceeded ${config.maxTotalFail} failed attempts. Turn returns to ${opponentOf(side)}.`);
    return { kind: 'handback', side, humanSide: this.seats.humanSide, ledger };
  }
}
