/**
 * Types for turn arbitration.
 *
 * An arbiter decides what happens on the current turn. It never mutates the
 * position or history: it returns a TurnDecision and the session commits it.
 */

import type { Move, Side } from '../rules/types';
import type { AgentIdentity } from '../agent/types';

export type GameMode = 'autonomous' | 'cooperative';

/**
 * Why a game ends without reaching a terminal position.
 */
export type AbortReason =
  | 'early_termination'
  | 'deadline_exceeded'
  | 'human_input_rejected'
  | 'human_requested_moves'
  | 'illegal_agent_commit'
  | 'agent_unavailable'
  | 'stopped';

/**
 * Cooperative failure weights, one per agent, for a single episode.
 */
export interface FailureLedger {
  weights: [number, number];
}

export type TurnDecision =
  | { kind: 'apply'; side: Side; actor: AgentIdentity | 'human'; move: Move; failures: number }
  /** Agent used its whole budget: possession passes, no ply recorded */
  | { kind: 'skip'; side: Side; agent: AgentIdentity; failures: number }
  /** Cooperative budget exhausted: possession goes back to the human */
  | { kind: 'handback'; side: Side; humanSide: Side; ledger: FailureLedger }
  | { kind: 'abort'; side: Side; reason: AbortReason; detail: string };

/**
 * Read-only view of the game for one turn.
 */
export interface TurnContext<P> {
  position: P;
  history: readonly Move[];
}

export interface TurnArbiter<P> {
  readonly mode: GameMode;
  playTurn(context: TurnContext<P>): Promise<TurnDecision>;
  /** Who plays `side`, for logs and events */
  actorFor(side: Side): AgentIdentity | 'human';
}

export interface AutonomousSeats {
  white: AgentIdentity;
  black: AgentIdentity;
}

export interface CooperativeSeats {
  /** First-listed agent wins leadership ties */
  agents: [AgentIdentity, AgentIdentity];
  humanSide: Side;
}
