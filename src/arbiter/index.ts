/**
 * Turn Arbitration Module
 *
 * Decides each turn's outcome for the two game modes:
 * - Autonomous: agent vs agent, skip a side that exhausts its budget
 * - Cooperative: human vs two agents with leader failover
 */

export type {
  GameMode,
  AbortReason,
  FailureLedger,
  TurnDecision,
  TurnContext,
  TurnArbiter,
  AutonomousSeats,
  CooperativeSeats,
} from './types';

export { AutonomousArbiter } from './autonomous';
export { CooperativeArbiter } from './cooperative';
export { runAgentResolution } from './agent-resolution';
export type { ArbiterDeps, AgentResolution } from './agent-resolution';
export { runWithDeadline } from './deadline';
export type { DeadlineOutcome } from './deadline';
export { createFailureLedger, selectLeader, penalize, totalWeight } from './failure-ledger';
export { evaluateHumanInput, describeRejection } from './human-intake';
export { ask, createTerminalHuman } from './terminal-human';
export type { TerminalHumanOptions } from './terminal-human';
export type {
  HumanMoveSource,
  HumanMoveRequest,
  HumanInputVerdict,
  HumanInputRejection,
} from './human-intake';
