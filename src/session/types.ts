/**
 * Types for game sessions.
 */

import type { Move, Side, TerminalReason } from '../rules/types';
import type { AgentIdentity } from '../agent/types';
import type { AbortReason, GameMode } from '../arbiter/types';
import type { TallyState } from './tally';

export type GameId = string;

/**
 * How a game ended.
 */
export type GameStatus = 'checkmate' | 'draw' | 'aborted';

export interface GameResult {
  gameId: GameId;
  mode: GameMode;
  status: GameStatus;
  reason: TerminalReason | AbortReason;
  winnerSide?: Side;
  /** Winning identity, or "You" / "Agents" in cooperative games */
  winner?: string;
  /** Human-readable explanation for aborted games */
  detail?: string;
  plies: number;
  history: Move[];
  /** Tally after this game */
  tally: TallyState;
}

/**
 * Everything the session mutates, kept in one place.
 */
export interface SessionState<P> {
  gameId: GameId | null;
  mode: GameMode | null;
  position: P;
  history: Move[];
  tally: TallyState;
  running: boolean;
}

export type SessionEvent =
  | { type: 'GAME_STARTED'; gameId: GameId; mode: GameMode; agents: AgentIdentity[]; fen: string }
  | { type: 'TURN_STARTED'; gameId: GameId; ply: number; side: Side; actor: string }
  | { type: 'MOVE_APPLIED'; gameId: GameId; ply: number; side: Side; actor: string; move: Move; failures: number; fen: string }
  | { type: 'TURN_SKIPPED'; gameId: GameId; side: Side; agent: AgentIdentity; failures: number; fen: string }
  | { type: 'POSSESSION_RETURNED'; gameId: GameId; side: Side; ledger: [number, number]; message: string }
  | { type: 'GAME_ENDED'; gameId: GameId; result: GameResult }
  | { type: 'TALLY_UPDATED'; tally: TallyState };

export type SessionEventCallback = (event: SessionEvent) => void;
