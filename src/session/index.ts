/**
 * Game Session Module
 *
 * The match loop: applies arbiter decisions, detects the end of the game,
 * keeps the win tally, and reports events.
 */

export type {
  GameId,
  GameStatus,
  GameResult,
  SessionState,
  SessionEvent,
  SessionEventCallback,
} from './types';

export {
  DEFAULT_ENGINE_CONFIG,
  resolveConfig,
  validateConfig,
  loadConfigFromEnv,
  computeTurnDeadlineMs,
} from './config';
export type { EngineConfig } from './config';

export { createTally, registerIdentities, recordWin, formatTally } from './tally';
export type { TallyState } from './tally';

export { GameSession } from './game-session';
export type { GameSessionOptions } from './game-session';
