/**
 * Agent layer - Public API
 *
 * Querying external agents for moves: prompt construction, transports,
 * move extraction, and the per-turn retry loop.
 */

export type {
  AgentIdentity,
  AgentInvocation,
  AgentTransport,
  AttemptFailureKind,
  MoveRequestOptions,
  MoveRequestResult,
  MoveSource,
} from './types';
export { AgentSpawnError } from './types';

export { buildMovePrompt, formatLegalMoves, extractLegalMovesFromPrompt } from './prompts';
export { findCoordinateTokens, extractMove } from './move-parser';
export type { MoveExtraction } from './move-parser';

export {
  createCommandTransport,
  createOllamaHttpTransport,
  createMockTransport,
} from './transports';
export type {
  AgentProcess,
  SpawnAgentProcess,
  CommandTransportOptions,
  OllamaHttpTransportOptions,
  MockTransportOptions,
} from './transports';

export { AgentClient, DEFAULT_AGENT_CLIENT_CONFIG } from './agent-client';
export type { AgentClientConfig, AgentClientOptions } from './agent-client';

export {
  resolveTurn,
  createRetryMetrics,
  formatRetryMetrics,
  sleep,
  DEFAULT_MOVE_RETRY_CONFIG,
} from './move-retry';
export type {
  MoveRetryConfig,
  MoveRetryMetrics,
  AttemptRecord,
  ResolveStopReason,
  ResolveTurnResult,
  ResolveTurnOptions,
} from './move-retry';
