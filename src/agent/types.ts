/**
 * Core types for querying move-generating agents.
 *
 * An agent is an external, unreliable process (typically an LLM behind
 * `ollama run <model>`) that receives a prompt and answers with free text.
 */

import type { Move } from '../rules/types';

/**
 * Name of the external model/process to invoke.
 */
export type AgentIdentity = string;

/**
 * Raw outcome of one transport invocation.
 */
export type AgentInvocation =
  | { status: 'ok'; stdout: string; stderr: string; exitCode: number | null; durationMs: number }
  | { status: 'timeout'; stdout: string; stderr: string; durationMs: number }
  | { status: 'error'; error: string; stdout: string; stderr: string; durationMs: number };

/**
 * Sends a prompt to an agent and collects its output.
 *
 * Implementations resolve for every recoverable failure (timeouts, crashes,
 * HTTP errors) and reject only with AgentSpawnError when the agent cannot be
 * started at all.
 */
export interface AgentTransport {
  invoke(identity: AgentIdentity, prompt: string, timeoutMs: number): Promise<AgentInvocation>;
}

/**
 * Why a single attempt failed to produce a usable move.
 */
export type AttemptFailureKind =
  | 'agent_timeout'
  | 'agent_malformed_output'
  | 'agent_illegal_move'
  | 'agent_process_error';

/**
 * Result of one Agent Client request.
 */
export interface MoveRequestResult {
  move: Move | null;
  /** Set when move is null */
  failure?: AttemptFailureKind;
  /** Every coordinate token found in the output, in order */
  candidates: Move[];
  durationMs: number;
}

/**
 * Per-request options a move source honours.
 */
export interface MoveRequestOptions {
  /** Hard wall-clock limit for this request; overrides the source's own default */
  timeoutMs?: number;
}

/**
 * Anything that can be asked for a move. The Agent Client is the production
 * implementation; tests substitute scripted sources.
 */
export interface MoveSource<P> {
  requestMove(
    identity: AgentIdentity,
    position: P,
    history: readonly Move[],
    options?: MoveRequestOptions,
  ): Promise<MoveRequestResult>;
  /** Tags subsequent requests with a game, for auditing */
  setGameId?(gameId: string | undefined): void;
}

/**
 * Raised when the agent command cannot be started (missing binary,
 * permission denied). Ends the session rather than consuming an attempt.
 */
export class AgentSpawnError extends Error {
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, cause: Error, code?: string) {
    super(`Failed to start agent command "${command}": ${cause.message}`);
    this.name = 'AgentSpawnError';
    this.command = command;
    this.code = code;
  }
}
