/**
 * Agent Client - one prompt, one external invocation, one candidate move.
 */

import type { Move, RulesAdapter } from '../rules/types';
import type { AgentAuditTrail, InvocationOutcome } from '../server/audit-log';
import { extractMove } from './move-parser';
import { buildMovePrompt } from './prompts';
import type {
  AgentIdentity,
  AgentInvocation,
  AgentTransport,
  AttemptFailureKind,
  MoveRequestOptions,
  MoveRequestResult,
  MoveSource,
} from './types';

export interface AgentClientConfig {
  /** Hard wall-clock limit per invocation. Default: 30000 */
  timeoutMs: number;
}

export const DEFAULT_AGENT_CLIENT_CONFIG: AgentClientConfig = {
  timeoutMs: 30_000,
};

export interface AgentClientOptions<P> {
  rules: RulesAdapter<P>;
  transport: AgentTransport;
  audit?: AgentAuditTrail;
  /** Attached to audit entries */
  gameId?: string;
  config?: Partial<AgentClientConfig>;
}

function outcomeFor(invocation: AgentInvocation, failure: AttemptFailureKind | undefined): InvocationOutcome {
  if (invocation.status === 'timeout') return 'timeout';
  if (invocation.status === 'error') return 'process_error';
  if (failure === 'agent_illegal_move') return 'illegal_moves_only';
  if (failure === 'agent_malformed_output') return 'no_move_found';
  return 'legal_move';
}

export class AgentClient<P> implements MoveSource<P> {
  private rules: RulesAdapter<P>;
  private transport: AgentTransport;
  private audit: AgentAuditTrail | undefined;
  private config: AgentClientConfig;
  private gameId: string | undefined;

  constructor(options: AgentClientOptions<P>) {
    this.rules = options.rules;
    this.transport = options.transport;
    this.audit = options.audit;
    this.gameId = options.gameId;
    this.config = { ...DEFAULT_AGENT_CLIENT_CONFIG, ...options.config };
  }

  setGameId(gameId: string | undefined): void {
    this.gameId = gameId;
  }

  /**
   * Asks one agent for a move. Every recoverable failure resolves with
   * `move: null`; only AgentSpawnError rejects. `options.timeoutMs`
   * replaces the configured timeout for this request.
   */
  async requestMove(
    identity: AgentIdentity,
    position: P,
    history: readonly Move[],
    options: MoveRequestOptions = {},
  ): Promise<MoveRequestResult> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const legalMoves = this.rules.legalMoves(position);
    const prompt = buildMovePrompt({
      fen: this.rules.toStandardNotation(position),
      history,
      legalMoves,
    });

    const invocation = await this.transport.invoke(identity, prompt, timeoutMs);

    let result: MoveRequestResult;
    if (invocation.status === 'timeout') {
      console.warn(`[${identity}] Timed out after ${timeoutMs}ms.`);
      result = { move: null, failure: 'agent_timeout', candidates: [], durationMs: invocation.durationMs };
    } else if (invocation.status === 'error') {
      console.warn(`[${identity}] Agent process error: ${invocation.error}`);
      result = { move: null, failure: 'agent_process_error', candidates: [], durationMs: invocation.durationMs };
    } else {
      const { move, candidates } = extractMove(invocation.stdout, legalMoves);
      if (move) {
        result = { move, candidates, durationMs: invocation.durationMs };
      } else {
        result = {
          move: null,
          failure: candidates.length > 0 ? 'agent_illegal_move' : 'agent_malformed_output',
          candidates,
          durationMs: invocation.durationMs,
        };
      }
    }

    this.audit?.record({
      gameId: this.gameId,
      identity,
      prompt,
      stdout: invocation.stdout,
      stderr: invocation.status === 'error' ? `${invocation.stderr}${invocation.error}` : invocation.stderr,
      status: invocation.status,
      exitCode: invocation.status === 'ok' ? invocation.exitCode : undefined,
      outcome: outcomeFor(invocation, result.failure),
      move: result.move ?? undefined,
      durationMs: invocation.durationMs,
    });

    return result;
  }
}
