/**
 * Test doubles shared by the engine tests.
 */

import type { Chess } from 'chess.js';
import { ChessRules } from '../rules/chess-rules';
import type { Move } from '../rules/types';
import type { AgentIdentity, MoveRequestOptions, MoveRequestResult, MoveSource } from '../agent/types';
import type { HumanMoveRequest, HumanMoveSource } from '../arbiter/human-intake';

export function legalReply(move: Move): MoveRequestResult {
  return { move, candidates: [move], durationMs: 0 };
}

export function malformedReply(): MoveRequestResult {
  return { move: null, failure: 'agent_malformed_output', candidates: [], durationMs: 0 };
}

export function timeoutReply(): MoveRequestResult {
  return { move: null, failure: 'agent_timeout', candidates: [], durationMs: 0 };
}

type Reply = MoveRequestResult | Promise<MoveRequestResult>;

/**
 * A move source that answers from a script and records every request.
 */
export class ScriptedSource implements MoveSource<Chess> {
  readonly calls: { identity: AgentIdentity; history: Move[] }[] = [];
  readonly gameIds: (string | undefined)[] = [];
  readonly timeouts: (number | undefined)[] = [];
  private script: (identity: AgentIdentity, call: number) => Reply;

  constructor(script: (identity: AgentIdentity, call: number) => Reply) {
    this.script = script;
  }

  /**
   * Plays the given moves in order, one per request, then fails.
   */
  static sequence(moves: Move[]): ScriptedSource {
    return new ScriptedSource((_identity, call) => (call < moves.length ? legalReply(moves[call]) : malformedReply()));
  }

  static alwaysFailing(): ScriptedSource {
    return new ScriptedSource(() => malformedReply());
  }

  async requestMove(
    identity: AgentIdentity,
    _position: Chess,
    history: readonly Move[],
    options: MoveRequestOptions = {},
  ): Promise<MoveRequestResult> {
    const call = this.calls.length;
    this.timeouts.push(options.timeoutMs);
    this.calls.push({ identity, history: [...history] });
    return this.script(identity, call);
  }

  setGameId(gameId: string | undefined): void {
    this.gameIds.push(gameId);
  }

  get identities(): AgentIdentity[] {
    return this.calls.map((c) => c.identity);
  }
}

/**
 * A human that types the given answers in order.
 */
export class ScriptedHuman implements HumanMoveSource {
  readonly requests: HumanMoveRequest[] = [];
  readonly shown: Move[][] = [];
  private answers: (string | null)[];

  constructor(answers: (string | null)[]) {
    this.answers = [...answers];
  }

  async readMove(request: HumanMoveRequest): Promise<string | null> {
    this.requests.push(request);
    return this.answers.shift() ?? null;
  }

  showLegalMoves(moves: readonly Move[]): void {
    this.shown.push([...moves]);
  }
}

/**
 * Rules whose games start from a fixed FEN.
 */
export class RulesFromFen extends ChessRules {
  private fen: string;

  constructor(fen: string) {
    super();
    this.fen = fen;
  }

  newPosition(): Chess {
    return this.fromStandardNotation(this.fen);
  }
}

export const noSleep = async (_ms: number): Promise<void> => {};
