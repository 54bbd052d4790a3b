/**
 * Game session management.
 *
 * Owns the position, move history, tally, and the match loop. Arbiters
 * decide each turn; only the session mutates state, after a decision has
 * been handed back.
 */

import { opponentOf, type Move, type RulesAdapter, type Side } from '../rules/types';
import type { AgentIdentity, MoveSource } from '../agent/types';
import { sleep, type MoveRetryMetrics } from '../agent/move-retry';
import { AutonomousArbiter } from '../arbiter/autonomous';
import { CooperativeArbiter } from '../arbiter/cooperative';
import type { ArbiterDeps } from '../arbiter/agent-resolution';
import type { HumanMoveSource } from '../arbiter/human-intake';
import type { AbortReason, GameMode, TurnArbiter, TurnDecision } from '../arbiter/types';
import { GameLogger } from '../server/game-logger';
import { resolveConfig, type EngineConfig } from './config';
import { createTally, recordWin, registerIdentities, type TallyState } from './tally';
import type {
  GameId,
  GameResult,
  SessionEvent,
  SessionEventCallback,
  SessionState,
} from './types';

function generateGameId(): GameId {
  return `game_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

export interface GameSessionOptions<P> {
  rules: RulesAdapter<P>;
  /** Usually an AgentClient */
  source: MoveSource<P>;
  /** Required for cooperative games */
  human?: HumanMoveSource;
  config?: Partial<EngineConfig>;
  /** JSONL game log; enabled by default under logs/games */
  gameLog?: { enabled?: boolean; logsDir?: string };
  metrics?: MoveRetryMetrics;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export class GameSession<P> {
  private rules: RulesAdapter<P>;
  private source: MoveSource<P>;
  private human: HumanMoveSource | undefined;
  private config: EngineConfig;
  private gameLog: { enabled: boolean; logsDir?: string };
  private metrics: MoveRetryMetrics | undefined;
  private wait: (ms: number) => Promise<void>;

  private state: SessionState<P>;
  private arbiter: TurnArbiter<P> | null = null;
  private logger: GameLogger | null = null;
  private stopRequested = false;
  private lastResult: GameResult | null = null;
  private eventCallbacks: SessionEventCallback[] = [];

  constructor(options: GameSessionOptions<P>) {
    this.rules = options.rules;
    this.source = options.source;
    this.human = options.human;
    this.config = resolveConfig(options.config);
    this.gameLog = { enabled: options.gameLog?.enabled !== false, logsDir: options.gameLog?.logsDir };
    this.metrics = options.metrics;
    this.wait = options.sleep ?? sleep;
    this.state = {
      gameId: null,
      mode: null,
      position: this.rules.newPosition(),
      history: [],
      tally: createTally(),
      running: false,
    };
  }

  /**
   * Registers an event listener.
   */
  onEvent(callback: SessionEventCallback): () => void {
    this.eventCallbacks.push(callback);
    return () => {
      const idx = this.eventCallbacks.indexOf(callback);
      if (idx !== -1) {
        this.eventCallbacks.splice(idx, 1);
      }
    };
  }

  private emit(event: SessionEvent): void {
    for (const callback of this.eventCallbacks) {
      try {
        callback(event);
      } catch (err) {
        console.error('Session event callback error:', err);
      }
    }
  }

  /**
   * Plays a whole game and resolves with its result.
   *
   * Autonomous: agents[0] plays White, agents[1] plays Black.
   * Cooperative: both agents share the side opposite the human.
   */
  async startGame(mode: GameMode, agents: readonly AgentIdentity[]): Promise<GameResult> {
    this.beginGame(mode, agents);
    while (this.state.running) {
      await this.playTurn();
    }
    if (!this.lastResult) {
      throw new Error('Game loop ended without a result');
    }
    return this.lastResult;
  }

  /**
   * Resets the board and selects the arbiter for this game's mode.
   */
  beginGame(mode: GameMode, agents: readonly AgentIdentity[]): GameId {
    if (this.state.running) {
      throw new Error('A game is already running.');
    }
    if (agents.length !== 2 || agents.some((a) => a.trim().length === 0)) {
      throw new Error(`Expected two agent identities, got ${JSON.stringify(agents)}`);
    }
    if (mode === 'cooperative' && !this.human) {
      throw new Error('Cooperative mode needs a human move source');
    }
    const [first, second] = agents;

    const gameId = generateGameId();
    this.logger = this.gameLog.enabled ? new GameLogger(gameId, this.gameLog.logsDir) : null;
    const deps: ArbiterDeps<P> = {
      rules: this.rules,
      source: this.source,
      config: this.config,
      metrics: this.metrics,
      sleep: this.wait,
      logger: this.logger ?? undefined,
    };

    if (mode === 'autonomous') {
      this.arbiter = new AutonomousArbiter(deps, { white: first, black: second });
      this.state.tally = registerIdentities(this.state.tally, [first, second]);
    } else if (this.human) {
      this.arbiter = new CooperativeArbiter(
        deps,
        { agents: [first, second], humanSide: this.config.humanSide },
        this.human,
      );
    }

    this.state = {
      ...this.state,
      gameId,
      mode,
      position: this.rules.newPosition(),
      history: [],
      running: true,
    };
    this.stopRequested = false;
    this.lastResult = null;
    this.source.setGameId?.(gameId);

    this.logger?.gameStarted(mode, [first, second]);
    this.emit({
      type: 'GAME_STARTED',
      gameId,
      mode,
      agents: [first, second],
      fen: this.rules.toStandardNotation(this.state.position),
    });
    return gameId;
  }

  /**
   * Plays one turn. Returns the decision taken, or null when the game had
   * already ended (terminal position or stop request).
   */
  async playTurn(): Promise<TurnDecision | null> {
    const { arbiter, state } = this;
    if (!state.running || !arbiter || state.gameId === null) {
      throw new Error('No game is running.');
    }

    if (this.stopRequested) {
      this.finishAborted('stopped', 'Game stopped by operator');
      return null;
    }
    if (this.rules.isTerminal(state.position)) {
      this.finishTerminal();
      return null;
    }

    const side = this.rules.activeSide(state.position);
    const ply = state.history.length + 1;
    const actor = arbiter.actorFor(side);
    this.logger?.turnStarted(ply, side, actor);
    this.emit({ type: 'TURN_STARTED', gameId: state.gameId, ply, side, actor });

    let decision: TurnDecision;
    try {
      decision = await arbiter.playTurn({ position: state.position, history: state.history });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.error(message, 'playTurn', error instanceof Error ? error.stack : undefined);
      this.finishAborted('early_termination', `Unexpected error: ${message}`);
      throw error;
    }

    await this.commit(decision);

    if (this.state.running && this.rules.isTerminal(this.state.position)) {
      this.finishTerminal();
    }
    return decision;
  }

  /**
   * Ends the running game after the current turn.
   */
  stop(): void {
    if (this.state.running) {
      this.stopRequested = true;
    }
  }

  private async commit(decision: TurnDecision): Promise<void> {
    const { position } = this.state;
    const gameId = this.state.gameId ?? '';

    switch (decision.kind) {
      case 'apply': {
        // Re-checked against the live position, not the set the agent saw.
        if (!this.rules.isLegal(position, decision.move)) {
          const detail = `${decision.actor} made an illegal move: ${decision.move}`;
          console.error(`Illegal move: ${detail}`);
          this.logger?.error(detail, 'commit');
          this.finishAborted('illegal_agent_commit', detail);
          return;
        }
        this.rules.apply(position, decision.move);
        this.state.history.push(decision.move);
        const ply = this.state.history.length;
        this.logger?.moveApplied(ply, decision.side, decision.actor, decision.move, decision.failures);
        this.emit({
          type: 'MOVE_APPLIED',
          gameId,
          ply,
          side: decision.side,
          actor: decision.actor,
          move: decision.move,
          failures: decision.failures,
          fen: this.rules.toStandardNotation(position),
        });
        await this.pause();
        return;
      }

      case 'skip':
        this.rules.setActiveSide(position, opponentOf(decision.side));
        this.logger?.turnSkipped(decision.side, decision.agent, decision.failures);
        this.emit({
          type: 'TURN_SKIPPED',
          gameId,
          side: decision.side,
          agent: decision.agent,
          failures: decision.failures,
          fen: this.rules.toStandardNotation(position),
        });
        await this.pause();
        return;

      case 'handback': {
        this.rules.setActiveSide(position, decision.humanSide);
        const message = `Agents exceeded ${this.config.maxTotalFail} failed attempts. It's your turn again.`;
        this.logger?.possessionReturned(decision.humanSide, [...decision.ledger.weights]);
        this.emit({
          type: 'POSSESSION_RETURNED',
          gameId,
          side: decision.humanSide,
          ledger: [decision.ledger.weights[0], decision.ledger.weights[1]],
          message,
        });
        return;
      }

      case 'abort':
        this.logger?.warning(decision.detail, decision.reason);
        this.finishAborted(decision.reason, decision.detail);
        return;
    }
  }

  private async pause(): Promise<void> {
    if (this.config.moveDelayMs > 0) {
      await this.wait(this.config.moveDelayMs);
    }
  }

  private finishTerminal(): void {
    const { position, mode } = this.state;
    const reason = this.rules.terminalReason(position);

    if (reason !== 'checkmate') {
      this.finish({ status: 'draw', reason });
      return;
    }

    // The side to move is the side that has been mated.
    const winnerSide = opponentOf(this.rules.activeSide(position));
    if (mode === 'cooperative') {
      const winner = winnerSide === this.config.humanSide ? 'You' : 'Agents';
      this.finish({ status: 'checkmate', reason, winnerSide, winner });
      return;
    }

    const winner = this.arbiter?.actorFor(winnerSide) ?? winnerSide;
    this.state.tally = recordWin(this.state.tally, winner);
    this.emit({ type: 'TALLY_UPDATED', tally: this.state.tally });
    this.finish({ status: 'checkmate', reason, winnerSide, winner });
  }

  private finishAborted(reason: AbortReason, detail: string): void {
    // An abort on a finished board still reports the board's result.
    if (this.rules.isTerminal(this.state.position)) {
      this.finishTerminal();
      return;
    }
    this.finish({ status: 'aborted', reason, detail });
  }

  private finish(outcome: Pick<GameResult, 'status' | 'reason' | 'winnerSide' | 'winner' | 'detail'>): void {
    const { gameId, mode, history, tally } = this.state;
    const result: GameResult = {
      gameId: gameId ?? '',
      mode: mode ?? 'autonomous',
      ...outcome,
      plies: history.length,
      history: [...history],
      tally,
    };

    this.state.running = false;
    this.lastResult = result;
    this.source.setGameId?.(undefined);
    this.logger?.gameEnded(result.status, result.reason, result.plies, result.winner);
    this.emit({ type: 'GAME_ENDED', gameId: result.gameId, result });
  }

  getGameId(): GameId | null {
    return this.state.gameId;
  }

  getMode(): GameMode | null {
    return this.state.mode;
  }

  isRunning(): boolean {
    return this.state.running;
  }

  getPosition(): P {
    return this.state.position;
  }

  getHistory(): Move[] {
    return [...this.state.history];
  }

  getActiveSide(): Side {
    return this.rules.activeSide(this.state.position);
  }

  getTally(): TallyState {
    return this.state.tally;
  }

  getLastResult(): GameResult | null {
    return this.lastResult;
  }

  getGameLogPath(): string | null {
    return this.logger?.getLogPath() ?? null;
  }
}
