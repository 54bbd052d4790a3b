/**
 * Tests for autonomous.ts: agent vs agent turn arbitration.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AutonomousArbiter } from '../autonomous';
import type { ArbiterDeps } from '../agent-resolution';
import { ChessRules } from '../../rules/chess-rules';
import { AgentSpawnError, type MoveRequestResult } from '../../agent/types';
import { resolveConfig, type EngineConfig } from '../../session/config';
import { ScriptedSource, legalReply, malformedReply } from '../../test/fixtures';
import type { Chess } from 'chess.js';

const rules = new ChessRules();
const seats = { white: 'alpha', black: 'beta' };

function makeDeps(source: ScriptedSource, overrides: Partial<EngineConfig> = {}) {
  const sleep = vi.fn(async (_ms: number) => {});
  const deps: ArbiterDeps<Chess> = {
    rules,
    source,
    config: resolveConfig({ pacingDelayMs: 0, moveDelayMs: 0, ...overrides }),
    sleep,
  };
  return { deps, sleep };
}

describe('AutonomousArbiter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should seat one agent per side', () => {
    const { deps } = makeDeps(ScriptedSource.alwaysFailing());
    const arbiter = new AutonomousArbiter(deps, seats);
    expect(arbiter.actorFor('white')).toBe('alpha');
    expect(arbiter.actorFor('black')).toBe('beta');
  });

  it('should ask the agent of the side to move', async () => {
    const source = ScriptedSource.sequence(['e7e5']);
    const { deps } = makeDeps(source);
    const position = rules.newPosition();
    rules.apply(position, 'e2e4');

    const decision = await new AutonomousArbiter(deps, seats).playTurn({ position, history: ['e2e4'] });

    expect(decision).toEqual({ kind: 'apply', side: 'black', actor: 'beta', move: 'e7e5', failures: 0 });
    expect(source.identities).toEqual(['beta']);
  });

  it('should report failures consumed before the move', async () => {
    const source = new ScriptedSource((_id, call) => (call < 3 ? malformedReply() : legalReply('e2e4')));
    const { deps } = makeDeps(source);

    const decision = await new AutonomousArbiter(deps, seats).playTurn({ position: rules.newPosition(), history: [] });

    expect(decision).toEqual({ kind: 'apply', side: 'white', actor: 'alpha', move: 'e2e4', failures: 3 });
  });

  it('should skip the turn once the agent exhausts its attempts', async () => {
    const source = ScriptedSource.alwaysFailing();
    const { deps, sleep } = makeDeps(source, { maxRetries: 5 });
    const position = rules.newPosition();

    const decision = await new AutonomousArbiter(deps, seats).playTurn({ position, history: [] });

    expect(decision).toEqual({ kind: 'skip', side: 'white', agent: 'alpha', failures: 5 });
    expect(source.calls).toHaveLength(5);
    expect(sleep).toHaveBeenCalledTimes(4);
    // Arbiters decide; they never touch the position.
    expect(rules.activeSide(position)).toBe('white');
  });

  it('should abort when the outer deadline passes', async () => {
    const source = new ScriptedSource(() => new Promise<MoveRequestResult>(() => {}));
    const { deps } = makeDeps(source, { maxRetries: 1, agentTimeoutMs: 0, deadlineGraceMs: 20 });

    const decision = await new AutonomousArbiter(deps, seats).playTurn({ position: rules.newPosition(), history: [] });

    expect(decision).toEqual({
      kind: 'abort',
      side: 'white',
      reason: 'deadline_exceeded',
      detail: 'alpha gave no result within 20ms',
    });
  });

  it('should abort when the agent cannot be started', async () => {
    const source = new ScriptedSource(() => {
      throw new AgentSpawnError('ollama', new Error('not found'), 'ENOENT');
    });
    const { deps } = makeDeps(source);

    const decision = await new AutonomousArbiter(deps, seats).playTurn({ position: rules.newPosition(), history: [] });

    expect(decision).toEqual({
      kind: 'abort',
      side: 'white',
      reason: 'agent_unavailable',
      detail: 'Failed to start agent command "ollama": not found',
    });
  });

  it('should abort when the loop stops without using its attempts', async () => {
    const position = rules.fromStandardNotation('k7/8/1Q6/8/8/8/8/7K b - - 0 1');
    const { deps } = makeDeps(ScriptedSource.alwaysFailing());

    const decision = await new AutonomousArbiter(deps, seats).playTurn({ position, history: [] });

    expect(decision).toMatchObject({ kind: 'abort', side: 'black', reason: 'early_termination' });
  });
});
