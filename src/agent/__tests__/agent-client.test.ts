/**
 * Tests for agent-client.ts: one prompt, one invocation, one candidate.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AgentClient } from '../agent-client';
import { ChessRules } from '../../rules/chess-rules';
import { AgentSpawnError, type AgentInvocation, type AgentTransport } from '../types';
import type { AgentAuditRecord, AgentAuditTrail } from '../../server/audit-log';

const rules = new ChessRules();

function ok(stdout: string): AgentInvocation {
  return { status: 'ok', stdout, stderr: '', exitCode: 0, durationMs: 12 };
}

function stubTransport(invocation: AgentInvocation | Error) {
  const prompts: string[] = [];
  const timeouts: number[] = [];
  const transport: AgentTransport = {
    async invoke(_identity, prompt, timeoutMs) {
      prompts.push(prompt);
      timeouts.push(timeoutMs);
      if (invocation instanceof Error) throw invocation;
      return invocation;
    },
  };
  return { transport, prompts, timeouts };
}

function memoryAudit(): AgentAuditTrail & { entries: AgentAuditRecord[] } {
  const entries: AgentAuditRecord[] = [];
  return {
    entries,
    record(entry) {
      entries.push(entry);
    },
  };
}

describe('AgentClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the first legal move in the output', async () => {
    const { transport } = stubTransport(ok('Let me think. e7e5? No: e2e4'));
    const client = new AgentClient({ rules, transport });

    const result = await client.requestMove('llama3', rules.newPosition(), []);

    expect(result.move).toBe('e2e4');
    expect(result.failure).toBeUndefined();
    expect(result.candidates).toEqual(['e7e5', 'e2e4']);
    expect(result.durationMs).toBe(12);
  });

  it('should send the position, history and legal moves in the prompt', async () => {
    const { transport, prompts } = stubTransport(ok('e7e5'));
    const client = new AgentClient({ rules, transport });
    const position = rules.newPosition();
    rules.apply(position, 'e2e4');

    await client.requestMove('llama3', position, ['e2e4']);

    const lines = prompts[0].split('\n');
    expect(lines[0]).toBe(`Chess state: ${rules.toStandardNotation(position)}`);
    expect(lines[1]).toBe('Move history: e2e4');
    expect(lines[2].startsWith('Legal moves: ')).toBe(true);
    expect(lines[2].split(', ')).toHaveLength(20);
  });

  it('should pass the configured timeout to the transport', async () => {
    const { transport, timeouts } = stubTransport(ok('e2e4'));
    const client = new AgentClient({ rules, transport, config: { timeoutMs: 1234 } });

    await client.requestMove('llama3', rules.newPosition(), []);

    expect(timeouts).toEqual([1234]);
  });

  it('should let a request override the configured timeout', async () => {
    const { transport, timeouts } = stubTransport(ok('e2e4'));
    const client = new AgentClient({ rules, transport, config: { timeoutMs: 1234 } });

    await client.requestMove('llama3', rules.newPosition(), [], { timeoutMs: 500 });
    await client.requestMove('llama3', rules.newPosition(), [], {});

    expect(timeouts).toEqual([500, 1234]);
  });

  it('should classify output with only illegal moves', async () => {
    const { transport } = stubTransport(ok('e2e5'));
    const client = new AgentClient({ rules, transport });

    const result = await client.requestMove('llama3', rules.newPosition(), []);

    expect(result).toEqual({ move: null, failure: 'agent_illegal_move', candidates: ['e2e5'], durationMs: 12 });
  });

  it('should classify output without any move as malformed', async () => {
    const { transport } = stubTransport(ok('I would rather not say.'));
    const client = new AgentClient({ rules, transport });

    const result = await client.requestMove('llama3', rules.newPosition(), []);

    expect(result.move).toBeNull();
    expect(result.failure).toBe('agent_malformed_output');
  });

  it('should classify a timeout', async () => {
    const { transport } = stubTransport({ status: 'timeout', stdout: 'e2e4', stderr: '', durationMs: 30 });
    const client = new AgentClient({ rules, transport });

    const result = await client.requestMove('llama3', rules.newPosition(), []);

    // Partial output from a killed process is not used.
    expect(result).toEqual({ move: null, failure: 'agent_timeout', candidates: [], durationMs: 30 });
  });

  it('should classify a process error', async () => {
    const { transport } = stubTransport({ status: 'error', error: 'crashed', stdout: '', stderr: '', durationMs: 3 });
    const client = new AgentClient({ rules, transport });

    const result = await client.requestMove('llama3', rules.newPosition(), []);

    expect(result.failure).toBe('agent_process_error');
  });

  it('should let AgentSpawnError through', async () => {
    const { transport } = stubTransport(new AgentSpawnError('ollama', new Error('not found'), 'ENOENT'));
    const client = new AgentClient({ rules, transport });

    await expect(client.requestMove('llama3', rules.newPosition(), [])).rejects.toBeInstanceOf(AgentSpawnError);
  });

  describe('audit trail', () => {
    it('should record each invocation with its outcome and game', async () => {
      const audit = memoryAudit();
      const { transport } = stubTransport(ok('e2e4'));
      const client = new AgentClient({ rules, transport, audit, gameId: 'game-1' });

      await client.requestMove('llama3', rules.newPosition(), []);

      expect(audit.entries).toHaveLength(1);
      expect(audit.entries[0]).toMatchObject({
        gameId: 'game-1',
        identity: 'llama3',
        stdout: 'e2e4',
        status: 'ok',
        exitCode: 0,
        outcome: 'legal_move',
        move: 'e2e4',
        durationMs: 12,
      });
      expect(audit.entries[0].prompt.startsWith('Chess state: ')).toBe(true);
    });

    it('should record failures without a move', async () => {
      const audit = memoryAudit();
      const { transport } = stubTransport(ok('e2e5'));
      const client = new AgentClient({ rules, transport, audit });

      await client.requestMove('llama3', rules.newPosition(), []);

      expect(audit.entries[0].outcome).toBe('illegal_moves_only');
      expect(audit.entries[0].move).toBeUndefined();
    });

    it('should append the process error to stderr', async () => {
      const audit = memoryAudit();
      const { transport } = stubTransport({ status: 'error', error: 'crashed', stdout: '', stderr: 'log: ', durationMs: 3 });
      const client = new AgentClient({ rules, transport, audit });

      await client.requestMove('llama3', rules.newPosition(), []);

      expect(audit.entries[0]).toMatchObject({ status: 'error', stderr: 'log: crashed', outcome: 'process_error' });
    });

    it('should follow the game id set on the client', async () => {
      const audit = memoryAudit();
      const { transport } = stubTransport({ status: 'timeout', stdout: '', stderr: '', durationMs: 30 });
      const client = new AgentClient({ rules, transport, audit });

      client.setGameId('game-2');
      await client.requestMove('llama3', rules.newPosition(), []);

      expect(audit.entries[0]).toMatchObject({ gameId: 'game-2', outcome: 'timeout' });
    });
  });
});
