#!/usr/bin/env npx tsx
/**
 * Play chess games between external agents, or with a human.
 *
 * Usage:
 *   npx tsx scripts/play.ts                                   # llama3 vs mistral via `ollama run`
 *   npx tsx scripts/play.ts --model1 llama3 --model2 phi3     # Pick the agents
 *   npx tsx scripts/play.ts --transport mock --games 5        # Offline, random legal moves
 *   npx tsx scripts/play.ts --transport ollama                # Ollama HTTP API instead of the CLI
 *   npx tsx scripts/play.ts --command ./my-agent.sh           # Any command reading the prompt on stdin
 *   npx tsx scripts/play.ts --mode cooperative                # You play White against both agents
 *   npx tsx scripts/play.ts --speed 0.5 --spectate 8090       # Half-second pause, WebSocket feed
 *
 * Pass --no-audit to skip the agent invocation audit trail.
 *
 * Budgets: --timeout <ms> --retries <n> --max-total-fail <n> --pacing <ms>.
 * The same budgets can be set through AGENT_TIMEOUT_MS, MAX_RETRIES,
 * MAX_TOTAL_FAIL, PACING_DELAY_MS, DEADLINE_GRACE_MS, MOVE_DELAY_MS and
 * HUMAN_SIDE; flags win over the environment.
 */

import type { Chess } from 'chess.js';
import { ChessRules } from '../src/rules';
import {
  AgentClient,
  createCommandTransport,
  createMockTransport,
  createOllamaHttpTransport,
  createRetryMetrics,
  formatRetryMetrics,
  type AgentTransport,
} from '../src/agent';
import { createTerminalHuman, type GameMode } from '../src/arbiter';
import {
  GameSession,
  formatTally,
  loadConfigFromEnv,
  resolveConfig,
  type EngineConfig,
  type SessionEvent,
} from '../src/session';
import { FileAgentAuditLog } from '../src/server/audit-log';
import { SpectatorServer } from '../src/server/spectator-server';

function getArg(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx !== -1 ? args[idx + 1] : undefined;
}

function getIntArg(args: string[], name: string): number | undefined {
  const raw = getArg(args, name);
  if (raw === undefined) return undefined;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`${name} expects a non-negative integer, got "${raw}"`);
  }
  return value;
}

function createTransport(args: string[]): AgentTransport {
  const kind = getArg(args, '--transport') ?? 'command';
  switch (kind) {
    case 'mock':
      return createMockTransport();
    case 'ollama':
      return createOllamaHttpTransport({ baseUrl: process.env.OLLAMA_URL });
    case 'command': {
      const command = getArg(args, '--command');
      // A custom command gets the identity as its only argument.
      return command
        ? createCommandTransport({ command, args: (identity) => [identity] })
        : createCommandTransport();
    }
    default:
      throw new Error(`Unknown transport "${kind}" (expected command, ollama or mock)`);
  }
}

function printEvent(event: SessionEvent, session: GameSession<Chess>): void {
  switch (event.type) {
    case 'GAME_STARTED':
      console.log(`\n=== ${event.mode} game ${event.gameId}: ${event.agents.join(' vs ')} ===`);
      break;
    case 'MOVE_APPLIED':
      console.log(`${event.ply}. ${event.actor} (${event.side}): ${event.move}`);
      if (session.getMode() === 'cooperative') {
        console.log(session.getPosition().ascii());
      }
      break;
    case 'TURN_SKIPPED':
      console.log(`${event.agent} (${event.side}) failed ${event.failures} times; turn skipped.`);
      break;
    case 'POSSESSION_RETURNED':
      console.log(event.message);
      break;
    case 'GAME_ENDED': {
      const { result } = event;
      const winner = result.winner ? `, winner: ${result.winner}` : '';
      const detail = result.detail ? ` - ${result.detail}` : '';
      console.log(`Game over: ${result.status} (${result.reason})${winner}${detail} after ${result.plies} plies`);
      break;
    }
    default:
      break;
  }
}

async function main() {
  const args = process.argv.slice(2);

  const mode = getArg(args, '--mode') ?? 'autonomous';
  if (mode !== 'autonomous' && mode !== 'cooperative') {
    throw new Error(`Unknown mode "${mode}" (expected autonomous or cooperative)`);
  }
  const gameMode: GameMode = mode;
  const model1 = getArg(args, '--model1') ?? 'llama3';
  const model2 = getArg(args, '--model2') ?? 'mistral';
  const games = getIntArg(args, '--games') ?? 1;

  const overrides: Partial<EngineConfig> = loadConfigFromEnv();
  const flags: [string, keyof Omit<EngineConfig, 'humanSide' | 'moveDelayMs'>][] = [
    ['--timeout', 'agentTimeoutMs'],
    ['--retries', 'maxRetries'],
    ['--max-total-fail', 'maxTotalFail'],
    ['--pacing', 'pacingDelayMs'],
  ];
  for (const [flag, key] of flags) {
    const value = getIntArg(args, flag);
    if (value !== undefined) overrides[key] = value;
  }
  const speed = getArg(args, '--speed');
  if (speed !== undefined) {
    const seconds = parseFloat(speed);
    if (Number.isNaN(seconds) || seconds < 0) {
      throw new Error(`--speed expects seconds, got "${speed}"`);
    }
    overrides.moveDelayMs = Math.round(seconds * 1000);
  }

  const config = resolveConfig(overrides);
  const rules = new ChessRules();
  const auditEnabled = !args.includes('--no-audit');
  const audit = new FileAgentAuditLog({ enabled: auditEnabled });
  const metrics = createRetryMetrics();
  const source = new AgentClient({
    rules,
    transport: createTransport(args),
    audit,
  });
  const session = new GameSession({
    rules,
    source,
    // Ctrl+C at the move prompt stops the session like a process SIGINT.
    human: createTerminalHuman({ onInterrupt: () => interrupt() }),
    config,
    metrics,
  });
  session.onEvent((event) => printEvent(event, session));

  const spectatePort = getIntArg(args, '--spectate');
  const spectator = spectatePort !== undefined ? new SpectatorServer(session) : null;
  if (spectator && spectatePort !== undefined) {
    await spectator.start(spectatePort);
  }

  let interrupted = false;
  const interrupt = (): void => {
    if (interrupted) process.exit(130);
    interrupted = true;
    console.log('\nStopping after the current turn (Ctrl+C again to quit now)...');
    session.stop();
  };
  process.on('SIGINT', interrupt);

  try {
    for (let i = 0; i < games && !interrupted; i++) {
      await session.startGame(gameMode, [model1, model2]);
      if (gameMode === 'autonomous') {
        console.log(formatTally(session.getTally(), [model1, model2]));
      }
      console.log(formatRetryMetrics(metrics));
    }
  } finally {
    await spectator?.stop();
  }
  if (auditEnabled) {
    console.log(`Audit log: ${audit.getLogPath()}`);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
