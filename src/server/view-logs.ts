#!/usr/bin/env npx tsx
/**
 * CLI tool to view game logs and the agent audit trail.
 *
 * Usage:
 *   npx tsx src/server/view-logs.ts                     # List all game logs
 *   npx tsx src/server/view-logs.ts <gameId>            # View logs for a specific game
 *   npx tsx src/server/view-logs.ts <gameId> --errors   # View only errors
 *   npx tsx src/server/view-logs.ts <gameId> --tail 20  # View last 20 entries
 *   npx tsx src/server/view-logs.ts <gameId> --type attempt_failed  # Filter by type
 *   npx tsx src/server/view-logs.ts --audit             # Verify the audit chain and list invocations
 *   npx tsx src/server/view-logs.ts --audit <gameId>    # Invocations for one game
 */

import {
  listGameLogs,
  readGameLogs,
  readRecentGameLogs,
  getGameErrors,
  filterLogsByType,
  type GameLogEntry,
  type GameLogEvent,
} from './game-logger';
import { FileAgentAuditLog, type AgentAuditEntry } from './audit-log';

const EVENT_TYPES: GameLogEvent['type'][] = [
  'game_started',
  'game_ended',
  'turn_started',
  'move_applied',
  'turn_skipped',
  'possession_returned',
  'attempt_failed',
  'error',
  'warning',
];

function isEventType(value: string): value is GameLogEvent['type'] {
  return EVENT_TYPES.some(type => type === value);
}

function formatTimestamp(ts: string): string {
  return new Date(ts).toLocaleTimeString();
}

function formatEvent(entry: GameLogEntry): string {
  const time = formatTimestamp(entry.timestamp);
  const event = entry.event;

  switch (event.type) {
    case 'game_started':
      return `${time} [START] ${event.mode}: ${event.agents.join(' vs ')}`;
    case 'game_ended':
      return `${time} [END] ${event.status} (${event.reason}), winner: ${event.winner || 'none'}, plies: ${event.plies}`;
    case 'turn_started':
      return `${time} [TURN] ${event.ply} ${event.side} (${event.actor})`;
    case 'move_applied':
      return `${time} [MOVE] ${event.ply} ${event.actor}: ${event.move} after ${event.failures} failure(s)`;
    case 'turn_skipped':
      return `${time} [SKIP] ${event.side} (${event.agent}) after ${event.failures} failure(s)`;
    case 'possession_returned':
      return `${time} [HANDBACK] to ${event.side}, ledger ${event.ledger.join('/')}`;
    case 'attempt_failed':
      return `${time} [FAIL] ${event.agent} #${event.attempt}: ${event.kind}${event.candidates.length > 0 ? ` (${event.candidates.join(', ')})` : ''}`;
    case 'error':
      return `${time} [ERROR] ${event.error} (${event.context || 'no context'})`;
    case 'warning':
      return `${time} [WARN] ${event.message}`;
  }
}

function formatAuditEntry(entry: AgentAuditEntry): string {
  const time = formatTimestamp(entry.timestamp);
  const move = entry.move ? ` -> ${entry.move}` : '';
  return `${time} [${entry.status.toUpperCase()}] ${entry.identity}: ${entry.outcome}${move} (${entry.durationMs}ms)`;
}

function printLogs(logs: GameLogEntry[]): void {
  for (const entry of logs) {
    console.log(formatEvent(entry));
  }
}

function showAudit(gameId: string | undefined): void {
  const audit = new FileAgentAuditLog();
  const result = audit.verify();
  if (result.valid) {
    console.log(`Audit chain OK (${result.entriesVerified} entries)`);
  } else {
    console.log(`Audit chain BROKEN at entry ${result.brokenAt}: ${result.error}`);
  }

  const entries = audit.query(gameId ? { gameId } : {});
  console.log('─'.repeat(60));
  for (const entry of entries) {
    console.log(formatAuditEntry(entry));
  }
  console.log('─'.repeat(60));
  console.log(`Total: ${entries.length} invocations`);
}

function main() {
  const args = process.argv.slice(2);

  if (args[0] === '--audit') {
    showAudit(args[1]);
    return;
  }

  // No args - list all game logs
  if (args.length === 0) {
    const logs = listGameLogs();
    if (logs.length === 0) {
      console.log('No game logs found in logs/games/');
      console.log('Logs are created when games are played via scripts/play.ts.');
      return;
    }
    console.log('Available game logs:');
    console.log('─'.repeat(60));
    for (const log of logs) {
      const sizeKB = (log.size / 1024).toFixed(1);
      console.log(`  ${log.gameId} (${sizeKB} KB)`);
    }
    console.log('─'.repeat(60));
    console.log(`\nUse: npx tsx src/server/view-logs.ts <gameId>`);
    return;
  }

  const gameId = args[0];
  const hasErrors = args.includes('--errors');
  const tailIdx = args.indexOf('--tail');
  const typeIdx = args.indexOf('--type');

  let logs: GameLogEntry[];

  if (hasErrors) {
    logs = getGameErrors(gameId);
    console.log(`Errors for game ${gameId}:`);
  } else if (tailIdx !== -1) {
    const count = parseInt(args[tailIdx + 1] || '20', 10);
    logs = readRecentGameLogs(gameId, count);
    console.log(`Last ${count} entries for game ${gameId}:`);
  } else {
    logs = readGameLogs(gameId);
    console.log(`All logs for game ${gameId}:`);
  }

  if (typeIdx !== -1) {
    const types = (args[typeIdx + 1] ?? '').split(',').filter(isEventType);
    logs = filterLogsByType(logs, types);
    console.log(`Filtered by type: ${types.join(', ')}`);
  }

  if (logs.length === 0) {
    console.log('No log entries found.');
    return;
  }

  console.log('─'.repeat(60));
  printLogs(logs);
  console.log('─'.repeat(60));
  console.log(`Total: ${logs.length} entries`);
}

main();
