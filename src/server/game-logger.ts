/**
 * Game Logger - Structured logging for game debugging.
 *
 * Writes JSONL logs to logs/games/{gameId}.jsonl. Captures: game lifecycle,
 * turns, applied and skipped moves, failed agent attempts, and errors.
 */

import { existsSync, mkdirSync, appendFileSync, readFileSync, readdirSync, statSync } from 'fs';
import { join, dirname, basename } from 'path';

/**
 * Log event types for game debugging.
 */
export type GameLogEvent =
  | { type: 'game_started'; gameId: string; mode: string; agents: string[] }
  | { type: 'game_ended'; gameId: string; status: string; reason: string; winner?: string; plies: number }
  | { type: 'turn_started'; ply: number; side: string; actor: string }
  | { type: 'move_applied'; ply: number; side: string; actor: string; move: string; failures: number }
  | { type: 'turn_skipped'; side: string; agent: string; failures: number }
  | { type: 'possession_returned'; side: string; ledger: number[] }
  | { type: 'attempt_failed'; agent: string; attempt: number; kind: string; candidates: string[] }
  | { type: 'error'; error: string; context?: string; stack?: string }
  | { type: 'warning'; message: string; context?: string };

/**
 * Full log entry with metadata.
 */
export interface GameLogEntry {
  timestamp: string;
  gameId: string;
  event: GameLogEvent;
}

function defaultLogsDir(): string {
  return join(process.cwd(), 'logs', 'games');
}

/**
 * Game logger for a single game instance.
 */
export class GameLogger {
  private gameId: string;
  private logPath: string;

  constructor(gameId: string, logsDir?: string) {
    this.gameId = gameId;
    this.logPath = join(logsDir || defaultLogsDir(), `${gameId}.jsonl`);

    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Logs an event to the game log file.
   */
  log(event: GameLogEvent): void {
    const entry: GameLogEntry = {
      timestamp: new Date().toISOString(),
      gameId: this.gameId,
      event,
    };

    try {
      appendFileSync(this.logPath, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error(`[GameLogger] Failed to write log: ${error}`);
    }
  }

  gameStarted(mode: string, agents: string[]): void {
    this.log({ type: 'game_started', gameId: this.gameId, mode, agents });
  }

  gameEnded(status: string, reason: string, plies: number, winner?: string): void {
    this.log({ type: 'game_ended', gameId: this.gameId, status, reason, winner, plies });
  }

  turnStarted(ply: number, side: string, actor: string): void {
    this.log({ type: 'turn_started', ply, side, actor });
  }

  moveApplied(ply: number, side: string, actor: string, move: string, failures: number): void {
    this.log({ type: 'move_applied', ply, side, actor, move, failures });
  }

  turnSkipped(side: string, agent: string, failures: number): void {
    this.log({ type: 'turn_skipped', side, agent, failures });
  }

  possessionReturned(side: string, ledger: number[]): void {
    this.log({ type: 'possession_returned', side, ledger });
  }

  attemptFailed(agent: string, attempt: number, kind: string, candidates: string[]): void {
    this.log({ type: 'attempt_failed', agent, attempt, kind, candidates });
  }

  error(error: string, context?: string, stack?: string): void {
    this.log({ type: 'error', error, context, stack });
  }

  warning(message: string, context?: string): void {
    this.log({ type: 'warning', message, context });
  }

  getLogPath(): string {
    return this.logPath;
  }
}

/**
 * Reads all log entries from a game log file. Unparseable lines are dropped.
 */
export function readGameLogs(gameId: string, logsDir?: string): GameLogEntry[] {
  const logPath = join(logsDir || defaultLogsDir(), `${gameId}.jsonl`);

  if (!existsSync(logPath)) {
    return [];
  }

  const content = readFileSync(logPath, 'utf-8');
  const lines = content.trim().split('\n').filter(line => line.length > 0);

  return lines.map(line => {
    try {
      return JSON.parse(line) as GameLogEntry;
    } catch {
      return null;
    }
  }).filter((entry): entry is GameLogEntry => entry !== null);
}

/**
 * Reads the last N log entries from a game log file.
 */
export function readRecentGameLogs(gameId: string, count: number = 50, logsDir?: string): GameLogEntry[] {
  return readGameLogs(gameId, logsDir).slice(-count);
}

/**
 * Lists all available game log files.
 */
export function listGameLogs(logsDir?: string): { gameId: string; path: string; size: number }[] {
  const baseDir = logsDir || defaultLogsDir();

  if (!existsSync(baseDir)) {
    return [];
  }

  return readdirSync(baseDir)
    .filter(f => f.endsWith('.jsonl'))
    .map(f => {
      const fullPath = join(baseDir, f);
      return {
        gameId: basename(f, '.jsonl'),
        path: fullPath,
        size: statSync(fullPath).size,
      };
    });
}

export function filterLogsByType(logs: GameLogEntry[], types: GameLogEvent['type'][]): GameLogEntry[] {
  return logs.filter(entry => types.includes(entry.event.type));
}

export function getGameErrors(gameId: string, logsDir?: string): GameLogEntry[] {
  return filterLogsByType(readGameLogs(gameId, logsDir), ['error']);
}
