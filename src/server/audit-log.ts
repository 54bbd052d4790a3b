/**
 * Agent Audit Log - Tamper-evident record of every agent invocation.
 *
 * Provides a hash-chained, append-only JSONL log of each prompt sent to an
 * agent and what came back. Each entry contains a cryptographic hash of its
 * content plus the previous entry's hash, creating a verifiable chain.
 *
 * The engine only ever writes here; the log exists for post-hoc inspection.
 */

import { createHash, randomUUID } from 'crypto';
import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import type { Move } from '../rules/types';
import type { AgentIdentity } from '../agent/types';

/**
 * What the Agent Client concluded from an invocation.
 */
export type InvocationOutcome =
  | 'legal_move'
  | 'no_move_found'
  | 'illegal_moves_only'
  | 'timeout'
  | 'process_error';

/**
 * A single audit log entry with hash chain.
 */
export interface AgentAuditEntry {
  /** Unique identifier for this entry */
  id: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Game the invocation belongs to, when known */
  gameId?: string;
  identity: AgentIdentity;
  prompt: string;
  stdout: string;
  stderr: string;
  /** Transport status */
  status: 'ok' | 'timeout' | 'error';
  exitCode?: number | null;
  outcome: InvocationOutcome;
  /** Legal move extracted, if any */
  move?: Move;
  durationMs: number;
  /** Hash of the previous entry (empty string for first entry) */
  previousHash: string;
  /** SHA-256 hash of this entry's content + previousHash */
  hash: string;
}

export type AgentAuditRecord = Omit<AgentAuditEntry, 'id' | 'timestamp' | 'previousHash' | 'hash'>;

/**
 * Filter criteria for querying audit entries.
 */
export interface AgentAuditFilter {
  identity?: AgentIdentity;
  gameId?: string;
  outcome?: InvocationOutcome;
  status?: AgentAuditEntry['status'];
  /** Filter by time range - start (inclusive) */
  startTime?: Date;
  /** Filter by time range - end (inclusive) */
  endTime?: Date;
  /** Maximum number of entries to return */
  limit?: number;
  /** Offset for pagination */
  offset?: number;
}

/**
 * Result of hash chain verification.
 */
export interface VerifyResult {
  valid: boolean;
  entriesVerified: number;
  /** Index of first broken entry (0-based) if chain is invalid */
  brokenAt?: number;
  error?: string;
}

export interface AgentAuditLogConfig {
  /** Directory to store audit logs */
  logsDir?: string;
  /** Whether the log is enabled */
  enabled?: boolean;
}

/**
 * Write side of the audit trail, as seen by the Agent Client.
 */
export interface AgentAuditTrail {
  record(entry: AgentAuditRecord): void;
}

function computeHash(entry: Omit<AgentAuditEntry, 'hash'>, previousHash: string): string {
  const content = JSON.stringify({
    id: entry.id,
    timestamp: entry.timestamp,
    gameId: entry.gameId,
    identity: entry.identity,
    prompt: entry.prompt,
    stdout: entry.stdout,
    stderr: entry.stderr,
    status: entry.status,
    exitCode: entry.exitCode,
    outcome: entry.outcome,
    move: entry.move,
    durationMs: entry.durationMs,
    previousHash,
  });
  return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}

/**
 * File-based audit log with hash chaining.
 */
export class FileAgentAuditLog implements AgentAuditTrail {
  private logPath: string;
  private enabled: boolean;
  private lastHash: string = '';

  constructor(config: AgentAuditLogConfig = {}) {
    const baseDir = config.logsDir || join(process.cwd(), 'logs', 'audit');
    this.logPath = join(baseDir, 'agent-invocations.jsonl');
    this.enabled = config.enabled !== false;

    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    this.lastHash = this.readAllEntries().at(-1)?.hash ?? '';
  }

  /**
   * Appends an entry. A failed write is reported but never interrupts play.
   */
  record(entry: AgentAuditRecord): void {
    if (!this.enabled) return;

    const fullEntry: Omit<AgentAuditEntry, 'hash'> = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
      previousHash: this.lastHash,
    };
    const hash = computeHash(fullEntry, fullEntry.previousHash);

    try {
      appendFileSync(this.logPath, JSON.stringify({ ...fullEntry, hash }) + '\n');
      this.lastHash = hash;
    } catch (error) {
      console.error(`[AgentAuditLog] Failed to write audit entry: ${error}`);
    }
  }

  query(filter: AgentAuditFilter = {}): AgentAuditEntry[] {
    let filtered = this.readAllEntries();

    const { identity, gameId, outcome, status, startTime, endTime } = filter;
    if (identity) {
      filtered = filtered.filter(e => e.identity === identity);
    }
    if (gameId) {
      filtered = filtered.filter(e => e.gameId === gameId);
    }
    if (outcome) {
      filtered = filtered.filter(e => e.outcome === outcome);
    }
    if (status) {
      filtered = filtered.filter(e => e.status === status);
    }
    if (startTime) {
      const startMs = startTime.getTime();
      filtered = filtered.filter(e => new Date(e.timestamp).getTime() >= startMs);
    }
    if (endTime) {
      const endMs = endTime.getTime();
      filtered = filtered.filter(e => new Date(e.timestamp).getTime() <= endMs);
    }

    if (filter.offset) {
      filtered = filtered.slice(filter.offset);
    }
    if (filter.limit) {
      filtered = filtered.slice(0, filter.limit);
    }

    return filtered;
  }

  verify(): VerifyResult {
    const entries = this.readAllEntries();
    let previousHash = '';

    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];

      if (entry.previousHash !== previousHash) {
        return {
          valid: false,
          entriesVerified: i,
          brokenAt: i,
          error: `Entry ${i} has incorrect previousHash: expected "${previousHash}", got "${entry.previousHash}"`,
        };
      }

      const expectedHash = computeHash(entry, previousHash);
      if (entry.hash !== expectedHash) {
        return {
          valid: false,
          entriesVerified: i,
          brokenAt: i,
          error: `Entry ${i} has incorrect hash: expected "${expectedHash}", got "${entry.hash}"`,
        };
      }

      previousHash = entry.hash;
    }

    return { valid: true, entriesVerified: entries.length };
  }

  private readAllEntries(): AgentAuditEntry[] {
    if (!existsSync(this.logPath)) {
      return [];
    }

    const content = readFileSync(this.logPath, 'utf-8');
    return content
      .split('\n')
      .filter(line => line.trim().length > 0)
      .map(line => JSON.parse(line) as AgentAuditEntry);
  }

  getLogPath(): string {
    return this.logPath;
  }
}
