/**
 * Agent transports.
 *
 * - Command: spawns a process per request and pipes the prompt to stdin
 *   (`ollama run <model>` by default)
 * - Ollama HTTP: posts to a local Ollama server's generate endpoint
 * - Mock: answers with a random legal move taken from the prompt
 */

import { spawn, type SpawnOptions } from 'child_process';
import type { Readable, Writable } from 'stream';
import { extractLegalMovesFromPrompt } from './prompts';
import {
  AgentSpawnError,
  type AgentIdentity,
  type AgentInvocation,
  type AgentTransport,
} from './types';

/**
 * The parts of a child process the command transport relies on.
 */
export interface AgentProcess {
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'close', listener: (code: number | null) => void): this;
}

export type SpawnAgentProcess = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => AgentProcess;

export interface CommandTransportOptions {
  /** Executable to run. Default: "ollama" */
  command?: string;
  /** Arguments for an identity. Default: ["run", identity] */
  args?: (identity: AgentIdentity) => string[];
  /** Process factory, replaced in tests */
  spawn?: SpawnAgentProcess;
}

/** Spawn error codes that mean the command can never run. */
const FATAL_SPAWN_CODES = new Set(['ENOENT', 'EACCES', 'ENOEXEC']);

function errorCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

const defaultSpawn: SpawnAgentProcess = (command, args, options) =>
  spawn(command, [...args], options);

export function createCommandTransport(options: CommandTransportOptions = {}): AgentTransport {
  const command = options.command ?? 'ollama';
  const buildArgs = options.args ?? ((identity: AgentIdentity) => ['run', identity]);
  const spawnProcess = options.spawn ?? defaultSpawn;

  return {
    invoke(identity, prompt, timeoutMs) {
      return new Promise<AgentInvocation>((resolve, reject) => {
        const startedAt = Date.now();
        let stdout = '';
        let stderr = '';
        let settled = false;

        let child: AgentProcess;
        try {
          child = spawnProcess(command, buildArgs(identity), {
            stdio: ['pipe', 'pipe', 'pipe'],
            windowsHide: true,
          });
        } catch (error) {
          const cause = error instanceof Error ? error : new Error(String(error));
          reject(new AgentSpawnError(command, cause, errorCode(cause)));
          return;
        }

        const settle = (result: AgentInvocation): void => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          resolve(result);
        };

        // The process is killed but not awaited: the caller's timeout is the bound.
        const timer = setTimeout(() => {
          child.kill('SIGKILL');
          settle({ status: 'timeout', stdout, stderr, durationMs: Date.now() - startedAt });
        }, timeoutMs);

        child.stdout?.on('data', (chunk) => {
          stdout += String(chunk);
        });
        child.stderr?.on('data', (chunk) => {
          stderr += String(chunk);
        });

        child.on('error', (err) => {
          if (settled) return;
          const code = errorCode(err);
          if (code && FATAL_SPAWN_CODES.has(code)) {
            settled = true;
            clearTimeout(timer);
            reject(new AgentSpawnError(command, err, code));
            return;
          }
          settle({ status: 'error', error: err.message, stdout, stderr, durationMs: Date.now() - startedAt });
        });

        child.on('close', (code) => {
          settle({ status: 'ok', stdout, stderr, exitCode: code, durationMs: Date.now() - startedAt });
        });

        // A process that exits without reading its input raises EPIPE here.
        child.stdin?.on('error', (err) => {
          stderr += `[stdin] ${err.message}\n`;
        });
        child.stdin?.end(prompt);
      });
    },
  };
}

export interface OllamaHttpTransportOptions {
  /** Default: http://localhost:11434 */
  baseUrl?: string;
  /** Sampling temperature. Default: 0.2 */
  temperature?: number;
}

/**
 * Talks to Ollama's /api/generate endpoint instead of spawning the CLI.
 */
export function createOllamaHttpTransport(options: OllamaHttpTransportOptions = {}): AgentTransport {
  const baseUrl = options.baseUrl ?? 'http://localhost:11434';
  const temperature = options.temperature ?? 0.2;

  return {
    async invoke(identity, prompt, timeoutMs) {
      const startedAt = Date.now();
      try {
        const response = await fetch(`${baseUrl}/api/generate`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            model: identity,
            prompt,
            stream: false,
            options: { temperature },
          }),
          signal: AbortSignal.timeout(timeoutMs),
        });

        if (!response.ok) {
          const body = await response.text();
          return {
            status: 'error',
            error: `Ollama API error: ${response.status}`,
            stdout: '',
            stderr: body,
            durationMs: Date.now() - startedAt,
          };
        }

        const data: unknown = await response.json();
        const text =
          typeof data === 'object' && data !== null && 'response' in data && typeof data.response === 'string'
            ? data.response
            : '';
        return { status: 'ok', stdout: text, stderr: '', exitCode: 0, durationMs: Date.now() - startedAt };
      } catch (error) {
        const durationMs = Date.now() - startedAt;
        if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
          return { status: 'timeout', stdout: '', stderr: '', durationMs };
        }
        const message = error instanceof Error ? error.message : String(error);
        return { status: 'error', error: message, stdout: '', stderr: '', durationMs };
      }
    },
  };
}

export interface MockTransportOptions {
  /** Random source, for reproducible games. Default: Math.random */
  random?: () => number;
}

/**
 * Offline transport for trying the engine without a model installed.
 * Picks a random legal move from the prompt and wraps it in chatter, so
 * the output still goes through move extraction.
 */
export function createMockTransport(options: MockTransportOptions = {}): AgentTransport {
  const random = options.random ?? Math.random;

  return {
    async invoke(identity, prompt) {
      const moves = extractLegalMovesFromPrompt(prompt);
      if (moves.length === 0) {
        return { status: 'ok', stdout: 'I have no idea.', stderr: '', exitCode: 0, durationMs: 0 };
      }
      const move = moves[Math.floor(random() * moves.length)];
      return {
        status: 'ok',
        stdout: `${identity} thinks for a moment...\n${move}\n`,
        stderr: '',
        exitCode: 0,
        durationMs: 0,
      };
    },
  };
}
