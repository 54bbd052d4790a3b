/**
 * HumanMoveSource that reads moves from a terminal.
 */

import * as readline from 'readline';
import type { Move } from '../rules/types';
import { formatLegalMoves } from '../agent/prompts';
import type { HumanMoveSource } from './human-intake';

export interface TerminalHumanOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Forces readline's terminal handling; detected from the output otherwise */
  terminal?: boolean;
  /** Called when Ctrl+C is pressed at the move prompt */
  onInterrupt?: () => void;
}

/**
 * Asks one question. Ctrl+C and end of input both answer with ''.
 */
export function ask(question: string, options: TerminalHumanOptions = {}): Promise<string> {
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    terminal: options.terminal,
  });

  return new Promise((resolve) => {
    rl.on('SIGINT', () => {
      options.onInterrupt?.();
      rl.close();
    });
    rl.on('close', () => resolve(''));
    rl.question(question, (answer) => {
      resolve(answer);
      rl.close();
    });
  });
}

export function createTerminalHuman(options: TerminalHumanOptions = {}): HumanMoveSource {
  const output = options.output ?? process.stdout;
  return {
    async readMove(request) {
      const answer = await ask(`Your move as ${request.side} (UCI, or "help"): `, options);
      return answer.trim().length > 0 ? answer : null;
    },
    showLegalMoves(moves: readonly Move[]) {
      output.write(`Legal moves: ${formatLegalMoves(moves)}\n`);
    },
  };
}
