/**
 * RulesAdapter backed by chess.js.
 */

import { Chess } from 'chess.js';
import type { Move, RulesAdapter, Side, TerminalReason } from './types';

const COORDINATE_MOVE = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

/**
 * Splits a coordinate move into the shape chess.js expects.
 */
function toMoveInput(move: Move): { from: string; to: string; promotion?: string } | null {
  const match = COORDINATE_MOVE.exec(move);
  if (!match) return null;
  const [, from, to, promotion] = match;
  return promotion ? { from, to, promotion } : { from, to };
}

export class ChessRules implements RulesAdapter<Chess> {
  newPosition(): Chess {
    return new Chess();
  }

  /**
   * Creates a position from FEN. Used for setting up test scenarios and
   * resuming from an arbitrary board.
   */
  fromStandardNotation(fen: string): Chess {
    return new Chess(fen);
  }

  /**
   * A skipped turn can leave the side not to move in check. chess.js then
   * offers the king capture, which is never a chess move, so it is dropped.
   */
  legalMoves(position: Chess): Move[] {
    return position
      .moves({ verbose: true })
      .filter((m) => m.captured !== 'k')
      .map((m) => `${m.from}${m.to}${m.promotion ?? ''}`);
  }

  isLegal(position: Chess, move: Move): boolean {
    return this.legalMoves(position).includes(move);
  }

  apply(position: Chess, move: Move): void {
    const input = toMoveInput(move);
    if (!input || !this.isLegal(position, move)) {
      throw new Error(`Illegal move for position ${position.fen()}: ${move}`);
    }
    position.move(input);
  }

  activeSide(position: Chess): Side {
    return position.turn() === 'w' ? 'white' : 'black';
  }

  /**
   * chess.js has no null move, so possession is flipped by rewriting the
   * side-to-move field. The en passant target no longer applies once the
   * turn is passed.
   */
  setActiveSide(position: Chess, side: Side): void {
    if (this.activeSide(position) === side) return;
    const fields = position.fen().split(' ');
    fields[1] = side === 'white' ? 'w' : 'b';
    fields[3] = '-';
    position.load(fields.join(' '));
  }

  isTerminal(position: Chess): boolean {
    return position.isGameOver();
  }

  terminalReason(position: Chess): TerminalReason {
    if (position.isCheckmate()) return 'checkmate';
    if (position.isStalemate()) return 'stalemate';
    if (position.isInsufficientMaterial()) return 'insufficientMaterial';
    if (position.isDraw()) return 'claimableDraw';
    return 'none';
  }

  toStandardNotation(position: Chess): string {
    return position.fen();
  }
}
