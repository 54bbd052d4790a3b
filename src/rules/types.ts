/**
 * Types for the rules boundary.
 *
 * The engine never looks inside a position. Everything it needs to know
 * about the board goes through a RulesAdapter.
 */

/**
 * A single ply in coordinate notation: origin + destination + optional
 * promotion piece, e.g. "e2e4" or "e7e8q".
 */
export type Move = string;

export type Side = 'white' | 'black';

/**
 * Why a position is terminal. 'none' for a position still in play.
 */
export type TerminalReason =
  | 'checkmate'
  | 'stalemate'
  | 'insufficientMaterial'
  | 'claimableDraw'
  | 'none';

/**
 * Operations the engine consumes from a rules library.
 */
export interface RulesAdapter<P> {
  /** Fresh position at the standard start. */
  newPosition(): P;
  legalMoves(position: P): Move[];
  isLegal(position: P, move: Move): boolean;
  /** Applies a move. Throws if the move is not legal. */
  apply(position: P, move: Move): void;
  activeSide(position: P): Side;
  /** Hands possession to `side` without playing a move. */
  setActiveSide(position: P, side: Side): void;
  isTerminal(position: P): boolean;
  terminalReason(position: P): TerminalReason;
  /** Position in FEN. */
  toStandardNotation(position: P): string;
}

export function opponentOf(side: Side): Side {
  return side === 'white' ? 'black' : 'white';
}
