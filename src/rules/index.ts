export type { Move, Side, TerminalReason, RulesAdapter } from './types';
export { opponentOf } from './types';
export { ChessRules } from './chess-rules';
