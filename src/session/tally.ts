/**
 * Win tally across games.
 *
 * Tallies are immutable values: every update returns a new tally.
 */

import type { AgentIdentity } from '../agent/types';

export type TallyState = Readonly<Record<AgentIdentity, number>>;

export function createTally(): TallyState {
  return {};
}

/**
 * Adds zero entries for identities not yet seen, so they show up in reports.
 */
export function registerIdentities(tally: TallyState, identities: readonly AgentIdentity[]): TallyState {
  const next: Record<AgentIdentity, number> = { ...tally };
  for (const identity of identities) {
    next[identity] = next[identity] ?? 0;
  }
  return next;
}

export function recordWin(tally: TallyState, identity: AgentIdentity): TallyState {
  return { ...tally, [identity]: (tally[identity] ?? 0) + 1 };
}

/**
 * Renders the tally. Given the two seat identities, notes when both seats
 * run the same identity, since their wins then share one entry.
 */
export function formatTally(tally: TallyState, seats: readonly AgentIdentity[] = []): string {
  const entries = Object.entries(tally);
  if (entries.length === 0) return 'Tally: no games played';
  const lines = ['Tally:', ...entries.map(([identity, wins]) => `  ${identity}: ${wins} ${wins === 1 ? 'win' : 'wins'}`)];
  if (seats.length === 2 && seats[0] === seats[1]) {
    lines.push(`  (both seats run ${seats[0]}; their wins are combined)`);
  }
  return lines.join('\n');
}
