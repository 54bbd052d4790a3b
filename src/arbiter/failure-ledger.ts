import type { FailureLedger } from './types';

export function createFailureLedger(): FailureLedger {
  return { weights: [0, 0] };
}

/**
 * Index of the agent that leads next: the lower weight, first agent on ties.
 */
export function selectLeader(ledger: FailureLedger): 0 | 1 {
  return ledger.weights[0] <= ledger.weights[1] ? 0 : 1;
}

export function penalize(ledger: FailureLedger, index: 0 | 1, weight: number): FailureLedger {
  const weights: [number, number] = [ledger.weights[0], ledger.weights[1]];
  weights[index] += weight;
  return { weights };
}

export function totalWeight(ledger: FailureLedger): number {
  return ledger.weights[0] + ledger.weights[1];
}
