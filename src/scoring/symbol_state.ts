/**
 * Per-symbol lifecycle during a scan.
 *
 *   Pending -> Validated -> Scored -> Accepted | Rejected
 *   any non-terminal state -> Failed
 */

import { IllegalTransitionError } from '@/core/errors';

export type SymbolState = 'Pending' | 'Validated' | 'Scored' | 'Accepted' | 'Rejected' | 'Failed';

const TRANSITIONS: Record<SymbolState, readonly SymbolState[]> = {
  Pending: ['Validated', 'Failed'],
  Validated: ['Scored', 'Failed'],
  Scored: ['Accepted', 'Rejected', 'Failed'],
  Accepted: [],
  Rejected: [],
  Failed: [],
};

export function canTransition(from: SymbolState, to: SymbolState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: SymbolState): boolean {
  return TRANSITIONS[state].length === 0;
}

export class SymbolTracker {
  private current: SymbolState = 'Pending';
  private readonly visited: SymbolState[] = ['Pending'];

  constructor(readonly symbol: string) {}

  get state(): SymbolState {
    return this.current;
  }

  get history(): readonly SymbolState[] {
    return this.visited;
  }

  transition(to: SymbolState): void {
    if (!canTransition(this.current, to)) {
      throw new IllegalTransitionError(this.symbol, this.current, to);
    }
    this.current = to;
    this.visited.push(to);
  }
}
