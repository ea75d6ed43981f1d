import { describe, expect, it } from 'vitest';
import { IllegalTransitionError } from '@/core/errors';
import { SymbolTracker, canTransition, isTerminal } from '@/scoring/symbol_state';

describe('symbol state machine', () => {
  it('allows the scoring path and failure from any live state', () => {
    expect(canTransition('Pending', 'Validated')).toBe(true);
    expect(canTransition('Validated', 'Scored')).toBe(true);
    expect(canTransition('Scored', 'Rejected')).toBe(true);
    expect(canTransition('Validated', 'Failed')).toBe(true);
    expect(canTransition('Pending', 'Scored')).toBe(false);
    expect(canTransition('Accepted', 'Failed')).toBe(false);
  });

  it('treats outcomes as terminal', () => {
    expect(isTerminal('Accepted')).toBe(true);
    expect(isTerminal('Rejected')).toBe(true);
    expect(isTerminal('Failed')).toBe(true);
    expect(isTerminal('Scored')).toBe(false);
  });

  it('records history and refuses illegal transitions', () => {
    const tracker = new SymbolTracker('AAA');
    tracker.transition('Validated');
    tracker.transition('Failed');
    expect(tracker.state).toBe('Failed');
    expect(tracker.history).toEqual(['Pending', 'Validated', 'Failed']);
    expect(() => tracker.transition('Scored')).toThrow(IllegalTransitionError);
    expect(() => tracker.transition('Scored')).toThrow('AAA: illegal transition Failed -> Scored');
  });
});
