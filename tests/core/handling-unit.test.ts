import { describe, expect, it } from 'vitest';

import { HandlingUnitStateError, RequestTimeoutError } from '@/common/errors.js';
import { HandlingUnit } from '@/core/handling-unit.js';

describe('HandlingUnit', () => {
  it('walks the happy path and counts the exchange', () => {
    const unit = new HandlingUnit(3);

    unit.begin();
    unit.transition('processing');
    unit.transition('responding');
    unit.transition('idle');

    expect(unit.getSnapshot()).toMatchObject({ id: 3, state: 'idle', handled: 1, failed: 0 });
  });

  it('rejects illegal transitions', () => {
    const unit = new HandlingUnit(0);

    expect(() => unit.transition('responding')).toThrow(HandlingUnitStateError);
    expect(() => unit.transition('responding')).toThrow('Handling unit 0 cannot move from idle to responding');

    unit.begin();
    expect(() => unit.begin()).toThrow('Handling unit 0 cannot move from accepting to accepting');
  });

  it('aborts the signal of the exchange in flight', () => {
    const unit = new HandlingUnit(0);
    const signal = unit.begin();
    const reason = new RequestTimeoutError(50);

    unit.abort(reason);

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe(reason);
  });

  it('resets through failed from any busy state', () => {
    const unit = new HandlingUnit(0);

    unit.begin();
    unit.transition('processing');
    unit.reset();

    expect(unit.state).toBe('idle');
    expect(unit.busy).toBe(false);
    expect(unit.getSnapshot()).toMatchObject({ handled: 0, failed: 1 });

    unit.reset();
    expect(unit.getSnapshot().failed).toBe(1);
  });

  it('gives every exchange a fresh signal', () => {
    const unit = new HandlingUnit(0);

    const first = unit.begin();
    unit.abort(new Error('first'));
    unit.reset();

    const second = unit.begin();
    expect(first.aborted).toBe(true);
    expect(second.aborted).toBe(false);
  });
});
