// Tests for the amortization scheduler — annuity, sculpted, grace, balloon

import { describe, it, expect } from 'vitest';
import { InfeasibleSculptError } from '../src/errors.js';
import { TrancheAmortizer, coverageRatio, levelPayment, scheduleTranche } from '../src/scheduler.js';
import { createTranche } from '../src/tranche.js';
import type { ScheduleEntry, TrancheInput } from '../src/types.js';

const sum = (values: number[]) => values.reduce((a, b) => a + b, 0);

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function expectMonotonic(entries: readonly ScheduleEntry[]): void {
  for (let i = 1; i < entries.length; i++) {
    expect(entries[i].openingBalance).toBeLessThanOrEqual(entries[i - 1].openingBalance);
  }
  for (const e of entries) {
    expect(e.closingBalance).toBeLessThanOrEqual(e.openingBalance);
  }
}

const annuity = (patch: Partial<TrancheInput> = {}) =>
  createTranche({
    id: 'A',
    currency: 'domestic',
    principal: 1_000_000,
    rate: 0.08,
    tenorPeriods: 5,
    amortization: 'annuity',
    ...patch,
  });

describe('coverageRatio', () => {
  it('returns the Infinity sentinel when no service is owed', () => {
    expect(coverageRatio(0, 0)).toBe(Infinity);
    expect(coverageRatio(100, 0)).toBe(Infinity);
  });

  it('returns 0 when there is service but no cash', () => {
    expect(coverageRatio(0, 10)).toBe(0);
    expect(coverageRatio(-5, 10)).toBe(0);
  });

  it('divides otherwise', () => {
    expect(coverageRatio(150, 100)).toBe(1.5);
  });
});

describe('levelPayment', () => {
  it('matches the standard annuity formula', () => {
    expect(levelPayment(0.08, 5, 1_000_000)).toBeCloseTo(250_456.4546, 3);
  });

  it('splits evenly at a zero rate', () => {
    expect(levelPayment(0, 3, 900)).toBe(300);
  });

  it('adds interest on the balloon portion', () => {
    expect(levelPayment(0.1, 3, 1_000, 200)).toBeCloseTo(341.6918429, 6);
  });
});

describe('scheduleTranche — annuity', () => {
  it('pays a level service and retires the loan (1,000,000 at 8% over 5 periods)', () => {
    const entries = scheduleTranche(annuity(), Array(5).fill(300_000));
    const level = levelPayment(0.08, 5, 1_000_000);

    expect(entries).toHaveLength(5);
    for (const e of entries) {
      expect(e.totalService).toBeCloseTo(level, 6);
      expect(coverageRatio(300_000, e.totalService)).toBeCloseTo(1.197813, 6);
    }
    expect(entries[0].interest).toBeCloseTo(80_000, 6);
    expect(entries[4].phase).toBe('maturity');
    expect(entries[4].closingBalance).toBe(0);
    expect(sum(entries.map(e => e.principalPaid))).toBeCloseTo(1_000_000, 6);
    expectMonotonic(entries);
  });

  it('charges interest only during grace, then amortizes over the remaining periods', () => {
    const entries = scheduleTranche(annuity({ principal: 1_000, rate: 0.1, tenorPeriods: 4, gracePeriods: 1 }), []);

    expect(entries[0]).toMatchObject({ phase: 'grace', principalPaid: 0, closingBalance: 1_000 });
    expect(entries[0].totalService).toBeCloseTo(100, 9);
    for (const e of entries.slice(1)) {
      expect(e.totalService).toBeCloseTo(402.1148036, 6);
    }
    expect(entries[3].closingBalance).toBe(0);
    expectMonotonic(entries);
  });

  it('capitalizes grace interest into the balance when flagged', () => {
    const entries = scheduleTranche(
      annuity({ principal: 1_000, rate: 0.1, tenorPeriods: 3, gracePeriods: 1, capitalizeGraceInterest: true }),
      [],
    );

    expect(entries[0]).toMatchObject({ phase: 'grace', principalPaid: 0, totalService: 0 });
    expect(entries[0].capitalizedInterest).toBeCloseTo(100, 9);
    expect(entries[0].closingBalance).toBeCloseTo(1_100, 9);
    expect(entries[1].totalService).toBeCloseTo(633.8095238, 6);
    expect(entries[2].totalService).toBeCloseTo(633.8095238, 6);
    // Conservation includes the capitalized interest
    expect(sum(entries.map(e => e.principalPaid)) + entries[2].closingBalance).toBeCloseTo(1_100, 9);
  });

  it('leaves exactly the balloon outstanding at maturity', () => {
    const entries = scheduleTranche(annuity({ principal: 1_000, rate: 0.1, tenorPeriods: 3, balloonFraction: 0.2 }), []);

    expect(entries.map(e => e.totalService)).toEqual([
      expect.closeTo(341.6918429, 6),
      expect.closeTo(341.6918429, 6),
      expect.closeTo(341.6918429, 6),
    ]);
    expect(entries[2].closingBalance).toBe(200);
    expect(sum(entries.map(e => e.principalPaid)) + entries[2].closingBalance).toBeCloseTo(1_000, 9);
    expectMonotonic(entries);
  });

  it('places the schedule on the project timeline from its start period', () => {
    const entries = scheduleTranche(annuity({ tenorPeriods: 2, startPeriod: 3 }), []);
    expect(entries.map(e => e.period)).toEqual([3, 4]);
  });
});

describe('scheduleTranche — sculpted', () => {
  const sculpted = (patch: Partial<TrancheInput> = {}) =>
    createTranche({
      id: 'S',
      currency: 'domestic',
      principal: 500_000,
      rate: 0.05,
      tenorPeriods: 4,
      amortization: 'sculpted',
      targetDscr: 1.25,
      ...patch,
    });

  it('holds the target DSCR in every amortizing period and plugs the last', () => {
    const cfads = [200_000, 200_000, 200_000, 200_000];
    const entries = scheduleTranche(sculpted(), cfads);

    expect(entries.map(e => e.principalPaid)).toEqual([
      expect.closeTo(135_000, 6),
      expect.closeTo(141_750, 6),
      expect.closeTo(148_837.5, 6),
      expect.closeTo(74_412.5, 6),
    ]);
    for (const e of entries.slice(0, 3)) {
      expect(coverageRatio(cfads[e.period], e.totalService)).toBeCloseTo(1.25, 10);
    }
    expect(entries[3].phase).toBe('maturity');
    expect(entries[3].closingBalance).toBe(0);
    expect(sum(entries.map(e => e.principalPaid))).toBeCloseTo(500_000, 6);
    expectMonotonic(entries);
  });

  it('stops amortizing once the balance reaches the balloon', () => {
    const entries = scheduleTranche(sculpted({ principal: 100_000, balloonFraction: 0.1 }), [400_000, 400_000, 400_000, 400_000]);

    expect(entries[0].principalPaid).toBeCloseTo(90_000, 6);
    expect(entries[1].principalPaid).toBe(0);
    expect(entries[3].closingBalance).toBe(10_000);
  });

  it('reports an infeasible period when CFADS cannot cover interest at the target (0-based period 2)', () => {
    const tranche = sculpted({ id: 'senior', principal: 1_000_000, rate: 0.1 });
    const err = catchError(() => scheduleTranche(tranche, [200_000, 220_000, 50_000, 240_000]));

    expect(err).toBeInstanceOf(InfeasibleSculptError);
    expect(err).toMatchObject({
      trancheId: 'senior',
      period: 2,
      targetDscr: 1.25,
      shortfall: expect.closeTo(57_250, 6),
      context: { reason: 'negative-principal' },
    });
  });

  it('reports negative principal on an interest-free tranche with a negative allocation', () => {
    const tranche = sculpted({ id: 'junior', principal: 600, rate: 0, tenorPeriods: 3 });
    const err = catchError(() => scheduleTranche(tranche, [-100, 1_000, 1_000]));

    expect(err).toBeInstanceOf(InfeasibleSculptError);
    expect(err).toMatchObject({
      trancheId: 'junior',
      period: 0,
      shortfall: expect.closeTo(100, 9),
      context: { reason: 'negative-principal' },
    });
  });

  it('skips an interest-free period once only the balloon is left', () => {
    const tranche = sculpted({ principal: 1_000, rate: 0, tenorPeriods: 3, balloonFraction: 0.2 });
    const entries = scheduleTranche(tranche, [2_000, -50, 0]);

    expect(entries.map(e => e.principalPaid)).toEqual([800, 0, 0]);
    expect(entries[2].closingBalance).toBe(200);
  });

  it('reports a balance that cannot be retired by maturity', () => {
    const tranche = sculpted({ principal: 1_000, rate: 0, tenorPeriods: 2 });
    const err = catchError(() => scheduleTranche(tranche, [500, 100]));

    expect(err).toBeInstanceOf(InfeasibleSculptError);
    expect(err).toMatchObject({
      period: 1,
      shortfall: expect.closeTo(650, 9),
      context: { reason: 'unretired-balance' },
    });
  });
});

describe('TrancheAmortizer', () => {
  it('reports opening balance and demand for the next period only', () => {
    const amortizer = new TrancheAmortizer(annuity({ startPeriod: 1 }));

    expect(amortizer.openingBalance(0)).toBe(0);
    expect(amortizer.openingBalance(1)).toBe(1_000_000);
    expect(amortizer.demand(1)).toBeCloseTo(250_456.4546, 3);
    expect(amortizer.demand(2)).toBe(0);
  });

  it('refuses to step past maturity', () => {
    const amortizer = new TrancheAmortizer(annuity({ tenorPeriods: 1 }));
    amortizer.step(0);
    expect(amortizer.done).toBe(true);
    expect(() => amortizer.step(0)).toThrow(RangeError);
  });
});
