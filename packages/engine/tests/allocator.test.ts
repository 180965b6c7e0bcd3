// Tests for the tranche allocator — pro-rata, priority waterfall, FX conversion

import { describe, it, expect } from 'vitest';
import { TrancheAllocator, assertFxCoverage, lookupFxRate } from '../src/allocator.js';
import { createEngineConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import { createTranche } from '../src/tranche.js';
import type { TrancheInput } from '../src/types.js';

const tranche = (patch: Partial<TrancheInput> & { id: string }) =>
  createTranche({
    currency: 'domestic',
    principal: 1_000,
    rate: 0.05,
    tenorPeriods: 3,
    amortization: 'annuity',
    ...patch,
  });

describe('TrancheAllocator — pro-rata', () => {
  const allocator = new TrancheAllocator(createEngineConfig());
  const a = tranche({ id: 'A', principal: 6_000_000 });
  const b = tranche({ id: 'B', principal: 4_000_000 });

  it('splits CFADS 60/40 by opening balance and adds back exactly', () => {
    const shares = allocator.allocatePeriod(0, 1_500_000, [
      { tranche: a, openingBalance: 6_000_000, demand: 0 },
      { tranche: b, openingBalance: 4_000_000, demand: 0 },
    ]);

    expect(shares.map(s => s.trancheId)).toEqual(['A', 'B']);
    expect(shares[0].base).toBe(900_000);
    expect(shares[1].base).toBe(600_000);
    expect(shares[0].base + shares[1].base).toBe(1_500_000);
    expect(shares[0].local).toBe(900_000);
  });

  it('follows the balances as they amortize', () => {
    const shares = allocator.allocatePeriod(1, 1_000, [
      { tranche: a, openingBalance: 1_000, demand: 0 },
      { tranche: b, openingBalance: 3_000, demand: 0 },
    ]);
    expect(shares.map(s => s.base)).toEqual([250, 750]);
  });

  it('gives matured tranches nothing', () => {
    const shares = allocator.allocatePeriod(2, 500, [
      { tranche: a, openingBalance: 0, demand: 0 },
      { tranche: b, openingBalance: 10, demand: 0 },
    ]);
    expect(shares.map(s => s.base)).toEqual([0, 500]);
  });

  it('falls back to original principal when nothing is outstanding', () => {
    const shares = allocator.allocatePeriod(9, 1_000, [
      { tranche: a, openingBalance: 0, demand: 0 },
      { tranche: b, openingBalance: 0, demand: 0 },
    ]);
    expect(shares.map(s => s.base)).toEqual([600, 400]);
  });

  it('converts a hard-currency share at the period exchange rate', () => {
    const domestic = tranche({ id: 'LKR', principal: 300_000 });
    const hard = tranche({ id: 'USD', currency: 'hard', principal: 1_000 });

    const shares = allocator.allocatePeriod(0, 60_000, [
      { tranche: domestic, openingBalance: 300_000, demand: 0 },
      { tranche: hard, openingBalance: 1_000, demand: 0 },
    ], { hard: [300] });

    expect(shares[0]).toMatchObject({ base: 30_000, local: 30_000, fxRate: 1 });
    expect(shares[1]).toMatchObject({ base: 30_000, local: 100, fxRate: 300 });
  });

  it('allocates a whole series from a balance profile', () => {
    const rows = allocator.allocateSeries([100, 200], [a, b], {
      openingBalances: [[1, 1], [1, 3]],
    });
    expect(rows.map(r => r.map(s => s.base))).toEqual([[50, 50], [50, 150]]);
  });
});

describe('TrancheAllocator — priority', () => {
  const allocator = new TrancheAllocator(createEngineConfig({ allocationPolicy: 'priority' }));
  const senior = tranche({ id: 'senior', seniority: 0 });
  const junior = tranche({ id: 'junior', seniority: 1 });

  // Junior listed first to check that seniority, not input order, decides
  const claims = (seniorBalance: number, juniorBalance: number, seniorDemand: number, juniorDemand: number) => [
    { tranche: junior, openingBalance: juniorBalance, demand: juniorDemand },
    { tranche: senior, openingBalance: seniorBalance, demand: seniorDemand },
  ];

  it('serves the senior demand first and passes the residual to the junior', () => {
    const shares = allocator.allocatePeriod(0, 150, claims(1_000, 500, 100, 80));
    expect(shares.map(s => [s.trancheId, s.base])).toEqual([['junior', 50], ['senior', 100]]);
  });

  it('leaves the junior nothing when CFADS falls short of the senior demand', () => {
    const shares = allocator.allocatePeriod(0, 80, claims(1_000, 500, 100, 80));
    expect(shares.map(s => s.base)).toEqual([0, 80]);
  });

  it('passes negative CFADS to the most junior outstanding tranche', () => {
    const shares = allocator.allocatePeriod(0, -20, claims(1_000, 500, 100, 80));
    expect(shares.map(s => s.base)).toEqual([-20, 0]);
  });

  it('gives everything to the senior once the junior is repaid', () => {
    const shares = allocator.allocatePeriod(0, 150, claims(1_000, 0, 100, 0));
    expect(shares.map(s => s.base)).toEqual([0, 150]);
  });
});

describe('FX coverage', () => {
  const hard = tranche({ id: 'USD', currency: 'hard', tenorPeriods: 3 });

  it('treats the base currency as rate 1', () => {
    expect(lookupFxRate('domestic', 5, {}, 'domestic')).toBe(1);
    expect(lookupFxRate('hard', 0, { hard: [0] }, 'domestic')).toBeUndefined();
  });

  it('names the tranche and first period without a rate', () => {
    let caught: unknown;
    try {
      assertFxCoverage([hard], { hard: [300, 305] }, 'domestic');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ context: { trancheId: 'USD', period: 2, field: 'fxRates.hard' } });
  });

  it('accepts a series covering the tranche life', () => {
    expect(() => assertFxCoverage([hard], { hard: [300, 305, 310] }, 'domestic')).not.toThrow();
  });

  it('rejects allocating to an active tranche without a rate', () => {
    const allocator = new TrancheAllocator(createEngineConfig());
    expect(() => allocator.allocatePeriod(0, 100, [{ tranche: hard, openingBalance: 10, demand: 0 }]))
      .toThrow(ConfigurationError);
  });
});
