// Tests for the coverage analyzer — DSCR, LLCR, PLCR and summary statistics

import { describe, it, expect } from 'vitest';
import { createEngineConfig } from '../src/config.js';
import { CoverageAnalyzer, npv, summarize } from '../src/coverage.js';
import { ConfigurationError } from '../src/errors.js';

const analyzer = new CoverageAnalyzer(createEngineConfig());

// Two periods of debt, two further periods of project life
const input = {
  cfads: [100, 100, 100, 50],
  debtService: [80, 80, 0, 0],
  openingBalance: [150, 80, 0, 0],
  hurdleRate: 0.1,
};

describe('npv', () => {
  it('discounts to the first period of the range', () => {
    expect(npv([100, 110, 121], 0.1, 0, 2)).toBeCloseTo(300, 9);
    expect(npv([100, 110, 121], 0.1, 1, 2)).toBeCloseTo(220, 9);
  });

  it('is 0 for an empty range', () => {
    expect(npv([100], 0.1, 1, 0)).toBe(0);
  });
});

describe('CoverageAnalyzer', () => {
  it('computes DSCR, LLCR and PLCR from the start-of-period balance', () => {
    const metrics = analyzer.analyze(input);

    expect(metrics.debtMaturityPeriod).toBe(1);
    expect(metrics.projectEndPeriod).toBe(3);
    expect(metrics.periods.map(p => p.period)).toEqual([0, 1]);

    const [first, second] = metrics.periods;
    expect(first.dscr).toBe(1.25);
    expect(first.llcr).toBeCloseTo(1.2727272727, 9);
    expect(first.plcr).toBeCloseTo(2.0741297270, 9);
    expect(second.dscr).toBe(1.25);
    expect(second.llcr).toBe(1.25);
    expect(second.plcr).toBeCloseTo(2.9028925620, 9);
  });

  it('puts PLCR above LLCR when post-maturity cash is positive', () => {
    for (const p of analyzer.analyze(input).periods) {
      expect(p.plcr).toBeGreaterThan(p.llcr);
    }
  });

  it('discounts negative post-maturity cash into PLCR', () => {
    const metrics = analyzer.analyze({ ...input, cfads: [100, 100, -500, 0] });
    const [first, second] = metrics.periods;

    expect(first.llcr).toBeCloseTo(1.2727272727, 9);
    expect(first.plcr).toBeCloseTo(-1.4820936639, 9);
    expect(second.llcr).toBe(1.25);
    expect(second.plcr).toBeCloseTo(-4.4318181818, 9);
    expect(metrics.summary.plcr.periodsBelowOne).toBe(2);
  });

  it('makes PLCR equal LLCR when the project ends at debt maturity', () => {
    const metrics = analyzer.analyze({
      cfads: [100, 100],
      debtService: [80, 80],
      openingBalance: [150, 80],
      hurdleRate: 0.1,
    });
    expect(metrics.periods.map(p => p.plcr)).toEqual(metrics.periods.map(p => p.llcr));
  });

  it('returns identical results for identical inputs', () => {
    expect(analyzer.analyze(input)).toEqual(analyzer.analyze(input));
  });

  it('keeps the Infinity DSCR in the period but out of the summary', () => {
    const metrics = analyzer.analyze({
      cfads: [100, 100],
      debtService: [0, 60],
      openingBalance: [100, 50],
      hurdleRate: 0.1,
    });

    expect(metrics.periods[0].dscr).toBe(Infinity);
    expect(metrics.summary.dscr.count).toBe(1);
    expect(metrics.summary.dscr.min).toBeCloseTo(100 / 60, 12);
  });

  it('starts at the requested period', () => {
    const metrics = analyzer.analyze({ ...input, fromPeriod: 1 });
    expect(metrics.periods.map(p => p.period)).toEqual([1]);
    expect(metrics.summary.llcr.min).toBe(1.25);
  });

  it('uses the configured hurdle rate when none is given', () => {
    const { hurdleRate, ...rest } = input;
    expect(analyzer.analyze(rest).hurdleRate).toBe(0.1);
    expect(hurdleRate).toBe(0.1);
  });

  it('rejects a hurdle rate at or below -100%', () => {
    expect(() => analyzer.analyze({ ...input, hurdleRate: -1 })).toThrow(ConfigurationError);
  });

  it('rejects a maturity beyond the CFADS horizon', () => {
    expect(() => analyzer.analyze({ ...input, debtMaturityPeriod: 4 })).toThrow(/debt matures in period 4/);
  });

  it('rejects non-finite CFADS', () => {
    expect(() => analyzer.analyze({ ...input, cfads: [100, NaN, 100, 50] })).toThrow(ConfigurationError);
  });
});

describe('summarize', () => {
  it('reports count, range, mean and median', () => {
    expect(summarize([3, 1, 2])).toEqual({
      count: 3,
      min: 1,
      max: 3,
      mean: 2,
      median: 2,
      periodsBelowOne: 0,
    });
  });

  it('averages the middle pair for an even count and counts sub-1 values', () => {
    const stats = summarize([1, 2, 3, 0.5]);
    expect(stats.median).toBe(1.5);
    expect(stats.periodsBelowOne).toBe(1);
  });

  it('returns nulls when nothing finite remains', () => {
    expect(summarize([Infinity])).toEqual({
      count: 0,
      min: null,
      max: null,
      mean: null,
      median: null,
      periodsBelowOne: 0,
    });
  });
});
