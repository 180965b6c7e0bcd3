// Coverage analyzer — DSCR, LLCR and PLCR per period plus summary statistics
//
// LLCR discounts CFADS through final debt maturity, PLCR through project end.
// Both divide by the start-of-period (pre-repayment) outstanding balance.
// Post-maturity outflows (decommissioning) are discounted like any other CFADS,
// so PLCR can fall below LLCR when the tail is negative.

import type { EngineConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { coverageRatio } from './scheduler.js';
import type {
  CfadsSeries,
  ConsolidatedEntry,
  CoverageMetric,
  CoverageMetrics,
  CoveragePeriod,
  SeriesStats,
} from './types.js';

export interface CoverageInput {
  readonly cfads: CfadsSeries;
  /** Total debt service per period, base currency */
  readonly debtService: readonly number[];
  /** Outstanding balance at the start of each period, base currency */
  readonly openingBalance: readonly number[];
  readonly hurdleRate?: number;
  /** Defaults to the last period with a balance outstanding */
  readonly debtMaturityPeriod?: number;
  /** Ignore periods before this one (refinancing comparisons) */
  readonly fromPeriod?: number;
}

/**
 * Present value at period `from` of cashflows[from..to] (inclusive) at a fixed
 * per-period rate. Empty ranges are worth 0.
 */
export function npv(cashflows: readonly number[], rate: number, from: number, to: number): number {
  let value = 0;
  let factor = 1;
  for (let k = from; k <= to && k < cashflows.length; k++) {
    value += cashflows[k] / factor;
    factor *= 1 + rate;
  }
  return value;
}

export function summarize(values: readonly number[]): SeriesStats {
  const finite = values.filter(Number.isFinite);
  if (finite.length === 0) {
    return { count: 0, min: null, max: null, mean: null, median: null, periodsBelowOne: 0 };
  }
  const sorted = [...finite].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];

  return {
    count: sorted.length,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean: sorted.reduce((sum, v) => sum + v, 0) / sorted.length,
    median,
    periodsBelowOne: sorted.filter(v => v < 1).length,
  };
}

export class CoverageAnalyzer {
  constructor(private readonly config: EngineConfig) {}

  analyze(input: CoverageInput): CoverageMetrics {
    const { cfads, debtService, openingBalance } = input;
    const hurdleRate = input.hurdleRate ?? this.config.hurdleRate;
    const fromPeriod = input.fromPeriod ?? 0;

    if (!Number.isFinite(hurdleRate) || hurdleRate <= -1) {
      throw new ConfigurationError(`Hurdle rate must be a finite number above -1 (got ${hurdleRate})`, { field: 'hurdleRate' });
    }
    if (!cfads.every(Number.isFinite)) {
      throw new ConfigurationError('CFADS series contains non-finite values', { field: 'cfads' });
    }

    const debtMaturityPeriod = input.debtMaturityPeriod ?? lastOutstandingPeriod(openingBalance);
    const projectEndPeriod = cfads.length - 1;
    if (debtMaturityPeriod > projectEndPeriod) {
      throw new ConfigurationError(
        `CFADS series covers ${cfads.length} periods but debt matures in period ${debtMaturityPeriod}`,
        { field: 'cfads', period: debtMaturityPeriod },
      );
    }

    const periods: CoveragePeriod[] = [];
    for (let t = Math.max(0, fromPeriod); t <= Math.min(debtMaturityPeriod, projectEndPeriod); t++) {
      const balance = openingBalance[t] ?? 0;
      if (!(balance > 0)) continue;

      const service = debtService[t] ?? 0;
      const loanLife = npv(cfads, hurdleRate, t, debtMaturityPeriod);
      const projectLife = npv(cfads, hurdleRate, t, projectEndPeriod);

      periods.push(Object.freeze({
        period: t,
        cfads: cfads[t],
        debtService: service,
        openingBalance: balance,
        dscr: coverageRatio(cfads[t], service),
        llcr: loanLife / balance,
        plcr: projectLife / balance,
      }));
    }

    const seriesOf = (metric: CoverageMetric) => periods.map(p => p[metric]);
    return Object.freeze({
      hurdleRate,
      debtMaturityPeriod,
      projectEndPeriod,
      periods,
      summary: Object.freeze({
        dscr: summarize(seriesOf('dscr')),
        llcr: summarize(seriesOf('llcr')),
        plcr: summarize(seriesOf('plcr')),
      }),
    });
  }

  /** Analyze a consolidated engine schedule. */
  analyzeSchedule(
    consolidated: readonly ConsolidatedEntry[],
    cfads: CfadsSeries,
    options: Pick<CoverageInput, 'hurdleRate' | 'debtMaturityPeriod' | 'fromPeriod'> = {},
  ): CoverageMetrics {
    return this.analyze({
      cfads,
      debtService: consolidated.map(e => e.totalService),
      openingBalance: consolidated.map(e => e.openingBalance),
      ...options,
    });
  }
}

function lastOutstandingPeriod(openingBalance: readonly number[]): number {
  for (let t = openingBalance.length - 1; t >= 0; t--) {
    if (openingBalance[t] > 0) return t;
  }
  return -1;
}
