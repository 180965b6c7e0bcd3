// Refinancing evaluator — replaces the outstanding debt at period t0 with a
// candidate tranche set and compares coverage against the baseline from t0 on.
// The baseline result is only read, never modified.

import { lookupFxRate } from './allocator.js';
import type { DebtEngine } from './engine.js';
import { ConfigurationError } from './errors.js';
import type {
  CfadsSeries,
  CovenantThreshold,
  CoverageMetrics,
  EngineResult,
  FxRates,
  SeriesStats,
  TrancheInput,
} from './types.js';

export interface RefinancingCandidate extends Omit<TrancheInput, 'principal' | 'startPeriod'> {
  /** Fraction of the refinanced balance this tranche takes */
  share: number;
}

export interface RefinancingRequest {
  refinancePeriod: number;
  candidates: readonly RefinancingCandidate[];
  /** Defaults to the CFADS carried in the baseline's consolidated schedule */
  cfads?: CfadsSeries;
  fxRates?: FxRates;
  hurdleRate?: number;
  covenants?: readonly CovenantThreshold[];
}

export interface RefinancingComparison {
  readonly refinancePeriod: number;
  readonly refinancedBalance: number;
  readonly original: CoverageMetrics;
  readonly alternative: EngineResult;
  readonly deltas: {
    readonly minDscr: number | null;
    readonly minLlcr: number | null;
    readonly minPlcr: number | null;
    readonly balloonDue: number;
  };
}

const SHARE_TOLERANCE = 1e-6;

function minDelta(alternative: SeriesStats, original: SeriesStats): number | null {
  if (alternative.min === null || original.min === null) return null;
  return alternative.min - original.min;
}

export class RefinancingEvaluator {
  constructor(private readonly engine: DebtEngine) {}

  evaluate(baseline: EngineResult, request: RefinancingRequest): RefinancingComparison {
    const t0 = request.refinancePeriod;
    const { baseCurrency } = this.engine.config;
    const cfads = request.cfads ?? baseline.consolidated.map(e => e.cfads);
    const fxRates = request.fxRates ?? {};
    const hurdleRate = request.hurdleRate ?? baseline.coverage.hurdleRate;

    if (!Number.isInteger(t0) || t0 < 0 || t0 >= baseline.consolidated.length) {
      throw new ConfigurationError(`Refinance period ${t0} is outside the baseline schedule`, { period: t0, field: 'refinancePeriod' });
    }
    const refinancedBalance = baseline.consolidated[t0].openingBalance;
    if (!(refinancedBalance > 0)) {
      throw new ConfigurationError(`No debt is outstanding at period ${t0} to refinance`, { period: t0, field: 'refinancePeriod' });
    }
    if (request.candidates.length === 0) {
      throw new ConfigurationError('At least one refinancing candidate is required', { field: 'candidates' });
    }

    const shareTotal = request.candidates.reduce((sum, c) => sum + c.share, 0);
    if (request.candidates.some(c => !(c.share > 0)) || Math.abs(shareTotal - 1) > SHARE_TOLERANCE) {
      throw new ConfigurationError(
        `Refinancing shares must be positive and sum to 1 (got ${shareTotal.toFixed(6)})`,
        { field: 'candidates.share' },
      );
    }

    const tranches: TrancheInput[] = request.candidates.map(({ share, ...terms }) => {
      const fx = lookupFxRate(terms.currency, t0, fxRates, baseCurrency);
      if (fx === undefined) {
        throw new ConfigurationError(
          `Tranche "${terms.id}": no ${terms.currency}/${baseCurrency} exchange rate for period ${t0}`,
          { trancheId: terms.id, period: t0, field: `fxRates.${terms.currency}` },
        );
      }
      return { ...terms, principal: (refinancedBalance * share) / fx, startPeriod: t0 };
    });

    const alternative = this.engine.run({
      cfads,
      tranches,
      fxRates,
      hurdleRate,
      covenants: request.covenants,
    });

    const original = this.engine.analyzer.analyzeSchedule(baseline.consolidated, cfads, {
      hurdleRate,
      fromPeriod: t0,
      debtMaturityPeriod: baseline.coverage.debtMaturityPeriod,
    });

    const balloonFrom = (result: EngineResult) =>
      result.consolidated.filter(e => e.period >= t0).reduce((sum, e) => sum + e.balloonDue, 0);

    return Object.freeze({
      refinancePeriod: t0,
      refinancedBalance,
      original,
      alternative,
      deltas: Object.freeze({
        minDscr: minDelta(alternative.coverage.summary.dscr, original.summary.dscr),
        minLlcr: minDelta(alternative.coverage.summary.llcr, original.summary.llcr),
        minPlcr: minDelta(alternative.coverage.summary.plcr, original.summary.plcr),
        balloonDue: balloonFrom(alternative) - balloonFrom(baseline),
      }),
    });
  }
}
