// Debt engine — runs the full structuring pipeline for one scenario:
//   CFADS + tranches -> allocator -> amortizer per tranche -> consolidated
//   schedule -> coverage analyzer -> covenant validator
//
// A DebtEngine holds only its frozen config, so one instance can serve any
// number of concurrent scenarios.

import { TrancheAllocator, assertFxCoverage, lookupFxRate } from './allocator.js';
import { assessBalloon } from './balloon.js';
import { createEngineConfig, type EngineConfig } from './config.js';
import { CovenantValidator } from './covenants.js';
import { CoverageAnalyzer } from './coverage.js';
import { ConfigurationError, InfeasibleSculptError } from './errors.js';
import { TrancheAmortizer } from './scheduler.js';
import { checkFinancingLimits, createTranche, isActiveIn, maturityPeriod } from './tranche.js';
import type {
  CfadsSeries,
  ConsolidatedEntry,
  CovenantThreshold,
  EngineResult,
  FxRates,
  Tranche,
  TrancheAllocation,
  TrancheInput,
  TrancheResult,
} from './types.js';

export interface EngineInput {
  cfads: CfadsSeries;
  tranches: readonly TrancheInput[];
  fxRates?: FxRates;
  hurdleRate?: number;
  covenants?: readonly CovenantThreshold[];
}

interface Simulation {
  amortizers: TrancheAmortizer[];
  allocations: TrancheAllocation[][];
}

export class DebtEngine {
  readonly allocator: TrancheAllocator;
  readonly analyzer: CoverageAnalyzer;

  constructor(readonly config: EngineConfig = createEngineConfig()) {
    this.allocator = new TrancheAllocator(config);
    this.analyzer = new CoverageAnalyzer(config);
  }

  run(input: EngineInput): EngineResult {
    const { cfads } = input;
    const fxRates = input.fxRates ?? {};
    const tranches = this.prepareTranches(input.tranches);
    const warnings = tranches.flatMap(t => checkFinancingLimits(t, this.config));

    const lastMaturity = Math.max(...tranches.map(maturityPeriod));
    if (cfads.length <= lastMaturity) {
      throw new ConfigurationError(
        `CFADS series covers ${cfads.length} periods but debt is outstanding until period ${lastMaturity}`,
        { field: 'cfads', period: lastMaturity },
      );
    }
    if (!cfads.every(Number.isFinite)) {
      throw new ConfigurationError('CFADS series contains non-finite values', { field: 'cfads' });
    }
    assertFxCoverage(tranches, fxRates, this.config.baseCurrency);

    const { simulation, scheduled, fallbacks } = this.simulateWithFallback(tranches, cfads, fxRates, warnings);
    const consolidated = this.consolidate(simulation.amortizers, cfads, fxRates);

    const coverage = this.analyzer.analyzeSchedule(consolidated, cfads, {
      hurdleRate: input.hurdleRate,
      debtMaturityPeriod: lastMaturity,
    });

    const compliance = input.covenants && input.covenants.length > 0
      ? CovenantValidator.fromConfig(this.config, input.covenants).validate(coverage)
      : undefined;

    const trancheResults: TrancheResult[] = scheduled.map((tranche, i) => ({
      tranche,
      entries: simulation.amortizers[i].entries,
      allocations: simulation.allocations[i],
      fallbackApplied: fallbacks.has(tranche.id),
    }));

    const balloons = trancheResults.map(({ tranche, entries }) =>
      assessBalloon(entries[entries.length - 1].closingBalance, tranche.principal, this.config.limits, tranche.id));

    return Object.freeze({
      tranches: trancheResults,
      consolidated,
      coverage,
      compliance,
      balloons,
      warnings: [...warnings, ...(compliance?.warnings ?? [])],
    });
  }

  private prepareTranches(inputs: readonly TrancheInput[]): Tranche[] {
    if (inputs.length === 0) {
      throw new ConfigurationError('At least one tranche is required', { field: 'tranches' });
    }
    const seen = new Set<string>();
    return inputs.map(input => {
      const tranche = createTranche(input);
      if (seen.has(tranche.id)) {
        throw new ConfigurationError(`Duplicate tranche id "${tranche.id}"`, { trancheId: tranche.id, field: 'id' });
      }
      seen.add(tranche.id);
      return tranche;
    });
  }

  // Re-runs the whole simulation with an infeasible sculpted tranche switched to
  // annuity, but only when the caller opted into that fallback.
  private simulateWithFallback(
    tranches: readonly Tranche[],
    cfads: CfadsSeries,
    fxRates: FxRates,
    warnings: string[],
  ): { simulation: Simulation; scheduled: Tranche[]; fallbacks: Set<string> } {
    let scheduled = [...tranches];
    const fallbacks = new Set<string>();

    for (;;) {
      try {
        return { simulation: this.simulate(scheduled, cfads, fxRates), scheduled, fallbacks };
      } catch (err) {
        if (!(err instanceof InfeasibleSculptError) || this.config.sculptFallback !== 'annuity') throw err;

        const warning = `${err.message}; falling back to annuity amortization`;
        warnings.push(warning);
        this.config.logger.warn(`[debt-engine] ${warning}`);
        fallbacks.add(err.trancheId);
        scheduled = scheduled.map(t =>
          t.id === err.trancheId ? Object.freeze({ ...t, amortization: 'annuity' as const }) : t);
      }
    }
  }

  private simulate(tranches: readonly Tranche[], cfads: CfadsSeries, fxRates: FxRates): Simulation {
    const amortizers = tranches.map(t => new TrancheAmortizer(t, { tolerance: this.config.tolerance }));
    const allocations: TrancheAllocation[][] = tranches.map(() => []);

    for (let period = 0; period < cfads.length; period++) {
      const claims = amortizers.map(a => ({
        tranche: a.tranche,
        openingBalance: a.openingBalance(period),
        demand: a.demand(period),
      }));
      const shares = this.allocator.allocatePeriod(period, cfads[period], claims, fxRates);

      amortizers.forEach((amortizer, i) => {
        allocations[i].push(shares[i]);
        if (isActiveIn(amortizer.tranche, period)) amortizer.step(shares[i].local);
      });
    }

    return { amortizers, allocations };
  }

  private consolidate(amortizers: readonly TrancheAmortizer[], cfads: CfadsSeries, fxRates: FxRates): ConsolidatedEntry[] {
    return cfads.map((amount, period) => {
      const row = {
        period,
        cfads: amount,
        interest: 0,
        capitalizedInterest: 0,
        principalPaid: 0,
        totalService: 0,
        openingBalance: 0,
        closingBalance: 0,
        balloonDue: 0,
      };

      for (const { tranche, entries } of amortizers) {
        if (!isActiveIn(tranche, period)) continue;
        const entry = entries[period - tranche.startPeriod];
        const fx = lookupFxRate(tranche.currency, period, fxRates, this.config.baseCurrency) ?? 1;

        row.interest += entry.interest * fx;
        row.capitalizedInterest += entry.capitalizedInterest * fx;
        row.principalPaid += entry.principalPaid * fx;
        row.totalService += entry.totalService * fx;
        row.openingBalance += entry.openingBalance * fx;
        row.closingBalance += entry.closingBalance * fx;
        if (entry.phase === 'maturity') row.balloonDue += entry.closingBalance * fx;
      }

      return Object.freeze(row);
    });
  }
}
