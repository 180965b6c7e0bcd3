// Tranche allocator — splits consolidated CFADS across tranches and converts
// each share into the tranche's own currency.
//
// pro-rata: by outstanding base-currency balance at the start of the period
// priority: senior tranches take their contractual demand, the most junior
//           outstanding tranche takes the residual
//
// In both modes the base-currency shares add back to the period's CFADS.

import type { EngineConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { isActiveIn, maturityPeriod } from './tranche.js';
import type { CfadsSeries, Currency, FxRates, Tranche, TrancheAllocation } from './types.js';

export interface TrancheClaim {
  readonly tranche: Tranche;
  /** Opening balance for the period, tranche currency */
  readonly openingBalance: number;
  /** Contractual cash need for the period, tranche currency (priority mode) */
  readonly demand: number;
}

export interface AllocationProfile {
  /** openingBalances[trancheIndex][period], tranche currency */
  readonly openingBalances: readonly (readonly number[])[];
  readonly demands?: readonly (readonly number[])[];
}

/**
 * Base-currency units per unit of `currency` in `period`, or undefined when the
 * series does not cover the period.
 */
export function lookupFxRate(
  currency: Currency,
  period: number,
  fxRates: FxRates,
  baseCurrency: Currency,
): number | undefined {
  if (currency === baseCurrency) return 1;
  const rate = fxRates[currency]?.[period];
  return rate !== undefined && Number.isFinite(rate) && rate > 0 ? rate : undefined;
}

/**
 * Every non-base tranche needs a positive rate for each period it is outstanding.
 *
 * @throws ConfigurationError naming the tranche and first uncovered period
 */
export function assertFxCoverage(
  tranches: readonly Tranche[],
  fxRates: FxRates,
  baseCurrency: Currency,
): void {
  for (const t of tranches) {
    if (t.currency === baseCurrency) continue;
    for (let p = t.startPeriod; p <= maturityPeriod(t); p++) {
      if (lookupFxRate(t.currency, p, fxRates, baseCurrency) === undefined) {
        throw new ConfigurationError(
          `Tranche "${t.id}": no ${t.currency}/${baseCurrency} exchange rate for period ${p}`,
          { trancheId: t.id, period: p, field: `fxRates.${t.currency}` },
        );
      }
    }
  }
}

export class TrancheAllocator {
  constructor(private readonly config: EngineConfig) {}

  /**
   * Allocate one period's CFADS across the claims, in claim order.
   * Tranches that are not outstanding in `period` receive nothing unless no
   * tranche is outstanding at all.
   */
  allocatePeriod(
    period: number,
    cfads: number,
    claims: readonly TrancheClaim[],
    fxRates: FxRates = {},
  ): TrancheAllocation[] {
    if (claims.length === 0) return [];

    const rates = claims.map(c => this.rateFor(c.tranche, period, fxRates));
    const bases = this.config.allocationPolicy === 'priority'
      ? this.byPriority(cfads, claims, rates)
      : this.proRata(cfads, claims, rates);

    return claims.map((c, i) => Object.freeze({
      trancheId: c.tranche.id,
      period,
      base: bases[i],
      local: bases[i] / rates[i],
      fxRate: rates[i],
    }));
  }

  /**
   * Allocate a whole CFADS series given each tranche's opening-balance profile
   * (and demand profile, for priority mode). Returns one row per tranche.
   */
  allocateSeries(
    cfads: CfadsSeries,
    tranches: readonly Tranche[],
    profile: AllocationProfile,
    fxRates: FxRates = {},
  ): TrancheAllocation[][] {
    assertFxCoverage(tranches, fxRates, this.config.baseCurrency);
    const byTranche: TrancheAllocation[][] = tranches.map(() => []);

    cfads.forEach((amount, period) => {
      const claims = tranches.map((tranche, i) => ({
        tranche,
        openingBalance: profile.openingBalances[i]?.[period] ?? 0,
        demand: profile.demands?.[i]?.[period] ?? 0,
      }));
      this.allocatePeriod(period, amount, claims, fxRates)
        .forEach((allocation, i) => byTranche[i].push(allocation));
    });

    return byTranche;
  }

  private rateFor(tranche: Tranche, period: number, fxRates: FxRates): number {
    const rate = lookupFxRate(tranche.currency, period, fxRates, this.config.baseCurrency);
    if (rate !== undefined) return rate;
    if (!isActiveIn(tranche, period)) return 1;
    throw new ConfigurationError(
      `Tranche "${tranche.id}": no ${tranche.currency}/${this.config.baseCurrency} exchange rate for period ${period}`,
      { trancheId: tranche.id, period, field: `fxRates.${tranche.currency}` },
    );
  }

  private proRata(cfads: number, claims: readonly TrancheClaim[], rates: readonly number[]): number[] {
    let weights = claims.map((c, i) => Math.max(0, c.openingBalance) * rates[i]);
    if (weights.every(w => w === 0)) {
      weights = claims.map((c, i) => c.tranche.principal * rates[i]);
    }
    const total = weights.reduce((sum, w) => sum + w, 0);
    const receiver = lastIndexWhere(weights, w => w > 0);

    const amounts = weights.map(w => (cfads * w) / total);
    return withResidual(cfads, amounts, receiver);
  }

  private byPriority(cfads: number, claims: readonly TrancheClaim[], rates: readonly number[]): number[] {
    const order = claims
      .map((c, i) => ({ i, seniority: c.tranche.seniority }))
      .sort((a, b) => a.seniority - b.seniority || a.i - b.i)
      .map(o => o.i);

    const outstanding = order.filter(i => claims[i].openingBalance > 0 || claims[i].demand > 0);
    const receiver = outstanding.length > 0 ? outstanding[outstanding.length - 1] : order[order.length - 1];

    const amounts = claims.map(() => 0);
    let remaining = cfads;
    for (const i of order) {
      if (i === receiver) continue;
      const take = remaining > 0 ? Math.min(remaining, Math.max(0, claims[i].demand) * rates[i]) : 0;
      amounts[i] = take;
      remaining -= take;
    }
    return withResidual(cfads, amounts, receiver);
  }
}

function lastIndexWhere<T>(values: readonly T[], predicate: (value: T) => boolean): number {
  for (let i = values.length - 1; i >= 0; i--) {
    if (predicate(values[i])) return i;
  }
  return values.length - 1;
}

// The receiver absorbs rounding so shares add back to the period's CFADS.
function withResidual(cfads: number, amounts: number[], receiver: number): number[] {
  const others = amounts.reduce((sum, a, i) => (i === receiver ? sum : sum + a), 0);
  const result = [...amounts];
  result[receiver] = cfads - others;
  return result;
}
