// Amortization scheduler — annuity and DSCR-sculpted repayment profiles
//
// A TrancheAmortizer advances one period at a time so the engine can feed it
// CFADS allocations computed from true opening balances. scheduleTranche()
// drives it across the whole tenor for callers that already hold an allocation.

import { DEFAULT_TOLERANCE, exceeds } from './config.js';
import { InfeasibleSculptError } from './errors.js';
import { balloonAmount, isActiveIn, maturityPeriod } from './tranche.js';
import type { SchedulePhase, ScheduleEntry, Tranche } from './types.js';

/**
 * Coverage ratio with the degenerate cases made explicit:
 * no service owed yields the Infinity sentinel, no cash yields 0.
 */
export function coverageRatio(cfads: number, service: number): number {
  if (service <= 0) return Infinity;
  if (cfads <= 0) return 0;
  return cfads / service;
}

/**
 * Level payment retiring `principal - balloon` over `periods`, plus interest on
 * the balloon portion so that exactly `balloon` is left after the last payment.
 */
export function levelPayment(rate: number, periods: number, principal: number, balloon = 0): number {
  const amortizing = principal - balloon;
  if (periods <= 0) return 0;
  if (rate === 0) return amortizing / periods;
  const factor = rate / (1 - Math.pow(1 + rate, -periods));
  return amortizing * factor + balloon * rate;
}

export interface AmortizerOptions {
  tolerance?: number;
}

export class TrancheAmortizer {
  private balance: number;
  private level: number | null = null;
  private nextPeriod: number;
  private readonly rows: ScheduleEntry[] = [];
  private readonly tolerance: number;

  constructor(readonly tranche: Tranche, options: AmortizerOptions = {}) {
    this.balance = tranche.principal;
    this.nextPeriod = tranche.startPeriod;
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  }

  get done(): boolean {
    return this.nextPeriod > maturityPeriod(this.tranche);
  }

  get entries(): readonly ScheduleEntry[] {
    return this.rows;
  }

  /** Balance outstanding at the start of `period`; 0 outside the tranche's life. */
  openingBalance(period: number): number {
    if (!isActiveIn(this.tranche, period)) return 0;
    if (period === this.nextPeriod) return this.balance;
    const row = this.rows.find(r => r.period === period);
    return row ? row.openingBalance : 0;
  }

  /**
   * Cash the tranche needs in `period` under its contract, in tranche currency.
   * Priority allocation serves senior tranches up to this amount.
   */
  demand(period: number): number {
    const t = this.tranche;
    if (!isActiveIn(t, period) || period !== this.nextPeriod) return 0;

    const index = period - t.startPeriod;
    const interest = this.balance * t.rate;
    const remainingAmortizable = Math.max(0, this.balance - balloonAmount(t));

    if (index < t.gracePeriods) {
      if (t.capitalizeGraceInterest) return 0;
      return t.amortization === 'sculpted' ? interest * (t.targetDscr ?? 1) : interest;
    }
    if (t.amortization === 'annuity') {
      if (period === maturityPeriod(t)) return interest + remainingAmortizable;
      return this.scheduledPayment();
    }
    const remainingPeriods = t.tenorPeriods - index;
    return (t.targetDscr ?? 1) * (interest + remainingAmortizable / remainingPeriods);
  }

  /**
   * Produce the schedule row for the next period.
   *
   * @param allocation CFADS allocated to this tranche, in tranche currency
   * @throws InfeasibleSculptError when a sculpted tranche cannot hold its target
   */
  step(allocation: number): ScheduleEntry {
    const t = this.tranche;
    if (this.done) {
      throw new RangeError(`Tranche "${t.id}" has already matured at period ${maturityPeriod(t)}`);
    }

    const period = this.nextPeriod;
    const index = period - t.startPeriod;
    const opening = this.balance;
    const interest = opening * t.rate;
    const balloon = balloonAmount(t);
    const remainingAmortizable = Math.max(0, opening - balloon);

    let phase: SchedulePhase;
    let principal = 0;
    let capitalized = 0;

    if (index < t.gracePeriods) {
      phase = 'grace';
      if (t.capitalizeGraceInterest) capitalized = interest;
    } else if (period === maturityPeriod(t)) {
      phase = 'maturity';
      principal = remainingAmortizable;
      if (t.amortization === 'sculpted') this.assertRetirable(period, allocation, interest, principal);
    } else {
      phase = 'amortizing';
      principal = t.amortization === 'annuity'
        ? Math.min(Math.max(0, this.scheduledPayment() - interest), remainingAmortizable)
        : this.sculptedPrincipal(period, allocation, interest, remainingAmortizable);
    }

    const closing = phase === 'maturity' ? balloon : opening + capitalized - principal;
    const row: ScheduleEntry = Object.freeze({
      trancheId: t.id,
      period,
      phase,
      openingBalance: opening,
      interest,
      capitalizedInterest: capitalized,
      principalPaid: principal,
      totalService: interest - capitalized + principal,
      closingBalance: closing,
    });

    this.rows.push(row);
    this.balance = closing;
    this.nextPeriod += 1;
    return row;
  }

  // The level payment is fixed on the balance at the first amortizing period,
  // which includes any interest capitalized during grace.
  private scheduledPayment(): number {
    if (this.level === null) {
      const t = this.tranche;
      this.level = levelPayment(t.rate, t.tenorPeriods - t.gracePeriods, this.balance, balloonAmount(t));
    }
    return this.level;
  }

  private sculptedPrincipal(period: number, allocation: number, interest: number, remainingAmortizable: number): number {
    const target = this.targetDscr();
    const raw = allocation / target - interest;
    // Retired down to its balloon with nothing accruing: no service to sculpt
    if (interest <= 0 && remainingAmortizable <= 0) return 0;
    if (raw < 0 && exceeds(interest, allocation / target, this.tolerance)) {
      throw new InfeasibleSculptError(this.tranche.id, period, interest * target - allocation, target, 'negative-principal');
    }
    return Math.min(Math.max(0, raw), remainingAmortizable);
  }

  private assertRetirable(period: number, allocation: number, interest: number, principal: number): void {
    const target = this.targetDscr();
    const service = interest + principal;
    if (service <= 0) return;
    if (exceeds(service, allocation / target, this.tolerance)) {
      throw new InfeasibleSculptError(this.tranche.id, period, service * target - allocation, target, 'unretired-balance');
    }
  }

  private targetDscr(): number {
    // createTranche guarantees a positive target on sculpted tranches
    return this.tranche.targetDscr ?? 1;
  }
}

/**
 * Full schedule for one tranche given its per-period allocation, indexed by
 * project period and expressed in tranche currency. Missing periods count as 0.
 */
export function scheduleTranche(
  tranche: Tranche,
  allocation: readonly number[],
  options: AmortizerOptions = {},
): ScheduleEntry[] {
  const amortizer = new TrancheAmortizer(tranche, options);
  for (let p = tranche.startPeriod; p <= maturityPeriod(tranche); p++) {
    amortizer.step(allocation[p] ?? 0);
  }
  return [...amortizer.entries];
}
