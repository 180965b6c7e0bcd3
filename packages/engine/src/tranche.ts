// Tranche model — immutable debt instrument records and their invariants

import type { EngineConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import type { Tranche, TrancheInput } from './types.js';

const CURRENCIES = ['domestic', 'hard'] as const;
const STYLES = ['annuity', 'sculpted'] as const;

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Build a frozen tranche from caller input, applying defaults.
 * Structural invariants are always enforced, whatever the validation policy.
 *
 * @throws ConfigurationError on grace >= tenor, negative rate or principal,
 *   balloon outside [0, 1), or a sculpted tranche without a positive target.
 */
export function createTranche(input: TrancheInput): Tranche {
  const tranche: Tranche = {
    id: input.id,
    currency: input.currency,
    principal: input.principal,
    rate: input.rate,
    tenorPeriods: input.tenorPeriods,
    gracePeriods: input.gracePeriods ?? 0,
    amortization: input.amortization,
    targetDscr: input.targetDscr,
    balloonFraction: input.balloonFraction ?? 0,
    capitalizeGraceInterest: input.capitalizeGraceInterest ?? false,
    seniority: input.seniority ?? 0,
    startPeriod: input.startPeriod ?? 0,
  };
  assertTrancheInvariants(tranche);
  return Object.freeze(tranche);
}

export function assertTrancheInvariants(t: Tranche): void {
  const fail = (field: string, message: string): never => {
    throw new ConfigurationError(`Tranche "${t.id}": ${message}`, { trancheId: t.id, field });
  };

  if (t.id.trim() === '') fail('id', 'id must not be empty');
  if (!CURRENCIES.includes(t.currency)) fail('currency', `unknown currency "${t.currency}"`);
  if (!STYLES.includes(t.amortization)) fail('amortization', `unknown amortization style "${t.amortization}"`);
  if (!Number.isFinite(t.principal) || t.principal <= 0) fail('principal', `principal must be positive (got ${t.principal})`);
  if (!Number.isFinite(t.rate) || t.rate < 0) fail('rate', `rate must be non-negative (got ${t.rate})`);
  if (!Number.isInteger(t.tenorPeriods) || t.tenorPeriods < 1) fail('tenorPeriods', `tenor must be an integer >= 1 (got ${t.tenorPeriods})`);
  if (!isNonNegativeInteger(t.gracePeriods)) fail('gracePeriods', `grace must be a non-negative integer (got ${t.gracePeriods})`);
  if (t.gracePeriods >= t.tenorPeriods) {
    fail('gracePeriods', `grace periods (${t.gracePeriods}) must be fewer than tenor (${t.tenorPeriods})`);
  }
  if (!Number.isFinite(t.balloonFraction) || t.balloonFraction < 0 || t.balloonFraction >= 1) {
    fail('balloonFraction', `balloon fraction must be in [0, 1) (got ${t.balloonFraction})`);
  }
  if (!isNonNegativeInteger(t.startPeriod)) fail('startPeriod', `start period must be a non-negative integer (got ${t.startPeriod})`);
  if (!Number.isInteger(t.seniority)) fail('seniority', `seniority must be an integer (got ${t.seniority})`);
  if (t.amortization === 'sculpted' && (t.targetDscr === undefined || !(t.targetDscr > 0))) {
    fail('targetDscr', 'sculpted amortization requires a positive targetDscr');
  }
}

/**
 * Check a tranche against the configured financing limits. Under the strict
 * policy the first breach throws; under permissive every breach is returned as
 * a warning and logged.
 */
export function checkFinancingLimits(t: Tranche, config: EngineConfig): string[] {
  const { limits } = config;
  const issues: Array<{ field: string; message: string }> = [];

  if (t.tenorPeriods > limits.maxTenorPeriods) {
    issues.push({ field: 'tenorPeriods', message: `tenor ${t.tenorPeriods} > max ${limits.maxTenorPeriods}` });
  }
  if (t.rate > limits.maxRate) {
    issues.push({
      field: 'rate',
      message: `rate ${(t.rate * 100).toFixed(2)}% > max ${(limits.maxRate * 100).toFixed(2)}%`,
    });
  }
  if (t.amortization === 'sculpted' && t.targetDscr !== undefined && t.targetDscr < limits.minTargetDscr) {
    issues.push({
      field: 'targetDscr',
      message: `target DSCR ${t.targetDscr.toFixed(2)}x < minimum ${limits.minTargetDscr.toFixed(2)}x`,
    });
  }

  if (issues.length === 0) return [];

  if (config.validationPolicy === 'strict') {
    const first = issues[0];
    throw new ConfigurationError(`Tranche "${t.id}": ${first.message}`, { trancheId: t.id, field: first.field });
  }

  return issues.map(({ message }) => {
    const warning = `Tranche "${t.id}": ${message}`;
    config.logger.warn(`[debt-engine] ${warning}`);
    return warning;
  });
}

/** Last period (inclusive) on the project timeline in which the tranche is outstanding. */
export function maturityPeriod(t: Tranche): number {
  return t.startPeriod + t.tenorPeriods - 1;
}

export function isActiveIn(t: Tranche, period: number): boolean {
  return period >= t.startPeriod && period <= maturityPeriod(t);
}

export function balloonAmount(t: Tranche): number {
  return t.balloonFraction * t.principal;
}
