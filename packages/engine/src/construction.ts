// Construction-period drawdown and interest-during-construction (IDC)
//
// Debt is drawn over the construction periods; interest on the running drawn
// balance is capitalized each period, so the tranche enters operations with a
// principal grossed up by the total IDC.

import type { EngineConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import type { TrancheInput } from './types.js';

export interface ConstructionSchedule {
  readonly drawdowns: readonly number[];
  readonly idc: readonly number[];
  readonly totalIdc: number;
  /** Drawn amount plus capitalized interest at the end of construction */
  readonly balance: number;
  readonly warnings: readonly string[];
}

export interface ConstructionOptions {
  /** Fraction of the facility drawn in each construction period */
  drawdownFractions: readonly number[];
}

export function buildDrawdowns(
  principal: number,
  fractions: readonly number[],
  config: EngineConfig,
  trancheId = 'construction',
): { drawdowns: number[]; warnings: string[] } {
  const warnings: string[] = [];
  fractions.forEach((f, period) => {
    if (!Number.isFinite(f) || f < 0) {
      throw new ConfigurationError(
        `Tranche "${trancheId}": drawdown fraction for period ${period} must be non-negative (got ${f})`,
        { trancheId, period, field: 'drawdownFractions' },
      );
    }
  });

  const total = fractions.reduce((sum, f) => sum + f, 0);
  if (total > 1 + config.tolerance) {
    const message = `Tranche "${trancheId}": drawdowns total ${(total * 100).toFixed(1)}% of the facility`;
    if (config.validationPolicy === 'strict') {
      throw new ConfigurationError(message, { trancheId, field: 'drawdownFractions' });
    }
    warnings.push(message);
    config.logger.warn(`[construction] ${message}`);
  }

  return { drawdowns: fractions.map(f => principal * f), warnings };
}

/** Capitalize interest on the running balance, itself including prior IDC. */
export function capitalizeConstructionInterest(
  drawdowns: readonly number[],
  rate: number,
): { idc: number[]; totalIdc: number; balance: number } {
  const idc: number[] = [];
  let balance = 0;
  let totalIdc = 0;
  for (const drawn of drawdowns) {
    balance += drawn;
    const interest = balance * rate;
    idc.push(interest);
    totalIdc += interest;
    balance += interest;
  }
  return { idc, totalIdc, balance };
}

/**
 * Gross a tranche up for its construction period. The returned input starts
 * amortizing (or its grace period) right after the last construction period.
 */
export function applyConstructionPeriod(
  input: TrancheInput,
  options: ConstructionOptions,
  config: EngineConfig,
): { tranche: TrancheInput; schedule: ConstructionSchedule } {
  const { drawdowns, warnings } = buildDrawdowns(input.principal, options.drawdownFractions, config, input.id);
  const { idc, totalIdc, balance } = capitalizeConstructionInterest(drawdowns, input.rate);

  return {
    tranche: {
      ...input,
      principal: balance,
      startPeriod: (input.startPeriod ?? 0) + options.drawdownFractions.length,
    },
    schedule: { drawdowns, idc, totalIdc, balance, warnings },
  };
}
