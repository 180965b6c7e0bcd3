// Balloon exposure assessment against warn / max thresholds and refinancing capacity

import type { FinancingLimits } from './config.js';
import type { BalloonAssessment } from './types.js';

const IMMATERIAL_FRACTION = 0.01;

const MITIGATION_OPTIONS = [
  'Refinancing commitment from lender',
  'Cash sweep to reduce the balloon',
  'Equity injection commitment at maturity',
  'Extend the amortization period',
  'Raise the sculpting DSCR target',
];

const RESTRUCTURE_OPTIONS = [
  'Extend tenor so more principal amortizes',
  'Raise the sculpting DSCR target',
  'Reduce the debt quantum',
  'Switch to annuity amortization',
];

function pct(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function assessBalloon(
  balloon: number,
  principal: number,
  limits: FinancingLimits,
  trancheId?: string,
): BalloonAssessment {
  const fraction = principal > 0 ? balloon / principal : 0;
  const base = { trancheId, balloonAmount: balloon, balloonFraction: fraction };

  if (fraction < IMMATERIAL_FRACTION) {
    return {
      ...base,
      status: 'none',
      feasible: true,
      mitigationRequired: false,
      mitigationOptions: [],
      notes: 'No material balloon payment',
    };
  }

  if (fraction <= limits.warnBalloonFraction) {
    return {
      ...base,
      status: 'acceptable',
      feasible: true,
      mitigationRequired: false,
      mitigationOptions: [],
      notes: `Small balloon (${pct(fraction)}), acceptable`,
    };
  }

  if (fraction <= limits.maxBalloonFraction) {
    const { refinancing } = limits;
    let feasible = true;
    let notes = `Balloon ${pct(fraction)} requires mitigation; refinancing disabled`;
    if (refinancing.enabled) {
      feasible = fraction <= refinancing.maxRefinanceFraction;
      notes = feasible
        ? `Balloon ${pct(fraction)} can be refinanced (max ${pct(refinancing.maxRefinanceFraction)})`
        : `Balloon ${pct(fraction)} exceeds refinancing limit ${pct(refinancing.maxRefinanceFraction)}`;
    }
    return {
      ...base,
      status: 'mitigate',
      feasible,
      mitigationRequired: true,
      mitigationOptions: MITIGATION_OPTIONS,
      notes,
    };
  }

  return {
    ...base,
    status: 'excessive',
    feasible: false,
    mitigationRequired: true,
    mitigationOptions: RESTRUCTURE_OPTIONS,
    notes: `Balloon ${pct(fraction)} exceeds maximum ${pct(limits.maxBalloonFraction)}; restructure the debt`,
  };
}
