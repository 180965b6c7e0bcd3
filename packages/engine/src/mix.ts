// Tranche mix — split a debt total across domestic, DFI and hard-currency
// commercial tranches under mix caps and a commercial floor.

import { ConfigurationError } from './errors.js';
import type { Currency, TrancheInput } from './types.js';

export type MixLeg = 'domestic' | 'dfi' | 'commercial';

/** Tranche terms for one leg of the mix; principal comes from the solver. */
export type MixTerms = Omit<TrancheInput, 'id' | 'currency' | 'principal'> & { id?: string };

export interface TrancheMix {
  /** Largest share of the debt total raised in domestic currency */
  readonly domesticMax: number;
  /** Largest share raised from development finance institutions (hard currency) */
  readonly dfiMax: number;
  /** Smallest share raised as hard-currency commercial debt */
  readonly commercialMin: number;
  readonly terms: Readonly<Record<MixLeg, MixTerms>>;
}

export interface MixOptions {
  /** Currency the debt total is expressed in (default 'domestic') */
  baseCurrency?: Currency;
  /** Base-currency units per unit of the other currency at financial close (default 1) */
  fxRate?: number;
}

export interface MixAmounts {
  readonly domestic: number;
  readonly dfi: number;
  readonly commercial: number;
}

const LEG_CURRENCY: Readonly<Record<MixLeg, Currency>> = {
  domestic: 'domestic',
  dfi: 'hard',
  commercial: 'hard',
};

const LEGS: readonly MixLeg[] = ['domestic', 'commercial', 'dfi'];

/**
 * Split `debtTotal` (base currency) into leg amounts. Domestic takes up to its
 * cap, DFI up to its cap out of what is left, commercial the rest. When the
 * rest is under the commercial floor the gap is pulled from domestic first,
 * then from DFI.
 */
export function solveMixAmounts(debtTotal: number, mix: Pick<TrancheMix, 'domesticMax' | 'dfiMax' | 'commercialMin'>): MixAmounts {
  if (!Number.isFinite(debtTotal) || debtTotal <= 0) {
    throw new ConfigurationError(`Debt total must be positive (got ${debtTotal})`, { field: 'debtTotal' });
  }
  for (const field of ['domesticMax', 'dfiMax', 'commercialMin'] as const) {
    const share = mix[field];
    if (!Number.isFinite(share) || share < 0 || share > 1) {
      throw new ConfigurationError(`Mix ${field} must be in [0, 1] (got ${share})`, { field });
    }
  }

  let domestic = debtTotal * mix.domesticMax;
  let dfi = Math.min(debtTotal * mix.dfiMax, Math.max(0, debtTotal - domestic));
  let commercial = Math.max(0, debtTotal - domestic - dfi);

  const floor = debtTotal * mix.commercialMin;
  if (commercial < floor) {
    let need = floor - commercial;
    const fromDomestic = Math.min(need, domestic);
    domestic -= fromDomestic;
    need -= fromDomestic;
    dfi -= Math.min(need, dfi);
    commercial = debtTotal - domestic - dfi;
  }

  return Object.freeze({ domestic, dfi, commercial });
}

/**
 * Size the tranches of a mix. Principals are in each tranche's own currency;
 * legs that receive nothing are left out.
 */
export function sizeTrancheMix(debtTotal: number, mix: TrancheMix, options: MixOptions = {}): TrancheInput[] {
  const baseCurrency = options.baseCurrency ?? 'domestic';
  const fxRate = options.fxRate ?? 1;
  if (!Number.isFinite(fxRate) || fxRate <= 0) {
    throw new ConfigurationError(`FX rate must be positive (got ${fxRate})`, { field: 'fxRate' });
  }

  const amounts = solveMixAmounts(debtTotal, mix);
  return LEGS
    .filter(leg => amounts[leg] > 0)
    .map(leg => {
      const currency = LEG_CURRENCY[leg];
      const { id, ...terms } = mix.terms[leg];
      return {
        ...terms,
        id: id ?? leg,
        currency,
        principal: currency === baseCurrency ? amounts[leg] : amounts[leg] / fxRate,
      };
    });
}
