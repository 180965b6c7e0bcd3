// Engine configuration — an explicit, frozen value passed to every component.
// Nothing here is read from the environment; the server layer does that.

import type {
  AllocationPolicy,
  Currency,
  SculptFallback,
  ValidationPolicy,
} from './types.js';

export interface RefinancingLimits {
  readonly enabled: boolean;
  readonly maxRefinanceFraction: number;
}

export interface FinancingLimits {
  readonly maxTenorPeriods: number;
  readonly maxRate: number;
  readonly minTargetDscr: number;
  readonly warnBalloonFraction: number;
  readonly maxBalloonFraction: number;
  readonly refinancing: RefinancingLimits;
}

export type EngineLogger = Pick<Console, 'warn'>;

export interface EngineConfig {
  readonly baseCurrency: Currency;
  readonly allocationPolicy: AllocationPolicy;
  readonly validationPolicy: ValidationPolicy;
  readonly hurdleRate: number;
  readonly sculptFallback: SculptFallback;
  /** Relative tolerance used for feasibility and plug comparisons */
  readonly tolerance: number;
  readonly limits: FinancingLimits;
  readonly logger: EngineLogger;
}

export interface EngineConfigOverrides {
  baseCurrency?: Currency;
  allocationPolicy?: AllocationPolicy;
  validationPolicy?: ValidationPolicy;
  hurdleRate?: number;
  sculptFallback?: SculptFallback;
  tolerance?: number;
  limits?: Partial<Omit<FinancingLimits, 'refinancing'>> & {
    refinancing?: Partial<RefinancingLimits>;
  };
  logger?: EngineLogger;
}

export const DEFAULT_LIMITS: FinancingLimits = Object.freeze({
  maxTenorPeriods: 25,
  maxRate: 0.25,
  minTargetDscr: 1.0,
  warnBalloonFraction: 0.05,
  maxBalloonFraction: 0.10,
  refinancing: Object.freeze({ enabled: false, maxRefinanceFraction: 0.15 }),
});

export const DEFAULT_HURDLE_RATE = 0.10;
export const DEFAULT_TOLERANCE = 1e-9;

export function createEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  // An explicit undefined keeps the default
  const given: NonNullable<EngineConfigOverrides['limits']> = overrides.limits ?? {};
  const refinancing: Partial<RefinancingLimits> = given.refinancing ?? {};
  const limits: FinancingLimits = Object.freeze({
    maxTenorPeriods: given.maxTenorPeriods ?? DEFAULT_LIMITS.maxTenorPeriods,
    maxRate: given.maxRate ?? DEFAULT_LIMITS.maxRate,
    minTargetDscr: given.minTargetDscr ?? DEFAULT_LIMITS.minTargetDscr,
    warnBalloonFraction: given.warnBalloonFraction ?? DEFAULT_LIMITS.warnBalloonFraction,
    maxBalloonFraction: given.maxBalloonFraction ?? DEFAULT_LIMITS.maxBalloonFraction,
    refinancing: Object.freeze({
      enabled: refinancing.enabled ?? DEFAULT_LIMITS.refinancing.enabled,
      maxRefinanceFraction: refinancing.maxRefinanceFraction ?? DEFAULT_LIMITS.refinancing.maxRefinanceFraction,
    }),
  });

  return Object.freeze({
    baseCurrency: overrides.baseCurrency ?? 'domestic',
    allocationPolicy: overrides.allocationPolicy ?? 'pro-rata',
    validationPolicy: overrides.validationPolicy ?? 'strict',
    hurdleRate: overrides.hurdleRate ?? DEFAULT_HURDLE_RATE,
    sculptFallback: overrides.sculptFallback ?? 'none',
    tolerance: overrides.tolerance ?? DEFAULT_TOLERANCE,
    limits,
    logger: overrides.logger ?? console,
  });
}

/** `a` is greater than `b` by more than the relative tolerance. */
export function exceeds(a: number, b: number, tolerance: number): boolean {
  return a - b > tolerance * Math.max(1, Math.abs(b));
}
