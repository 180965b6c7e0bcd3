// Shared debt-structuring types
// Periods are 0-based indices on the project timeline throughout.

export type Currency = 'domestic' | 'hard';
export type AmortizationStyle = 'annuity' | 'sculpted';
export type AllocationPolicy = 'pro-rata' | 'priority';
export type ValidationPolicy = 'strict' | 'permissive';
export type SculptFallback = 'none' | 'annuity';
export type CoverageMetric = 'dscr' | 'llcr' | 'plcr';
export type SchedulePhase = 'grace' | 'amortizing' | 'maturity';

/** Per-period CFADS in the base currency, produced upstream. */
export type CfadsSeries = readonly number[];

/**
 * Per-period exchange rates keyed by currency: base-currency units per one unit
 * of that currency. Only needed for tranches outside the base currency.
 */
export type FxRates = Partial<Record<Currency, readonly number[]>>;

export interface Tranche {
  readonly id: string;
  readonly currency: Currency;
  readonly principal: number;
  readonly rate: number;                 // periodic, fraction
  readonly tenorPeriods: number;
  readonly gracePeriods: number;         // interest-only periods at the start
  readonly amortization: AmortizationStyle;
  readonly targetDscr?: number;          // required when sculpted
  readonly balloonFraction: number;      // of original principal, left at maturity
  readonly capitalizeGraceInterest: boolean;
  readonly seniority: number;            // lower is more senior
  readonly startPeriod: number;
}

/** Tranche fields as supplied by a caller; omitted fields take their defaults. */
export interface TrancheInput {
  id: string;
  currency: Currency;
  principal: number;
  rate: number;
  tenorPeriods: number;
  gracePeriods?: number;
  amortization: AmortizationStyle;
  targetDscr?: number;
  balloonFraction?: number;
  capitalizeGraceInterest?: boolean;
  seniority?: number;
  startPeriod?: number;
}

/** One (tranche, period) row, in tranche currency. */
export interface ScheduleEntry {
  readonly trancheId: string;
  readonly period: number;
  readonly phase: SchedulePhase;
  readonly openingBalance: number;
  readonly interest: number;             // accrued this period
  readonly capitalizedInterest: number;  // part of interest added to balance instead of paid
  readonly principalPaid: number;
  readonly totalService: number;         // cash paid: interest - capitalized + principal
  readonly closingBalance: number;
}

/** One project period summed across tranches, in base currency. */
export interface ConsolidatedEntry {
  readonly period: number;
  readonly cfads: number;
  readonly interest: number;
  readonly capitalizedInterest: number;
  readonly principalPaid: number;
  readonly totalService: number;
  readonly openingBalance: number;
  readonly closingBalance: number;
  readonly balloonDue: number;
}

export interface TrancheAllocation {
  readonly trancheId: string;
  readonly period: number;
  readonly base: number;   // base currency
  readonly local: number;  // tranche currency
  readonly fxRate: number;
}

export interface SeriesStats {
  readonly count: number;
  readonly min: number | null;
  readonly max: number | null;
  readonly mean: number | null;
  readonly median: number | null;
  readonly periodsBelowOne: number;
}

export interface CoveragePeriod {
  readonly period: number;
  readonly cfads: number;
  readonly debtService: number;
  readonly openingBalance: number;
  readonly dscr: number;    // Infinity when no service is owed
  readonly llcr: number;
  readonly plcr: number;
}

export interface CoverageMetrics {
  readonly hurdleRate: number;
  readonly debtMaturityPeriod: number;
  readonly projectEndPeriod: number;
  readonly periods: readonly CoveragePeriod[];
  readonly summary: Readonly<Record<CoverageMetric, SeriesStats>>;
}

export interface CovenantThreshold {
  readonly metric: CoverageMetric;
  readonly minimum: number;
  readonly warnAt?: number;  // passing values below this are put on watch
}

export type CovenantStatus = 'pass' | 'watch' | 'breach';

export interface CovenantCheck {
  readonly period: number;
  readonly actual: number;
  readonly minimum: number;
  readonly pass: boolean;
  readonly buffer: number;
  readonly status: CovenantStatus;
}

export interface CovenantViolation {
  readonly metric: CoverageMetric;
  readonly period: number;
  readonly actual: number;
  readonly minimum: number;
  readonly shortfall: number;
  readonly severity: 'critical' | 'breach';
}

export interface MetricCompliance {
  readonly metric: CoverageMetric;
  readonly minimum: number;
  readonly warnAt: number | null;
  readonly checks: readonly CovenantCheck[];
  readonly violationCount: number;
  readonly watchCount: number;
  readonly minBuffer: number | null;
}

export interface ComplianceReport {
  readonly compliant: boolean;
  readonly metrics: readonly MetricCompliance[];
  readonly violations: readonly CovenantViolation[];
  readonly warnings: readonly string[];
}

export type BalloonStatus = 'none' | 'acceptable' | 'mitigate' | 'excessive';

export interface BalloonAssessment {
  readonly trancheId?: string;
  readonly balloonAmount: number;
  readonly balloonFraction: number;
  readonly status: BalloonStatus;
  readonly feasible: boolean;
  readonly mitigationRequired: boolean;
  readonly mitigationOptions: readonly string[];
  readonly notes: string;
}

export interface TrancheResult {
  readonly tranche: Tranche;
  readonly entries: readonly ScheduleEntry[];
  readonly allocations: readonly TrancheAllocation[];
  readonly fallbackApplied: boolean;
}

export interface EngineResult {
  readonly tranches: readonly TrancheResult[];
  readonly consolidated: readonly ConsolidatedEntry[];
  readonly coverage: CoverageMetrics;
  readonly compliance?: ComplianceReport;
  readonly balloons: readonly BalloonAssessment[];
  readonly warnings: readonly string[];
}
