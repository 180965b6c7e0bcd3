import { z } from "zod";
import {
  CfadsSchema,
  CurrencySchema,
  CovenantSchema,
  FxRatesSchema,
  HurdleRateSchema,
  PeriodSeriesSchema,
  PolicyOverridesSchema,
  TrancheSchema,
} from "./common.js";

// --- Full debt structure run ---
export const DebtScheduleSchema = z.object({
  tranches: z.array(TrancheSchema).min(1).describe("Debt tranches to schedule"),
  cfads: CfadsSchema,
  fx_rates: FxRatesSchema,
  hurdle_rate: HurdleRateSchema,
  covenants: z.array(CovenantSchema).optional().describe("Optional covenant thresholds to test"),
  ...PolicyOverridesSchema,
});

// --- Single tranche against a given allocation ---
export const TrancheScheduleSchema = z.object({
  tranche: TrancheSchema,
  allocation: PeriodSeriesSchema.describe(
    "CFADS allocated to this tranche per project period, tranche currency (only used when sculpted)"
  ),
});

// --- Coverage from an existing schedule ---
export const CoverageRatiosSchema = z.object({
  cfads: CfadsSchema,
  debt_service: PeriodSeriesSchema.describe("Total debt service per period, base currency"),
  opening_balance: PeriodSeriesSchema.describe("Outstanding debt at the start of each period, base currency"),
  hurdle_rate: HurdleRateSchema,
  debt_maturity_period: z.coerce
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Last period of debt service (default: last period with a balance)"),
});

// --- Covenant test over a debt structure ---
export const CovenantComplianceSchema = z.object({
  tranches: z.array(TrancheSchema).min(1),
  cfads: CfadsSchema,
  fx_rates: FxRatesSchema,
  hurdle_rate: HurdleRateSchema,
  covenants: z.array(CovenantSchema).min(1).describe("Covenant thresholds to test"),
  ...PolicyOverridesSchema,
});

// --- Refinancing at a future period ---
export const RefinancingCandidateSchema = TrancheSchema.omit({
  principal: true,
  start_period: true,
}).extend({
  share: z.coerce
    .number()
    .positive()
    .max(1)
    .describe("Fraction of the refinanced balance this tranche takes; shares sum to 1"),
});

export type RefinancingCandidateArgs = z.infer<typeof RefinancingCandidateSchema>;

export const RefinancingComparisonSchema = z.object({
  tranches: z.array(TrancheSchema).min(1).describe("Existing debt structure"),
  cfads: CfadsSchema,
  fx_rates: FxRatesSchema,
  hurdle_rate: HurdleRateSchema,
  refinance_period: z.coerce.number().int().min(0).describe("Period in which the outstanding debt is replaced"),
  candidates: z.array(RefinancingCandidateSchema).min(1).describe("Replacement tranches"),
  covenants: z.array(CovenantSchema).optional(),
  ...PolicyOverridesSchema,
});

// --- Construction-period interest ---
export const ConstructionIdcSchema = z.object({
  tranche: TrancheSchema,
  drawdown_fractions: z
    .array(z.coerce.number())
    .min(1)
    .describe("Fraction of the facility drawn in each construction period"),
  validation_policy: PolicyOverridesSchema.validation_policy,
});

// --- Balloon exposure ---
export const BalloonAssessmentSchema = z.object({
  balloon: z.coerce.number().min(0).describe("Balance outstanding at maturity"),
  principal: z.coerce.number().min(0).describe("Original principal"),
  tranche_id: z.string().optional(),
  warn_balloon_fraction: z.coerce.number().min(0).optional().describe("Acceptable balloon fraction (default 0.05)"),
  max_balloon_fraction: z.coerce.number().min(0).optional().describe("Maximum balloon fraction (default 0.10)"),
  refinancing_enabled: z.boolean().optional().describe("Whether a refinancing facility is available"),
  max_refinance_fraction: z.coerce.number().min(0).optional().describe("Largest balloon refinancing can absorb (default 0.15)"),
});

// --- Debt total split across domestic, DFI and commercial tranches ---
export const MixTermsSchema = TrancheSchema.omit({
  id: true,
  currency: true,
  principal: true,
}).extend({
  id: z.string().min(1).optional().describe("Tranche identifier (default: the leg name)"),
});

export type MixTermsArgs = z.infer<typeof MixTermsSchema>;

const MixShareSchema = z.coerce.number().min(0).max(1);

export const TrancheMixSchema = z.object({
  debt_total: z.coerce.number().positive().describe("Total debt to raise, base currency"),
  domestic_max: MixShareSchema.describe("Largest share raised in domestic currency"),
  dfi_max: MixShareSchema.describe("Largest share raised from DFIs, hard currency"),
  commercial_min: MixShareSchema.describe("Smallest share raised as hard-currency commercial debt"),
  terms: z.object({
    domestic: MixTermsSchema,
    dfi: MixTermsSchema,
    commercial: MixTermsSchema,
  }).describe("Tranche terms per leg; principals are sized by the mix"),
  base_currency: CurrencySchema.optional(),
  fx_rate: z.coerce
    .number()
    .positive()
    .optional()
    .describe("Base-currency units per unit of the other currency at financial close (default 1)"),
});
