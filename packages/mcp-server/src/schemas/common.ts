import { z } from "zod";

export const CurrencySchema = z
  .enum(["domestic", "hard"])
  .describe("Tranche currency: the project's domestic currency or a hard (foreign) currency");

export const CfadsSchema = z
  .array(z.coerce.number())
  .min(1)
  .describe("Cash flow available for debt service per period, base currency, period 0 first");

export const PeriodSeriesSchema = z
  .array(z.coerce.number())
  .describe("One value per period, period 0 first");

export const FxRatesSchema = z
  .object({
    domestic: z.array(z.coerce.number().positive()).optional(),
    hard: z.array(z.coerce.number().positive()).optional(),
  })
  .optional()
  .describe("Base-currency units per unit of each non-base currency, one rate per period");

export const HurdleRateSchema = z.coerce
  .number()
  .gt(-1)
  .optional()
  .describe("Per-period discount rate for LLCR/PLCR as a decimal (default from server config)");

export const TrancheSchema = z.object({
  id: z.string().min(1).describe("Unique tranche identifier"),
  currency: CurrencySchema.default("domestic"),
  principal: z.coerce.number().positive().describe("Original principal, tranche currency"),
  rate: z.coerce.number().min(0).describe("Periodic interest rate as a decimal"),
  tenor_periods: z.coerce.number().int().min(1).describe("Total periods including grace"),
  grace_periods: z.coerce
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Interest-only periods at the start (default 0)"),
  amortization: z.enum(["annuity", "sculpted"]).default("annuity"),
  target_dscr: z.coerce
    .number()
    .positive()
    .optional()
    .describe("Target DSCR, required for sculpted amortization (e.g. 1.30)"),
  balloon_fraction: z.coerce
    .number()
    .min(0)
    .lt(1)
    .optional()
    .describe("Fraction of principal left outstanding at maturity"),
  capitalize_grace_interest: z
    .boolean()
    .optional()
    .describe("Add grace-period interest to the balance instead of paying it"),
  seniority: z.coerce.number().int().optional().describe("Lower is more senior (default 0)"),
  start_period: z.coerce
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Project period in which the tranche starts (default 0)"),
});

export const CovenantSchema = z.object({
  metric: z.enum(["dscr", "llcr", "plcr"]),
  minimum: z.coerce.number().describe("Lender minimum for the ratio, e.g. 1.20"),
  warn_at: z.coerce
    .number()
    .optional()
    .describe("Passing values below this level are put on watch"),
});

export const PolicyOverridesSchema = {
  base_currency: CurrencySchema.optional(),
  allocation_policy: z
    .enum(["pro-rata", "priority"])
    .optional()
    .describe("How CFADS is split across tranches"),
  validation_policy: z
    .enum(["strict", "permissive"])
    .optional()
    .describe("Strict raises on limit breaches; permissive reports warnings"),
  sculpt_fallback: z
    .enum(["none", "annuity"])
    .optional()
    .describe("Switch an infeasible sculpted tranche to annuity instead of failing"),
};

export type TrancheArgs = z.infer<typeof TrancheSchema>;
export type CovenantArgs = z.infer<typeof CovenantSchema>;
