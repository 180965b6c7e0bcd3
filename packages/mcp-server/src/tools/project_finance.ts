import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  ConfigurationError,
  CovenantValidator,
  DebtEngine,
  RefinancingEvaluator,
  applyConstructionPeriod,
  assessBalloon,
  createEngineConfig,
  createTranche,
  scheduleTranche,
  sizeTrancheMix,
  solveMixAmounts,
  type BalloonAssessment,
  type ComplianceReport,
  type CovenantThreshold,
  type CoverageMetrics,
  type EngineConfig,
  type EngineResult,
  type MixAmounts,
  type MixTerms,
  type RefinancingCandidate,
  type RefinancingComparison,
  type ScheduleEntry,
  type Tranche,
  type TrancheInput,
  type ValidationPolicy,
} from "@pf-debt/engine";
import { z } from "zod";
import {
  BalloonAssessmentSchema,
  ConstructionIdcSchema,
  CoverageRatiosSchema,
  CovenantComplianceSchema,
  DebtScheduleSchema,
  RefinancingComparisonSchema,
  TrancheMixSchema,
  TrancheScheduleSchema,
  type MixTermsArgs,
  type RefinancingCandidateArgs,
} from "../schemas/project_finance.js";
import type { CovenantArgs, TrancheArgs } from "../schemas/common.js";
import { coerceNumbers, runTool } from "../formatters/response.js";

// ── Input mapping ───────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Coerce and validate raw tool arguments. Under the strict policy unknown
 * top-level fields are rejected; under permissive they are dropped.
 */
export function parseToolInput<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
  params: unknown,
  policy: ValidationPolicy,
): z.infer<z.ZodObject<T>> {
  const raw = coerceNumbers(params);
  if (policy === "strict" && isRecord(raw)) {
    const unknown = Object.keys(raw).filter(key => !Object.hasOwn(schema.shape, key));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown input field(s): ${unknown.join(", ")}`, { field: unknown[0] });
    }
  }
  return schema.parse(raw);
}

function toTrancheInput(t: TrancheArgs): TrancheInput {
  return {
    id: t.id,
    currency: t.currency,
    principal: t.principal,
    rate: t.rate,
    tenorPeriods: t.tenor_periods,
    gracePeriods: t.grace_periods,
    amortization: t.amortization,
    targetDscr: t.target_dscr,
    balloonFraction: t.balloon_fraction,
    capitalizeGraceInterest: t.capitalize_grace_interest,
    seniority: t.seniority,
    startPeriod: t.start_period,
  };
}

function toCandidate(c: RefinancingCandidateArgs): RefinancingCandidate {
  return {
    id: c.id,
    currency: c.currency,
    rate: c.rate,
    tenorPeriods: c.tenor_periods,
    gracePeriods: c.grace_periods,
    amortization: c.amortization,
    targetDscr: c.target_dscr,
    balloonFraction: c.balloon_fraction,
    capitalizeGraceInterest: c.capitalize_grace_interest,
    seniority: c.seniority,
    share: c.share,
  };
}

function toMixTerms(m: MixTermsArgs): MixTerms {
  return {
    id: m.id,
    rate: m.rate,
    tenorPeriods: m.tenor_periods,
    gracePeriods: m.grace_periods,
    amortization: m.amortization,
    targetDscr: m.target_dscr,
    balloonFraction: m.balloon_fraction,
    capitalizeGraceInterest: m.capitalize_grace_interest,
    seniority: m.seniority,
    startPeriod: m.start_period,
  };
}

function toCovenant(c: CovenantArgs): CovenantThreshold {
  return { metric: c.metric, minimum: c.minimum, warnAt: c.warn_at };
}

interface PolicyArgs {
  base_currency?: EngineConfig["baseCurrency"];
  allocation_policy?: EngineConfig["allocationPolicy"];
  validation_policy?: EngineConfig["validationPolicy"];
  sculpt_fallback?: EngineConfig["sculptFallback"];
}

function withOverrides(config: EngineConfig, args: PolicyArgs): EngineConfig {
  return createEngineConfig({
    ...config,
    baseCurrency: args.base_currency ?? config.baseCurrency,
    allocationPolicy: args.allocation_policy ?? config.allocationPolicy,
    validationPolicy: args.validation_policy ?? config.validationPolicy,
    sculptFallback: args.sculpt_fallback ?? config.sculptFallback,
  });
}

// ── Tool bodies ─────────────────────────────────────────────────────

export function debtSchedule(params: unknown, config: EngineConfig): EngineResult {
  const input = parseToolInput(DebtScheduleSchema, params, config.validationPolicy);
  const engine = new DebtEngine(withOverrides(config, input));
  return engine.run({
    cfads: input.cfads,
    tranches: input.tranches.map(toTrancheInput),
    fxRates: input.fx_rates,
    hurdleRate: input.hurdle_rate,
    covenants: input.covenants?.map(toCovenant),
  });
}

export function trancheSchedule(params: unknown, config: EngineConfig): ScheduleEntry[] {
  const input = parseToolInput(TrancheScheduleSchema, params, config.validationPolicy);
  const tranche = createTranche(toTrancheInput(input.tranche));
  return scheduleTranche(tranche, input.allocation, { tolerance: config.tolerance });
}

export function coverageRatios(params: unknown, config: EngineConfig): CoverageMetrics {
  const input = parseToolInput(CoverageRatiosSchema, params, config.validationPolicy);
  const engine = new DebtEngine(config);
  return engine.analyzer.analyze({
    cfads: input.cfads,
    debtService: input.debt_service,
    openingBalance: input.opening_balance,
    hurdleRate: input.hurdle_rate,
    debtMaturityPeriod: input.debt_maturity_period,
  });
}

export function covenantCompliance(params: unknown, config: EngineConfig): ComplianceReport {
  const input = parseToolInput(CovenantComplianceSchema, params, config.validationPolicy);
  const runConfig = withOverrides(config, input);
  const result = new DebtEngine(runConfig).run({
    cfads: input.cfads,
    tranches: input.tranches.map(toTrancheInput),
    fxRates: input.fx_rates,
    hurdleRate: input.hurdle_rate,
  });
  const report = CovenantValidator.fromConfig(runConfig, input.covenants.map(toCovenant)).validate(result.coverage);
  return { ...report, warnings: [...result.warnings, ...report.warnings] };
}

export function refinancingComparison(params: unknown, config: EngineConfig): RefinancingComparison {
  const input = parseToolInput(RefinancingComparisonSchema, params, config.validationPolicy);
  const engine = new DebtEngine(withOverrides(config, input));
  const baseline = engine.run({
    cfads: input.cfads,
    tranches: input.tranches.map(toTrancheInput),
    fxRates: input.fx_rates,
    hurdleRate: input.hurdle_rate,
  });
  return new RefinancingEvaluator(engine).evaluate(baseline, {
    refinancePeriod: input.refinance_period,
    candidates: input.candidates.map(toCandidate),
    cfads: input.cfads,
    fxRates: input.fx_rates,
    hurdleRate: input.hurdle_rate,
    covenants: input.covenants?.map(toCovenant),
  });
}

export function constructionIdc(params: unknown, config: EngineConfig) {
  const input = parseToolInput(ConstructionIdcSchema, params, config.validationPolicy);
  const runConfig = withOverrides(config, input);
  const { tranche, schedule } = applyConstructionPeriod(
    toTrancheInput(input.tranche),
    { drawdownFractions: input.drawdown_fractions },
    runConfig,
  );
  // Validate the grossed-up tranche before handing it back
  return { tranche: createTranche(tranche), schedule };
}

export function balloonAssessment(params: unknown, config: EngineConfig): BalloonAssessment {
  const input = parseToolInput(BalloonAssessmentSchema, params, config.validationPolicy);
  const { limits } = createEngineConfig({
    ...config,
    limits: {
      ...config.limits,
      warnBalloonFraction: input.warn_balloon_fraction ?? config.limits.warnBalloonFraction,
      maxBalloonFraction: input.max_balloon_fraction ?? config.limits.maxBalloonFraction,
      refinancing: {
        enabled: input.refinancing_enabled ?? config.limits.refinancing.enabled,
        maxRefinanceFraction: input.max_refinance_fraction ?? config.limits.refinancing.maxRefinanceFraction,
      },
    },
  });
  return assessBalloon(input.balloon, input.principal, limits, input.tranche_id);
}

export function trancheMix(params: unknown, config: EngineConfig): { amounts: MixAmounts; tranches: Tranche[] } {
  const input = parseToolInput(TrancheMixSchema, params, config.validationPolicy);
  const mix = {
    domesticMax: input.domestic_max,
    dfiMax: input.dfi_max,
    commercialMin: input.commercial_min,
    terms: {
      domestic: toMixTerms(input.terms.domestic),
      dfi: toMixTerms(input.terms.dfi),
      commercial: toMixTerms(input.terms.commercial),
    },
  };
  const tranches = sizeTrancheMix(input.debt_total, mix, {
    baseCurrency: input.base_currency ?? config.baseCurrency,
    fxRate: input.fx_rate,
  });
  return { amounts: solveMixAmounts(input.debt_total, mix), tranches: tranches.map(createTranche) };
}

// ── Registration ────────────────────────────────────────────────────

export function registerProjectFinanceTools(server: Pick<McpServer, "tool">, config: EngineConfig) {
  server.tool(
    "debt_schedule",
    "Structure project-finance debt against a CFADS series. Allocates CFADS across tranches (pro-rata or priority, with FX conversion), builds annuity or DSCR-sculpted amortization schedules with grace, capitalized interest and balloons, and returns the consolidated schedule, DSCR/LLCR/PLCR per period with summary statistics, optional covenant compliance and balloon assessments.",
    DebtScheduleSchema.shape,
    async (params) => runTool(() => debtSchedule(params, config))
  );

  server.tool(
    "tranche_schedule",
    "Amortization schedule for a single tranche given the CFADS allocated to it each period. Annuity tranches pay a level service; sculpted tranches size principal to hold the target DSCR.",
    TrancheScheduleSchema.shape,
    async (params) => runTool(() => trancheSchedule(params, config))
  );

  server.tool(
    "coverage_ratios",
    "Compute DSCR, LLCR and PLCR per period from CFADS, total debt service and opening balances, with min/max/mean/median statistics. LLCR discounts CFADS to debt maturity, PLCR to project end, both against the start-of-period balance.",
    CoverageRatiosSchema.shape,
    async (params) => runTool(() => coverageRatios(params, config))
  );

  server.tool(
    "covenant_compliance",
    "Run a debt structure and test its DSCR/LLCR/PLCR against lender minimums. Returns every violation with period, actual, minimum, shortfall and severity, watch-list periods, and the minimum headroom per covenant.",
    CovenantComplianceSchema.shape,
    async (params) => runTool(() => covenantCompliance(params, config))
  );

  server.tool(
    "refinancing_comparison",
    "Replace the debt outstanding at a future period with candidate tranches and compare coverage from that period on against the existing structure, including changes in minimum DSCR/LLCR/PLCR and balloon exposure.",
    RefinancingComparisonSchema.shape,
    async (params) => runTool(() => refinancingComparison(params, config))
  );

  server.tool(
    "construction_idc",
    "Construction-period drawdowns and interest during construction. Capitalizes interest on the drawn balance each period and returns the grossed-up tranche that starts after construction.",
    ConstructionIdcSchema.shape,
    async (params) => runTool(() => constructionIdc(params, config))
  );

  server.tool(
    "balloon_assessment",
    "Classify a balloon payment against acceptable and maximum fractions of principal and refinancing capacity, with mitigation options.",
    BalloonAssessmentSchema.shape,
    async (params) => runTool(() => balloonAssessment(params, config))
  );

  server.tool(
    "tranche_mix",
    "Split a debt total across domestic, DFI and hard-currency commercial tranches. Domestic and DFI shares are capped; a commercial floor is met by pulling from domestic first, then DFI. Returns the leg amounts in base currency and the sized tranches in their own currencies.",
    TrancheMixSchema.shape,
    async (params) => runTool(() => trancheMix(params, config))
  );
}
