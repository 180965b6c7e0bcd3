export * from './types.js';
export { DebtEngineError, ConfigurationError, InfeasibleSculptError, isDebtEngineError } from './errors.js';
export type { DebtEngineErrorKind, ErrorContext } from './errors.js';
export {
  createEngineConfig,
  exceeds,
  DEFAULT_LIMITS,
  DEFAULT_HURDLE_RATE,
  DEFAULT_TOLERANCE,
} from './config.js';
export type { EngineConfig, EngineConfigOverrides, EngineLogger, FinancingLimits, RefinancingLimits } from './config.js';
export { createTranche, assertTrancheInvariants, checkFinancingLimits, maturityPeriod, isActiveIn, balloonAmount } from './tranche.js';
export { sizeTrancheMix, solveMixAmounts } from './mix.js';
export type { MixAmounts, MixLeg, MixOptions, MixTerms, TrancheMix } from './mix.js';
export { TrancheAmortizer, scheduleTranche, levelPayment, coverageRatio } from './scheduler.js';
export type { AmortizerOptions } from './scheduler.js';
export { TrancheAllocator, assertFxCoverage, lookupFxRate } from './allocator.js';
export type { TrancheClaim, AllocationProfile } from './allocator.js';
export { CoverageAnalyzer, npv, summarize } from './coverage.js';
export type { CoverageInput } from './coverage.js';
export { CovenantValidator } from './covenants.js';
export type { CovenantValidatorOptions } from './covenants.js';
export { assessBalloon } from './balloon.js';
export { buildDrawdowns, capitalizeConstructionInterest, applyConstructionPeriod } from './construction.js';
export type { ConstructionSchedule, ConstructionOptions } from './construction.js';
export { DebtEngine } from './engine.js';
export type { EngineInput } from './engine.js';
export { RefinancingEvaluator } from './refinancing.js';
export type { RefinancingCandidate, RefinancingRequest, RefinancingComparison } from './refinancing.js';
