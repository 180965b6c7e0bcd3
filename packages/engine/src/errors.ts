// Structural and business errors raised by the debt engine.
// None of these are transient; callers should fix the inputs, not retry.

export type DebtEngineErrorKind = 'configuration' | 'infeasible-sculpt';

export interface ErrorContext {
  trancheId?: string;
  period?: number;
  field?: string;
  [key: string]: string | number | undefined;
}

export class DebtEngineError extends Error {
  constructor(
    message: string,
    public readonly kind: DebtEngineErrorKind,
    public readonly context: Readonly<ErrorContext> = {},
  ) {
    super(message);
    this.name = 'DebtEngineError';
  }
}

/**
 * Malformed tranche, threshold or series input, or a financing limit breached
 * under the strict validation policy.
 */
export class ConfigurationError extends DebtEngineError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'configuration', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * A sculpted tranche cannot hold its target DSCR in `period` without negative
 * principal, or cannot be retired to its balloon by maturity. `shortfall` is the
 * extra CFADS the period would need, in tranche currency.
 */
export class InfeasibleSculptError extends DebtEngineError {
  constructor(
    public readonly trancheId: string,
    public readonly period: number,
    public readonly shortfall: number,
    public readonly targetDscr: number,
    reason: 'negative-principal' | 'unretired-balance',
  ) {
    super(
      reason === 'negative-principal'
        ? `Tranche "${trancheId}" cannot reach DSCR ${targetDscr.toFixed(2)}x in period ${period}: ` +
          `CFADS short by ${shortfall.toFixed(2)} even with zero principal`
        : `Tranche "${trancheId}" cannot retire its balance by maturity (period ${period}) ` +
          `at DSCR ${targetDscr.toFixed(2)}x: CFADS short by ${shortfall.toFixed(2)}`,
      'infeasible-sculpt',
      { trancheId, period, shortfall, targetDscr, reason },
    );
    this.name = 'InfeasibleSculptError';
  }
}

export function isDebtEngineError(err: unknown): err is DebtEngineError {
  return err instanceof DebtEngineError;
}
