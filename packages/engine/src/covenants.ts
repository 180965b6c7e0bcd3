// Covenant validator — compares coverage ratios to lender minimums

import type { EngineConfig, EngineLogger } from './config.js';
import { ConfigurationError } from './errors.js';
import type {
  ComplianceReport,
  CovenantCheck,
  CovenantStatus,
  CovenantThreshold,
  CovenantViolation,
  CoverageMetric,
  CoverageMetrics,
  MetricCompliance,
  ValidationPolicy,
} from './types.js';

const METRICS: readonly CoverageMetric[] = ['dscr', 'llcr', 'plcr'];

export interface CovenantValidatorOptions {
  thresholds: readonly CovenantThreshold[];
  policy?: ValidationPolicy;
  logger?: EngineLogger;
}

interface ResolvedThreshold {
  metric: CoverageMetric;
  minimum: number;
  warnAt: number | null;
}

export class CovenantValidator {
  private readonly thresholds: readonly ResolvedThreshold[];
  private readonly setupWarnings: readonly string[];

  constructor(options: CovenantValidatorOptions) {
    const policy = options.policy ?? 'strict';
    const logger = options.logger ?? console;
    const warnings: string[] = [];

    const reject = (message: string, field: string): void => {
      if (policy === 'strict') throw new ConfigurationError(message, { field });
      warnings.push(message);
      logger.warn(`[covenants] ${message}`);
    };

    const resolved: ResolvedThreshold[] = [];
    for (const t of options.thresholds) {
      if (!METRICS.includes(t.metric)) {
        reject(`Unknown covenant metric "${t.metric}"`, 'metric');
        continue;
      }
      if (!Number.isFinite(t.minimum)) {
        reject(`Covenant ${t.metric}: minimum must be a finite number (got ${t.minimum})`, `${t.metric}.minimum`);
        continue;
      }
      if (resolved.some(r => r.metric === t.metric)) {
        reject(`Covenant ${t.metric} is defined more than once; keeping the first`, t.metric);
        continue;
      }
      let warnAt: number | null = t.warnAt ?? null;
      if (warnAt !== null && !(warnAt >= t.minimum)) {
        reject(`Covenant ${t.metric}: warnAt ${warnAt} is below minimum ${t.minimum}; ignoring warnAt`, `${t.metric}.warnAt`);
        warnAt = null;
      }
      resolved.push({ metric: t.metric, minimum: t.minimum, warnAt });
    }

    this.thresholds = resolved;
    this.setupWarnings = warnings;
  }

  static fromConfig(config: EngineConfig, thresholds: readonly CovenantThreshold[]): CovenantValidator {
    return new CovenantValidator({ thresholds, policy: config.validationPolicy, logger: config.logger });
  }

  validate(metrics: CoverageMetrics): ComplianceReport {
    const violations: CovenantViolation[] = [];

    const reports: MetricCompliance[] = this.thresholds.map(({ metric, minimum, warnAt }) => {
      const checks: CovenantCheck[] = metrics.periods.map(p => {
        const actual = p[metric];
        const pass = actual >= minimum;
        let status: CovenantStatus = pass ? 'pass' : 'breach';
        if (pass && warnAt !== null && actual < warnAt) status = 'watch';

        if (!pass) {
          violations.push({
            metric,
            period: p.period,
            actual,
            minimum,
            shortfall: minimum - actual,
            severity: actual < 1 ? 'critical' : 'breach',
          });
        }
        return { period: p.period, actual, minimum, pass, buffer: actual - minimum, status };
      });

      const finiteBuffers = checks.map(c => c.buffer).filter(Number.isFinite);
      return {
        metric,
        minimum,
        warnAt,
        checks,
        violationCount: checks.filter(c => !c.pass).length,
        watchCount: checks.filter(c => c.status === 'watch').length,
        minBuffer: finiteBuffers.length > 0 ? Math.min(...finiteBuffers) : null,
      };
    });

    violations.sort((a, b) => a.period - b.period || METRICS.indexOf(a.metric) - METRICS.indexOf(b.metric));

    return {
      compliant: violations.length === 0,
      metrics: reports,
      violations,
      warnings: this.setupWarnings,
    };
  }
}
