// Server configuration — engine settings from PF_* environment variables
// Supported:
//   PF_BASE_CURRENCY       domestic (default) | hard
//   PF_ALLOCATION_POLICY   pro-rata (default) | priority
//   PF_VALIDATION_POLICY   strict (default) | permissive
//   PF_SCULPT_FALLBACK     none (default) | annuity
//   PF_HURDLE_RATE         per-period decimal, default 0.10
//   PF_TOLERANCE           relative tolerance, default 1e-9

import {
  createEngineConfig,
  DEFAULT_HURDLE_RATE,
  DEFAULT_TOLERANCE,
  type EngineConfig,
  type EngineLogger,
} from "@pf-debt/engine";

const CURRENCIES = ["domestic", "hard"] as const;
const ALLOCATION_POLICIES = ["pro-rata", "priority"] as const;
const VALIDATION_POLICIES = ["strict", "permissive"] as const;
const SCULPT_FALLBACKS = ["none", "annuity"] as const;

export type Env = Record<string, string | undefined>;

function pickOption<T extends string>(
  env: Env,
  name: string,
  allowed: readonly T[],
  fallback: T,
  logger: EngineLogger,
): T {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const normalized = raw.toLowerCase().replace(/_/g, "-");
  const match = allowed.find(option => option === normalized);
  if (match !== undefined) return match;
  logger.warn(`[config] ${name}="${raw}" is not one of ${allowed.join(", ")}; using ${fallback}`);
  return fallback;
}

function pickNumber(
  env: Env,
  name: string,
  fallback: number,
  isValid: (value: number) => boolean,
  logger: EngineLogger,
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (Number.isFinite(value) && isValid(value)) return value;
  logger.warn(`[config] ${name}="${raw}" is not a valid number; using ${fallback}`);
  return fallback;
}

export function configFromEnv(env: Env = process.env, logger: EngineLogger = console): EngineConfig {
  return createEngineConfig({
    baseCurrency: pickOption(env, "PF_BASE_CURRENCY", CURRENCIES, "domestic", logger),
    allocationPolicy: pickOption(env, "PF_ALLOCATION_POLICY", ALLOCATION_POLICIES, "pro-rata", logger),
    validationPolicy: pickOption(env, "PF_VALIDATION_POLICY", VALIDATION_POLICIES, "strict", logger),
    sculptFallback: pickOption(env, "PF_SCULPT_FALLBACK", SCULPT_FALLBACKS, "none", logger),
    hurdleRate: pickNumber(env, "PF_HURDLE_RATE", DEFAULT_HURDLE_RATE, v => v > -1, logger),
    tolerance: pickNumber(env, "PF_TOLERANCE", DEFAULT_TOLERANCE, v => v >= 0, logger),
    logger,
  });
}
