import type { VaultYield } from "../types.js";

export const DEFAULT_RISK_FREE_RATE = 0.05;
const TVL_SAFETY_STEP_USD = 10_000_000;

/**
 * Heuristic risk in [0, 100]: higher APY and lower TVL both push it up.
 * APY is capped at 100% and TVL stops contributing past 50M.
 */
export function computeRiskScore(apy: number, tvl: number): number {
  const apyRisk = Math.min(apy / 100, 1.0) * 50;
  const tvlSafety = Math.max(0, 50 - (tvl / TVL_SAFETY_STEP_USD) * 10);
  return Math.max(0, Math.min(apyRisk + tvlSafety, 100));
}

/** Excess return over the risk-free rate divided by the risk score as a volatility proxy. */
export function computeSharpeRatio(
  data: VaultYield,
  riskFreeRate = DEFAULT_RISK_FREE_RATE
): number {
  const excessReturn = data.apy / 100 - riskFreeRate;
  const volatility = data.riskScore / 100;
  if (volatility === 0) return 0;
  return excessReturn / volatility;
}

/** Reads a numeric field that the API may send as a number or a numeric string. */
export function readNumericField(body: Record<string, unknown>, key: string): number | null {
  const raw = body[key];
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw === "string" && raw.trim() !== "") {
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
