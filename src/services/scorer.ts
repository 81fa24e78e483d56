import type { Candidate, OptimizeMode, VaultYield } from "../types.js";
import { computeSharpeRatio, DEFAULT_RISK_FREE_RATE } from "./apy.js";
import { shortAddress, type YieldSource } from "./yield-api.js";

const OPTIMIZE_MODES: readonly OptimizeMode[] = ["sharpe", "apy", "safety"];

export function resolveOptimizeMode(raw: string | undefined): OptimizeMode {
  const normalized = raw?.trim().toLowerCase();
  return OPTIMIZE_MODES.find((mode) => mode === normalized) ?? "sharpe";
}

/** Higher is better in every mode; unknown modes score as sharpe. */
export function scoreYield(
  data: VaultYield,
  mode: string,
  riskFreeRate = DEFAULT_RISK_FREE_RATE
): number {
  switch (mode) {
    case "apy":
      return data.apy;
    case "safety":
      return -data.riskScore;
    case "sharpe":
    default:
      return computeSharpeRatio(data, riskFreeRate);
  }
}

/** First strictly-greater score wins, so ties keep the earlier vault. */
export function pickBestCandidate(
  yields: readonly VaultYield[],
  mode: string,
  riskFreeRate = DEFAULT_RISK_FREE_RATE
): Candidate | null {
  let best: Candidate | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;

  for (const data of yields) {
    const score = scoreYield(data, mode, riskFreeRate);
    console.log(`[scorer] Vault ${shortAddress(data.vaultAddress)}: Score=${score.toFixed(4)}`);
    if (score > bestScore) {
      bestScore = score;
      best = { vault: data.vaultAddress, yield: data, score };
    }
  }

  return best;
}

export class OpportunityScorer {
  constructor(
    private readonly source: YieldSource,
    private readonly riskFreeRate = DEFAULT_RISK_FREE_RATE
  ) {}

  async rank(
    vaultIds: readonly string[],
    amount: bigint,
    mode: string
  ): Promise<Candidate | null> {
    const yields = await this.source.scan(vaultIds, amount);
    if (yields.length === 0) return null;
    return pickBestCandidate(yields, mode, this.riskFreeRate);
  }
}
