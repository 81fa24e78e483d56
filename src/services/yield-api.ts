import { toErrorMessage } from "../errors.js";
import type { VaultYield, YieldApiBody } from "../types.js";
import { computeRiskScore, readNumericField } from "./apy.js";
import { isJsonObject, postJson, type JsonClientConfig } from "./http.js";

export const DEFAULT_YIELD_CHAIN = "hyperevm";

export interface YieldSource {
  scan(vaultIds: readonly string[], amount: bigint, chain?: string): Promise<VaultYield[]>;
}

export class YieldApiClient implements YieldSource {
  constructor(
    private readonly config: JsonClientConfig,
    private readonly defaultChain = DEFAULT_YIELD_CHAIN,
    private readonly now: () => number = () => Math.floor(Date.now() / 1000)
  ) {}

  async historicalApy(vaultId: string, chain = this.defaultChain): Promise<YieldApiBody | null> {
    return this.request("/historical-apy", "historical APY", {
      lp_token_address: vaultId,
      chain
    });
  }

  async dilutedApy(
    vaultId: string,
    amount: bigint,
    chain = this.defaultChain
  ): Promise<YieldApiBody | null> {
    return this.request("/diluted-apy", "diluted APY", {
      lp_token_address: vaultId,
      chain,
      amount: amount.toString()
    });
  }

  /**
   * Fetches both APY views for each vault in order. Vaults missing either
   * view are left out; one failing vault never aborts the scan.
   */
  async scan(
    vaultIds: readonly string[],
    amount: bigint,
    chain = this.defaultChain
  ): Promise<VaultYield[]> {
    const yields: VaultYield[] = [];

    for (const vaultAddress of vaultIds) {
      try {
        const historical = await this.historicalApy(vaultAddress, chain);
        const diluted = await this.dilutedApy(vaultAddress, amount, chain);
        if (!historical || !diluted) continue;

        const apy =
          readNumericField(diluted, "apy") ?? readNumericField(historical, "apy") ?? 0;
        const tvl = readNumericField(historical, "tvl") ?? 0;

        yields.push({
          vaultAddress,
          apy,
          tvl,
          riskScore: computeRiskScore(apy, tvl),
          observedAt: this.now()
        });
        console.log(
          `[scanner] Vault ${shortAddress(vaultAddress)}: APY=${apy}%, TVL=$${Math.round(tvl).toLocaleString("en-US")}`
        );
      } catch (error) {
        console.error(`[scanner] Error processing vault ${vaultAddress}: ${toErrorMessage(error)}`);
      }
    }

    return yields;
  }

  private async request(
    path: string,
    label: string,
    payload: Record<string, unknown>
  ): Promise<YieldApiBody | null> {
    try {
      const body = await postJson(this.config, path, payload);
      if (!isJsonObject(body)) {
        console.error(`[yield-api] Unexpected ${label} response shape for ${String(payload.lp_token_address)}`);
        return null;
      }
      return body;
    } catch (error) {
      console.error(`[yield-api] Error fetching ${label}: ${toErrorMessage(error)}`);
      return null;
    }
  }
}

export function shortAddress(address: string): string {
  return `${address.slice(0, 10)}...`;
}
