import { formatEther } from "viem";
import { ViemManagerContract } from "./adapters/manager.viem.js";
import { makeClients } from "./clients.js";
import { loadRuntimeConfig } from "./config.js";
import { toErrorMessage } from "./errors.js";
import { YieldApiClient } from "./services/yield-api.js";
import type { RuntimeConfig } from "./types.js";

type CheckStatus = "PASS" | "WARN" | "FAIL";

interface CheckResult {
  id: string;
  status: CheckStatus;
  detail: string;
}

function push(
  results: CheckResult[],
  id: string,
  status: CheckStatus,
  detail: string
): void {
  results.push({ id, status, detail });
}

async function main(): Promise<void> {
  const results: CheckResult[] = [];

  let config: RuntimeConfig;
  try {
    config = loadRuntimeConfig();
    push(results, "config.load", "PASS", `Loaded config for chain ${config.chainId}.`);
  } catch (error) {
    push(results, "config.load", "FAIL", toErrorMessage(error));
    printReport(results);
    process.exitCode = 1;
    return;
  }

  push(
    results,
    "mode.dry_run",
    config.dryRun ? "WARN" : "PASS",
    config.dryRun
      ? "DRY_RUN=true. Rebalances are simulated, never broadcast."
      : "DRY_RUN=false (live execution mode)."
  );
  push(results, "vaults.whitelist", "PASS", `${config.vaults.length} whitelisted vaults.`);
  push(
    results,
    "api.secret",
    config.apiSecret ? "PASS" : "WARN",
    config.apiSecret
      ? "YIELD_API_SECRET set; payload signing available."
      : "YIELD_API_SECRET not set; requests carry only the API key."
  );

  const { publicClient, walletClient } = makeClients(config);
  const signer = walletClient.account.address;
  push(results, "signer.account", "PASS", `Signer loaded: ${signer}`);

  try {
    const chainId = await publicClient.getChainId();
    push(
      results,
      "rpc.chain_id",
      chainId === config.chainId ? "PASS" : "FAIL",
      `RPC chainId=${chainId}, expected=${config.chainId}`
    );
  } catch (error) {
    push(results, "rpc.chain_id", "FAIL", `RPC unreachable: ${toErrorMessage(error)}`);
  }

  try {
    const balance = await publicClient.getBalance({ address: signer });
    push(
      results,
      "signer.balance",
      balance > 0n ? "PASS" : "FAIL",
      `Signer native balance: ${formatEther(balance)}`
    );
  } catch (error) {
    push(results, "signer.balance", "FAIL", `Balance read failed: ${toErrorMessage(error)}`);
  }

  const manager = new ViemManagerContract(config.managerAddress, publicClient, walletClient);
  try {
    const allocation = await manager.getCurrentAllocation();
    push(
      results,
      "manager.allocation",
      "PASS",
      `vault=${allocation.vault ?? "none"}, amount=${allocation.amount}, lastUpdate=${allocation.lastUpdate}`
    );
  } catch (error) {
    push(
      results,
      "manager.allocation",
      "FAIL",
      `getCurrentAllocation failed: ${toErrorMessage(error)}`
    );
  }

  try {
    const ready = await manager.canRebalance();
    push(
      results,
      "manager.cooldown",
      ready ? "PASS" : "WARN",
      ready ? "canRebalance() => true" : "canRebalance() => false (cooldown active)"
    );
  } catch (error) {
    push(results, "manager.cooldown", "FAIL", `canRebalance failed: ${toErrorMessage(error)}`);
  }

  const yieldApi = new YieldApiClient(
    {
      baseUrl: config.yieldApiBaseUrl,
      apiKey: config.apiKey,
      timeoutMs: config.httpTimeoutMs
    },
    config.yieldChain
  );
  const probeVault = config.vaults[0];
  const historical = probeVault ? await yieldApi.historicalApy(probeVault) : null;
  push(
    results,
    "yield_api.historical_apy",
    historical ? "PASS" : "FAIL",
    historical
      ? `historical-apy answered for ${probeVault}`
      : `historical-apy returned no data for ${probeVault ?? "n/a"}`
  );

  printReport(results);
  if (results.some((result) => result.status === "FAIL")) {
    process.exitCode = 1;
  }
}

function printReport(results: CheckResult[]): void {
  console.log("=== Yield Optimizer Preflight (read-only) ===");
  for (const result of results) {
    console.log(`${result.status.padEnd(4)} | ${result.id} | ${result.detail}`);
  }

  const summary = {
    pass: results.filter((result) => result.status === "PASS").length,
    warn: results.filter((result) => result.status === "WARN").length,
    fail: results.filter((result) => result.status === "FAIL").length
  };
  console.log(
    `--- Summary: PASS=${summary.pass}, WARN=${summary.warn}, FAIL=${summary.fail} ---`
  );
}

main().catch((error: unknown) => {
  console.error("[preflight] Fatal error:", error);
  process.exitCode = 1;
});
