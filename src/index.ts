import { ViemManagerContract } from "./adapters/manager.viem.js";
import { makeClients } from "./clients.js";
import { loadRuntimeConfig } from "./config.js";
import { toErrorMessage } from "./errors.js";
import { RebalanceExecutor } from "./services/executor.js";
import { AllocationGate } from "./services/gate.js";
import { OptimizerService } from "./services/optimizer.js";
import { OpportunityScorer } from "./services/scorer.js";
import {
  BotStatusServer,
  nowIso,
  trackCycles,
  type BotRuntimeStatus
} from "./services/status-server.js";
import { YieldApiClient } from "./services/yield-api.js";
import { JsonDb } from "./storage/db.js";
import type { RuntimeConfig } from "./types.js";

function envBool(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  return raw.toLowerCase() === "true";
}

function envInteger(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) return fallback;
  return Math.floor(value);
}

async function main(): Promise<void> {
  let config: RuntimeConfig;
  try {
    config = loadRuntimeConfig();
  } catch (error) {
    console.error(`[config] ${toErrorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  const db = new JsonDb(config.statePath);
  await db.init();
  const persisted = await db.getState();

  const { publicClient, walletClient } = makeClients(config);
  console.log(`[startup] Optimizer account: ${walletClient.account.address}`);
  if (config.vaultAddress) {
    console.log(`[startup] Deposit vault: ${config.vaultAddress}`);
  }

  const manager = new ViemManagerContract(config.managerAddress, publicClient, walletClient);
  const yieldApi = new YieldApiClient(
    {
      baseUrl: config.yieldApiBaseUrl,
      apiKey: config.apiKey,
      timeoutMs: config.httpTimeoutMs
    },
    config.yieldChain
  );

  const runtimeStatus: BotRuntimeStatus = {
    service: "yield-optimizer-bot",
    startedAt: nowIso(),
    runMode: config.runOnce ? "once" : "loop",
    checkIntervalSeconds: config.checkIntervalSeconds,
    staleAfterSeconds: envInteger(
      "BOT_HEALTH_STALE_SECONDS",
      Math.max(config.checkIntervalSeconds * 3, 60)
    ),
    inFlight: false,
    totalCycles: 0,
    successfulCycles: 0,
    failedCycles: 0,
    lastCycleStartedAt: null,
    lastCycleFinishedAt: null,
    lastSuccessfulCycleAt: null,
    lastErrorAt: null,
    lastErrorMessage: null,
    lastOutcome: null,
    rebalanceCount: persisted.optimizer.rebalanceCount,
    consecutiveFailedRebalances: 0,
    maxFailedRebalances: envInteger("BOT_HEALTH_MAX_FAILED_REBALANCES", 3)
  };
  const hooks = trackCycles(runtimeStatus);

  const optimizer = new OptimizerService(
    {
      vaults: config.vaults,
      optimizeFor: config.optimizeFor,
      minApyDiff: config.minApyDiff,
      defaultScanAmountRaw: config.defaultScanAmountRaw,
      defaultRebalanceAmountRaw: config.defaultRebalanceAmountRaw,
      checkIntervalSeconds: config.checkIntervalSeconds,
      errorBackoffSeconds: config.errorBackoffSeconds
    },
    {
      manager,
      scorer: new OpportunityScorer(yieldApi),
      gate: new AllocationGate(manager, config.minApyDiff),
      executor: new RebalanceExecutor(
        {
          gasPriceGwei: config.gasPriceGwei,
          dryRun: config.dryRun,
          allowedVaults: config.vaults
        },
        manager
      ),
      store: db
    },
    { ...persisted.optimizer },
    hooks
  );

  let statusServer: BotStatusServer | null = null;
  if (envBool("BOT_STATUS_SERVER_ENABLED", false)) {
    const host = process.env.BOT_STATUS_HOST?.trim() || "0.0.0.0";
    const port = envInteger("BOT_STATUS_PORT", 8787);
    const server = new BotStatusServer({
      host,
      port,
      authToken: process.env.BOT_STATUS_AUTH_TOKEN?.trim() || "",
      statusProvider: () => ({ ...runtimeStatus }),
      stateProvider: () => db.getState()
    });
    try {
      await server.start();
      statusServer = server;
      console.log(`[status-server] listening on http://${host}:${port}`);
    } catch (error) {
      console.warn(`[status-server] disabled (startup failed): ${toErrorMessage(error)}`);
    }
  }

  try {
    if (config.runOnce) {
      hooks.onCycleStart?.();
      try {
        const record = await optimizer.runCycle();
        hooks.onCycleEnd?.(null, record);
      } catch (error) {
        hooks.onCycleEnd?.(error, null);
        throw error;
      }
      return;
    }

    const controller = new AbortController();
    const shutdown = (signal: NodeJS.Signals): void => {
      console.log(`[loop] Received ${signal}, shutting down optimizer...`);
      controller.abort();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    await optimizer.run(controller.signal);
  } finally {
    if (statusServer) {
      await statusServer.stop();
    }
  }
}

main().catch((error: unknown) => {
  console.error("[startup] Fatal error:", error);
  process.exitCode = 1;
});
