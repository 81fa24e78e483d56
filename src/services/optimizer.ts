import { setTimeout as delay } from "node:timers/promises";
import { formatUnits } from "viem";
import type { ManagerContract } from "../adapters/manager.interface.js";
import { toErrorMessage } from "../errors.js";
import type { StateStore } from "../storage/db.js";
import type { Allocation, CycleOutcome, CycleRecord, Hex, OptimizerState } from "../types.js";
import type { RebalanceExecutor } from "./executor.js";
import type { AllocationGate } from "./gate.js";
import type { OpportunityScorer } from "./scorer.js";
import { shortAddress } from "./yield-api.js";

const DEPOSIT_TOKEN_DECIMALS = 6;

export interface OptimizerConfig {
  vaults: readonly string[];
  optimizeFor: string;
  minApyDiff: number;
  defaultScanAmountRaw: bigint;
  defaultRebalanceAmountRaw: bigint;
  checkIntervalSeconds: number;
  errorBackoffSeconds: number;
}

export interface OptimizerDeps {
  manager: Pick<ManagerContract, "getCurrentAllocation">;
  scorer: Pick<OpportunityScorer, "rank">;
  gate: Pick<AllocationGate, "decide">;
  executor: Pick<RebalanceExecutor, "execute">;
  store?: StateStore;
}

export interface CycleHooks {
  onCycleStart?(): void;
  onCycleEnd?(error: unknown, record: CycleRecord | null): void;
}

type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export class OptimizerService {
  constructor(
    private readonly config: OptimizerConfig,
    private readonly deps: OptimizerDeps,
    private readonly state: OptimizerState,
    private readonly hooks: CycleHooks = {},
    private readonly now: () => number = () => Math.floor(Date.now() / 1000),
    private readonly sleep: SleepFn = abortableSleep
  ) {}

  getState(): OptimizerState {
    return { ...this.state };
  }

  async readAllocation(): Promise<Allocation> {
    try {
      return await this.deps.manager.getCurrentAllocation();
    } catch (error) {
      console.error(`[cycle] Error getting current allocation: ${toErrorMessage(error)}`);
      return { vault: null, amount: 0n, lastUpdate: 0 };
    }
  }

  /**
   * One pass: allocation → scan → score → gate → execute. A cycle without
   * yield data leaves the optimizer state untouched.
   */
  async runCycle(): Promise<CycleRecord> {
    console.log("[cycle] Starting optimization cycle...");

    const allocation = await this.readAllocation();
    if (allocation.vault) {
      console.log(`[cycle] Current vault: ${shortAddress(allocation.vault)}`);
      console.log(
        `[cycle] Current amount: ${formatUnits(allocation.amount, DEPOSIT_TOKEN_DECIMALS)}`
      );
    } else {
      console.log("[cycle] No current allocation");
    }

    const scanAmount =
      allocation.amount > 0n ? allocation.amount : this.config.defaultScanAmountRaw;
    const candidate = await this.deps.scorer.rank(
      this.config.vaults,
      scanAmount,
      this.config.optimizeFor
    );

    if (!candidate) {
      console.warn("[cycle] No yield data available, skipping cycle");
      return this.record({
        timestamp: this.now(),
        outcome: "NO_DATA",
        reason: "No yield data available",
        candidateVault: null,
        candidateApy: null,
        score: null,
        txHash: null
      });
    }

    console.log(
      `[cycle] Best opportunity: ${shortAddress(candidate.vault)} | APY=${candidate.yield.apy.toFixed(2)}% | Score=${candidate.score.toFixed(4)} | TVL=$${Math.round(candidate.yield.tvl).toLocaleString("en-US")}`
    );

    const gate = await this.deps.gate.decide({
      currentVault: allocation.vault,
      currentApy: this.state.currentApy,
      candidateVault: candidate.vault,
      candidateApy: candidate.yield.apy
    });
    console.log(`[gate] ${gate.reason}${gate.details ? ` (${gate.details})` : ""}`);

    let outcome: CycleOutcome = "HOLD";
    let reason = gate.reason;
    let txHash: Hex | null = null;

    if (gate.approved) {
      const amount =
        allocation.amount > 0n ? allocation.amount : this.config.defaultRebalanceAmountRaw;
      const result = await this.deps.executor.execute(candidate.vault, amount);
      txHash = result.txHash;
      if (result.success) {
        this.state.currentVault = candidate.vault;
        this.state.currentApy = candidate.yield.apy;
        this.state.rebalanceCount += 1;
        console.log(`[cycle] Total rebalances: ${this.state.rebalanceCount}`);
        outcome = "REBALANCED";
        reason = gate.details ?? gate.reason;
      } else {
        outcome = "FAILED";
        reason = result.error?.message ?? "Rebalance failed";
      }
    }

    this.state.lastCheckTime = this.now();
    await this.deps.store?.setOptimizerState(this.state);
    return this.record({
      timestamp: this.state.lastCheckTime,
      outcome,
      reason,
      candidateVault: candidate.vault,
      candidateApy: candidate.yield.apy,
      score: candidate.score,
      txHash
    });
  }

  /** Repeats cycles until the signal aborts; a failed cycle backs off instead of exiting. */
  async run(signal: AbortSignal): Promise<void> {
    console.log("[loop] Yield optimizer started");
    console.log(`[loop] Check interval: ${this.config.checkIntervalSeconds}s`);
    console.log(`[loop] Min APY difference: ${this.config.minApyDiff}%`);
    console.log(`[loop] Optimization strategy: ${this.config.optimizeFor}`);

    while (!signal.aborted) {
      let sleepSeconds = this.config.checkIntervalSeconds;
      this.hooks.onCycleStart?.();
      try {
        const record = await this.runCycle();
        this.hooks.onCycleEnd?.(null, record);
        console.log(`[loop] Sleeping for ${sleepSeconds}s...`);
      } catch (error) {
        this.hooks.onCycleEnd?.(error, null);
        console.error("[loop] Error in optimization cycle:", error);
        sleepSeconds = this.config.errorBackoffSeconds;
        console.log(`[loop] Waiting ${sleepSeconds}s before retry...`);
      }
      await this.sleep(sleepSeconds * 1_000, signal);
    }

    console.log("[loop] Yield optimizer stopped");
  }

  private async record(record: CycleRecord): Promise<CycleRecord> {
    await this.deps.store?.addCycle(record);
    console.log(`[decision] ${record.outcome} | ${record.reason}`);
    return record;
  }
}

export async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) return;
    throw error;
  }
}
