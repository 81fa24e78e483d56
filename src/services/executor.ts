import { getAddress, parseGwei } from "viem";
import type { ManagerContract } from "../adapters/manager.interface.js";
import { ZERO_ADDRESS } from "../config.js";
import { ReceiptTimeoutError, toErrorMessage } from "../errors.js";
import type {
  ExecutionError,
  ExecutionResult,
  Hex,
  RebalanceCall,
  TxSettings
} from "../types.js";
import { shortAddress } from "./yield-api.js";

export const REBALANCE_GAS_LIMIT = 500_000n;
export const RECEIPT_TIMEOUT_MS = 120_000;

interface ExecutorConfig {
  gasPriceGwei: number;
  dryRun: boolean;
  allowedVaults: readonly string[];
  receiptTimeoutMs?: number;
}

export class RebalanceExecutor {
  private readonly allowedVaults: Set<string>;

  constructor(
    private readonly config: ExecutorConfig,
    private readonly manager: ManagerContract
  ) {
    this.allowedVaults = new Set(config.allowedVaults.map((vault) => vault.toLowerCase()));
  }

  /**
   * Sends `executeRebalance` with a direct-transfer router and waits for the
   * receipt. Never throws: every failure comes back as `success: false`.
   */
  async execute(
    targetVault: string,
    amount: bigint,
    swapCalldata: Hex = "0x"
  ): Promise<ExecutionResult> {
    console.log(`[executor] Executing rebalance to ${shortAddress(targetVault)}`);

    if (!this.allowedVaults.has(targetVault.toLowerCase())) {
      return this.failed(null, {
        code: "POLICY_BLOCKED",
        message: `Target vault ${targetVault} is not whitelisted.`
      });
    }

    let call: RebalanceCall;
    let tx: TxSettings;
    try {
      call = {
        targetVault: getAddress(targetVault),
        amount,
        routerAddress: ZERO_ADDRESS,
        swapCalldata
      };
      tx = {
        gas: REBALANCE_GAS_LIMIT,
        gasPrice: parseGwei(String(this.config.gasPriceGwei))
      };
    } catch (error) {
      return this.failed(null, {
        code: "CONFIG_ERROR",
        message: "Could not build rebalance transaction.",
        details: toErrorMessage(error)
      });
    }

    if (this.config.dryRun) {
      try {
        await this.manager.simulateRebalance(call, tx);
      } catch (error) {
        return this.failed(null, {
          code: "SIMULATION_FAILED",
          message: "Simulation failed for executeRebalance.",
          details: toErrorMessage(error)
        });
      }
      return this.failed(null, {
        code: "DRY_RUN",
        message: "DRY_RUN=true; simulation passed but transaction broadcast is blocked."
      });
    }

    let txHash: Hex;
    try {
      txHash = await this.manager.sendRebalance(call, tx);
    } catch (error) {
      return this.failed(null, {
        code: "SEND_FAILED",
        message: "Transaction broadcast failed for executeRebalance.",
        details: toErrorMessage(error)
      });
    }
    console.log(`[executor] Transaction sent: ${txHash}`);

    try {
      const status = await this.manager.waitForReceipt(
        txHash,
        this.config.receiptTimeoutMs ?? RECEIPT_TIMEOUT_MS
      );
      if (status !== "success") {
        return this.failed(txHash, {
          code: "TX_REVERTED",
          message: "Rebalancing transaction failed."
        });
      }
    } catch (error) {
      return this.failed(txHash, {
        code: error instanceof ReceiptTimeoutError ? "RECEIPT_TIMEOUT" : "SEND_FAILED",
        message: "Could not confirm rebalance transaction.",
        details: toErrorMessage(error)
      });
    }

    console.log("[executor] Rebalancing successful");
    return { success: true, txHash };
  }

  private failed(txHash: Hex | null, error: ExecutionError): ExecutionResult {
    const line = `[executor] ${error.code} | ${error.message} | ${error.details ?? "n/a"}`;
    if (error.code === "DRY_RUN" || error.code === "POLICY_BLOCKED") {
      console.warn(line);
    } else {
      console.error(line);
    }
    return { success: false, txHash, error };
  }
}
