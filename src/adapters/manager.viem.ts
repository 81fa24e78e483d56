import {
  parseAbi,
  WaitForTransactionReceiptTimeoutError,
  type Account,
  type Chain,
  type PublicClient,
  type Transport,
  type WalletClient
} from "viem";
import { ZERO_ADDRESS } from "../config.js";
import { ReceiptTimeoutError } from "../errors.js";
import type {
  Address,
  Allocation,
  Hex,
  RebalanceCall,
  ReceiptStatus,
  TxSettings
} from "../types.js";
import type { ManagerContract } from "./manager.interface.js";

export const MANAGER_ABI = parseAbi([
  "function executeRebalance(address targetVault, uint256 amount, address routerAddress, bytes swapCalldata)",
  "function getCurrentAllocation() view returns (address vault, uint256 amount, uint256 lastUpdate)",
  "function canRebalance() view returns (bool)"
]);

export type SignerWalletClient = WalletClient<Transport, Chain, Account>;

export class ViemManagerContract implements ManagerContract {
  constructor(
    readonly address: Address,
    private readonly publicClient: PublicClient,
    private readonly walletClient: SignerWalletClient | null
  ) {}

  get signerAddress(): Address | null {
    return this.walletClient?.account.address ?? null;
  }

  async getCurrentAllocation(): Promise<Allocation> {
    const [vault, amount, lastUpdate] = await this.publicClient.readContract({
      address: this.address,
      abi: MANAGER_ABI,
      functionName: "getCurrentAllocation"
    });
    return {
      vault: vault.toLowerCase() === ZERO_ADDRESS ? null : vault,
      amount,
      lastUpdate: Number(lastUpdate)
    };
  }

  async canRebalance(): Promise<boolean> {
    return this.publicClient.readContract({
      address: this.address,
      abi: MANAGER_ABI,
      functionName: "canRebalance"
    });
  }

  async simulateRebalance(call: RebalanceCall, tx: TxSettings): Promise<void> {
    const wallet = this.requireWallet();
    await this.publicClient.simulateContract({
      account: wallet.account,
      address: this.address,
      abi: MANAGER_ABI,
      functionName: "executeRebalance",
      args: [call.targetVault, call.amount, call.routerAddress, call.swapCalldata],
      gas: tx.gas,
      gasPrice: tx.gasPrice
    });
  }

  async sendRebalance(call: RebalanceCall, tx: TxSettings): Promise<Hex> {
    const wallet = this.requireWallet();
    const nonce = await this.publicClient.getTransactionCount({
      address: wallet.account.address
    });
    return wallet.writeContract({
      address: this.address,
      abi: MANAGER_ABI,
      functionName: "executeRebalance",
      args: [call.targetVault, call.amount, call.routerAddress, call.swapCalldata],
      gas: tx.gas,
      gasPrice: tx.gasPrice,
      nonce
    });
  }

  async waitForReceipt(hash: Hex, timeoutMs: number): Promise<ReceiptStatus> {
    try {
      const receipt = await this.publicClient.waitForTransactionReceipt({
        hash,
        timeout: timeoutMs
      });
      return receipt.status;
    } catch (error) {
      if (error instanceof WaitForTransactionReceiptTimeoutError) {
        throw new ReceiptTimeoutError(hash, timeoutMs);
      }
      throw error;
    }
  }

  private requireWallet(): SignerWalletClient {
    if (!this.walletClient) {
      throw new Error("Wallet client is required to sign manager transactions.");
    }
    return this.walletClient;
  }
}
