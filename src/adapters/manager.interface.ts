import type {
  Address,
  Allocation,
  Hex,
  RebalanceCall,
  ReceiptStatus,
  TxSettings
} from "../types.js";

/**
 * On-chain manager contract. Reads throw on failure; callers decide the
 * fallback value. `waitForReceipt` throws ReceiptTimeoutError on timeout.
 */
export interface ManagerContract {
  readonly address: Address;
  readonly signerAddress: Address | null;
  getCurrentAllocation(): Promise<Allocation>;
  canRebalance(): Promise<boolean>;
  simulateRebalance(call: RebalanceCall, tx: TxSettings): Promise<void>;
  sendRebalance(call: RebalanceCall, tx: TxSettings): Promise<Hex>;
  waitForReceipt(hash: Hex, timeoutMs: number): Promise<ReceiptStatus>;
}
