import { vi } from "vitest";
import type { ManagerContract } from "../src/adapters/manager.interface.js";
import { isJsonObject, type FetchFn } from "../src/services/http.js";
import type { YieldSource } from "../src/services/yield-api.js";
import type { StateStore } from "../src/storage/db.js";
import type {
  Address,
  Allocation,
  CycleRecord,
  DbState,
  Hex,
  OptimizerState,
  RebalanceCall,
  ReceiptStatus,
  TxSettings,
  VaultYield
} from "../src/types.js";

export const VAULT_A: Address = "0x1111111111111111111111111111111111111111";
export const VAULT_B: Address = "0x2222222222222222222222222222222222222222";
export const VAULT_C: Address = "0x3333333333333333333333333333333333333333";
export const TX_HASH: Hex = "0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";

export function silenceLogs(): void {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
}

export function makeYield(overrides: Partial<VaultYield> = {}): VaultYield {
  return {
    vaultAddress: VAULT_A,
    apy: 5,
    tvl: 10_000_000,
    riskScore: 42.5,
    observedAt: 1_700_000_000,
    ...overrides
  };
}

export class FakeManagerContract implements ManagerContract {
  readonly address: Address = "0x00000000000000000000000000000000000000aa";
  readonly signerAddress: Address | null = "0x00000000000000000000000000000000000000bb";

  allocation: Allocation | Error = { vault: null, amount: 0n, lastUpdate: 0 };
  cooldownOk: boolean | Error = true;
  sendResult: Hex | Error = TX_HASH;
  receipt: ReceiptStatus | Error = "success";
  simulateError: Error | null = null;

  canRebalanceCalls = 0;
  readonly simulated: Array<{ call: RebalanceCall; tx: TxSettings }> = [];
  readonly sent: Array<{ call: RebalanceCall; tx: TxSettings }> = [];
  readonly waited: Array<{ hash: Hex; timeoutMs: number }> = [];

  async getCurrentAllocation(): Promise<Allocation> {
    if (this.allocation instanceof Error) throw this.allocation;
    return this.allocation;
  }

  async canRebalance(): Promise<boolean> {
    this.canRebalanceCalls += 1;
    if (this.cooldownOk instanceof Error) throw this.cooldownOk;
    return this.cooldownOk;
  }

  async simulateRebalance(call: RebalanceCall, tx: TxSettings): Promise<void> {
    this.simulated.push({ call, tx });
    if (this.simulateError) throw this.simulateError;
  }

  async sendRebalance(call: RebalanceCall, tx: TxSettings): Promise<Hex> {
    this.sent.push({ call, tx });
    if (this.sendResult instanceof Error) throw this.sendResult;
    return this.sendResult;
  }

  async waitForReceipt(hash: Hex, timeoutMs: number): Promise<ReceiptStatus> {
    this.waited.push({ hash, timeoutMs });
    if (this.receipt instanceof Error) throw this.receipt;
    return this.receipt;
  }
}

export class FakeYieldSource implements YieldSource {
  readonly calls: Array<{ vaultIds: readonly string[]; amount: bigint }> = [];

  constructor(public yields: VaultYield[] | Error = []) {}

  async scan(vaultIds: readonly string[], amount: bigint): Promise<VaultYield[]> {
    this.calls.push({ vaultIds, amount });
    if (this.yields instanceof Error) throw this.yields;
    return this.yields;
  }
}

export class MemoryStore implements StateStore {
  optimizer: OptimizerState | null = null;
  readonly cycles: CycleRecord[] = [];

  async getState(): Promise<DbState> {
    return {
      optimizer: this.optimizer ?? {
        currentVault: null,
        currentApy: 0,
        rebalanceCount: 0,
        lastCheckTime: 0
      },
      cycles: [...this.cycles]
    };
  }

  async setOptimizerState(state: OptimizerState): Promise<void> {
    this.optimizer = { ...state };
  }

  async addCycle(record: CycleRecord): Promise<void> {
    this.cycles.push(record);
  }
}

export interface RecordedRequest {
  url: string;
  headers: Headers;
  body: Record<string, unknown>;
}

export type FakeReply = { status?: number; body: unknown } | Error;

/** In-process stand-in for fetch that records each request and answers from `handler`. */
export function fakeFetch(
  handler: (url: string, body: Record<string, unknown>) => FakeReply
): { fetchFn: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    const url =
      typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const parsed: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : {};
    const body = isJsonObject(parsed) ? parsed : {};
    requests.push({ url, headers: new Headers(init?.headers), body });

    const reply = handler(url, body);
    if (reply instanceof Error) throw reply;
    const text = typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200 });
  };
  return { fetchFn, requests };
}
