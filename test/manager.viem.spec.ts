import {
  createPublicClient,
  custom,
  decodeFunctionData,
  encodeFunctionResult,
  getAddress,
  isHex,
  type PublicClient
} from "viem";
import { describe, expect, it } from "vitest";
import { ZERO_ADDRESS } from "../src/config.js";
import { MANAGER_ABI, ViemManagerContract } from "../src/adapters/manager.viem.js";
import type { Hex } from "../src/types.js";
import { VAULT_B } from "./helpers.js";

const MANAGER = "0x00000000000000000000000000000000000000aa";

type CallAnswer = (functionName: string) => Hex | Error;

/** Answers eth_call for the manager ABI in process. */
function clientFor(answer: CallAnswer): PublicClient {
  return createPublicClient({
    transport: custom(
      {
        async request({ method, params }: { method: string; params?: unknown }) {
          if (method !== "eth_call" || !Array.isArray(params)) {
            throw new Error(`unexpected rpc method ${method}`);
          }
          const [request] = params;
          const data: unknown =
            typeof request === "object" && request !== null && "data" in request
              ? request.data
              : undefined;
          if (!isHex(data)) throw new Error("missing call data");
          const { functionName } = decodeFunctionData({ abi: MANAGER_ABI, data });
          const result = answer(functionName);
          if (result instanceof Error) throw result;
          return result;
        }
      },
      { retryCount: 0 }
    )
  });
}

describe("ViemManagerContract", () => {
  it("decodes the current allocation", async () => {
    const client = clientFor(() =>
      encodeFunctionResult({
        abi: MANAGER_ABI,
        functionName: "getCurrentAllocation",
        result: [VAULT_B, 5_000_000n, 1_700_000_000n]
      })
    );
    const manager = new ViemManagerContract(MANAGER, client, null);

    expect(await manager.getCurrentAllocation()).toEqual({
      vault: getAddress(VAULT_B),
      amount: 5_000_000n,
      lastUpdate: 1_700_000_000
    });
  });

  it("maps the zero address to no allocation", async () => {
    const client = clientFor(() =>
      encodeFunctionResult({
        abi: MANAGER_ABI,
        functionName: "getCurrentAllocation",
        result: [ZERO_ADDRESS, 0n, 0n]
      })
    );
    const manager = new ViemManagerContract(MANAGER, client, null);

    expect((await manager.getCurrentAllocation()).vault).toBeNull();
  });

  it.each([true, false])("reads canRebalance=%s", async (value) => {
    const client = clientFor(() =>
      encodeFunctionResult({ abi: MANAGER_ABI, functionName: "canRebalance", result: value })
    );
    const manager = new ViemManagerContract(MANAGER, client, null);

    expect(await manager.canRebalance()).toBe(value);
  });

  it("propagates rpc failures", async () => {
    const manager = new ViemManagerContract(
      MANAGER,
      clientFor(() => new Error("node unavailable")),
      null
    );

    await expect(manager.canRebalance()).rejects.toThrow();
  });

  it("needs a wallet to send transactions", async () => {
    const manager = new ViemManagerContract(MANAGER, clientFor(() => "0x"), null);

    expect(manager.signerAddress).toBeNull();
    await expect(
      manager.sendRebalance(
        { targetVault: VAULT_B, amount: 1n, routerAddress: ZERO_ADDRESS, swapCalldata: "0x" },
        { gas: 500_000n, gasPrice: 1_000_000_000n }
      )
    ).rejects.toThrow("Wallet client is required to sign manager transactions.");
  });
});
