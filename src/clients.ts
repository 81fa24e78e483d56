import { createPublicClient, createWalletClient, defineChain, http, type Chain, type PublicClient } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { SignerWalletClient } from "./adapters/manager.viem.js";
import type { RuntimeConfig } from "./types.js";

export function makeChain(config: Pick<RuntimeConfig, "chainId" | "chainName" | "rpcUrl">): Chain {
  return defineChain({
    id: config.chainId,
    name: config.chainName,
    nativeCurrency: { name: "HYPE", symbol: "HYPE", decimals: 18 },
    rpcUrls: {
      default: { http: [config.rpcUrl] }
    }
  });
}

// retryCount 0: the optimization loop's backoff is the only retry.
export function makeClients(config: RuntimeConfig): {
  publicClient: PublicClient;
  walletClient: SignerWalletClient;
} {
  const chain = makeChain(config);
  const publicClient = createPublicClient({
    chain,
    transport: http(config.rpcUrl, { retryCount: 0 })
  });
  const walletClient = createWalletClient({
    account: privateKeyToAccount(config.privateKey),
    chain,
    transport: http(config.rpcUrl, { retryCount: 0 })
  });
  return { publicClient, walletClient };
}
