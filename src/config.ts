import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { isAddress } from "viem";
import type { Address, Hex, OptimizeMode, RuntimeConfig } from "./types.js";
import { resolveOptimizeMode } from "./services/scorer.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
export const PROJECT_ROOT = join(__dirname, "..");

// Prefer the project-root .env, then the current working directory, then ambient environment.
loadEnv({ path: join(PROJECT_ROOT, ".env") });
loadEnv();

const CHAIN_CONFIG_PATH = join(PROJECT_ROOT, "config", "hyperevm.testnet.json");

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

interface ChainFileConfig {
  chainId: number;
  chainName: string;
  rpcUrl: string;
  yieldChain: string;
  apis: {
    yieldApiBaseUrl: string;
    routerApiBaseUrl: string;
  };
  vaults: string[];
}

export const CHAIN_CONFIG = JSON.parse(
  readFileSync(CHAIN_CONFIG_PATH, "utf8")
) as ChainFileConfig;

type Env = Record<string, string | undefined>;

function envString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function envNumber(env: Env, name: string, fallback: number): number {
  const raw = envString(env, name);
  if (!raw) return fallback;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid number for ${name}: ${raw}`);
  }
  return value;
}

function envPositiveNumber(env: Env, name: string, fallback: number): number {
  const value = envNumber(env, name, fallback);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got ${value}`);
  }
  return value;
}

function envBigInt(env: Env, name: string, fallback: bigint): bigint {
  const raw = envString(env, name);
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Invalid integer amount for ${name}: ${raw}`);
  }
  return BigInt(raw);
}

function envBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = envString(env, name);
  if (!raw) return fallback;
  return raw.toLowerCase() === "true";
}

function requireEnv(env: Env, name: string): string {
  const raw = envString(env, name);
  if (!raw) {
    throw new Error(`${name} not set in environment`);
  }
  return raw;
}

function parseAddress(name: string, raw: string): Address {
  if (!isAddress(raw, { strict: false })) {
    throw new Error(`Invalid address for ${name}: ${raw}`);
  }
  return raw;
}

export function parsePrivateKey(raw: string): Hex {
  const body = raw.startsWith("0x") ? raw.slice(2) : raw;
  if (!/^[0-9a-fA-F]{64}$/.test(body)) {
    throw new Error("PRIVATE_KEY must be 32 bytes of hex");
  }
  return `0x${body}`;
}

function parseVaultList(raw: string | undefined): Address[] {
  const entries = raw
    ? raw.split(",").map((value) => value.trim()).filter(Boolean)
    : CHAIN_CONFIG.vaults;
  if (entries.length === 0) {
    throw new Error("Vault whitelist is empty");
  }
  return entries.map((entry, index) => parseAddress(`vault[${index}]`, entry));
}

function parseMode(raw: string | undefined): OptimizeMode {
  const mode = resolveOptimizeMode(raw);
  if (raw && raw.trim().toLowerCase() !== mode) {
    console.warn(`[config] Unknown OPTIMIZE_FOR="${raw}"; falling back to ${mode}.`);
  }
  return mode;
}

/**
 * Builds the runtime configuration from environment variables, falling back to
 * the chain file for network defaults and the vault whitelist. Throws on any
 * missing required value; callers treat that as fatal.
 */
export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const privateKey = parsePrivateKey(requireEnv(env, "PRIVATE_KEY"));
  const managerAddress = parseAddress("MANAGER_ADDRESS", requireEnv(env, "MANAGER_ADDRESS"));
  const apiKey = requireEnv(env, "YIELD_API_KEY");
  const vaultAddressRaw = envString(env, "VAULT_ADDRESS");

  return {
    rpcUrl: envString(env, "RPC_URL") ?? CHAIN_CONFIG.rpcUrl,
    chainId: envNumber(env, "CHAIN_ID", CHAIN_CONFIG.chainId),
    chainName: CHAIN_CONFIG.chainName,
    yieldChain: envString(env, "YIELD_CHAIN") ?? CHAIN_CONFIG.yieldChain,
    privateKey,
    managerAddress,
    vaultAddress: vaultAddressRaw ? parseAddress("VAULT_ADDRESS", vaultAddressRaw) : null,
    vaults: parseVaultList(envString(env, "VAULT_WHITELIST")),
    apiKey,
    apiSecret: envString(env, "YIELD_API_SECRET") ?? "",
    yieldApiBaseUrl: envString(env, "YIELD_API_BASE_URL") ?? CHAIN_CONFIG.apis.yieldApiBaseUrl,
    routerApiBaseUrl:
      envString(env, "ROUTER_API_BASE_URL") ?? CHAIN_CONFIG.apis.routerApiBaseUrl,
    httpTimeoutMs: envPositiveNumber(env, "HTTP_TIMEOUT_MS", 15_000),
    checkIntervalSeconds: envPositiveNumber(env, "CHECK_INTERVAL", 300),
    errorBackoffSeconds: envPositiveNumber(env, "ERROR_BACKOFF_SECONDS", 60),
    minApyDiff: envNumber(env, "MIN_APY_DIFF", 0.5),
    gasPriceGwei: envNumber(env, "GAS_PRICE_GWEI", 1),
    optimizeFor: parseMode(envString(env, "OPTIMIZE_FOR")),
    defaultScanAmountRaw: envBigInt(env, "DEFAULT_SCAN_AMOUNT_RAW", 1_000_000_000_000n),
    defaultRebalanceAmountRaw: envBigInt(env, "DEFAULT_REBALANCE_AMOUNT_RAW", 1_000_000_000n),
    dryRun: envBool(env, "DRY_RUN", false),
    runOnce: envBool(env, "RUN_ONCE", false),
    statePath: envString(env, "STATE_PATH") ?? join(PROJECT_ROOT, "data", "state.json")
  };
}
