export type Address = `0x${string}`;
export type Hex = `0x${string}`;

export type OptimizeMode = "sharpe" | "apy" | "safety";
export type CycleOutcome = "NO_DATA" | "HOLD" | "REBALANCED" | "FAILED";

export enum GateReasonCode {
  APPROVED = 0,
  ALREADY_OPTIMAL = 1,
  BELOW_THRESHOLD = 2,
  COOLDOWN_ACTIVE = 3
}

export interface VaultYield {
  vaultAddress: string;
  apy: number;
  tvl: number;
  riskScore: number;
  observedAt: number;
}

export interface Candidate {
  vault: string;
  yield: VaultYield;
  score: number;
}

export interface Allocation {
  vault: Address | null;
  amount: bigint;
  lastUpdate: number;
}

export interface OptimizerState {
  currentVault: string | null;
  currentApy: number;
  rebalanceCount: number;
  lastCheckTime: number;
}

export interface SwapQuote {
  inputToken: string;
  outputToken: string;
  inputAmount: string;
  outputAmount: string;
  minOutputAmount: string;
  router: string;
  calldata: string;
  value: string;
}

export interface QuoteRequest {
  inputToken: string;
  outputToken: string;
  inputAmount: string;
  inputSender: string;
  outputReceiver: string;
  chain?: string;
  slippage?: number;
}

/** Raw body of the yield service; only `apy` and `tvl` are read. */
export type YieldApiBody = Record<string, unknown>;

export interface GateInput {
  currentVault: string | null;
  currentApy: number;
  candidateVault: string;
  candidateApy: number;
}

export interface GateResult {
  approved: boolean;
  reasonCode: GateReasonCode;
  reason: string;
  details?: string;
}

export interface RebalanceCall {
  targetVault: Address;
  amount: bigint;
  routerAddress: Address;
  swapCalldata: Hex;
}

export interface TxSettings {
  gas: bigint;
  gasPrice: bigint;
}

export type ReceiptStatus = "success" | "reverted";

export interface ExecutionError {
  code:
    | "CONFIG_ERROR"
    | "POLICY_BLOCKED"
    | "DRY_RUN"
    | "SIMULATION_FAILED"
    | "SEND_FAILED"
    | "RECEIPT_TIMEOUT"
    | "TX_REVERTED";
  message: string;
  details?: string;
}

export interface ExecutionResult {
  success: boolean;
  txHash: Hex | null;
  error?: ExecutionError;
}

export interface CycleRecord {
  timestamp: number;
  outcome: CycleOutcome;
  reason: string;
  candidateVault: string | null;
  candidateApy: number | null;
  score: number | null;
  txHash: Hex | null;
}

export interface RuntimeConfig {
  rpcUrl: string;
  chainId: number;
  chainName: string;
  yieldChain: string;
  privateKey: Hex;
  managerAddress: Address;
  vaultAddress: Address | null;
  vaults: Address[];
  apiKey: string;
  apiSecret: string;
  yieldApiBaseUrl: string;
  routerApiBaseUrl: string;
  httpTimeoutMs: number;
  checkIntervalSeconds: number;
  errorBackoffSeconds: number;
  minApyDiff: number;
  gasPriceGwei: number;
  optimizeFor: OptimizeMode;
  defaultScanAmountRaw: bigint;
  defaultRebalanceAmountRaw: bigint;
  dryRun: boolean;
  runOnce: boolean;
  statePath: string;
}

export interface DbState {
  optimizer: OptimizerState;
  cycles: CycleRecord[];
}
