import type { ManagerContract } from "../adapters/manager.interface.js";
import { toErrorMessage } from "../errors.js";
import { GateReasonCode, type GateInput, type GateResult } from "../types.js";

export interface RebalanceCheckInput extends GateInput {
  minApyDiff: number;
  cooldownOk: boolean;
}

export function evaluateRebalance(input: RebalanceCheckInput): GateResult {
  if (input.currentVault && input.currentVault.toLowerCase() === input.candidateVault.toLowerCase()) {
    return {
      approved: false,
      reasonCode: GateReasonCode.ALREADY_OPTIMAL,
      reason: "Already in optimal vault"
    };
  }

  const improvement = input.candidateApy - input.currentApy;
  // NaN on either side lands here.
  if (!(improvement >= input.minApyDiff)) {
    return {
      approved: false,
      reasonCode: GateReasonCode.BELOW_THRESHOLD,
      reason: "APY improvement below threshold",
      details: `improvement=${improvement.toFixed(2)}%, threshold=${input.minApyDiff}%`
    };
  }

  if (!input.cooldownOk) {
    return {
      approved: false,
      reasonCode: GateReasonCode.COOLDOWN_ACTIVE,
      reason: "Rebalance cooldown period active"
    };
  }

  return {
    approved: true,
    reasonCode: GateReasonCode.APPROVED,
    reason: "Rebalancing recommended",
    details: `+${improvement.toFixed(2)}% APY improvement`
  };
}

export function shouldRebalance(input: RebalanceCheckInput): boolean {
  return evaluateRebalance(input).approved;
}

export class AllocationGate {
  constructor(
    private readonly manager: Pick<ManagerContract, "canRebalance">,
    private readonly minApyDiff: number
  ) {}

  /** The cooldown is only read once the vault and threshold checks pass. */
  async decide(input: GateInput): Promise<GateResult> {
    const precheck = evaluateRebalance({
      ...input,
      minApyDiff: this.minApyDiff,
      cooldownOk: true
    });
    if (!precheck.approved) return precheck;

    const cooldownOk = await this.readCooldown();
    return evaluateRebalance({ ...input, minApyDiff: this.minApyDiff, cooldownOk });
  }

  async readCooldown(): Promise<boolean> {
    try {
      return (await this.manager.canRebalance()) === true;
    } catch (error) {
      console.error(`[gate] Error checking rebalance status: ${toErrorMessage(error)}`);
      return false;
    }
  }
}
