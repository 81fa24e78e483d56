import { toErrorMessage } from "../errors.js";
import type { QuoteRequest, SwapQuote } from "../types.js";
import { isJsonObject, postJson, type JsonClientConfig } from "./http.js";
import { DEFAULT_YIELD_CHAIN } from "./yield-api.js";

const DEFAULT_SLIPPAGE_PCT = 0.5;

const QUOTE_FIELDS = [
  "inputToken",
  "outputToken",
  "inputAmount",
  "outputAmount",
  "minOutputAmount",
  "router",
  "calldata",
  "value"
] as const;

// Swap quotes for a future swap-based rebalance leg; the optimization loop does not call this.
export class RouterApiClient {
  constructor(private readonly config: JsonClientConfig) {}

  async quote(request: QuoteRequest): Promise<SwapQuote | null> {
    let body: unknown;
    try {
      body = await postJson(this.config, "/quote", {
        chain: request.chain ?? DEFAULT_YIELD_CHAIN,
        inputToken: request.inputToken,
        outputToken: request.outputToken,
        inputAmount: request.inputAmount,
        inputSender: request.inputSender,
        outputReceiver: request.outputReceiver,
        slippage: request.slippage ?? DEFAULT_SLIPPAGE_PCT,
        surgeProtection: true
      });
    } catch (error) {
      console.error(`[router-api] Error fetching router quote: ${toErrorMessage(error)}`);
      return null;
    }

    if (!isJsonObject(body) || body.statusCode !== 200) {
      console.error(`[router-api] Router API error: ${JSON.stringify(body)}`);
      return null;
    }

    const quote = parseQuote(body.result);
    if (!quote) {
      console.error("[router-api] Router API returned an incomplete quote result");
    }
    return quote;
  }
}

function parseQuote(result: unknown): SwapQuote | null {
  if (!isJsonObject(result)) return null;
  if (!QUOTE_FIELDS.every((key) => typeof result[key] === "string")) return null;
  return {
    inputToken: String(result.inputToken),
    outputToken: String(result.outputToken),
    inputAmount: String(result.inputAmount),
    outputAmount: String(result.outputAmount),
    minOutputAmount: String(result.minOutputAmount),
    router: String(result.router),
    calldata: String(result.calldata),
    value: String(result.value)
  };
}
