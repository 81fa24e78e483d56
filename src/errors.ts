export class ApiRequestError extends Error {
  constructor(
    readonly endpoint: string,
    message: string,
    readonly status: number | null = null
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "unknown_error";
}

export class ReceiptTimeoutError extends Error {
  constructor(
    readonly txHash: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for receipt of ${txHash}`);
    this.name = "ReceiptTimeoutError";
  }
}
