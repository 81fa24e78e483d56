import { ApiRequestError } from "../errors.js";

export type FetchFn = typeof fetch;

export interface JsonClientConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

/**
 * POSTs a JSON body with the API-key header and a per-request timeout.
 * Any transport failure, non-2xx status or unparseable body raises
 * ApiRequestError. There is no retry.
 */
export async function postJson(
  config: JsonClientConfig,
  path: string,
  payload: Record<string, unknown>
): Promise<unknown> {
  const endpoint = `${config.baseUrl.replace(/\/$/, "")}${path}`;
  const fetchFn = config.fetchFn ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.timeoutMs);
  try {
    let response: Response;
    try {
      response = await fetchFn(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-API-Key": config.apiKey
        },
        body: JSON.stringify(payload),
        signal: controller.signal
      });
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${config.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new ApiRequestError(endpoint, `Request to ${endpoint} failed: ${reason}`);
    }

    if (!response.ok) {
      throw new ApiRequestError(
        endpoint,
        `${endpoint} returned ${response.status}`,
        response.status
      );
    }

    try {
      return await response.json();
    } catch {
      throw new ApiRequestError(
        endpoint,
        controller.signal.aborted
          ? `Request to ${endpoint} failed: timed out after ${config.timeoutMs}ms`
          : `${endpoint} returned a non-JSON body`,
        response.status
      );
    }
  } finally {
    clearTimeout(timeout);
  }
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
