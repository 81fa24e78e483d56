import { beforeEach, describe, expect, it, vi } from "vitest";
import type { FetchFn } from "../src/services/http.js";
import { YieldApiClient } from "../src/services/yield-api.js";
import { fakeFetch, silenceLogs, VAULT_A, VAULT_B, VAULT_C, type FakeReply } from "./helpers.js";

const BASE_URL = "https://yield.test";
const NOW = 1_700_000_000;

function client(fetchFn: FetchFn, timeoutMs = 1_000): YieldApiClient {
  return new YieldApiClient(
    { baseUrl: `${BASE_URL}/`, apiKey: "test-key", timeoutMs, fetchFn },
    "hyperevm",
    () => NOW
  );
}

describe("YieldApiClient", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    silenceLogs();
  });

  it("posts the historical APY request with the API key header", async () => {
    const { fetchFn, requests } = fakeFetch(() => ({ body: { apy: 4.2, tvl: 1_000 } }));

    const body = await client(fetchFn).historicalApy(VAULT_A);

    expect(body).toEqual({ apy: 4.2, tvl: 1_000 });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(`${BASE_URL}/historical-apy`);
    expect(requests[0].body).toEqual({ lp_token_address: VAULT_A, chain: "hyperevm" });
    expect(requests[0].headers.get("x-api-key")).toBe("test-key");
    expect(requests[0].headers.get("content-type")).toBe("application/json");
  });

  it("sends the diluted APY amount as a decimal string", async () => {
    const { fetchFn, requests } = fakeFetch(() => ({ body: { apy: 3.9 } }));

    await client(fetchFn).dilutedApy(VAULT_A, 1_000_000n, "otherchain");

    expect(requests[0].url).toBe(`${BASE_URL}/diluted-apy`);
    expect(requests[0].body).toEqual({
      lp_token_address: VAULT_A,
      chain: "otherchain",
      amount: "1000000"
    });
  });

  it.each<[string, FakeReply]>([
    ["an HTTP error status", { status: 500, body: { error: "boom" } }],
    ["a transport failure", new Error("connection refused")],
    ["a non-JSON body", { body: "<html>oops</html>" }],
    ["a non-object body", { body: [1, 2, 3] }]
  ])("returns null on %s", async (_label, reply) => {
    const { fetchFn } = fakeFetch(() => reply);
    await expect(client(fetchFn).historicalApy(VAULT_A)).resolves.toBeNull();
  });

  it("returns null when the request times out", async () => {
    const hanging: FetchFn = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });

    await expect(client(hanging, 10).historicalApy(VAULT_A)).resolves.toBeNull();
  });

  it("scans vaults in order and omits the ones that fail", async () => {
    const { fetchFn, requests } = fakeFetch((url, body) => {
      const vault = body.lp_token_address;
      if (vault === VAULT_B && url.endsWith("/historical-apy")) {
        return { status: 503, body: {} };
      }
      if (url.endsWith("/historical-apy")) {
        return { body: { apy: 1, tvl: vault === VAULT_A ? 20_000_000 : 60_000_000 } };
      }
      return { body: { apy: vault === VAULT_A ? 7.5 : 4 } };
    });

    const yields = await client(fetchFn).scan([VAULT_A, VAULT_B, VAULT_C], 500n);

    expect(yields).toEqual([
      { vaultAddress: VAULT_A, apy: 7.5, tvl: 20_000_000, riskScore: 33.75, observedAt: NOW },
      { vaultAddress: VAULT_C, apy: 4, tvl: 60_000_000, riskScore: 2, observedAt: NOW }
    ]);
    expect(requests.map((request) => [request.url.slice(BASE_URL.length), request.body.lp_token_address])).toEqual([
      ["/historical-apy", VAULT_A],
      ["/diluted-apy", VAULT_A],
      ["/historical-apy", VAULT_B],
      ["/diluted-apy", VAULT_B],
      ["/historical-apy", VAULT_C],
      ["/diluted-apy", VAULT_C]
    ]);
    expect(requests[1].body.amount).toBe("500");
  });

  it("falls back to the historical APY when the diluted body has none", async () => {
    const { fetchFn } = fakeFetch((url) =>
      url.endsWith("/historical-apy")
        ? { body: { apy: "6", tvl: "10000000" } }
        : { body: { note: "no apy" } }
    );

    const [entry] = await client(fetchFn).scan([VAULT_A], 1n);

    expect(entry.apy).toBe(6);
    expect(entry.tvl).toBe(10_000_000);
    expect(entry.riskScore).toBe(43);
  });

  it("defaults missing APY and TVL to zero", async () => {
    const { fetchFn } = fakeFetch(() => ({ body: {} }));

    const [entry] = await client(fetchFn).scan([VAULT_A], 1n);

    expect(entry).toEqual({ vaultAddress: VAULT_A, apy: 0, tvl: 0, riskScore: 50, observedAt: NOW });
  });

  it("returns an empty list when every vault fails", async () => {
    const { fetchFn } = fakeFetch(() => new Error("offline"));
    await expect(client(fetchFn).scan([VAULT_A, VAULT_B], 1n)).resolves.toEqual([]);
  });
});
