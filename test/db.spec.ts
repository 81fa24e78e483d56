import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { cloneDefaultState, JsonDb } from "../src/storage/db.js";
import type { CycleRecord } from "../src/types.js";
import { VAULT_B } from "./helpers.js";

function cycle(timestamp: number): CycleRecord {
  return {
    timestamp,
    outcome: "HOLD",
    reason: "Already in optimal vault",
    candidateVault: VAULT_B,
    candidateApy: 8,
    score: 0.265,
    txHash: null
  };
}

describe("JsonDb", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "optimizer-db-"));
    path = join(dir, "nested", "state.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the state file with defaults on init", async () => {
    const db = new JsonDb(path);
    await db.init();

    expect(await db.getState()).toEqual(cloneDefaultState());
    expect(JSON.parse(await readFile(path, "utf8"))).toEqual(cloneDefaultState());
  });

  it("keeps an existing state file on init", async () => {
    const first = new JsonDb(path);
    await first.init();
    await first.setOptimizerState({
      currentVault: VAULT_B,
      currentApy: 8,
      rebalanceCount: 3,
      lastCheckTime: 1_700_000_000
    });

    const second = new JsonDb(path);
    await second.init();

    expect((await second.getState()).optimizer).toEqual({
      currentVault: VAULT_B,
      currentApy: 8,
      rebalanceCount: 3,
      lastCheckTime: 1_700_000_000
    });
  });

  it("keeps only the newest cycles", async () => {
    const db = new JsonDb(path, 2);
    await db.init();

    await Promise.all([db.addCycle(cycle(1)), db.addCycle(cycle(2)), db.addCycle(cycle(3))]);

    const { cycles } = await db.getState();
    expect(cycles.map((entry) => entry.timestamp)).toEqual([2, 3]);
  });

  it("drops wrongly typed optimizer fields", async () => {
    const db = new JsonDb(path);
    await db.init();
    await writeFile(
      path,
      JSON.stringify({
        optimizer: {
          currentVault: 42,
          currentApy: "n/a",
          rebalanceCount: "3",
          lastCheckTime: 1_700_000_000
        },
        cycles: [cycle(7), { timestamp: "soon" }]
      }),
      "utf8"
    );

    const state = await db.getState();
    expect(state.optimizer).toEqual({
      currentVault: null,
      currentApy: 0,
      rebalanceCount: 0,
      lastCheckTime: 1_700_000_000
    });
    expect(state.cycles).toEqual([cycle(7)]);
  });

  it("reads a non-object document as the default state", async () => {
    const db = new JsonDb(path);
    await db.init();
    await writeFile(path, "[1, 2]", "utf8");

    expect(await db.getState()).toEqual(cloneDefaultState());
  });

  it("reads a corrupt file as the default state", async () => {
    const db = new JsonDb(path);
    await db.init();
    await writeFile(path, "{not json", "utf8");

    expect(await db.getState()).toEqual(cloneDefaultState());
  });
});
