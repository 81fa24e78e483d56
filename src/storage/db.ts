import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { CycleRecord, DbState, OptimizerState } from "../types.js";

export function initialOptimizerState(): OptimizerState {
  return {
    currentVault: null,
    currentApy: 0,
    rebalanceCount: 0,
    lastCheckTime: 0
  };
}

export function cloneDefaultState(): DbState {
  return {
    optimizer: initialOptimizerState(),
    cycles: []
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function finiteOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/** Keeps each persisted field only when it has the expected type. */
export function parseOptimizerState(raw: unknown): OptimizerState {
  const defaults = initialOptimizerState();
  if (!isRecord(raw)) return defaults;
  return {
    currentVault:
      typeof raw.currentVault === "string" && raw.currentVault ? raw.currentVault : null,
    currentApy: finiteOr(raw.currentApy, defaults.currentApy),
    rebalanceCount: finiteOr(raw.rebalanceCount, defaults.rebalanceCount),
    lastCheckTime: finiteOr(raw.lastCheckTime, defaults.lastCheckTime)
  };
}

function isCycleRecord(value: unknown): value is CycleRecord {
  return (
    isRecord(value) &&
    typeof value.timestamp === "number" &&
    typeof value.outcome === "string" &&
    typeof value.reason === "string"
  );
}

export interface StateStore {
  getState(): Promise<DbState>;
  setOptimizerState(state: OptimizerState): Promise<void>;
  addCycle(record: CycleRecord): Promise<void>;
}

export class JsonDb implements StateStore {
  private opQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly maxCycles = 2_000
  ) {}

  async init(): Promise<void> {
    await this.enqueue(async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      try {
        await readFile(this.filePath, "utf8");
      } catch {
        await this.writeState(cloneDefaultState());
      }
    });
  }

  async getState(): Promise<DbState> {
    await this.opQueue;
    return this.readState();
  }

  async setOptimizerState(state: OptimizerState): Promise<void> {
    await this.enqueue(async () => {
      const current = await this.readState();
      current.optimizer = { ...state };
      await this.writeState(current);
    });
  }

  async addCycle(record: CycleRecord): Promise<void> {
    await this.enqueue(async () => {
      const state = await this.readState();
      state.cycles.push(record);
      state.cycles = state.cycles.slice(-this.maxCycles);
      await this.writeState(state);
    });
  }

  private async readState(): Promise<DbState> {
    try {
      const raw = await readFile(this.filePath, "utf8");
      const parsed: unknown = JSON.parse(raw);
      if (!isRecord(parsed)) return cloneDefaultState();
      return {
        optimizer: parseOptimizerState(parsed.optimizer),
        cycles: Array.isArray(parsed.cycles) ? parsed.cycles.filter(isCycleRecord) : []
      };
    } catch {
      return cloneDefaultState();
    }
  }

  private async writeState(state: DbState): Promise<void> {
    const tempPath = `${this.filePath}.${Date.now().toString(36)}.${Math.random()
      .toString(16)
      .slice(2)}.tmp`;
    await writeFile(tempPath, JSON.stringify(state, null, 2), "utf8");
    try {
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(() => undefined);
      throw error;
    }
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const task = this.opQueue.then(operation, operation);
    this.opQueue = task.then(
      () => undefined,
      () => undefined
    );
    return task;
  }
}
