import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { toErrorMessage } from "../errors.js";
import type { CycleOutcome, DbState } from "../types.js";
import type { CycleHooks } from "./optimizer.js";

export interface BotRuntimeStatus {
  service: "yield-optimizer-bot";
  startedAt: string;
  runMode: "once" | "loop";
  checkIntervalSeconds: number;
  staleAfterSeconds: number;
  inFlight: boolean;
  totalCycles: number;
  successfulCycles: number;
  failedCycles: number;
  lastCycleStartedAt: string | null;
  lastCycleFinishedAt: string | null;
  lastSuccessfulCycleAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
  lastOutcome: CycleOutcome | null;
  rebalanceCount: number;
  consecutiveFailedRebalances: number;
  maxFailedRebalances: number;
}

interface BotStatusServerConfig {
  host: string;
  port: number;
  authToken: string;
  statusProvider: () => BotRuntimeStatus;
  stateProvider: () => Promise<DbState>;
}

export interface HealthEvaluation {
  healthy: boolean;
  ready: boolean;
  reason: string;
}

export function nowIso(): string {
  return new Date().toISOString();
}

/** Hooks that keep the runtime status in step with the optimizer loop. */
export function trackCycles(
  status: BotRuntimeStatus,
  clock: () => string = nowIso
): CycleHooks {
  return {
    onCycleStart() {
      status.inFlight = true;
      status.totalCycles += 1;
      status.lastCycleStartedAt = clock();
    },
    onCycleEnd(error, record) {
      status.inFlight = false;
      status.lastCycleFinishedAt = clock();
      if (error) {
        status.failedCycles += 1;
        status.lastErrorAt = status.lastCycleFinishedAt;
        status.lastErrorMessage = toErrorMessage(error);
      } else {
        status.successfulCycles += 1;
        status.lastSuccessfulCycleAt = status.lastCycleFinishedAt;
      }
      if (record) {
        status.lastOutcome = record.outcome;
        if (record.outcome === "REBALANCED") {
          status.rebalanceCount += 1;
          status.consecutiveFailedRebalances = 0;
        } else if (record.outcome === "FAILED") {
          status.consecutiveFailedRebalances += 1;
        }
      }
    }
  };
}

export class BotStatusServer {
  private readonly server: Server;

  constructor(private readonly config: BotStatusServerConfig) {
    this.server = createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        console.error("[status-server] Request failed:", error);
        if (!res.headersSent) {
          this.respond(res, 500, { error: "Internal error" });
        }
      });
    });
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off("error", reject);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (url.pathname === "/state" && !this.isAuthorized(req, url)) {
      this.respond(res, 401, { error: "Unauthorized" });
      return;
    }

    const status = this.config.statusProvider();
    const health = evaluateHealth(status);
    const summary = {
      service: status.service,
      healthy: health.healthy,
      ready: health.ready,
      reason: health.reason,
      lastOutcome: status.lastOutcome,
      rebalanceCount: status.rebalanceCount,
      runtime: status
    };

    if (url.pathname === "/healthz") {
      this.respond(res, health.healthy ? 200 : 503, summary);
      return;
    }

    if (url.pathname === "/readyz") {
      this.respond(res, health.ready ? 200 : 503, summary);
      return;
    }

    if (url.pathname === "/state") {
      const state = await this.config.stateProvider();
      this.respond(res, health.healthy ? 200 : 503, { ...summary, state });
      return;
    }

    this.respond(res, 200, {
      service: status.service,
      routes: ["/healthz", "/readyz", "/state"]
    });
  }

  private isAuthorized(req: IncomingMessage, url: URL): boolean {
    if (!this.config.authToken) return true;
    const headerToken = req.headers["x-bot-status-token"];
    if (typeof headerToken === "string" && headerToken === this.config.authToken) {
      return true;
    }
    return url.searchParams.get("token") === this.config.authToken;
  }

  private respond(res: ServerResponse, code: number, payload: unknown): void {
    res.statusCode = code;
    res.setHeader("Content-Type", "application/json; charset=utf-8");
    res.setHeader("Cache-Control", "no-store, max-age=0");
    res.end(JSON.stringify(payload));
  }
}

export function evaluateHealth(status: BotRuntimeStatus, now = Date.now()): HealthEvaluation {
  const staleMs = status.staleAfterSeconds * 1_000;

  if (!status.lastCycleStartedAt) {
    const startupAgeMs = now - Date.parse(status.startedAt);
    return {
      healthy: startupAgeMs <= staleMs,
      ready: false,
      reason: startupAgeMs <= staleMs ? "starting" : "cycle_not_started"
    };
  }

  if (status.inFlight) {
    const ageMs = now - Date.parse(status.lastCycleStartedAt);
    return {
      healthy: ageMs <= staleMs,
      ready: Boolean(status.lastSuccessfulCycleAt),
      reason: ageMs <= staleMs ? "cycle_in_progress" : "cycle_stuck"
    };
  }

  if (!status.lastSuccessfulCycleAt) {
    const lastActivityAt = status.lastCycleFinishedAt ?? status.lastCycleStartedAt;
    const activityAgeMs = now - Date.parse(lastActivityAt);
    return {
      // Liveness stays green while cycles keep finishing, even if none has succeeded yet.
      healthy: activityAgeMs <= staleMs,
      ready: false,
      reason: activityAgeMs <= staleMs ? "no_successful_cycle" : "heartbeat_stale"
    };
  }

  const ageMs = now - Date.parse(status.lastSuccessfulCycleAt);
  if (ageMs > staleMs) {
    return { healthy: false, ready: true, reason: "heartbeat_stale" };
  }

  // Cycles complete but every approved rebalance keeps failing on chain.
  if (status.consecutiveFailedRebalances >= status.maxFailedRebalances) {
    return { healthy: true, ready: false, reason: "rebalance_failing" };
  }

  return { healthy: true, ready: true, reason: "ok" };
}
