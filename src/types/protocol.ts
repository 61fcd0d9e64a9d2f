import type { PhaseCounts, PoolState } from "../pool/connection-state.js";

export interface HealthResponse {
  readonly status: "ok" | "degraded";
  readonly poolState: PoolState;
  readonly workers: PhaseCounts;
  /** Seconds since the harness started. */
  readonly uptime: number;
}

export interface StatsResponse {
  readonly connectedTotal: number;
  readonly disconnectedTotal: number;
  readonly errorTotal: number;
  readonly messageTotal: number;
  readonly startTime: number | null;
  readonly takenAt: number;
}
