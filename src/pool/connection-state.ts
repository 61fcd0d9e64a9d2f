export type WorkerPhase = "connecting" | "connected" | "disconnected" | "stopped";

export interface WorkerStatus {
  readonly id: number;
  readonly phase: WorkerPhase;
  readonly attempts: number;
  readonly lastError: string | null;
  readonly launchedAt: number | null;
}

export type PoolState = "idle" | "starting" | "running" | "stopping" | "stopped";

export type PhaseCounts = Readonly<Record<WorkerPhase, number>>;

export const WORKER_PHASES: readonly WorkerPhase[] = [
  "connecting",
  "connected",
  "disconnected",
  "stopped",
];

export function createInitialWorkerStatus(id: number): WorkerStatus {
  return {
    id,
    phase: "disconnected",
    attempts: 0,
    lastError: null,
    launchedAt: null,
  };
}

export function countPhases(statuses: readonly WorkerStatus[]): PhaseCounts {
  const counts: Record<WorkerPhase, number> = {
    connecting: 0,
    connected: 0,
    disconnected: 0,
    stopped: 0,
  };
  for (const status of statuses) {
    counts[status.phase] += 1;
  }
  return counts;
}
