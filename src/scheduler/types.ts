import type { TaskSchedule } from "./schedule.js";

export type TaskName = "metrics" | "bans" | "presence";

export type TickStatus = "ok" | "error" | "skipped";

export type TickOutcome = {
  status: TickStatus;
  summary?: string;
  error?: string;
  /** The source asked us to slow down. */
  rateLimited?: { retryAfterMs?: number };
  /** The source rejected the credentials; stop until they change. */
  authFailure?: boolean;
};

export type TaskDefinition = {
  name: TaskName;
  schedule: TaskSchedule;
  run: () => Promise<TickOutcome>;
  /**
   * Identifies the credentials the task runs with. After an auth failure the
   * task stays disabled while this returns the same value.
   */
  credentialKey?: () => string | null;
};

export type TaskState = {
  nextRunAtMs?: number;
  lastRunAtMs?: number;
  lastStatus?: TickStatus;
  lastError?: string;
  lastSummary?: string;
  lastDurationMs?: number;
  /** Due ticks dropped because the previous one was still running. */
  overlapSkips: number;
  backoffFactor: number;
  disabledReason?: string;
};

export type TaskStatusView = TaskState & {
  name: TaskName;
  running: boolean;
};

export type SchedulerEvent =
  | { task: TaskName; action: "started"; runAtMs: number }
  | {
      task: TaskName;
      action: "finished";
      status: TickStatus;
      error?: string;
      summary?: string;
      runAtMs: number;
      durationMs: number;
      nextRunAtMs?: number;
    }
  | { task: TaskName; action: "skipped"; reason: "running" | "disabled" };

export type TaskRunResult = TickStatus | "overlap";
