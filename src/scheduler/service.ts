import { createHash } from "node:crypto";

import { formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging.js";
import { computeNextRunAtMs, resolveIntervalMs } from "./schedule.js";
import type {
  SchedulerEvent,
  TaskDefinition,
  TaskName,
  TaskRunResult,
  TaskState,
  TaskStatusView,
  TickOutcome,
} from "./types.js";

const MAX_TIMER_DELAY_MS = 60_000;
const MAX_BACKOFF_FACTOR = 8;

export type TaskSchedulerDeps = {
  log: Logger;
  nowMs?: () => number;
  onEvent?: (evt: SchedulerEvent) => void;
};

type TaskRuntime = {
  def: TaskDefinition;
  state: TaskState;
  timer: NodeJS.Timeout | null;
  inFlight: Promise<TickOutcome> | null;
  /** Hash of the credentials that were rejected. */
  disabledKey: string | null;
  /** Bumped by `resumeTask`; a rejection from an older epoch does not disable. */
  credentialEpoch: number;
};

type SchedulerState = {
  deps: Required<Pick<TaskSchedulerDeps, "nowMs">> & TaskSchedulerDeps;
  tasks: Map<TaskName, TaskRuntime>;
  started: boolean;
};

export interface TaskScheduler {
  start(): void;
  stop(opts?: { graceMs?: number }): Promise<{ drained: boolean }>;
  /** Runs a task now under the same overlap guard as timer ticks. */
  runTask(name: TaskName): Promise<TaskRunResult>;
  /** Clears an auth-failure disable, e.g. after credentials were re-entered. */
  resumeTask(name: TaskName): void;
  status(): TaskStatusView[];
}

export function createTaskScheduler(
  definitions: readonly TaskDefinition[],
  deps: TaskSchedulerDeps,
): TaskScheduler {
  const state: SchedulerState = {
    deps: { ...deps, nowMs: deps.nowMs ?? Date.now },
    tasks: new Map(),
    started: false,
  };
  for (const def of definitions) {
    if (state.tasks.has(def.name)) {
      throw new Error(`Duplicate task: ${def.name}`);
    }
    state.tasks.set(def.name, {
      def,
      state: { overlapSkips: 0, backoffFactor: 1 },
      timer: null,
      inFlight: null,
      disabledKey: null,
      credentialEpoch: 0,
    });
  }

  return {
    start: () => {
      if (state.started) {
        return;
      }
      state.started = true;
      const now = state.deps.nowMs();
      for (const task of state.tasks.values()) {
        task.state.nextRunAtMs = now;
        armTimer(state, task);
      }
    },
    stop: (opts) => stopScheduler(state, opts?.graceMs ?? 0),
    runTask: (name) => {
      const task = state.tasks.get(name);
      if (!task) {
        return Promise.reject(new Error(`Unknown task: ${name}`));
      }
      return runGuarded(state, task);
    },
    resumeTask: (name) => {
      const task = state.tasks.get(name);
      if (!task) {
        throw new Error(`Unknown task: ${name}`);
      }
      task.credentialEpoch += 1;
      if (task.disabledKey === null) {
        return;
      }
      task.disabledKey = null;
      task.state.disabledReason = undefined;
      state.deps.log.info({ task: name }, "scheduler: task resumed");
    },
    status: () =>
      [...state.tasks.values()].map((task) => ({
        ...task.state,
        name: task.def.name,
        running: task.inFlight !== null,
      })),
  };
}

function armTimer(state: SchedulerState, task: TaskRuntime) {
  if (task.timer) {
    clearTimeout(task.timer);
  }
  task.timer = null;
  if (!state.started) {
    return;
  }
  const nextAt = task.state.nextRunAtMs;
  if (nextAt === undefined) {
    return;
  }
  const delay = Math.max(nextAt - state.deps.nowMs(), 0);
  // Wake at least once a minute so wall-clock jumps are picked up quickly.
  const clampedDelay = Math.min(delay, MAX_TIMER_DELAY_MS);
  task.timer = setTimeout(async () => {
    try {
      await onTimer(state, task);
    } catch (err) {
      state.deps.log.error(
        { task: task.def.name, err: formatErrorMessage(err) },
        "scheduler: timer tick failed",
      );
    }
  }, clampedDelay);
}

async function onTimer(state: SchedulerState, task: TaskRuntime) {
  const now = state.deps.nowMs();
  const due = task.state.nextRunAtMs;
  if (due === undefined || now < due) {
    armTimer(state, task);
    return;
  }
  // Fixed cadence: the next slot is armed before this tick runs, so a slow
  // tick makes the following one hit the overlap guard instead of queueing.
  task.state.nextRunAtMs = computeNextRunAtMs(task.def.schedule, now);
  armTimer(state, task);
  await runGuarded(state, task);
}

async function runGuarded(state: SchedulerState, task: TaskRuntime): Promise<TaskRunResult> {
  const name = task.def.name;
  if (task.inFlight) {
    task.state.overlapSkips += 1;
    state.deps.log.warn({ task: name }, "scheduler: previous tick still running, skipping");
    emit(state, { task: name, action: "skipped", reason: "running" });
    return "overlap";
  }

  if (task.disabledKey !== null) {
    const currentKey = hashCredentialKey(task.def.credentialKey?.() ?? null);
    if (currentKey === task.disabledKey) {
      emit(state, { task: name, action: "skipped", reason: "disabled" });
      return "skipped";
    }
    task.disabledKey = null;
    task.state.disabledReason = undefined;
    state.deps.log.info({ task: name }, "scheduler: credentials changed, resuming task");
  }

  const attempt: TickAttempt = {
    startedAt: state.deps.nowMs(),
    credentialKey: hashCredentialKey(task.def.credentialKey?.() ?? null),
    credentialEpoch: task.credentialEpoch,
  };
  emit(state, { task: name, action: "started", runAtMs: attempt.startedAt });
  const run = executeTick(state, task);
  task.inFlight = run;
  let outcome: TickOutcome;
  try {
    outcome = await run;
  } finally {
    task.inFlight = null;
  }
  finishTick(state, task, outcome, attempt);
  return outcome.status;
}

async function executeTick(state: SchedulerState, task: TaskRuntime): Promise<TickOutcome> {
  try {
    return await task.def.run();
  } catch (err) {
    state.deps.log.error(
      { task: task.def.name, err: formatErrorMessage(err) },
      "scheduler: tick threw unexpectedly",
    );
    return { status: "error", error: formatErrorMessage(err) };
  }
}

type TickAttempt = {
  startedAt: number;
  /** Credentials the tick ran with, captured before it started. */
  credentialKey: string;
  credentialEpoch: number;
};

function finishTick(
  state: SchedulerState,
  task: TaskRuntime,
  outcome: TickOutcome,
  attempt: TickAttempt,
) {
  const { startedAt } = attempt;
  const endedAt = state.deps.nowMs();
  const name = task.def.name;
  task.state.lastRunAtMs = startedAt;
  task.state.lastStatus = outcome.status;
  task.state.lastError = outcome.error;
  task.state.lastSummary = outcome.summary;
  task.state.lastDurationMs = Math.max(0, endedAt - startedAt);

  if (outcome.authFailure) {
    if (attempt.credentialEpoch === task.credentialEpoch) {
      task.disabledKey = attempt.credentialKey;
      task.state.disabledReason = "credentials rejected";
      state.deps.log.error(
        { task: name, err: outcome.error },
        "scheduler: credentials rejected, task disabled until they change",
      );
    } else {
      state.deps.log.warn(
        { task: name, err: outcome.error },
        "scheduler: credentials rejected, but they were re-entered during the tick",
      );
    }
  }

  if (outcome.rateLimited) {
    task.state.backoffFactor = Math.min(task.state.backoffFactor * 2, MAX_BACKOFF_FACTOR);
    const intervalMs = resolveIntervalMs(task.def.schedule, endedAt) ?? MAX_TIMER_DELAY_MS;
    const waitMs = Math.max(intervalMs * task.state.backoffFactor, outcome.rateLimited.retryAfterMs ?? 0);
    task.state.nextRunAtMs = endedAt + waitMs;
    state.deps.log.warn(
      { task: name, backoffFactor: task.state.backoffFactor, waitMs },
      "scheduler: rate limited, backing off",
    );
    armTimer(state, task);
  } else if (outcome.status === "ok" && task.state.backoffFactor !== 1) {
    task.state.backoffFactor = 1;
  }

  emit(state, {
    task: name,
    action: "finished",
    status: outcome.status,
    error: outcome.error,
    summary: outcome.summary,
    runAtMs: startedAt,
    durationMs: task.state.lastDurationMs,
    nextRunAtMs: task.state.nextRunAtMs,
  });
}

async function stopScheduler(state: SchedulerState, graceMs: number): Promise<{ drained: boolean }> {
  state.started = false;
  const pending: Promise<unknown>[] = [];
  for (const task of state.tasks.values()) {
    if (task.timer) {
      clearTimeout(task.timer);
    }
    task.timer = null;
    if (task.inFlight) {
      pending.push(task.inFlight);
    }
  }
  if (pending.length === 0) {
    return { drained: true };
  }
  let graceTimer: NodeJS.Timeout | undefined;
  const grace = new Promise<boolean>((resolve) => {
    graceTimer = setTimeout(() => resolve(false), graceMs);
  });
  try {
    const drained = await Promise.race([Promise.allSettled(pending).then(() => true), grace]);
    if (!drained) {
      state.deps.log.warn({ graceMs }, "scheduler: grace period elapsed with ticks still running");
    }
    return { drained };
  } finally {
    clearTimeout(graceTimer);
  }
}

function hashCredentialKey(key: string | null): string {
  return createHash("sha256")
    .update(key ?? "")
    .digest("hex");
}

function emit(state: SchedulerState, evt: SchedulerEvent) {
  try {
    state.deps.onEvent?.(evt);
  } catch (err) {
    state.deps.log.warn({ err: formatErrorMessage(err) }, "scheduler: event listener failed");
  }
}
