import type { TaskSchedule } from "./schedule.js";
import { type TaskScheduler, type TaskSchedulerDeps, createTaskScheduler } from "./service.js";
import {
  type ReconcileContext,
  battlemetricsCredentialKey,
  runBanSyncTick,
  runMetricsTick,
  runPresenceTick,
} from "./ticks.js";
import type { TaskDefinition, TaskName } from "./types.js";

export const DEFAULT_TASK_INTERVAL_MS = 60_000;

export type ReconcileSchedules = Record<TaskName, TaskSchedule>;

export function defaultReconcileSchedules(): ReconcileSchedules {
  return {
    metrics: { kind: "every", everyMs: DEFAULT_TASK_INTERVAL_MS },
    bans: { kind: "every", everyMs: DEFAULT_TASK_INTERVAL_MS },
    presence: { kind: "every", everyMs: DEFAULT_TASK_INTERVAL_MS },
  };
}

export function buildReconcileTasks(
  ctx: ReconcileContext,
  schedules: ReconcileSchedules = defaultReconcileSchedules(),
): TaskDefinition[] {
  return [
    { name: "metrics", schedule: schedules.metrics, run: () => runMetricsTick(ctx) },
    {
      name: "bans",
      schedule: schedules.bans,
      run: () => runBanSyncTick(ctx),
      credentialKey: () => battlemetricsCredentialKey(ctx.store.get()),
    },
    { name: "presence", schedule: schedules.presence, run: () => runPresenceTick(ctx) },
  ];
}

export function createReconciliationScheduler(params: {
  ctx: ReconcileContext;
  schedules?: ReconcileSchedules;
  nowMs?: TaskSchedulerDeps["nowMs"];
  onEvent?: TaskSchedulerDeps["onEvent"];
}): TaskScheduler {
  return createTaskScheduler(buildReconcileTasks(params.ctx, params.schedules), {
    log: params.ctx.log,
    nowMs: params.nowMs,
    onEvent: params.onEvent,
  });
}
