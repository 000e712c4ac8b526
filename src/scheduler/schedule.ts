import { Cron } from "croner";

export type TaskSchedule =
  | { kind: "every"; everyMs: number; anchorMs?: number }
  | { kind: "cron"; expr: string; tz?: string };

function resolveCronTimezone(tz?: string) {
  const trimmed = typeof tz === "string" ? tz.trim() : "";
  if (trimmed) {
    return trimmed;
  }
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/** First run strictly after `nowMs`, or undefined when the schedule never fires again. */
export function computeNextRunAtMs(schedule: TaskSchedule, nowMs: number): number | undefined {
  if (schedule.kind === "every") {
    const everyMs = Math.max(1, Math.floor(schedule.everyMs));
    const anchor = Math.max(0, Math.floor(schedule.anchorMs ?? nowMs));
    if (nowMs < anchor) {
      return anchor;
    }
    const steps = Math.floor((nowMs - anchor) / everyMs) + 1;
    return anchor + steps * everyMs;
  }

  const expr = schedule.expr.trim();
  if (!expr) {
    return undefined;
  }
  const cron = new Cron(expr, {
    timezone: resolveCronTimezone(schedule.tz),
    catch: false,
  });
  let cursor = nowMs;
  for (let attempt = 0; attempt < 3; attempt++) {
    const next = cron.nextRun(new Date(cursor));
    if (!next) {
      return undefined;
    }
    const nextMs = next.getTime();
    if (Number.isFinite(nextMs) && nextMs > nowMs) {
      return nextMs;
    }
    cursor += 1_000;
  }
  return undefined;
}

/** Gap between the next two runs; used to scale backoff for cron schedules too. */
export function resolveIntervalMs(schedule: TaskSchedule, nowMs: number): number | undefined {
  const first = computeNextRunAtMs(schedule, nowMs);
  if (first === undefined) {
    return undefined;
  }
  const second = computeNextRunAtMs(schedule, first);
  return second === undefined ? undefined : second - first;
}

/** Throws when a cron expression does not parse. */
export function validateTaskSchedule(schedule: TaskSchedule): void {
  if (schedule.kind === "every") {
    if (!Number.isFinite(schedule.everyMs) || schedule.everyMs <= 0) {
      throw new Error(`Invalid interval: ${schedule.everyMs}ms`);
    }
    return;
  }
  new Cron(schedule.expr, { timezone: resolveCronTimezone(schedule.tz), paused: true });
}
