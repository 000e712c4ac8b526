import { z } from "zod";

import type { ReconcileSchedules } from "../scheduler/reconcile.js";
import { type TaskSchedule, validateTaskSchedule } from "../scheduler/schedule.js";

const LogLevelSchema = z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]);

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const RelayEnvSchema = z.object({
  DISCORD_TOKEN: optionalString,
  DISCORD_APPLICATION_ID: optionalString,
  DISCORD_PUBLIC_KEY: optionalString,
  BOT_STATE_PATH: z.string().trim().min(1).default("config.json"),
  TMUX_SESSION: z.string().trim().min(1).default("arma_reforger"),
  TMUX_TIMEOUT_MS: positiveInt(5_000),
  BATTLEMETRICS_API_URL: z.string().trim().url().default("https://api.battlemetrics.com"),
  BATTLEMETRICS_TIMEOUT_MS: positiveInt(10_000),
  METRICS_INTERVAL_SECONDS: positiveInt(60),
  BANS_INTERVAL_SECONDS: positiveInt(60),
  PRESENCE_INTERVAL_SECONDS: positiveInt(60),
  METRICS_CRON: optionalString,
  BANS_CRON: optionalString,
  PRESENCE_CRON: optionalString,
  CRON_TZ: optionalString,
  MAX_PLAYERS: positiveInt(128),
  RESTART_TIMEOUT_MS: positiveInt(60_000),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(10_000),
  LOG_LEVEL: LogLevelSchema.default("info"),
  LOG_FILE: z.string().default("bot.log"),
});

export type RelayEnv = z.infer<typeof RelayEnvSchema>;

export function loadRelayEnv(env: Record<string, string | undefined> = process.env): RelayEnv {
  const parsed = RelayEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

export function requireDiscordToken(env: RelayEnv): string {
  if (!env.DISCORD_TOKEN) {
    throw new Error("DISCORD_TOKEN environment variable not set");
  }
  return env.DISCORD_TOKEN;
}

function resolveTaskSchedule(everySeconds: number, cron: string | undefined, tz: string | undefined): TaskSchedule {
  const schedule: TaskSchedule = cron
    ? { kind: "cron", expr: cron, tz }
    : { kind: "every", everyMs: everySeconds * 1000 };
  validateTaskSchedule(schedule);
  return schedule;
}

/** A `*_CRON` variable overrides the matching interval. */
export function resolveTaskSchedules(env: RelayEnv): ReconcileSchedules {
  return {
    metrics: resolveTaskSchedule(env.METRICS_INTERVAL_SECONDS, env.METRICS_CRON, env.CRON_TZ),
    bans: resolveTaskSchedule(env.BANS_INTERVAL_SECONDS, env.BANS_CRON, env.CRON_TZ),
    presence: resolveTaskSchedule(env.PRESENCE_INTERVAL_SECONDS, env.PRESENCE_CRON, env.CRON_TZ),
  };
}
