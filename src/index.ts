#!/usr/bin/env node
import { createCommandGate } from "./commands/gate.js";
import { createSystemctlProcessControl } from "./commands/process-control.js";
import { loadRelayEnv, requireDiscordToken, resolveTaskSchedules } from "./config/env.js";
import { startDiscordBot } from "./discord/monitor.js";
import { formatErrorMessage } from "./errors.js";
import { configureLogging, getChildLogger } from "./logging.js";
import { createNotificationDispatcher } from "./notify/dispatcher.js";
import { createReconciliationScheduler } from "./scheduler/reconcile.js";
import type { TaskScheduler } from "./scheduler/service.js";
import { createReconcileRuntime } from "./scheduler/ticks.js";
import { createBattleMetricsBanReader } from "./sources/battlemetrics.js";
import { createTmuxPerformanceReader } from "./sources/tmux.js";
import { loadStateStore } from "./state/store.js";

async function main() {
  const env = loadRelayEnv();
  const root = configureLogging({ level: env.LOG_LEVEL, file: env.LOG_FILE });
  const log = getChildLogger({ module: "main" });
  const token = requireDiscordToken(env);
  const schedules = resolveTaskSchedules(env);

  const store = await loadStateStore({
    statePath: env.BOT_STATE_PATH,
    log: getChildLogger({ module: "state" }),
  });

  let scheduler: TaskScheduler | null = null;
  const gate = createCommandGate({
    store,
    processControl: createSystemctlProcessControl({ timeoutMs: env.RESTART_TIMEOUT_MS }),
    log: getChildLogger({ module: "commands" }),
    taskStatus: () => scheduler?.status() ?? [],
    onCredentialsChanged: () => scheduler?.resumeTask("bans"),
  });

  const bot = await startDiscordBot({
    token,
    applicationId: env.DISCORD_APPLICATION_ID,
    publicKey: env.DISCORD_PUBLIC_KEY,
    gate,
    log: getChildLogger({ module: "discord" }),
  });

  const reconcileLog = getChildLogger({ module: "reconcile" });
  const running = createReconciliationScheduler({
    ctx: {
      store,
      dispatcher: createNotificationDispatcher({
        surface: bot.surface,
        log: getChildLogger({ module: "notify" }),
      }),
      readPerformance: createTmuxPerformanceReader({
        session: env.TMUX_SESSION,
        timeoutMs: env.TMUX_TIMEOUT_MS,
      }),
      readBans: createBattleMetricsBanReader({
        baseUrl: env.BATTLEMETRICS_API_URL,
        timeoutMs: env.BATTLEMETRICS_TIMEOUT_MS,
      }),
      presence: bot.presence,
      maxPlayers: env.MAX_PLAYERS,
      log: reconcileLog,
      runtime: createReconcileRuntime(),
    },
    schedules,
  });
  scheduler = running;
  running.start();
  log.info({ statePath: env.BOT_STATE_PATH, session: env.TMUX_SESSION }, "relay started");

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    log.info({ signal }, "shutting down");
    const { drained } = await running.stop({ graceMs: env.SHUTDOWN_GRACE_MS });
    if (!drained) {
      log.warn({ graceMs: env.SHUTDOWN_GRACE_MS }, "in-flight ticks abandoned at shutdown");
    }
    bot.stop();
    root.flush();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      void shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err: formatErrorMessage(err) }, "shutdown failed");
          process.exit(1);
        },
      );
    });
  }
}

void main().catch((err: unknown) => {
  getChildLogger({ module: "main" }).fatal({ err: formatErrorMessage(err) }, "relay failed to start");
  process.exit(1);
});
