import pino, { type Logger, type LevelWithSilent, type TransportTargetOptions } from "pino";

export type { Logger };

export type LoggingOptions = {
  level?: LevelWithSilent;
  /** Also append JSON lines to this file. Empty or unset logs to stdout only. */
  file?: string;
};

/** The log file rolls over at this size, keeping this many old files. */
export const LOG_ROTATE_SIZE = "5m";
export const LOG_ROTATE_KEEP = 5;

export function buildLogTargets(level: string, file: string): TransportTargetOptions[] {
  return [
    { target: "pino/file", level, options: { destination: 1 } },
    {
      target: "pino-roll",
      level,
      options: { file, size: LOG_ROTATE_SIZE, limit: { count: LOG_ROTATE_KEEP }, mkdir: true },
    },
  ];
}

let rootLogger: Logger | null = null;

export function createRootLogger(opts: LoggingOptions = {}): Logger {
  const level = opts.level ?? "info";
  const file = opts.file?.trim();
  if (level === "silent" || !file) {
    return pino({ name: "gameserver-relay", level });
  }
  return pino(
    { name: "gameserver-relay", level },
    pino.transport({ targets: buildLogTargets(level, file) }),
  );
}

export function configureLogging(opts: LoggingOptions): Logger {
  rootLogger = createRootLogger(opts);
  return rootLogger;
}

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger({ level: "info" });
  }
  return rootLogger;
}

export function getChildLogger(bindings: { module: string } & Record<string, unknown>): Logger {
  return getLogger().child(bindings);
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
