import { describe, expect, it } from "vitest";

import { buildLogTargets, createRootLogger } from "./logging.js";

describe("logging", () => {
  it("writes to stdout and a size-rotated file", () => {
    expect(buildLogTargets("info", "logs/bot.log")).toEqual([
      { target: "pino/file", level: "info", options: { destination: 1 } },
      {
        target: "pino-roll",
        level: "info",
        options: { file: "logs/bot.log", size: "5m", limit: { count: 5 }, mkdir: true },
      },
    ]);
  });

  it("logs to stdout only without a file", () => {
    const log = createRootLogger({ level: "warn", file: "  " });
    expect(log.level).toBe("warn");
  });
});
