import { describe, expect, it, vi } from "vitest";

import { ProcessControlError } from "../errors.js";
import { createSilentLogger } from "../logging.js";
import { createStateStore } from "../state/store.js";
import { type BotState, createDefaultBotState } from "../state/types.js";
import { createMemoryStateStore } from "../test-utils/fakes.js";
import type { CommandCaller } from "./access.js";
import { createCommandGate, formatTaskStatus } from "./gate.js";
import type { ProcessControl } from "./process-control.js";

const log = createSilentLogger();

const OWNER: CommandCaller = { userId: "100", roleIds: [] };
const ADMIN: CommandCaller = { userId: "200", roleIds: ["900"] };
const MEMBER: CommandCaller = { userId: "300", roleIds: ["901"] };

function setup(state: Partial<BotState> = {}, processControl?: ProcessControl) {
  const { store, tracker } = createMemoryStateStore(state);
  const restart = vi.fn(async (_serviceName: string) => undefined);
  const gate = createCommandGate({
    store,
    processControl: processControl ?? { restart },
    log,
  });
  return { gate, store, tracker, restart };
}

const configured: Partial<BotState> = { ownerId: "100", adminRoleId: "900" };

describe("set-owner", () => {
  it("sets the owner once and rejects later attempts", async () => {
    const { gate, store } = setup();

    expect(await gate.execute(OWNER, { name: "set-owner", userId: "100" })).toEqual({
      ok: true,
      message: "Owner has been set to user ID: 100",
    });
    expect(await gate.execute(OWNER, { name: "set-owner", userId: "300" })).toEqual({
      ok: false,
      message: "Owner has already been set!",
    });
    expect(await gate.execute(MEMBER, { name: "set-owner", userId: "300" })).toEqual({
      ok: false,
      message: "Owner has already been set!",
    });
    expect(store.get().ownerId).toBe("100");
  });

  it("lets only one of two concurrent bootstrap calls win", async () => {
    const { gate, store } = setup();

    const replies = await Promise.all([
      gate.execute(OWNER, { name: "set-owner", userId: "100" }),
      gate.execute(MEMBER, { name: "set-owner", userId: "300" }),
    ]);

    expect(replies.map((r) => r.ok)).toEqual([true, false]);
    expect(store.get().ownerId).toBe("100");
  });

  it("rejects a malformed user id without touching state", async () => {
    const { gate, tracker } = setup();
    expect(await gate.execute(OWNER, { name: "set-owner", userId: "abc" })).toEqual({
      ok: false,
      message: "Invalid user ID.",
    });
    expect(tracker.writes).toBe(0);
  });
});

describe("owner commands", () => {
  it("refuses everyone while no owner is set", async () => {
    const { gate } = setup();
    expect(await gate.execute(OWNER, { name: "clear-bans" })).toEqual({
      ok: false,
      message: "The owner has not been set. Please run `/set-owner` first.",
    });
  });

  it("refuses a non-owner and leaves state unchanged", async () => {
    const { gate, store, tracker } = setup(configured);

    const reply = await gate.execute(ADMIN, { name: "set-admin-role", roleId: "901" });

    expect(reply).toEqual({ ok: false, message: "Only the owner can use this command!" });
    expect(store.get().adminRoleId).toBe("900");
    expect(tracker.writes).toBe(0);
  });

  it("stores BattleMetrics credentials for the owner", async () => {
    const { gate, store } = setup(configured);

    const reply = await gate.execute(OWNER, {
      name: "set-battlemetrics",
      token: " test-secret ",
      serverId: "4242",
    });

    expect(reply.ok).toBe(true);
    expect(store.get()).toMatchObject({
      battlemetricsToken: "test-secret",
      battlemetricsServerId: "4242",
    });
  });

  it("reports new BattleMetrics credentials only once they are committed", async () => {
    const { store } = createMemoryStateStore(configured);
    const onCredentialsChanged = vi.fn();
    const gate = createCommandGate({
      store,
      processControl: { restart: async () => undefined },
      log,
      onCredentialsChanged,
    });

    await gate.execute(ADMIN, { name: "set-battlemetrics", token: "test-secret", serverId: "1" });
    expect(onCredentialsChanged).not.toHaveBeenCalled();

    await gate.execute(OWNER, { name: "set-battlemetrics", token: "test-secret", serverId: "1" });
    expect(onCredentialsChanged).toHaveBeenCalledTimes(1);
  });

  it("clears the posted ban set", async () => {
    const { gate, store } = setup({ ...configured, postedBanIds: ["A", "B"] });

    expect(await gate.execute(OWNER, { name: "clear-bans" })).toEqual({
      ok: true,
      message: "Posted bans list has been cleared!",
    });
    expect(store.get().postedBanIds).toEqual([]);
  });
});

describe("admin commands", () => {
  it("reports an unset admin role to non-owners", async () => {
    const { gate } = setup({ ownerId: "100" });
    expect(await gate.execute(ADMIN, { name: "set-service", serviceName: "game" })).toEqual({
      ok: false,
      message: "The admin role has not been set. Ask the owner to run `/set-admin-role` first.",
    });
  });

  it("lets the owner through without the admin role", async () => {
    const { gate, store } = setup({ ownerId: "100" });
    const reply = await gate.execute(OWNER, { name: "set-bans-channel", channelId: "555" });
    expect(reply).toEqual({ ok: true, message: "Ban notifications will now be sent to this channel!" });
    expect(store.get().bansChannelId).toBe("555");
  });

  it("accepts role holders and refuses others", async () => {
    const { gate, store } = setup(configured);

    expect((await gate.execute(ADMIN, { name: "set-service", serviceName: "game@1.service" })).ok).toBe(
      true,
    );
    expect(await gate.execute(MEMBER, { name: "set-service", serviceName: "other" })).toEqual({
      ok: false,
      message: "You need the admin role to use this command!",
    });
    expect(store.get().serviceName).toBe("game@1.service");
  });

  it("rejects service names systemctl would misread", async () => {
    const { gate, store } = setup(configured);
    for (const serviceName of ["--force", "a b", "x;reboot", ""]) {
      const reply = await gate.execute(OWNER, { name: "set-service", serviceName });
      expect(reply.ok).toBe(false);
    }
    expect(store.get().serviceName).toBe("arma3server");
  });
});

describe("restart", () => {
  it("restarts the configured service", async () => {
    const { gate, restart } = setup({ ...configured, serviceName: "game" });

    expect(await gate.execute(ADMIN, { name: "restart" })).toEqual({
      ok: true,
      message: "Service `game` has been restarted successfully!",
    });
    expect(restart).toHaveBeenCalledWith("game");
  });

  it("refuses a second restart while one is in flight", async () => {
    let finish: () => void = () => undefined;
    const restart = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );
    const { gate } = setup(configured, { restart });

    const first = gate.execute(OWNER, { name: "restart" });
    const second = await gate.execute(ADMIN, { name: "restart" });
    finish();

    expect(second).toEqual({
      ok: false,
      message: "A restart of `arma3server` is already in progress.",
    });
    expect((await first).ok).toBe(true);
    expect(restart).toHaveBeenCalledTimes(1);

    const third = gate.execute(ADMIN, { name: "restart" });
    finish();
    expect((await third).ok).toBe(true);
  });

  it("surfaces process-control failures", async () => {
    const { gate } = setup(configured, {
      restart: async () => {
        throw new ProcessControlError("Failed to restart service: unit not found");
      },
    });

    expect(await gate.execute(OWNER, { name: "restart" })).toEqual({
      ok: false,
      message: "Failed to restart service: unit not found",
    });
  });

  it("checks authorization before restarting", async () => {
    const { gate, restart } = setup(configured);
    expect((await gate.execute(MEMBER, { name: "restart" })).ok).toBe(false);
    expect(restart).not.toHaveBeenCalled();
  });
});

describe("general commands", () => {
  it("binds the invoking channel for performance updates", async () => {
    const { gate, store } = setup();
    const reply = await gate.execute(MEMBER, { name: "fps-channel", channelId: "777" });
    expect(reply).toEqual({ ok: true, message: "Performance updates will now be sent to this channel!" });
    expect(store.get().fpsChannelId).toBe("777");
  });

  it("reports the owner", async () => {
    expect(await setup().gate.execute(MEMBER, { name: "get-owner" })).toEqual({
      ok: true,
      message: "No owner has been set yet.",
    });
    expect(await setup(configured).gate.execute(MEMBER, { name: "get-owner" })).toEqual({
      ok: true,
      message: "The current owner is <@100> (ID: 100)",
    });
  });

  it("summarizes task status", async () => {
    const { store } = createMemoryStateStore();
    const gate = createCommandGate({
      store,
      processControl: { restart: async () => undefined },
      log,
      nowMs: () => 10_000,
      taskStatus: () => [
        { name: "metrics", running: false, lastStatus: "ok", overlapSkips: 0, backoffFactor: 1, nextRunAtMs: 52_000 },
        {
          name: "bans",
          running: false,
          lastStatus: "error",
          lastError: "bad token",
          overlapSkips: 0,
          backoffFactor: 1,
          disabledReason: "credentials rejected",
        },
      ],
    });

    expect(await gate.execute(MEMBER, { name: "status" })).toEqual({
      ok: true,
      message: "**metrics**: ok, next in 42s\n**bans**: error (disabled: credentials rejected)",
    });
  });
});

describe("persistence", () => {
  it("returns a persistence failure as a reply and keeps the old state", async () => {
    const store = createStateStore(
      {
        statePath: "/nonexistent/state.json",
        log,
        write: async () => {
          throw new Error("disk full");
        },
      },
      createDefaultBotState(),
    );
    const gate = createCommandGate({ store, processControl: { restart: async () => undefined }, log });

    expect(await gate.execute(MEMBER, { name: "fps-channel", channelId: "777" })).toEqual({
      ok: false,
      message: "Failed to save bot state: disk full",
    });
    expect(store.get().fpsChannelId).toBeNull();
  });

  it("keeps a ban committed by a concurrent tick when clearing", async () => {
    const { gate, store } = setup({ ...configured, postedBanIds: ["A"] });

    const tick = store.mutate((current) => ({ ...current, postedBanIds: [...current.postedBanIds, "B"] }));
    const clear = gate.execute(OWNER, { name: "clear-bans" });
    const later = store.mutate((current) => ({ ...current, postedBanIds: [...current.postedBanIds, "C"] }));
    await Promise.all([tick, clear, later]);

    expect(store.get().postedBanIds).toEqual(["C"]);
  });
});

describe("formatTaskStatus", () => {
  it("shows running tasks and backoff", () => {
    expect(
      formatTaskStatus(
        { name: "bans", running: true, lastStatus: "error", lastError: "slow down", overlapSkips: 0, backoffFactor: 4, nextRunAtMs: 1_500 },
        1_000,
      ),
    ).toBe("**bans**: running (slow down), backoff x4, next in 1s");
    expect(formatTaskStatus({ name: "presence", running: false, overlapSkips: 0, backoffFactor: 1 }, 0)).toBe(
      "**presence**: pending",
    );
  });
});
