import { describe, expect, it, vi } from "vitest";

import type { CommandGate, GateCommand } from "../commands/gate.js";
import {
  SLASH_COMMANDS,
  type SlashCommandSpec,
  handleSlashCommand,
  readOptionValues,
  toCommandOptions,
} from "./commands.js";

function spec(name: string): SlashCommandSpec {
  const found = SLASH_COMMANDS.find((entry) => entry.name === name);
  if (!found) {
    throw new Error(`missing ${name}`);
  }
  return found;
}

function recordingGate() {
  const execute = vi.fn<CommandGate["execute"]>(async () => ({ ok: true, message: "done" }));
  return { gate: { execute }, execute };
}

const caller = { userId: "100", roleIds: ["900"] };

describe("slash commands", () => {
  it("registers every gate command once", () => {
    expect(SLASH_COMMANDS.map((entry) => entry.name)).toEqual([
      "set-owner",
      "set-admin-role",
      "set-battlemetrics",
      "clear-bans",
      "restart",
      "set-service",
      "set-bans-channel",
      "fps-channel",
      "get-owner",
      "status",
    ]);
  });

  it("binds the invoking channel", async () => {
    const { gate, execute } = recordingGate();

    await handleSlashCommand(spec("fps-channel"), { caller, channelId: "777", args: {} }, gate);

    const expected: GateCommand = { name: "fps-channel", channelId: "777" };
    expect(execute).toHaveBeenCalledWith(caller, expected);
  });

  it("refuses channel commands without a channel", async () => {
    const { gate, execute } = recordingGate();

    const reply = await handleSlashCommand(
      spec("set-bans-channel"),
      { caller, channelId: undefined, args: {} },
      gate,
    );

    expect(reply).toEqual({ ok: false, message: "This command must be used in a server channel." });
    expect(execute).not.toHaveBeenCalled();
  });

  it("maps string options onto the gate command", async () => {
    const { gate, execute } = recordingGate();

    await handleSlashCommand(
      spec("set-battlemetrics"),
      { caller, channelId: undefined, args: { token: "test-secret", server_id: "42" } },
      gate,
    );

    expect(execute).toHaveBeenCalledWith(caller, {
      name: "set-battlemetrics",
      token: "test-secret",
      serverId: "42",
    });
  });

  it("declares required string options only where arguments exist", () => {
    expect(toCommandOptions(spec("restart").options)).toBeUndefined();
    expect(toCommandOptions(spec("set-service").options)).toEqual([
      { name: "service_name", description: "systemd unit name", type: 3, required: true },
    ]);
  });

  it("offers a role picker for the admin role", async () => {
    expect(toCommandOptions(spec("set-admin-role").options)).toEqual([
      { name: "role", description: "Role allowed to run admin commands", type: 8, required: true },
    ]);

    const { gate, execute } = recordingGate();
    const args = readOptionValues(spec("set-admin-role").options, [{ name: "role", type: 8, value: "900" }]);
    await handleSlashCommand(spec("set-admin-role"), { caller, channelId: "777", args }, gate);

    expect(execute).toHaveBeenCalledWith(caller, { name: "set-admin-role", roleId: "900" });
  });

  it("reads missing or non-string option values as empty", () => {
    expect(
      readOptionValues(spec("set-battlemetrics").options, [{ name: "server_id", type: 4, value: 42 }]),
    ).toEqual({ token: "", server_id: "" });
    expect(readOptionValues(spec("set-service").options, undefined)).toEqual({ service_name: "" });
  });
});
