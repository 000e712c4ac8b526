import { z } from "zod";

import {
  InvalidArgumentError,
  RestartInProgressError,
  type RelayErrorCode,
  formatErrorMessage,
  isRelayError,
} from "../errors.js";
import type { Logger } from "../logging.js";
import type { TaskStatusView } from "../scheduler/types.js";
import type { BotState, StateStore } from "../state/types.js";
import { type AccessLevel, type CommandCaller, authorize, claimOwner } from "./access.js";
import type { ProcessControl } from "./process-control.js";

export type GateCommand =
  | { name: "set-owner"; userId: string }
  | { name: "set-admin-role"; roleId: string }
  | { name: "set-battlemetrics"; token: string; serverId: string }
  | { name: "clear-bans" }
  | { name: "restart" }
  | { name: "set-service"; serviceName: string }
  | { name: "set-bans-channel"; channelId: string }
  | { name: "fps-channel"; channelId: string }
  | { name: "get-owner" }
  | { name: "status" };

export type CommandName = GateCommand["name"];

export type CommandReply = { ok: boolean; message: string };

export const COMMAND_ACCESS: Record<CommandName, AccessLevel> = {
  "set-owner": "bootstrap",
  "set-admin-role": "owner",
  "set-battlemetrics": "owner",
  "clear-bans": "owner",
  restart: "admin",
  "set-service": "admin",
  "set-bans-channel": "admin",
  "fps-channel": "general",
  "get-owner": "general",
  status: "general",
};

const REJECTION_CODES: ReadonlySet<RelayErrorCode> = new Set([
  "not_authorized",
  "admin_role_unset",
  "owner_already_set",
  "restart_in_progress",
  "invalid_argument",
]);

const SnowflakeSchema = z.string().trim().regex(/^\d{1,25}$/);
// systemd unit names; a leading dash would read as an option to systemctl.
const ServiceNameSchema = z
  .string()
  .trim()
  .max(256)
  .regex(/^[A-Za-z0-9@_:.][A-Za-z0-9@._:-]*$/);
const TokenSchema = z.string().trim().min(1);

function parseArg(schema: z.ZodType<string>, value: string, message: string): string {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(message);
  }
  return parsed.data;
}

export function formatTaskStatus(view: TaskStatusView, nowMs: number): string {
  let line = `**${view.name}**: ${view.running ? "running" : (view.lastStatus ?? "pending")}`;
  if (view.disabledReason) {
    line += ` (disabled: ${view.disabledReason})`;
  } else if (view.lastStatus === "error" && view.lastError) {
    line += ` (${view.lastError})`;
  } else if (view.lastSummary) {
    line += ` (${view.lastSummary})`;
  }
  if (view.backoffFactor > 1) {
    line += `, backoff x${view.backoffFactor}`;
  }
  if (view.nextRunAtMs !== undefined && !view.disabledReason) {
    line += `, next in ${Math.max(0, Math.ceil((view.nextRunAtMs - nowMs) / 1000))}s`;
  }
  return line;
}

export type CommandGateDeps = {
  store: StateStore;
  processControl: ProcessControl;
  log: Logger;
  taskStatus?: () => TaskStatusView[];
  /** Called after new BattleMetrics credentials are committed. */
  onCredentialsChanged?: () => void;
  nowMs?: () => number;
};

export interface CommandGate {
  execute(caller: CommandCaller, command: GateCommand): Promise<CommandReply>;
}

export function createCommandGate(deps: CommandGateDeps): CommandGate {
  const nowMs = deps.nowMs ?? Date.now;
  let restartInFlight: string | null = null;

  const update = async (
    caller: CommandCaller,
    name: CommandName,
    apply: (current: Readonly<BotState>) => BotState,
  ) => {
    await deps.store.mutate((current) => {
      authorize(COMMAND_ACCESS[name], current, caller);
      return apply(current);
    });
  };

  const restart = async (caller: CommandCaller): Promise<string> => {
    const state = deps.store.get();
    authorize(COMMAND_ACCESS.restart, state, caller);
    if (restartInFlight !== null) {
      throw new RestartInProgressError(restartInFlight);
    }
    const serviceName = state.serviceName;
    restartInFlight = serviceName;
    try {
      deps.log.info({ serviceName, userId: caller.userId }, "command: restarting service");
      await deps.processControl.restart(serviceName);
    } finally {
      restartInFlight = null;
    }
    return `Service \`${serviceName}\` has been restarted successfully!`;
  };

  const run = async (caller: CommandCaller, command: GateCommand): Promise<string> => {
    switch (command.name) {
      case "set-owner": {
        const userId = parseArg(SnowflakeSchema, command.userId, "Invalid user ID.");
        await deps.store.mutate((current) => claimOwner(current, caller, userId));
        return `Owner has been set to user ID: ${userId}`;
      }
      case "set-admin-role": {
        const roleId = parseArg(SnowflakeSchema, command.roleId, "Invalid role ID.");
        await update(caller, command.name, (current) => ({ ...current, adminRoleId: roleId }));
        return `Admin role has been set to <@&${roleId}>`;
      }
      case "set-battlemetrics": {
        const token = parseArg(TokenSchema, command.token, "The BattleMetrics token must not be empty.");
        const serverId = parseArg(SnowflakeSchema, command.serverId, "Invalid BattleMetrics server ID.");
        await update(caller, command.name, (current) => ({
          ...current,
          battlemetricsToken: token,
          battlemetricsServerId: serverId,
        }));
        deps.onCredentialsChanged?.();
        return "BattleMetrics configuration has been updated!";
      }
      case "clear-bans": {
        await update(caller, command.name, (current) =>
          current.postedBanIds.length === 0 ? current : { ...current, postedBanIds: [] },
        );
        return "Posted bans list has been cleared!";
      }
      case "restart":
        return restart(caller);
      case "set-service": {
        const serviceName = parseArg(
          ServiceNameSchema,
          command.serviceName,
          "Invalid service name. Use a systemd unit name such as `arma3server`.",
        );
        await update(caller, command.name, (current) =>
          current.serviceName === serviceName ? current : { ...current, serviceName },
        );
        return `Service name has been set to \`${serviceName}\``;
      }
      case "set-bans-channel": {
        const { channelId } = command;
        await update(caller, command.name, (current) =>
          current.bansChannelId === channelId ? current : { ...current, bansChannelId: channelId },
        );
        return "Ban notifications will now be sent to this channel!";
      }
      case "fps-channel": {
        const { channelId } = command;
        await update(caller, command.name, (current) =>
          current.fpsChannelId === channelId ? current : { ...current, fpsChannelId: channelId },
        );
        return "Performance updates will now be sent to this channel!";
      }
      case "get-owner": {
        const ownerId = deps.store.get().ownerId;
        return ownerId === null
          ? "No owner has been set yet."
          : `The current owner is <@${ownerId}> (ID: ${ownerId})`;
      }
      case "status": {
        const views = deps.taskStatus?.() ?? [];
        if (views.length === 0) {
          return "No background tasks are running.";
        }
        const now = nowMs();
        return views.map((view) => formatTaskStatus(view, now)).join("\n");
      }
    }
  };

  return {
    async execute(caller, command) {
      try {
        const message = await run(caller, command);
        deps.log.info({ command: command.name, userId: caller.userId }, "command: applied");
        return { ok: true, message };
      } catch (err) {
        if (isRelayError(err) && REJECTION_CODES.has(err.code)) {
          deps.log.warn(
            { command: command.name, userId: caller.userId, code: err.code },
            "command: rejected",
          );
          return { ok: false, message: err.message };
        }
        deps.log.error(
          { err: formatErrorMessage(err), command: command.name, userId: caller.userId },
          "command: failed",
        );
        return {
          ok: false,
          message: isRelayError(err)
            ? err.message
            : `An unexpected error occurred: ${formatErrorMessage(err)}`,
        };
      }
    },
  };
}
