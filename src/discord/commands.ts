import { Command, type CommandInteraction, type CommandOptions } from "@buape/carbon";
import {
  type APIApplicationCommandBasicOption,
  ApplicationCommandOptionType,
} from "discord-api-types/v10";

import type { CommandCaller } from "../commands/access.js";
import type { CommandGate, CommandName, CommandReply, GateCommand } from "../commands/gate.js";
import type { Logger } from "../logging.js";

type SlashOption = {
  name: string;
  description: string;
  /** Role options are a picker; their value is the role's snowflake. */
  kind?: "string" | "role";
};

export type SlashCommandSpec = {
  name: CommandName;
  description: string;
  options: SlashOption[];
  /** Replies only the caller can see. */
  ephemeral: boolean;
  /**
   * Builds the gate command from string options and the invoking channel;
   * null when the command binds a channel and there is none.
   */
  build: (args: Record<string, string>, channelId: string | undefined) => GateCommand | null;
};

export const SLASH_COMMANDS: readonly SlashCommandSpec[] = [
  {
    name: "set-owner",
    description: "Set the bot owner (one time only)",
    options: [{ name: "user_id", description: "Discord user ID of the owner" }],
    ephemeral: true,
    build: (args) => ({ name: "set-owner", userId: args.user_id ?? "" }),
  },
  {
    name: "set-admin-role",
    description: "Set the role allowed to run admin commands",
    options: [{ name: "role", description: "Role allowed to run admin commands", kind: "role" }],
    ephemeral: true,
    build: (args) => ({ name: "set-admin-role", roleId: args.role ?? "" }),
  },
  {
    name: "set-battlemetrics",
    description: "Set the BattleMetrics API token and server ID",
    options: [
      { name: "token", description: "BattleMetrics API token" },
      { name: "server_id", description: "BattleMetrics server ID" },
    ],
    ephemeral: true,
    build: (args) => ({
      name: "set-battlemetrics",
      token: args.token ?? "",
      serverId: args.server_id ?? "",
    }),
  },
  {
    name: "clear-bans",
    description: "Forget which bans were announced",
    options: [],
    ephemeral: true,
    build: () => ({ name: "clear-bans" }),
  },
  {
    name: "restart",
    description: "Restart the game server service",
    options: [],
    ephemeral: false,
    build: () => ({ name: "restart" }),
  },
  {
    name: "set-service",
    description: "Set the systemd service restarted by /restart",
    options: [{ name: "service_name", description: "systemd unit name" }],
    ephemeral: true,
    build: (args) => ({ name: "set-service", serviceName: args.service_name ?? "" }),
  },
  {
    name: "set-bans-channel",
    description: "Send ban notifications to this channel",
    options: [],
    ephemeral: false,
    build: (_args, channelId) => (channelId ? { name: "set-bans-channel", channelId } : null),
  },
  {
    name: "fps-channel",
    description: "Send performance updates to this channel",
    options: [],
    ephemeral: false,
    build: (_args, channelId) => (channelId ? { name: "fps-channel", channelId } : null),
  },
  {
    name: "get-owner",
    description: "Show the current bot owner",
    options: [],
    ephemeral: true,
    build: () => ({ name: "get-owner" }),
  },
  {
    name: "status",
    description: "Show background task status",
    options: [],
    ephemeral: true,
    build: () => ({ name: "status" }),
  },
];

export type SlashInvocation = {
  caller: CommandCaller;
  channelId: string | undefined;
  args: Record<string, string>;
};

export async function handleSlashCommand(
  spec: SlashCommandSpec,
  invocation: SlashInvocation,
  gate: CommandGate,
): Promise<CommandReply> {
  const command = spec.build(invocation.args, invocation.channelId);
  if (!command) {
    return { ok: false, message: "This command must be used in a server channel." };
  }
  return gate.execute(invocation.caller, command);
}

export function toCommandOptions(options: readonly SlashOption[]): CommandOptions | undefined {
  if (options.length === 0) {
    return undefined;
  }
  return options.map((option): APIApplicationCommandBasicOption =>
    option.kind === "role"
      ? {
          name: option.name,
          description: option.description,
          type: ApplicationCommandOptionType.Role,
          required: true,
        }
      : {
          name: option.name,
          description: option.description,
          type: ApplicationCommandOptionType.String,
          required: true,
        },
  );
}

type RawOptionData = { name: string; type?: number; value?: unknown };

/** String and role values by option name; absent options read as "". */
export function readOptionValues(
  options: readonly SlashOption[],
  raw: readonly RawOptionData[] | undefined,
): Record<string, string> {
  const args: Record<string, string> = {};
  for (const option of options) {
    const value = raw?.find((entry) => entry.name === option.name)?.value;
    args[option.name] = typeof value === "string" ? value : "";
  }
  return args;
}

function readInvocation(spec: SlashCommandSpec, interaction: CommandInteraction): SlashInvocation | null {
  const user = interaction.user;
  if (!user) {
    return null;
  }
  const data = interaction.rawData.data;
  return {
    caller: { userId: user.id, roleIds: interaction.rawData.member?.roles ?? [] },
    channelId: interaction.channel?.id,
    args: readOptionValues(spec.options, "options" in data ? data.options : undefined),
  };
}

export function createSlashCommand(spec: SlashCommandSpec, deps: { gate: CommandGate; log: Logger }) {
  return new (class extends Command {
    name = spec.name;
    description = spec.description;
    defer = true;
    ephemeral = spec.ephemeral;
    options = toCommandOptions(spec.options);

    async run(interaction: CommandInteraction) {
      const invocation = readInvocation(spec, interaction);
      if (!invocation) {
        return;
      }
      const reply = await handleSlashCommand(spec, invocation, deps.gate);
      try {
        await interaction.reply({ content: reply.message });
      } catch (err) {
        deps.log.warn({ err: String(err), command: spec.name }, "discord: reply failed");
      }
    }
  })();
}

export function createSlashCommands(deps: { gate: CommandGate; log: Logger }) {
  return SLASH_COMMANDS.map((spec) => createSlashCommand(spec, deps));
}
