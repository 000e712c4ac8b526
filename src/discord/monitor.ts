import { Client } from "@buape/carbon";
import { GatewayIntents, GatewayPlugin } from "@buape/carbon/gateway";
import { ActivityType, PresenceUpdateStatus } from "discord-api-types/v10";

import type { CommandGate } from "../commands/gate.js";
import type { Logger } from "../logging.js";
import type { ChatSurface } from "../notify/dispatcher.js";
import type { PresenceSink } from "../scheduler/ticks.js";
import { createSlashCommands } from "./commands.js";
import { fetchDiscordApplicationId } from "./probe.js";
import { createDiscordChatSurface } from "./surface.js";

type PresenceUpdate = Parameters<GatewayPlugin["updatePresence"]>[0];

export interface PresenceGateway {
  updatePresence(data: PresenceUpdate): void;
}

export function createGatewayPresenceSink(
  getGateway: () => PresenceGateway | undefined,
): PresenceSink {
  return {
    async setActivity(text) {
      const gateway = getGateway();
      if (!gateway) {
        throw new Error("Discord gateway is not available");
      }
      gateway.updatePresence({
        since: null,
        activities: [{ name: text, type: ActivityType.Playing }],
        status: PresenceUpdateStatus.Online,
        afk: false,
      });
    },
  };
}

export type DiscordBotOptions = {
  token: string;
  /** Resolved from the token when not given. */
  applicationId?: string;
  publicKey?: string;
  gate: CommandGate;
  log: Logger;
  probeTimeoutMs?: number;
};

export type DiscordBot = {
  client: Client;
  surface: ChatSurface;
  presence: PresenceSink;
  stop(): void;
};

export async function startDiscordBot(opts: DiscordBotOptions): Promise<DiscordBot> {
  const applicationId =
    opts.applicationId ?? (await fetchDiscordApplicationId(opts.token, opts.probeTimeoutMs ?? 4_000));

  const client = new Client(
    {
      baseUrl: "http://localhost",
      deploySecret: "unused",
      clientId: applicationId,
      publicKey: opts.publicKey ?? "unused",
      token: opts.token,
      autoDeploy: true,
    },
    {
      commands: createSlashCommands({ gate: opts.gate, log: opts.log }),
      listeners: [],
    },
    [
      new GatewayPlugin({
        intents: GatewayIntents.Guilds,
        autoInteractions: true,
      }),
    ],
  );

  const getGateway = () => client.getPlugin<GatewayPlugin>("gateway");
  opts.log.info({ applicationId }, "discord: client started");

  return {
    client,
    surface: createDiscordChatSurface(client.rest),
    presence: createGatewayPresenceSink(getGateway),
    stop() {
      getGateway()?.disconnect();
      opts.log.info("discord: gateway disconnected");
    },
  };
}
