import { z } from "zod";

import { type BotState, DEFAULT_SERVICE_NAME } from "./types.js";

// Older files stored Discord snowflakes as JSON numbers.
const SnowflakeSchema = z
  .union([z.string(), z.number()])
  .nullable()
  .optional()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    const text = String(value).trim();
    return text ? text : null;
  });

const NullableStringSchema = z
  .string()
  .nullable()
  .optional()
  .transform((value) => (value === undefined ? null : value));

export const PersistedStateSchema = z.object({
  fps_channel: SnowflakeSchema,
  bans_channel: SnowflakeSchema,
  owner_id: SnowflakeSchema,
  admin_role: SnowflakeSchema,
  service_name: z
    .string()
    .nullable()
    .optional()
    .transform((value) => value?.trim() || DEFAULT_SERVICE_NAME),
  last_message_id: SnowflakeSchema,
  posted_bans: z
    .array(z.union([z.string(), z.number()]).transform((value) => String(value)))
    .nullable()
    .optional()
    .transform((value) => value ?? []),
  battlemetrics_token: NullableStringSchema,
  battlemetrics_server_id: SnowflakeSchema,
});

export type PersistedState = {
  fps_channel: string | null;
  bans_channel: string | null;
  owner_id: string | null;
  admin_role: string | null;
  service_name: string;
  last_message_id: string | null;
  posted_bans: string[];
  battlemetrics_token: string | null;
  battlemetrics_server_id: string | null;
};

export function decodeBotState(raw: unknown): BotState {
  const parsed = PersistedStateSchema.parse(raw);
  return {
    fpsChannelId: parsed.fps_channel,
    bansChannelId: parsed.bans_channel,
    ownerId: parsed.owner_id,
    adminRoleId: parsed.admin_role,
    serviceName: parsed.service_name,
    lastMessageId: parsed.last_message_id,
    postedBanIds: dedupeIds(parsed.posted_bans),
    battlemetricsToken: parsed.battlemetrics_token,
    battlemetricsServerId: parsed.battlemetrics_server_id,
  };
}

export function encodeBotState(state: Readonly<BotState>): PersistedState {
  return {
    fps_channel: state.fpsChannelId,
    bans_channel: state.bansChannelId,
    owner_id: state.ownerId,
    admin_role: state.adminRoleId,
    service_name: state.serviceName,
    last_message_id: state.lastMessageId,
    posted_bans: [...state.postedBanIds],
    battlemetrics_token: state.battlemetricsToken,
    battlemetrics_server_id: state.battlemetricsServerId,
  };
}

function dedupeIds(ids: string[]): string[] {
  return [...new Set(ids)];
}
