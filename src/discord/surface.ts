import { Routes } from "discord-api-types/v10";
import { z } from "zod";

import type { ChatSurface, EditOutcome } from "../notify/dispatcher.js";

/** The slice of carbon's `RequestClient` the chat surface needs. */
export interface DiscordRest {
  post(path: string, data: { body: unknown }): Promise<unknown>;
  patch(path: string, data: { body: unknown }): Promise<unknown>;
}

const MessageResponseSchema = z.object({ id: z.string() });

// Unknown Message / Unknown Channel
const MISSING_RESOURCE_CODES = new Set([10003, 10008]);

export function isMissingResourceError(err: unknown): boolean {
  if (typeof err !== "object" || err === null) {
    return false;
  }
  if ("status" in err && err.status === 404) {
    return true;
  }
  if ("code" in err && typeof err.code === "number") {
    return MISSING_RESOURCE_CODES.has(err.code);
  }
  return false;
}

function readMessageId(response: unknown): string {
  const parsed = MessageResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new Error("Discord returned a message without an id");
  }
  return parsed.data.id;
}

export function createDiscordChatSurface(rest: DiscordRest): ChatSurface {
  return {
    async sendMessage(channelId, content) {
      const response = await rest.post(Routes.channelMessages(channelId), { body: { content } });
      return readMessageId(response);
    },
    async editMessage(channelId, messageId, content): Promise<EditOutcome> {
      try {
        await rest.patch(Routes.channelMessage(channelId, messageId), { body: { content } });
        return "edited";
      } catch (err) {
        if (isMissingResourceError(err)) {
          return "missing";
        }
        throw err;
      }
    },
  };
}
