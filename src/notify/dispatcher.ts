import { ChannelUnsetError, DispatchError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging.js";
import type { BanRecord } from "../sources/battlemetrics.js";
import type { PerformanceSample } from "../sources/performance.js";
import { formatBanMessage, formatPerformanceMessage } from "./format.js";

export type EditOutcome = "edited" | "missing";

/** Write side of the chat platform. Implementations throw on transport failure. */
export interface ChatSurface {
  sendMessage(channelId: string, content: string): Promise<string>;
  /** Resolves `"missing"` when the message (or channel) no longer exists. */
  editMessage(channelId: string, messageId: string, content: string): Promise<EditOutcome>;
}

export interface NotificationDispatcher {
  postBan(record: BanRecord, channelId: string | null): Promise<string>;
  postOrEditStatus(
    sample: PerformanceSample,
    channelId: string | null,
    previousMessageId: string | null,
  ): Promise<string>;
}

export function createNotificationDispatcher(deps: {
  surface: ChatSurface;
  log: Logger;
}): NotificationDispatcher {
  const { surface, log } = deps;

  return {
    async postBan(record, channelId) {
      if (!channelId) {
        throw new ChannelUnsetError("bans");
      }
      try {
        return await surface.sendMessage(channelId, formatBanMessage(record));
      } catch (err) {
        throw new DispatchError(`Failed to post ban ${record.id}: ${formatErrorMessage(err)}`, {
          cause: err,
        });
      }
    },

    async postOrEditStatus(sample, channelId, previousMessageId) {
      if (!channelId) {
        throw new ChannelUnsetError("fps");
      }
      const content = formatPerformanceMessage(sample);
      try {
        if (previousMessageId) {
          const outcome = await surface.editMessage(channelId, previousMessageId, content);
          if (outcome === "edited") {
            return previousMessageId;
          }
          log.warn({ channelId, messageId: previousMessageId }, "notify: status message gone, reposting");
        }
        return await surface.sendMessage(channelId, content);
      } catch (err) {
        throw new DispatchError(`Failed to update status message: ${formatErrorMessage(err)}`, {
          cause: err,
        });
      }
    },
  };
}
