import type { ChatSurface, EditOutcome } from "../notify/dispatcher.js";
import type { BanRecord } from "../sources/battlemetrics.js";
import type { PerformanceSample } from "../sources/performance.js";
import type { BotState, StateStore } from "../state/types.js";
import { createDefaultBotState } from "../state/types.js";

export type SentMessage = { channelId: string; messageId: string; content: string };

/** In-memory chat surface recording every send and edit. */
export function createFakeSurface() {
  let nextId = 1;
  const messages = new Map<string, SentMessage>();
  const sent: SentMessage[] = [];
  const edits: SentMessage[] = [];
  let failNextSends = 0;

  const surface: ChatSurface = {
    async sendMessage(channelId, content) {
      if (failNextSends > 0) {
        failNextSends -= 1;
        throw new Error("discord unavailable");
      }
      const messageId = `m-${nextId++}`;
      const message = { channelId, messageId, content };
      messages.set(messageId, message);
      sent.push(message);
      return messageId;
    },
    async editMessage(channelId, messageId, content): Promise<EditOutcome> {
      const existing = messages.get(messageId);
      if (!existing || existing.channelId !== channelId) {
        return "missing";
      }
      const updated = { channelId, messageId, content };
      messages.set(messageId, updated);
      edits.push(updated);
      return "edited";
    },
  };

  return {
    surface,
    sent,
    edits,
    failSends(count: number) {
      failNextSends = count;
    },
    deleteMessage(messageId: string) {
      messages.delete(messageId);
    },
  };
}

/** State store without a disk; `writes` counts persisted mutations. */
export function createMemoryStateStore(initial: Partial<BotState> = {}) {
  let committed: Readonly<BotState> = Object.freeze({ ...createDefaultBotState(), ...initial });
  let chain: Promise<unknown> = Promise.resolve();
  const tracker = { writes: 0 };

  const store: StateStore = {
    get: () => committed,
    mutate(fn) {
      const run = chain.then(async () => {
        const next = fn(committed);
        if (next === committed) {
          return committed;
        }
        await Promise.resolve();
        committed = Object.freeze({ ...next });
        tracker.writes += 1;
        return committed;
      });
      chain = run.catch(() => undefined);
      return run;
    },
  };
  return { store, tracker };
}

export function makeSample(overrides: Partial<PerformanceSample> = {}): PerformanceSample {
  return {
    fps: 50,
    frameTimeAvgMs: 20,
    frameTimeMinMs: 15,
    frameTimeMaxMs: 40,
    memoryKb: 4_194_304,
    players: 12,
    ai: 80,
    vehicles: 9,
    totalClients: 12,
    packetLossClients: 1,
    sampledAtMs: 0,
    ...overrides,
  };
}

export function makeBan(id: string, overrides: Partial<BanRecord> = {}): BanRecord {
  return {
    id,
    reason: `reason ${id}`,
    playerName: `player-${id}`,
    timestamp: null,
    expiresAt: null,
    ...overrides,
  };
}
