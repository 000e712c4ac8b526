import {
  AuthError,
  ChannelUnsetError,
  RateLimitedError,
  formatErrorMessage,
  isRelayError,
} from "../errors.js";
import type { Logger } from "../logging.js";
import type { NotificationDispatcher } from "../notify/dispatcher.js";
import { formatPresence } from "../notify/format.js";
import type { BanReader, BanRecord } from "../sources/battlemetrics.js";
import type { PerformanceSample } from "../sources/performance.js";
import type { PerformanceReader } from "../sources/tmux.js";
import type { BotState, StateStore } from "../state/types.js";
import type { TickOutcome } from "./types.js";

/** Updates the bot's visible activity line. */
export interface PresenceSink {
  setActivity(text: string): Promise<void>;
}

export type ReconcileContext = {
  store: StateStore;
  dispatcher: NotificationDispatcher;
  readPerformance: PerformanceReader;
  readBans: BanReader;
  presence: PresenceSink;
  maxPlayers: number;
  log: Logger;
  nowMs?: () => number;
  /** In-memory only: the newest sample and the presence text last applied. */
  runtime: {
    latestSample: PerformanceSample | null;
    presenceText: string | null;
    presenceAppliedAtMs: number | null;
  };
};

/**
 * A gateway reconnect clears the bot's activity without telling us, so an
 * unchanged presence is still reapplied this often.
 */
export const PRESENCE_REFRESH_MS = 10 * 60_000;

export function createReconcileRuntime(): ReconcileContext["runtime"] {
  return { latestSample: null, presenceText: null, presenceAppliedAtMs: null };
}

export function hasPostedBan(state: Readonly<BotState>, banId: string): boolean {
  return state.postedBanIds.includes(banId);
}

export function battlemetricsCredentialKey(state: Readonly<BotState>): string | null {
  if (!state.battlemetricsToken || !state.battlemetricsServerId) {
    return null;
  }
  return `${state.battlemetricsToken}\u0000${state.battlemetricsServerId}`;
}

export async function runMetricsTick(ctx: ReconcileContext): Promise<TickOutcome> {
  let sample: PerformanceSample;
  try {
    sample = await ctx.readPerformance();
  } catch (err) {
    ctx.log.warn(
      { code: isRelayError(err) ? err.code : undefined, err: formatErrorMessage(err) },
      "metrics: no sample this tick",
    );
    return { status: "error", error: formatErrorMessage(err) };
  }
  ctx.runtime.latestSample = sample;

  const state = ctx.store.get();
  let messageId: string;
  try {
    messageId = await ctx.dispatcher.postOrEditStatus(sample, state.fpsChannelId, state.lastMessageId);
  } catch (err) {
    if (err instanceof ChannelUnsetError) {
      ctx.log.debug("metrics: no fps channel configured");
      return { status: "ok", summary: "fps channel not configured" };
    }
    ctx.log.error({ err: formatErrorMessage(err) }, "metrics: status dispatch failed");
    return { status: "error", error: formatErrorMessage(err) };
  }

  if (messageId !== state.lastMessageId) {
    try {
      await ctx.store.mutate((current) =>
        current.lastMessageId === messageId ? current : { ...current, lastMessageId: messageId },
      );
    } catch (err) {
      ctx.log.error({ err: formatErrorMessage(err) }, "metrics: failed to record status message");
      return { status: "error", error: formatErrorMessage(err) };
    }
  }
  return {
    status: "ok",
    summary: `fps=${sample.fps.toFixed(1)} players=${sample.players}`,
  };
}

export async function runBanSyncTick(ctx: ReconcileContext): Promise<TickOutcome> {
  const initial = ctx.store.get();
  const token = initial.battlemetricsToken;
  const serverId = initial.battlemetricsServerId;
  if (!token || !serverId) {
    return { status: "skipped", summary: "battlemetrics not configured" };
  }
  if (!initial.bansChannelId) {
    return { status: "skipped", summary: "bans channel not configured" };
  }

  let records: BanRecord[];
  try {
    records = await ctx.readBans(token, serverId);
  } catch (err) {
    if (err instanceof AuthError) {
      return { status: "error", error: err.message, authFailure: true };
    }
    if (err instanceof RateLimitedError) {
      return { status: "error", error: err.message, rateLimited: { retryAfterMs: err.retryAfterMs } };
    }
    ctx.log.warn(
      { code: isRelayError(err) ? err.code : undefined, err: formatErrorMessage(err) },
      "bans: fetch failed, retrying next tick",
    );
    return { status: "error", error: formatErrorMessage(err) };
  }

  const pending = records.filter((record) => !hasPostedBan(initial, record.id));
  let announced = 0;
  for (const record of pending) {
    // A concurrent tick or command may have committed since the fetch.
    const current = ctx.store.get();
    if (hasPostedBan(current, record.id)) {
      continue;
    }
    try {
      await ctx.dispatcher.postBan(record, current.bansChannelId);
    } catch (err) {
      if (err instanceof ChannelUnsetError) {
        return { status: "skipped", summary: "bans channel not configured" };
      }
      ctx.log.error(
        { banId: record.id, err: formatErrorMessage(err) },
        "bans: dispatch failed, remaining bans wait for the next tick",
      );
      return { status: "error", error: formatErrorMessage(err), summary: `${announced} announced` };
    }
    try {
      await ctx.store.mutate((latest) =>
        hasPostedBan(latest, record.id)
          ? latest
          : { ...latest, postedBanIds: [...latest.postedBanIds, record.id] },
      );
    } catch (err) {
      ctx.log.error(
        { banId: record.id, err: formatErrorMessage(err) },
        "bans: announced but not recorded, it may be announced again",
      );
      return { status: "error", error: formatErrorMessage(err), summary: `${announced} announced` };
    }
    announced += 1;
    ctx.log.info({ banId: record.id, player: record.playerName }, "bans: posted new ban");
  }
  return { status: "ok", summary: `${announced} announced` };
}

export async function runPresenceTick(ctx: ReconcileContext): Promise<TickOutcome> {
  const sample = ctx.runtime.latestSample;
  if (!sample) {
    return { status: "skipped", summary: "no sample yet" };
  }
  const text = formatPresence(sample.players, ctx.maxPlayers);
  const now = (ctx.nowMs ?? Date.now)();
  const appliedAt = ctx.runtime.presenceAppliedAtMs;
  const fresh = appliedAt !== null && now - appliedAt < PRESENCE_REFRESH_MS;
  if (text === ctx.runtime.presenceText && fresh) {
    return { status: "ok", summary: "unchanged" };
  }
  try {
    await ctx.presence.setActivity(text);
  } catch (err) {
    ctx.log.warn({ err: formatErrorMessage(err) }, "presence: update failed");
    return { status: "error", error: formatErrorMessage(err) };
  }
  ctx.runtime.presenceText = text;
  ctx.runtime.presenceAppliedAtMs = now;
  return { status: "ok", summary: text };
}
