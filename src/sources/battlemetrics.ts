import { z } from "zod";

import { AuthError, NetworkError, ParseError, RateLimitedError, formatErrorMessage } from "../errors.js";

export type BanRecord = {
  id: string;
  reason: string;
  playerName: string;
  /** ISO timestamp of the ban, when the API reports one. */
  timestamp: string | null;
  /** ISO expiry; null means permanent. */
  expiresAt: string | null;
};

export type BanReader = (token: string, serverId: string) => Promise<BanRecord[]>;

export type BattleMetricsReaderOptions = {
  baseUrl: string;
  timeoutMs: number;
  pageSize?: number;
  fetchImpl?: typeof fetch;
};

const IdentifierSchema = z.union([
  z.number(),
  z.object({
    type: z.string().optional(),
    identifier: z.union([z.string(), z.number()]).nullable().optional(),
  }),
]);

const BanSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value)),
  attributes: z
    .object({
      reason: z.string().nullable().optional(),
      timestamp: z.string().nullable().optional(),
      expires: z.string().nullable().optional(),
      identifiers: z.array(IdentifierSchema).nullable().optional(),
    })
    .optional(),
});

const BanListSchema = z.object({
  data: z.array(BanSchema),
});

export const UNKNOWN_PLAYER = "Unknown";
export const NO_REASON = "No reason provided";

export function buildBansUrl(baseUrl: string, serverId: string, pageSize = 100): string {
  const url = new URL("/bans", baseUrl);
  url.searchParams.set("filter[server]", serverId);
  url.searchParams.set("filter[expired]", "false");
  url.searchParams.set("include", "user,server");
  url.searchParams.set("page[size]", String(pageSize));
  return url.toString();
}

export function parseRetryAfterMs(header: string | null, nowMs: number = Date.now()): number | undefined {
  const raw = header?.trim();
  if (!raw) {
    return undefined;
  }
  const seconds = Number(raw);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const at = Date.parse(raw);
  if (Number.isFinite(at)) {
    return Math.max(0, at - nowMs);
  }
  return undefined;
}

function resolvePlayerName(identifiers: z.infer<typeof IdentifierSchema>[] | null | undefined) {
  for (const entry of identifiers ?? []) {
    if (typeof entry === "number" || entry.type !== "name") {
      continue;
    }
    const name = entry.identifier == null ? "" : String(entry.identifier).trim();
    if (name) {
      return name;
    }
  }
  return UNKNOWN_PLAYER;
}

function timestampKey(record: BanRecord): number {
  const ms = record.timestamp ? Date.parse(record.timestamp) : Number.NaN;
  return Number.isFinite(ms) ? ms : Number.POSITIVE_INFINITY;
}

/** Oldest first; bans without a timestamp go last. Ties break on id. */
export function sortBanRecords(records: readonly BanRecord[]): BanRecord[] {
  return [...records].sort((a, b) => {
    const ta = timestampKey(a);
    const tb = timestampKey(b);
    if (ta !== tb) {
      return ta < tb ? -1 : 1;
    }
    if (a.id === b.id) {
      return 0;
    }
    return a.id < b.id ? -1 : 1;
  });
}

export function parseBanList(body: unknown): BanRecord[] {
  const parsed = BanListSchema.safeParse(body);
  if (!parsed.success) {
    throw new ParseError(`Unexpected BattleMetrics response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  const records = parsed.data.data.map((ban) => ({
    id: ban.id,
    reason: ban.attributes?.reason?.trim() || NO_REASON,
    playerName: resolvePlayerName(ban.attributes?.identifiers),
    timestamp: ban.attributes?.timestamp ?? null,
    expiresAt: ban.attributes?.expires ?? null,
  }));
  return sortBanRecords(records);
}

export function createBattleMetricsBanReader(opts: BattleMetricsReaderOptions): BanReader {
  const fetchImpl = opts.fetchImpl ?? fetch;

  return async (token, serverId) => {
    let res: Response;
    try {
      res = await fetchImpl(buildBansUrl(opts.baseUrl, serverId, opts.pageSize), {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(opts.timeoutMs),
      });
    } catch (err) {
      throw new NetworkError(`Error fetching bans: ${formatErrorMessage(err)}`, { cause: err });
    }

    if (res.status === 401 || res.status === 403) {
      throw new AuthError(res.status, `BattleMetrics rejected the API token (${res.status})`);
    }
    if (res.status === 429) {
      throw new RateLimitedError(
        "BattleMetrics rate limit reached",
        parseRetryAfterMs(res.headers.get("retry-after")),
      );
    }
    if (!res.ok) {
      throw new NetworkError(`Failed to fetch bans: ${res.status}`, { status: res.status });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        throw new NetworkError(`Timed out reading bans: ${err.message}`, { cause: err });
      }
      throw new ParseError(`BattleMetrics returned invalid JSON: ${formatErrorMessage(err)}`, {
        cause: err,
      });
    }
    return parseBanList(body);
  };
}
