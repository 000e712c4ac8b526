import { RouteBases, Routes } from "discord-api-types/v10";
import { z } from "zod";

import { NetworkError, formatErrorMessage } from "../errors.js";

const ApplicationSchema = z.object({ id: z.string() });

/** Looks up the bot's application id from its token. */
export async function fetchDiscordApplicationId(
  token: string,
  timeoutMs: number,
  fetchImpl: typeof fetch = fetch,
): Promise<string> {
  let res: Response;
  try {
    res = await fetchImpl(`${RouteBases.api}${Routes.currentApplication()}`, {
      headers: { Authorization: `Bot ${token}` },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new NetworkError(`Failed to reach Discord: ${formatErrorMessage(err)}`, { cause: err });
  }
  if (!res.ok) {
    throw new NetworkError(`Discord rejected the application lookup (HTTP ${res.status})`, {
      status: res.status,
    });
  }
  const parsed = ApplicationSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new NetworkError("Discord returned an application without an id");
  }
  return parsed.data.id;
}
