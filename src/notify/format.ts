import type { BanRecord } from "../sources/battlemetrics.js";
import type { PerformanceSample } from "../sources/performance.js";

const numberFormat = new Intl.NumberFormat("en-US");

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYY-MM-DD HH:mm UTC`, or `Permanent` for bans without an expiry. */
export function formatBanExpiry(expiresAt: string | null): string {
  if (!expiresAt) {
    return "Permanent";
  }
  const date = new Date(expiresAt);
  if (Number.isNaN(date.getTime())) {
    return expiresAt;
  }
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())} ${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())} UTC`;
}

export function formatPerformanceMessage(sample: PerformanceSample): string {
  return [
    "🖥️ **Server Performance Report**",
    `FPS: **${sample.fps.toFixed(1)}** (Frame Time: avg ${sample.frameTimeAvgMs.toFixed(1)}ms, max ${sample.frameTimeMaxMs.toFixed(1)}ms)`,
    `Memory: **${numberFormat.format(Math.floor(sample.memoryKb / 1024))} MB**`,
    "",
    "👥 **Server Population**",
    `Players: **${sample.players}**`,
    `AI Units: **${sample.ai}**`,
    `Vehicles: **${sample.vehicles}**`,
    "",
    "🌐 **Network Status**",
    `Connected Clients: **${sample.totalClients}**`,
    `Clients with Packet Loss: **${sample.packetLossClients}**`,
  ].join("\n");
}

export function formatBanMessage(record: BanRecord): string {
  return [
    "🚫 **New Ban**",
    `**Player**: ${record.playerName}`,
    `**Reason**: ${record.reason}`,
    `**Expires**: ${formatBanExpiry(record.expiresAt)}`,
  ].join("\n");
}

export function formatPresence(players: number, maxPlayers: number): string {
  return `${players}/${maxPlayers} Playing`;
}
