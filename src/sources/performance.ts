import { ParseError } from "../errors.js";

export type PerformanceSample = {
  fps: number;
  frameTimeAvgMs: number;
  frameTimeMinMs: number;
  frameTimeMaxMs: number;
  /** Resident memory as reported by the server, in kB. */
  memoryKb: number;
  players: number;
  ai: number;
  vehicles: number;
  totalClients: number;
  packetLossClients: number;
  sampledAtMs: number;
};

const FPS_RE = /FPS: ([\d.]+)/;
const FRAME_TIME_RE = /frame time \(avg: ([\d.]+) ms, min: ([\d.]+) ms, max: ([\d.]+) ms\)/;
const MEM_RE = /Mem: (\d+)/;
const AI_RE = /AI: (\d+)/;
const VEHICLES_RE = /Veh: (\d+)\s*\(/;
const CLIENT_TAG_RE = /\[C\d+\]/g;
const PACKET_LOSS_RE = /PktLoss: ([1-9]\d*)\/100/g;
const PLAYERS_RE = /Players connected: (\d+)/;

function toFloat(raw: string | undefined): number {
  const value = raw === undefined ? Number.NaN : Number.parseFloat(raw);
  return Number.isFinite(value) ? value : 0;
}

function toInt(raw: string | undefined): number {
  const value = raw === undefined ? Number.NaN : Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : 0;
}

export type FpsLineStats = Omit<PerformanceSample, "players" | "sampledAtMs">;

export function parseFpsLine(line: string): FpsLineStats | null {
  const fps = FPS_RE.exec(line);
  if (!fps) {
    return null;
  }
  const fpsValue = Number.parseFloat(fps[1] ?? "");
  if (!Number.isFinite(fpsValue)) {
    return null;
  }
  const frameTime = FRAME_TIME_RE.exec(line);
  return {
    fps: fpsValue,
    frameTimeAvgMs: toFloat(frameTime?.[1]),
    frameTimeMinMs: toFloat(frameTime?.[2]),
    frameTimeMaxMs: toFloat(frameTime?.[3]),
    memoryKb: toInt(MEM_RE.exec(line)?.[1]),
    ai: toInt(AI_RE.exec(line)?.[1]),
    vehicles: toInt(VEHICLES_RE.exec(line)?.[1]),
    totalClients: line.match(CLIENT_TAG_RE)?.length ?? 0,
    packetLossClients: line.match(PACKET_LOSS_RE)?.length ?? 0,
  };
}

export function parsePlayerCount(lines: readonly string[]): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i] ?? "";
    if (!line.includes("NETWORK") || !line.includes("Players connected:")) {
      continue;
    }
    return toInt(PLAYERS_RE.exec(line)?.[1]);
  }
  return 0;
}

/**
 * Builds a sample from a captured pane: the newest `DEFAULT ... FPS:` line
 * plus the newest `NETWORK ... Players connected:` line.
 */
export function parsePerformanceOutput(output: string, nowMs: number): PerformanceSample {
  const lines = output.split(/\r?\n/).map((line) => line.trim());
  let fpsLine: string | undefined;
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i] ?? "";
    if (line.startsWith("DEFAULT") && line.includes("FPS:")) {
      fpsLine = line;
      break;
    }
  }
  if (!fpsLine) {
    throw new ParseError("No FPS lines found in server output");
  }
  const stats = parseFpsLine(fpsLine);
  if (!stats) {
    throw new ParseError("Failed to parse FPS line");
  }
  return {
    ...stats,
    players: parsePlayerCount(lines),
    sampledAtMs: nowMs,
  };
}
