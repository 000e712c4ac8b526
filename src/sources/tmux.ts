import { ParseError, SourceTimeoutError, SourceUnavailableError } from "../errors.js";
import { type ExecFileResult, type ExecFileRunner, runExecFile } from "../infra/exec.js";
import { type PerformanceSample, parsePerformanceOutput } from "./performance.js";

export type PerformanceReader = () => Promise<PerformanceSample>;

export type TmuxReaderOptions = {
  session: string;
  timeoutMs: number;
  /** Scrollback lines to capture. */
  historyLines?: number;
  exec?: ExecFileRunner;
  nowMs?: () => number;
};

const SESSION_MISSING_PATTERNS = [
  /can't find (session|pane|window)/i,
  /no server running/i,
  /session not found/i,
  /error connecting to/i,
];

export function buildCapturePaneArgs(session: string, historyLines: number): string[] {
  return ["capture-pane", "-p", "-S", `-${historyLines}`, "-E", "-1", "-t", session];
}

export function createTmuxPerformanceReader(opts: TmuxReaderOptions): PerformanceReader {
  const exec = opts.exec ?? runExecFile;
  const nowMs = opts.nowMs ?? Date.now;
  const args = buildCapturePaneArgs(opts.session, opts.historyLines ?? 1000);

  return async () => {
    const result = await exec("tmux", args, { timeoutMs: opts.timeoutMs });
    const output = expectCapture(result, opts);
    if (!output.trim()) {
      throw new ParseError(`tmux session ${opts.session} produced no output`);
    }
    return parsePerformanceOutput(output, nowMs());
  };
}

function expectCapture(result: ExecFileResult, opts: TmuxReaderOptions): string {
  if (result.kind === "spawn-error") {
    throw new SourceUnavailableError(`tmux is not available: ${result.message}`);
  }
  if (result.kind === "timeout") {
    throw new SourceTimeoutError(
      `tmux capture-pane did not respond within ${opts.timeoutMs}ms`,
    );
  }
  if (result.kind === "output-limit") {
    throw new SourceUnavailableError(
      `tmux capture-pane output exceeded ${result.limitBytes} bytes; lower the history length`,
    );
  }
  if (result.code !== 0) {
    const stderr = result.stderr.trim();
    if (SESSION_MISSING_PATTERNS.some((pattern) => pattern.test(stderr))) {
      throw new SourceUnavailableError(`tmux session ${opts.session} is not running: ${stderr}`);
    }
    throw new SourceUnavailableError(
      `Failed to read tmux session ${opts.session} (exit ${result.code}): ${stderr || "no stderr"}`,
    );
  }
  return result.stdout;
}
