import { execFile } from "node:child_process";

import { sanitizeHostExecEnv } from "./host-env-security.js";

export type ExecFileResult =
  | { kind: "exit"; code: number; stdout: string; stderr: string }
  | { kind: "timeout" }
  /** The child wrote more than the capture limit and was killed. */
  | { kind: "output-limit"; limitBytes: number }
  | { kind: "spawn-error"; message: string };

export type ExecFileRunner = (
  command: string,
  args: readonly string[],
  opts: { timeoutMs: number },
) => Promise<ExecFileResult>;

const MAX_BUFFER_BYTES = 8 * 1024 * 1024;

type ExecFailure = {
  message: string;
  code?: string | number | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
};

export function classifyExecFailure(
  err: ExecFailure,
  stdout: string,
  stderr: string,
  limitBytes: number = MAX_BUFFER_BYTES,
): ExecFileResult {
  // Checked first: the overflowing child is also killed with the kill signal.
  if (err.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
    return { kind: "output-limit", limitBytes };
  }
  if (err.killed && err.signal === "SIGKILL") {
    return { kind: "timeout" };
  }
  if (typeof err.code === "number") {
    return { kind: "exit", code: err.code, stdout, stderr };
  }
  return { kind: "spawn-error", message: err.message };
}

/**
 * Runs a binary without a shell. Never rejects: spawn failures, timeouts and
 * non-zero exits are all reported through the result.
 */
export const runExecFile: ExecFileRunner = (command, args, opts) =>
  new Promise((resolve) => {
    execFile(
      command,
      [...args],
      {
        timeout: opts.timeoutMs,
        killSignal: "SIGKILL",
        maxBuffer: MAX_BUFFER_BYTES,
        encoding: "utf8",
        env: sanitizeHostExecEnv(),
        windowsHide: true,
      },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ kind: "exit", code: 0, stdout, stderr });
          return;
        }
        resolve(classifyExecFailure(err, stdout, stderr));
      },
    );
  });
