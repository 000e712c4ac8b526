import { ProcessControlError } from "../errors.js";
import { type ExecFileRunner, runExecFile } from "../infra/exec.js";

export interface ProcessControl {
  restart(serviceName: string): Promise<void>;
}

export function buildRestartCommand(serviceName: string): { command: string; args: string[] } {
  return { command: "sudo", args: ["-n", "systemctl", "restart", serviceName] };
}

/** Restarts a systemd unit through passwordless sudo. */
export function createSystemctlProcessControl(opts: {
  timeoutMs: number;
  exec?: ExecFileRunner;
}): ProcessControl {
  const exec = opts.exec ?? runExecFile;
  return {
    async restart(serviceName) {
      const { command, args } = buildRestartCommand(serviceName);
      const result = await exec(command, args, { timeoutMs: opts.timeoutMs });
      if (result.kind === "spawn-error") {
        throw new ProcessControlError(`Failed to run ${command}: ${result.message}`);
      }
      if (result.kind === "output-limit") {
        throw new ProcessControlError(
          `Restarting ${serviceName} produced more than ${result.limitBytes} bytes of output`,
        );
      }
      if (result.kind === "timeout") {
        throw new ProcessControlError(
          `Restarting ${serviceName} did not finish within ${opts.timeoutMs}ms`,
        );
      }
      if (result.code !== 0) {
        const detail = result.stderr.trim() || `exit code ${result.code}`;
        throw new ProcessControlError(`Failed to restart service: ${detail}`);
      }
    },
  };
}
