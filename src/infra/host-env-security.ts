const PORTABLE_ENV_VAR_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Loader and shell-init variables that would let the parent environment
// inject code into tmux or sudo/systemctl.
const BLOCKED_KEYS = [
  "BASH_ENV",
  "ENV",
  "SHELLOPTS",
  "PS4",
  "IFS",
  "NODE_OPTIONS",
  "PERL5OPT",
  "PYTHONSTARTUP",
  "SUDO_ASKPASS",
] as const;

const BLOCKED_PREFIXES = ["LD_", "DYLD_", "BASH_FUNC_"] as const;

// Credentials handed to this process that child processes never need.
const SECRET_KEYS = ["DISCORD_TOKEN", "BATTLEMETRICS_TOKEN"] as const;

export const HOST_DANGEROUS_ENV_KEYS = new Set<string>([...BLOCKED_KEYS, ...SECRET_KEYS]);
export const HOST_DANGEROUS_ENV_PREFIXES: readonly string[] = BLOCKED_PREFIXES;

export function normalizeEnvVarKey(
  rawKey: string,
  options?: { portable?: boolean },
): string | null {
  const key = rawKey.trim();
  if (!key) {
    return null;
  }
  if (options?.portable && !PORTABLE_ENV_VAR_KEY.test(key)) {
    return null;
  }
  return key;
}

export function isDangerousHostEnvVarName(rawKey: string): boolean {
  const key = normalizeEnvVarKey(rawKey);
  if (!key) {
    return false;
  }
  const upper = key.toUpperCase();
  if (HOST_DANGEROUS_ENV_KEYS.has(upper)) {
    return true;
  }
  return HOST_DANGEROUS_ENV_PREFIXES.some((prefix) => upper.startsWith(prefix));
}

/** Environment for tmux and systemctl: the inherited env minus blocked keys. */
export function sanitizeHostExecEnv(
  baseEnv: Record<string, string | undefined> = process.env,
): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const [rawKey, value] of Object.entries(baseEnv)) {
    if (typeof value !== "string") {
      continue;
    }
    const key = normalizeEnvVarKey(rawKey, { portable: true });
    if (!key || isDangerousHostEnvVarName(key)) {
      continue;
    }
    merged[key] = value;
  }
  return merged;
}
