export type RelayErrorCode =
  | "source_unavailable"
  | "source_timeout"
  | "parse_error"
  | "auth_error"
  | "rate_limited"
  | "network_error"
  | "dispatch_error"
  | "channel_unset"
  | "persistence_error"
  | "not_authorized"
  | "admin_role_unset"
  | "owner_already_set"
  | "restart_in_progress"
  | "invalid_argument"
  | "process_control_error";

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Source adapters: skip-this-tick failures.
export class SourceUnavailableError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("source_unavailable", message, options);
  }
}

export class SourceTimeoutError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("source_timeout", message, options);
  }
}

export class ParseError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("parse_error", message, options);
  }
}

export class AuthError extends RelayError {
  readonly status: number;

  constructor(status: number, message: string) {
    super("auth_error", message);
    this.status = status;
  }
}

export class RateLimitedError extends RelayError {
  /** Server-provided wait, when the response carried a Retry-After header. */
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super("rate_limited", message);
    this.retryAfterMs = retryAfterMs;
  }
}

export class NetworkError extends RelayError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("network_error", message, options);
    this.status = options?.status;
  }
}

export class DispatchError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("dispatch_error", message, options);
  }
}

export class ChannelUnsetError extends RelayError {
  constructor(kind: "fps" | "bans") {
    super("channel_unset", `${kind} channel is not configured`);
  }
}

export class PersistenceError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("persistence_error", message, options);
  }
}

// Command rejections: always surfaced to the caller.
export class NotAuthorizedError extends RelayError {
  constructor(message = "You are not authorized to use this command.") {
    super("not_authorized", message);
  }
}

export class AdminRoleUnsetError extends RelayError {
  constructor() {
    super(
      "admin_role_unset",
      "The admin role has not been set. Ask the owner to run `/set-admin-role` first.",
    );
  }
}

export class OwnerAlreadySetError extends RelayError {
  constructor() {
    super("owner_already_set", "Owner has already been set!");
  }
}

export class RestartInProgressError extends RelayError {
  constructor(serviceName: string) {
    super("restart_in_progress", `A restart of \`${serviceName}\` is already in progress.`);
  }
}

export class InvalidArgumentError extends RelayError {
  constructor(message: string) {
    super("invalid_argument", message);
  }
}

export class ProcessControlError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("process_control_error", message, options);
  }
}

export function isRelayError(err: unknown): err is RelayError {
  return err instanceof RelayError;
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name;
  }
  return String(err);
}
