export type BotState = {
  /** Channel receiving the edited performance status message. */
  fpsChannelId: string | null;
  /** Channel receiving one message per newly seen ban. */
  bansChannelId: string | null;
  /** Settable once through `set-owner`. */
  ownerId: string | null;
  adminRoleId: string | null;
  /** systemd unit restarted by `/restart`. */
  serviceName: string;
  lastMessageId: string | null;
  /** Ban ids already announced, in announcement order. */
  postedBanIds: readonly string[];
  battlemetricsToken: string | null;
  battlemetricsServerId: string | null;
};

export const DEFAULT_SERVICE_NAME = "arma3server";

export function createDefaultBotState(): BotState {
  return {
    fpsChannelId: null,
    bansChannelId: null,
    ownerId: null,
    adminRoleId: null,
    serviceName: DEFAULT_SERVICE_NAME,
    lastMessageId: null,
    postedBanIds: [],
    battlemetricsToken: null,
    battlemetricsServerId: null,
  };
}

export type StateMutation = (current: Readonly<BotState>) => BotState;

export interface StateStore {
  /** Latest committed state. */
  get(): Readonly<BotState>;
  /**
   * Applies `fn` against the committed state and persists the result before
   * resolving. `fn` may throw to reject the mutation; nothing is written then.
   */
  mutate(fn: StateMutation): Promise<Readonly<BotState>>;
}
