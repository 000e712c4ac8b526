import {
  AdminRoleUnsetError,
  NotAuthorizedError,
  OwnerAlreadySetError,
} from "../errors.js";
import type { BotState } from "../state/types.js";

export type CommandCaller = {
  userId: string;
  /** Guild roles of the caller; empty outside a guild. */
  roleIds: readonly string[];
};

export type AccessLevel = "bootstrap" | "owner" | "admin" | "general";

export function isOwner(state: Readonly<BotState>, caller: CommandCaller): boolean {
  return state.ownerId !== null && state.ownerId === caller.userId;
}

export function assertOwner(state: Readonly<BotState>, caller: CommandCaller): void {
  if (state.ownerId === null) {
    throw new NotAuthorizedError("The owner has not been set. Please run `/set-owner` first.");
  }
  if (!isOwner(state, caller)) {
    throw new NotAuthorizedError("Only the owner can use this command!");
  }
}

/** The owner always passes; everyone else needs the configured admin role. */
export function assertAdmin(state: Readonly<BotState>, caller: CommandCaller): void {
  if (isOwner(state, caller)) {
    return;
  }
  if (state.adminRoleId === null) {
    throw new AdminRoleUnsetError();
  }
  if (!caller.roleIds.includes(state.adminRoleId)) {
    throw new NotAuthorizedError("You need the admin role to use this command!");
  }
}

/**
 * Unset -> Set transition for the owner. Repeat attempts are rejected, never
 * silently ignored: the owner learns it is already set, anyone else is refused.
 */
export function claimOwner(
  state: Readonly<BotState>,
  caller: CommandCaller,
  userId: string,
): BotState {
  if (state.ownerId === null) {
    return { ...state, ownerId: userId };
  }
  if (isOwner(state, caller)) {
    throw new OwnerAlreadySetError();
  }
  throw new NotAuthorizedError("Owner has already been set!");
}

export function authorize(
  level: AccessLevel,
  state: Readonly<BotState>,
  caller: CommandCaller,
): void {
  switch (level) {
    case "owner":
      assertOwner(state, caller);
      return;
    case "admin":
      assertAdmin(state, caller);
      return;
    case "bootstrap":
    case "general":
      return;
  }
}
