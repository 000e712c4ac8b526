import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import { PersistenceError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging.js";
import { type LockState, locked } from "./locked.js";
import { decodeBotState, encodeBotState } from "./schema.js";
import { type BotState, type StateMutation, type StateStore, createDefaultBotState } from "./types.js";

export type LoadedStateFile = {
  state: BotState;
  existed: boolean;
};

export async function loadStateFile(statePath: string): Promise<LoadedStateFile> {
  let raw: string;
  try {
    raw = await fs.readFile(statePath, "utf-8");
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") {
      return { state: createDefaultBotState(), existed: false };
    }
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Failed to parse bot state at ${statePath}: ${formatErrorMessage(err)}`, {
      cause: err,
    });
  }
  try {
    return { state: decodeBotState(parsed), existed: true };
  } catch (err) {
    throw new Error(`Failed to parse bot state at ${statePath}: ${formatErrorMessage(err)}`, {
      cause: err,
    });
  }
}

export async function saveStateFile(statePath: string, state: Readonly<BotState>): Promise<void> {
  await fs.mkdir(path.dirname(statePath), { recursive: true });
  const tmp = `${statePath}.${process.pid}.${randomBytes(8).toString("hex")}.tmp`;
  const json = JSON.stringify(encodeBotState(state), null, 2);
  try {
    await fs.writeFile(tmp, `${json}\n`, "utf-8");
    await fs.rename(tmp, statePath);
  } catch (err) {
    await fs.rm(tmp, { force: true }).catch(() => undefined);
    throw err;
  }
}

export type StateStoreDeps = {
  statePath: string;
  log: Logger;
  /** Overridable for tests that need a failing disk. */
  write?: (statePath: string, state: Readonly<BotState>) => Promise<void>;
};

type StateStoreInternal = LockState & {
  committed: Readonly<BotState>;
};

export function createStateStore(
  deps: StateStoreDeps,
  initial: Readonly<BotState>,
): StateStore {
  const write = deps.write ?? saveStateFile;
  const internal: StateStoreInternal = {
    op: Promise.resolve(),
    committed: Object.freeze({ ...initial }),
  };

  return {
    get: () => internal.committed,
    mutate: (fn: StateMutation) =>
      locked(internal, async () => {
        const current = internal.committed;
        const next = fn(current);
        if (next === current) {
          return current;
        }
        const frozen = Object.freeze({ ...next, postedBanIds: Object.freeze([...next.postedBanIds]) });
        try {
          await write(deps.statePath, frozen);
        } catch (err) {
          deps.log.error(
            { err: formatErrorMessage(err), statePath: deps.statePath },
            "state: persist failed, mutation discarded",
          );
          throw new PersistenceError(`Failed to save bot state: ${formatErrorMessage(err)}`, {
            cause: err,
          });
        }
        internal.committed = frozen;
        return frozen;
      }),
  };
}

/** Loads the state file, writing defaults immediately when it does not exist yet. */
export async function loadStateStore(deps: StateStoreDeps): Promise<StateStore> {
  const loaded = await loadStateFile(deps.statePath);
  if (!loaded.existed) {
    const write = deps.write ?? saveStateFile;
    try {
      await write(deps.statePath, loaded.state);
    } catch (err) {
      throw new PersistenceError(`Failed to create bot state: ${formatErrorMessage(err)}`, {
        cause: err,
      });
    }
    deps.log.info({ statePath: deps.statePath }, "state: created default state file");
  } else {
    deps.log.info(
      {
        statePath: deps.statePath,
        postedBans: loaded.state.postedBanIds.length,
        ownerSet: loaded.state.ownerId !== null,
      },
      "state: loaded",
    );
  }
  return createStateStore(deps, loaded.state);
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
