export type LockState = {
  op: Promise<unknown>;
};

const resolveChain = (promise: Promise<unknown>) =>
  promise.then(
    () => undefined,
    () => undefined,
  );

/**
 * Runs `fn` after every operation previously queued on `state` has settled.
 * A rejected operation does not poison the chain.
 */
export async function locked<T>(state: LockState, fn: () => Promise<T>): Promise<T> {
  const next = resolveChain(state.op).then(fn);
  state.op = resolveChain(next);
  return await next;
}
