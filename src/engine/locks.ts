// In-process advisory locks keyed by record. Callers on the same key run one at a time,
// in arrival order. Cross-process exclusion relies on the store's conditional updates.
const locks = new Map<string, Promise<void>>();

export async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const prev = locks.get(key) ?? Promise.resolve();
  let release: () => void = () => undefined;
  const held = new Promise<void>(resolve => { release = resolve; });
  const tail = prev.then(() => held);
  locks.set(key, tail);
  await prev;
  try {
    return await fn();
  } finally {
    release();
    if (locks.get(key) === tail) locks.delete(key);
  }
}

export function lockKey(collection: string, id: string) {
  return `${collection}:${id}`;
}

export function heldLocks() {
  return locks.size;
}
