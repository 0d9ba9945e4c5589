// pattern: Imperative Shell

type Handle = {
  tail: Promise<void>;
  waiters: number;
};

/**
 * Per-key mutual exclusion. Callers on the same key run one at a time in
 * arrival order; a key's handle is dropped as soon as nobody holds or waits
 * on it.
 */
export class KeyedLock {
  private readonly handles = new Map<string, Handle>();

  get size(): number {
    return this.handles.size;
  }

  isHeld(key: string): boolean {
    return this.handles.has(key);
  }

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let handle = this.handles.get(key);
    if (!handle) {
      handle = { tail: Promise.resolve(), waiters: 0 };
      this.handles.set(key, handle);
    }

    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = handle.tail;
    handle.tail = previous.then(() => turn);
    handle.waiters++;

    try {
      await previous;
      return await fn();
    } finally {
      release();
      handle.waiters--;
      if (handle.waiters === 0 && this.handles.get(key) === handle) {
        this.handles.delete(key);
      }
    }
  }
}
