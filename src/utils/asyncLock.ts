interface Slot {
  tail: Promise<void>;
  holders: number;
}

/**
 * One FIFO lock per key (a manager id). Work for the same key runs in
 * arrival order; different keys never wait on each other. A key's slot is
 * dropped once nothing holds or waits on it, so idle managers cost nothing.
 */
export class KeyedLock {
  private slots = new Map<string, Slot>();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const slot = this.slots.get(key) ?? { tail: Promise.resolve(), holders: 0 };
    this.slots.set(key, slot);
    slot.holders += 1;

    const previous = slot.tail;
    let release: () => void = () => undefined;
    slot.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
      slot.holders -= 1;
      if (slot.holders === 0 && this.slots.get(key) === slot) this.slots.delete(key);
    }
  }

  isHeld(key: string): boolean {
    return this.slots.has(key);
  }

  /** Keys with a held or queued lock. */
  get size(): number {
    return this.slots.size;
  }
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    if (ms <= 0) return resolve();
    setTimeout(resolve, ms);
  });
