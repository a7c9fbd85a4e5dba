/**
 * Slot that admits one task at a time. A task offered while another is in flight is
 * dropped rather than queued.
 */
export class SingleFlight {
  private inflight: Promise<unknown> | null = null;

  get busy(): boolean {
    return this.inflight !== null;
  }

  /** Resolves to `{ ran: false }` without invoking `task` when the slot is taken. */
  run<T>(task: () => Promise<T>): Promise<{ ran: true; value: T } | { ran: false }> {
    if (this.inflight) return Promise.resolve({ ran: false });
    const pending = task().finally(() => {
      this.inflight = null;
    });
    this.inflight = pending;
    return pending.then((value) => ({ ran: true, value }));
  }
}

/** Runs tasks sharing a key strictly in arrival order; different keys run concurrently. */
export class KeyedSerializer {
  private readonly tails = new Map<string, Promise<unknown>>();

  get pendingKeys(): number {
    return this.tails.size;
  }

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task, task);
    const tail = next.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return next;
  }
}
