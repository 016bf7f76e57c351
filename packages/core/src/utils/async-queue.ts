interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (reason: unknown) => void;
}

/**
 * Push/pull bridge between callback-style producers (socket events) and an
 * async consumer. Items queued before `end` or `fail` are still delivered;
 * `abort` discards them.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { reason: unknown } | undefined;

  push(item: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push(item);
    }
  }

  end(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  abort(): void {
    this.items.length = 0;
    this.end();
  }

  fail(reason: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = { reason };
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(reason);
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const value = this.items.shift();
      if (value !== undefined) return Promise.resolve({ value, done: false });
    }
    if (this.failure) return Promise.reject(this.failure.reason);
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}
