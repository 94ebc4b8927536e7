interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

/**
 * Unbounded FIFO between a push-style event source and a pull-style
 * consumer. Items pushed before anyone reads are kept; a failure is
 * delivered only after every item queued ahead of it.
 */
export class FrameQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private ended = false;
  private failure: { error: unknown } | null = null;

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    if (this.ended) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value: item });
      return;
    }
    this.items.push(item);
  }

  /** No more items will arrive; pending and future reads finish */
  end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ done: true, value: undefined });
    }
  }

  /** Like end(), but the next read after the queued items rejects */
  fail(error: unknown): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.failure = { error };
    const waiters = this.waiters.splice(0);
    const first = waiters.shift();
    if (first) {
      this.failure = null;
      first.reject(error);
    }
    for (const waiter of waiters) {
      waiter.resolve({ done: true, value: undefined });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const value = this.items.shift();
      if (value !== undefined) {
        return Promise.resolve({ done: false, value });
      }
    }
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }
    if (this.ended) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}
