/**
 * Paged Stream
 *
 * Turns a chain of "fetch the page for token N" calls into one async
 * sequence of items. The first fetch starts as soon as the stream is
 * constructed; each later fetch starts as soon as the previous page has
 * arrived, so at most one request is ever outstanding and the stream runs
 * at most one page ahead of the consumer.
 *
 * The end of the data is signalled only by a page without a next token.
 * A page with no items but a token is a normal page and the stream keeps
 * going.
 *
 * @example
 * ```ts
 * const trades = new PagedStream((token, signal) => fetchTradesPage(token, signal));
 * for await (const trade of trades) {
 *   console.log(trade.price);
 * }
 * ```
 */

export interface PageSplit<T> {
  items: T[];
  /** Absent on the last page */
  nextToken?: string;
}

/**
 * A response body that can be split into its items and the cursor for the
 * following page. Implemented once per response shape.
 */
export interface Paged<T> {
  split(): PageSplit<T>;
}

export type PageFetcher<P> = (token: string | undefined, signal: AbortSignal) => Promise<P>;

export class PagedStream<T> implements AsyncIterableIterator<T> {
  private buffer: T[] = [];
  private cursor = 0;
  private pending: Promise<Paged<T>> | null;
  private readonly controller = new AbortController();
  private tail: Promise<unknown> = Promise.resolve();
  private closed = false;

  constructor(private readonly fetcher: PageFetcher<Paged<T>>) {
    this.pending = this.fetch(undefined);
  }

  /** Number of items already fetched but not yet consumed */
  get buffered(): number {
    return this.buffer.length - this.cursor;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    // Calls are chained so two concurrent next() never race on the buffer.
    const result = this.tail.then(() => this.advance());
    this.tail = result.catch(() => undefined);
    return result;
  }

  /**
   * Stop the stream and abort the in-flight request, if any
   */
  async return(): Promise<IteratorResult<T, undefined>> {
    this.closed = true;
    this.controller.abort();
    this.pending = null;
    this.buffer = [];
    this.cursor = 0;
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /**
   * Drain the remaining items into an array
   */
  async collect(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  private async advance(): Promise<IteratorResult<T, undefined>> {
    for (;;) {
      if (this.cursor < this.buffer.length) {
        const value = this.buffer[this.cursor];
        this.cursor += 1;
        return { done: false, value };
      }

      const pending = this.pending;
      if (pending === null) {
        return { done: true, value: undefined };
      }

      let split: PageSplit<T>;
      try {
        split = (await pending).split();
      } catch (error) {
        if (this.closed) {
          return { done: true, value: undefined };
        }
        // The instance is spent: no further requests after a failure.
        this.pending = null;
        throw error;
      }

      if (this.closed) {
        return { done: true, value: undefined };
      }

      this.buffer = split.items;
      this.cursor = 0;
      this.pending = split.nextToken === undefined ? null : this.fetch(split.nextToken);
    }
  }

  private fetch(token: string | undefined): Promise<Paged<T>> {
    const signal = this.controller.signal;
    const page = new Promise<Paged<T>>((resolve) => {
      resolve(this.fetcher(token, signal));
    });
    // Failures reach the caller through next(); this only marks the
    // promise as handled while nobody is waiting on it.
    void page.catch(() => undefined);
    return page;
  }
}
