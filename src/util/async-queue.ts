/**
 * Unbounded single-consumer queue exposed as an async iterator.
 * `end()` finishes the iteration once buffered items are consumed; `end(error)` makes the
 * pending (and every later) `next()` reject with that error.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: Array<IteratorYieldResult<T>> = [];
  private waiters: Array<{
    resolve: (result: IteratorResult<T>) => void;
    reject: (error: Error) => void;
  }> = [];
  private ended = false;
  private failure: Error | null = null;
  private iterated = false;

  get closed(): boolean {
    return this.ended;
  }

  push(item: T): void {
    if (this.ended) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push({ value: item, done: false });
    }
  }

  end(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = error ?? null;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (this.failure) {
        waiter.reject(this.failure);
      } else {
        waiter.resolve({ value: undefined, done: true });
      }
    }
  }

  private next(): Promise<IteratorResult<T>> {
    const buffered = this.items.shift();
    if (buffered) return Promise.resolve(buffered);
    if (this.ended) {
      return this.failure
        ? Promise.reject(this.failure)
        : Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterated) {
      throw new Error('AsyncQueue can only be iterated once');
    }
    this.iterated = true;
    return {
      next: () => this.next(),
      return: () => {
        this.end();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
