interface Taker<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (reason: unknown) => void;
}

/**
 * Unbounded single-consumer queue between dispatch workers and whoever reads
 * the run. `close(error)` lets buffered values drain before the error surfaces.
 */
export class ResultChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly takers: Array<Taker<T>> = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) throw new Error('Cannot push to a closed channel');
    const taker = this.takers.shift();
    if (taker) taker.resolve({ value, done: false });
    else this.buffer.push(value);
  }

  close(error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    if (error !== undefined) this.failure = { error };

    for (const taker of this.takers.splice(0)) {
      if (this.failure) taker.reject(this.failure.error);
      else taker.resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      if (this.failure) return Promise.reject(this.failure.error);
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => this.takers.push({ resolve, reject }));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
