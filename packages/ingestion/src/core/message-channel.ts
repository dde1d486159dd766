interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
}

/**
 * Buffered single-consumer channel that turns push-style callbacks into an
 * async iterable. Closing the channel lets the consumer drain what is already
 * buffered and then ends iteration (or rejects, when closed with an error).
 * `onClose` runs once, whichever side closes the channel.
 */
export class AsyncMessageChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private failure: { error: unknown } | null = null;
  private closed = false;

  constructor(private readonly onClose?: () => void) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  close(error?: unknown) {
    if (this.closed) return;
    this.closed = true;
    if (error !== undefined) this.failure = { error };

    // Pending waiters only exist while the buffer is empty.
    for (const waiter of this.waiters.splice(0)) {
      this.settleClosed(waiter);
    }
    this.onClose?.();
  }

  private settleClosed(waiter: Waiter<T>) {
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      waiter.reject(error);
      return;
    }
    waiter.resolve({ value: undefined, done: true });
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    return new Promise((resolve, reject) => {
      const waiter = { resolve, reject };
      if (this.closed) {
        this.settleClosed(waiter);
      } else {
        this.waiters.push(waiter);
      }
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
