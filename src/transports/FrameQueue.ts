/**
 * Single-consumer async queue of received frames.
 *
 * Producers (socket callbacks, the pipe peer) push frames; the connection's
 * read-loop pulls them with `for await`.
 */

interface Waiter {
  resolve: (result: IteratorResult<Uint8Array>) => void;
  reject: (err: Error) => void;
}

export class FrameQueue implements AsyncIterable<Uint8Array> {
  private _items: Uint8Array[] = [];
  private _waiter: Waiter | null = null;
  private _closed = false;
  private _error: Error | null = null;

  get closed(): boolean {
    return this._closed;
  }

  get length(): number {
    return this._items.length;
  }

  /**
   * Queue a frame. Returns false once the queue is closed.
   */
  push(frame: Uint8Array): boolean {
    if (this._closed) return false;

    const waiter = this._waiter;
    if (waiter) {
      this._waiter = null;
      waiter.resolve({ value: frame, done: false });
      return true;
    }

    this._items.push(frame);
    return true;
  }

  /**
   * End the queue. Frames already queued are still delivered, then iteration
   * ends (or throws `err`).
   */
  close(err?: Error): void {
    if (this._closed) return;
    this._closed = true;
    this._error = err ?? null;

    const waiter = this._waiter;
    if (waiter) {
      this._waiter = null;
      if (this._error) waiter.reject(this._error);
      else waiter.resolve({ value: undefined, done: true });
    }
  }

  /**
   * Drop queued frames that have not been consumed yet.
   */
  clear(): void {
    this._items.length = 0;
  }

  next(): Promise<IteratorResult<Uint8Array>> {
    const item = this._items.shift();
    if (item) return Promise.resolve({ value: item, done: false });

    if (this._closed) {
      return this._error ? Promise.reject(this._error) : Promise.resolve({ value: undefined, done: true });
    }

    if (this._waiter) {
      return Promise.reject(new Error('FrameQueue supports a single consumer'));
    }

    return new Promise((resolve, reject) => {
      this._waiter = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    return { next: () => this.next() };
  }
}
