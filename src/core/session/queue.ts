type Waiter<T> = {
  resolve: (v: T | undefined) => void;
  timer: NodeJS.Timeout;
};

/**
 * Unbounded FIFO between the output relay (producer) and the turn engine
 * (consumer). `receive` waits at most `timeoutMs` and resolves `undefined`
 * when nothing arrived.
 */
export class RawOutputQueue<T = string> {
  private values: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private closed = false;

  get size(): number {
    return this.values.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(v: T): void {
    if (this.closed) return;
    const w = this.waiters.shift();
    if (w) {
      clearTimeout(w.timer);
      w.resolve(v);
    } else {
      this.values.push(v);
    }
  }

  receive(timeoutMs: number): Promise<T | undefined> {
    if (this.values.length > 0) return Promise.resolve(this.values.shift());
    if (this.closed) return Promise.resolve(undefined);

    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx !== -1) this.waiters.splice(idx, 1);
          resolve(undefined);
        }, Math.max(0, timeoutMs))
      };
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything currently queued without waiting. */
  drain(): T[] {
    return this.values.splice(0);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const w of this.waiters.splice(0)) {
      clearTimeout(w.timer);
      w.resolve(undefined);
    }
  }
}
