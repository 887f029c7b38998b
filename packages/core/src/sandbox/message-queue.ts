/**
 * Bounded async line queue.
 *
 * Fed by a stream listener, drained by one awaiting consumer. A consumer
 * waits on a promise with a deadline; nothing polls. When full, the oldest
 * line is dropped.
 */

interface Waiter {
  resolve: (line: string | null) => void;
  timer: NodeJS.Timeout;
}

export class AsyncLineQueue {
  private readonly lines: string[] = [];
  private readonly waiters: Waiter[] = [];
  private isClosed = false;

  constructor(
    private readonly capacity = 1000,
    private readonly onDrop?: (line: string) => void
  ) {}

  get size(): number {
    return this.lines.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  push(line: string): void {
    if (this.isClosed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(line);
      return;
    }

    if (this.lines.length >= this.capacity) {
      const dropped = this.lines.shift();
      if (dropped !== undefined) this.onDrop?.(dropped);
    }
    this.lines.push(line);
  }

  /** Next line, or null on timeout or once closed and drained. */
  next(timeoutMs: number): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.isClosed) return Promise.resolve(null);

    return new Promise((resolve) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          const i = this.waiters.indexOf(waiter);
          if (i !== -1) this.waiters.splice(i, 1);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /** Stop accepting lines and release every waiter. Buffered lines stay readable. */
  close(): void {
    this.isClosed = true;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }
}
