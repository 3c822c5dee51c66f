export interface SerialEventQueueOptions<T> {
  /** Processes one item. Never awaited. */
  worker: (item: T) => void;
  /** Called when the worker throws; draining continues with the next item. */
  onError: (err: unknown, item: T) => void;
}

/**
 * FIFO drained by a single worker. Producers enqueue and return immediately;
 * the drain runs on a microtask so items submitted from inside the worker are
 * processed after the current one, in order.
 */
export class SerialEventQueue<T extends object> {
  private readonly items: T[] = [];
  private readonly waiters: (() => void)[] = [];
  private scheduled = false;
  private draining = false;
  private closed = false;

  constructor(private readonly options: SerialEventQueueOptions<T>) {}

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false once the queue is closed. */
  enqueue(item: T): boolean {
    if (this.closed) {
      return false;
    }
    this.items.push(item);
    this.schedule();
    return true;
  }

  /** Resolves once every item enqueued so far has been processed. */
  idle(): Promise<void> {
    if (!this.scheduled && !this.draining && this.items.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Drop pending items and refuse new ones. */
  close(): void {
    this.closed = true;
    this.items.length = 0;
    if (!this.draining) {
      this.notifyIdle();
    }
  }

  private schedule(): void {
    if (this.scheduled || this.draining) {
      return;
    }
    this.scheduled = true;
    queueMicrotask(() => this.drain());
  }

  private drain(): void {
    this.scheduled = false;
    this.draining = true;
    let item = this.items.shift();
    while (item !== undefined) {
      try {
        this.options.worker(item);
      } catch (err) {
        this.options.onError(err, item);
      }
      item = this.items.shift();
    }
    this.draining = false;
    this.notifyIdle();
  }

  private notifyIdle(): void {
    const waiters = this.waiters.splice(0);
    for (const resolve of waiters) {
      resolve();
    }
  }
}
