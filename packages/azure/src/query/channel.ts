/**
 * Unbounded channel with many producers and a single consumer.
 * Closing twice or sending after close throws.
 */
export interface Channel<T> extends AsyncIterable<T> {
  send(value: T): void;
  close(): void;
  readonly closed: boolean;
}

export function createChannel<T>(): Channel<T> {
  const buffer: T[] = [];
  let head = 0;
  let closed = false;
  let wake: (() => void) | null = null;

  function notify(): void {
    const resolve = wake;
    wake = null;
    resolve?.();
  }

  return {
    get closed() {
      return closed;
    },

    send(value) {
      if (closed) {
        throw new Error("send on closed channel");
      }
      buffer.push(value);
      notify();
    },

    close() {
      if (closed) {
        throw new Error("close of closed channel");
      }
      closed = true;
      notify();
    },

    async *[Symbol.asyncIterator]() {
      for (;;) {
        while (head < buffer.length) {
          yield buffer[head++];
        }
        buffer.length = 0;
        head = 0;
        if (closed) return;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
    },
  };
}

/**
 * Joins a dynamic set of tasks. Tasks report their own failures; a
 * rejection surfaces from wait().
 */
export class WaitGroup {
  private readonly pending = new Set<Promise<void>>();

  go(task: () => Promise<void>): void {
    const running: Promise<void> = task().finally(() => {
      this.pending.delete(running);
    });
    this.pending.add(running);
  }

  get size(): number {
    return this.pending.size;
  }

  async wait(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }
}
