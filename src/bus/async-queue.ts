interface Waiter<V> {
  resolve: (value: V) => void;
  reject: (err: Error) => void;
}

/**
 * Bounded FIFO of pending work for one consumer loop.
 *
 * `publish` waits while the queue is full, `consume` waits while it is empty.
 * A waiter is released with QueueAbortedError when its signal fires, and its
 * abort listener is removed once it is served, so a long-lived signal can be
 * passed to every call.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private publishers: Array<Waiter<void>> = [];
  private consumers: Array<Waiter<T>> = [];
  private readonly capacity: number;

  constructor(capacity = 100) {
    this.capacity = capacity;
  }

  async publish(item: T, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer.resolve(item);
      return;
    }

    if (this.items.length >= this.capacity) {
      await wait(this.publishers, signal);
    }
    this.items.push(item);
  }

  async consume(signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();

    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      this.publishers.shift()?.resolve();
      return item;
    }
    return wait(this.consumers, signal);
  }

  /** Remove and return everything still queued; blocked publishers are rejected. */
  drain(): T[] {
    const left = this.items.splice(0);
    for (const publisher of this.publishers.splice(0)) {
      publisher.reject(new QueueAbortedError());
    }
    return left;
  }

  get size(): number {
    return this.items.length;
  }

  /** Consumers waiting for an item. */
  get pending(): number {
    return this.consumers.length;
  }
}

export class QueueAbortedError extends Error {
  constructor() {
    super('Aborted');
    this.name = 'AbortError';
  }
}

function wait<V>(waiters: Array<Waiter<V>>, signal?: AbortSignal): Promise<V> {
  return new Promise<V>((resolve, reject) => {
    const onAbort = (): void => {
      const idx = waiters.indexOf(waiter);
      if (idx !== -1) waiters.splice(idx, 1);
      reject(new QueueAbortedError());
    };
    const waiter: Waiter<V> = {
      resolve: (value) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      reject: (err) => {
        signal?.removeEventListener('abort', onAbort);
        reject(err);
      },
    };
    waiters.push(waiter);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
