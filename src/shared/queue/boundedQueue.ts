import { abortError } from '@/shared/abort';

export type TakeResult<T> = { kind: 'item'; item: T } | { kind: 'timeout' };

export type EvictingPushResult<T> = {
  accepted: boolean;
  evicted: T | undefined;
};

type Waiter<T> = {
  deliver: (item: T) => void;
};

/**
 * Fixed-capacity FIFO. Producers never wait: `tryPush` reports whether the
 * item was taken. Consumers wait through `take`, which observes an abort
 * signal and an optional timeout.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  public get size(): number {
    return this.items.length;
  }

  public isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  public isEmpty(): boolean {
    return this.items.length === 0;
  }

  public tryPush(item: T): boolean {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.deliver(item);
      return true;
    }
    if (this.isFull()) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  public tryShift(): T | undefined {
    return this.items.shift();
  }

  /**
   * Pushes `item`, dropping the oldest queued item first when full.
   * `accepted` is false only if the queue is still full after the eviction.
   */
  public pushEvictingOldest(item: T): EvictingPushResult<T> {
    if (this.tryPush(item)) {
      return { accepted: true, evicted: undefined };
    }
    const evicted = this.tryShift();
    return { accepted: this.tryPush(item), evicted };
  }

  /** Removes and returns everything queued. */
  public drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  public snapshot(): readonly T[] {
    return [...this.items];
  }

  public take(signal: AbortSignal, timeoutMs?: number): Promise<TakeResult<T>> {
    if (signal.aborted) {
      return Promise.reject(abortError(signal));
    }
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve({ kind: 'item', item });
    }

    return new Promise<TakeResult<T>>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const cleanup = () => {
        if (timer) {
          clearTimeout(timer);
        }
        signal.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
      };
      const waiter: Waiter<T> = {
        deliver: (item) => {
          cleanup();
          resolve({ kind: 'item', item });
        },
      };
      const onAbort = () => {
        cleanup();
        reject(abortError(signal));
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          resolve({ kind: 'timeout' });
        }, timeoutMs);
      }
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }
}
