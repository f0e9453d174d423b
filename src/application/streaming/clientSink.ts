import { BoundedQueue, type TakeResult } from '@/shared/queue/boundedQueue';

/** Pushed to every sink when the producer ends; the client closes cleanly. */
export const END_OF_STREAM: unique symbol = Symbol('end-of-stream');

export type SinkItem = Buffer | typeof END_OF_STREAM;

export type OfferOutcome = 'queued' | 'evicted-oldest' | 'dropped';

export const DEFAULT_SINK_CAPACITY = 10;

let nextSinkId = 0;

/**
 * Bounded per-client buffer between the relay and one HTTP response.
 * The capacity never grows; a slow client loses its oldest chunks.
 */
export class ClientSink {
  public readonly id = ++nextSinkId;
  private readonly queue: BoundedQueue<SinkItem>;
  private evictedCount = 0;
  private droppedCount = 0;

  constructor(
    public readonly label: string,
    capacity = DEFAULT_SINK_CAPACITY,
  ) {
    this.queue = new BoundedQueue<SinkItem>(capacity);
  }

  public get capacity(): number {
    return this.queue.capacity;
  }

  public get size(): number {
    return this.queue.size;
  }

  public get stats(): { evicted: number; dropped: number } {
    return { evicted: this.evictedCount, dropped: this.droppedCount };
  }

  /** Non-blocking push used by the relay for every chunk. */
  public offer(chunk: Buffer): OfferOutcome {
    const result = this.queue.pushEvictingOldest(chunk);
    if (!result.accepted) {
      this.droppedCount += 1;
      return 'dropped';
    }
    if (result.evicted !== undefined) {
      this.evictedCount += 1;
      return 'evicted-oldest';
    }
    return 'queued';
  }

  /** Queues the end sentinel, discarding buffered audio if there is no room. */
  public end(): void {
    while (!this.queue.tryPush(END_OF_STREAM)) {
      if (this.queue.tryShift() === undefined) {
        return;
      }
    }
  }

  public next(signal: AbortSignal, timeoutMs?: number): Promise<TakeResult<SinkItem>> {
    return this.queue.take(signal, timeoutMs);
  }

  /** Drops everything still queued. Returns the number of items released. */
  public drain(): number {
    return this.queue.drain().length;
  }

  /** Queued audio chunks in delivery order (the end sentinel is omitted). */
  public pending(): Buffer[] {
    return this.queue.snapshot().filter((item): item is Buffer => item !== END_OF_STREAM);
  }
}
