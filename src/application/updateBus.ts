import { createLogger } from '@/shared/logging/logger';
import type { UpdateEvent, UpdateQueue, UpdateSink } from '@/ports/ControllerBus';

/**
 * Controller side of the update channel. Never blocks: when the consumer
 * falls behind, new events are dropped and the drop is logged.
 */
export class UpdateBus implements UpdateSink {
  private readonly log = createLogger('Controller', 'Updates');
  private dropped = 0;

  constructor(private readonly queue: UpdateQueue) {}

  public get droppedCount(): number {
    return this.dropped;
  }

  public emit(event: UpdateEvent): void {
    if (this.queue.tryPush(event)) {
      return;
    }
    this.dropped += 1;
    this.log.warn('update queue full; dropping update', {
      kind: event.kind,
      dropped: this.dropped,
      capacity: this.queue.capacity,
    });
  }

  /**
   * Delivers an event that must not be lost (the terminal `closed`),
   * evicting the oldest pending update if needed.
   */
  public emitTerminal(event: UpdateEvent): void {
    const { evicted } = this.queue.pushEvictingOldest(event);
    if (evicted) {
      this.dropped += 1;
      this.log.warn('update queue full; evicted oldest update for terminal event', {
        kind: event.kind,
        evicted: evicted.kind,
      });
    }
  }
}
