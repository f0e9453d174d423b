import { abortError } from '@/shared/abort';
import type { MediaProcess } from '@/ports/MediaProcess';

/**
 * Hands the transcoder started by the audio channel over to the relay.
 * Each published process is handed out once.
 */
export class TranscoderSlot {
  private current: MediaProcess | null = null;
  private served: MediaProcess | null = null;
  private closed = false;
  private readonly waiters = new Set<(proc: MediaProcess | null) => void>();

  public get isClosed(): boolean {
    return this.closed;
  }

  public publish(proc: MediaProcess): void {
    if (this.closed) {
      return;
    }
    this.current = proc;
    for (const waiter of Array.from(this.waiters)) {
      waiter(proc);
    }
  }

  public clear(proc: MediaProcess): void {
    if (this.current === proc) {
      this.current = null;
    }
  }

  /** No transcoder will be published again; pending and future waits get null. */
  public close(): void {
    this.closed = true;
    this.current = null;
    for (const waiter of Array.from(this.waiters)) {
      waiter(null);
    }
  }

  public next(signal: AbortSignal): Promise<MediaProcess | null> {
    if (signal.aborted) {
      return Promise.reject(abortError(signal));
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    if (this.current && this.current !== this.served) {
      this.served = this.current;
      return Promise.resolve(this.current);
    }
    return new Promise<MediaProcess | null>((resolve, reject) => {
      const onAbort = () => {
        this.waiters.delete(waiter);
        reject(abortError(signal));
      };
      const waiter = (proc: MediaProcess | null) => {
        this.waiters.delete(waiter);
        signal.removeEventListener('abort', onAbort);
        if (proc) {
          this.served = proc;
        }
        resolve(proc);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiters.add(waiter);
    });
  }
}
