import { addAbortSignal } from 'node:stream';
import { createLogger } from '@/shared/logging/logger';
import { abortError } from '@/shared/abort';
import { errorMessage } from '@/shared/bestEffort';
import { updates, type UpdateSink } from '@/ports/ControllerBus';
import type { ControllerTask } from '@/ports/ControllerTask';
import type { FeaturePort } from '@/ports/FeaturePort';
import type { MediaProcess } from '@/ports/MediaProcess';
import type { ClientSink } from '@/application/streaming/clientSink';
import type { TranscoderSlot } from '@/application/streaming/transcoderSlot';

export const DEFAULT_RELAY_CHUNK_SIZE = 1024;

export type RelayOptions = {
  chunkSize?: number;
};

export type MembershipListener = (clientCount: number) => void;

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof Uint8Array) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  return Buffer.from(String(data));
}

/**
 * Fans the transcoder's output out to every attached client sink.
 *
 * The producer is never blocked: each chunk is offered to a snapshot of the
 * current membership, and a full sink gives up its oldest chunk.
 */
export class BroadcastRelay implements ControllerTask {
  public readonly name = 'relay';
  public readonly restart = 'while-feature-enabled';
  public readonly feature = 'transcoding';
  private readonly log = createLogger('Stream', 'Relay');
  private readonly sinks = new Set<ClientSink>();
  private readonly listeners = new Set<MembershipListener>();
  private readonly chunkSize: number;
  private relayedBytes = 0;

  constructor(
    private readonly slot: TranscoderSlot,
    private readonly features: FeaturePort,
    private readonly sink: UpdateSink,
    options: RelayOptions = {},
  ) {
    this.chunkSize = options.chunkSize ?? DEFAULT_RELAY_CHUNK_SIZE;
    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new RangeError(`relay chunk size must be a positive integer, got ${this.chunkSize}`);
    }
  }

  public get clientCount(): number {
    return this.sinks.size;
  }

  public get bytesRelayed(): number {
    return this.relayedBytes;
  }

  public onMembershipChange(listener: MembershipListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  public attach(sink: ClientSink): void {
    if (this.sinks.has(sink)) {
      return;
    }
    this.sinks.add(sink);
    this.log.debug('client attached', { client: sink.label, clients: this.sinks.size });
    this.notifyMembership();
  }

  public detach(sink: ClientSink): void {
    if (!this.sinks.delete(sink)) {
      return;
    }
    this.log.debug('client detached', { client: sink.label, clients: this.sinks.size });
    this.notifyMembership();
  }

  /**
   * Delivers `data` to every sink attached when the call starts, in pieces of
   * at most `chunkSize` bytes.
   */
  public broadcast(data: Buffer): void {
    const members = Array.from(this.sinks);
    for (let offset = 0; offset < data.length; offset += this.chunkSize) {
      const chunk = data.subarray(offset, offset + this.chunkSize);
      this.relayedBytes += chunk.length;
      for (const sink of members) {
        const outcome = sink.offer(chunk);
        if (outcome !== 'queued') {
          this.log.spam('slow client', { client: sink.label, outcome });
        }
      }
    }
  }

  /** Queues the end-of-stream marker on every attached sink. */
  public endAll(): void {
    for (const sink of Array.from(this.sinks)) {
      sink.end();
    }
  }

  public async run(signal: AbortSignal): Promise<void> {
    const unsubscribe = this.features.subscribe((change) => {
      if (change.feature === 'transcoding' && !change.enabled) {
        this.slot.close();
      }
    });
    try {
      while (this.features.isEnabled('transcoding')) {
        const proc = await this.slot.next(signal);
        if (!proc) {
          break;
        }
        await this.pump(proc, signal);
      }
      this.log.debug('relay finished; transcoding disabled');
    } finally {
      unsubscribe();
    }
  }

  private async pump(proc: MediaProcess, signal: AbortSignal): Promise<void> {
    const output = proc.stdout;
    if (!output) {
      this.log.warn('transcoder has no readable output', { name: proc.name });
      this.slot.clear(proc);
      return;
    }

    this.log.info('relaying transcoder output', { pid: proc.pid, clients: this.sinks.size });
    let failure: unknown;
    try {
      for await (const data of addAbortSignal(signal, output)) {
        this.broadcast(toBuffer(data));
      }
    } catch (error) {
      if (signal.aborted) {
        this.endAll();
        throw abortError(signal);
      }
      failure = error;
    } finally {
      this.slot.clear(proc);
    }

    this.endAll();

    if (proc.terminationRequested) {
      this.log.info('transcoder output ended after requested stop', { pid: proc.pid });
      this.sink.emit(updates.streamStatus('Stream: Encoder restarting...'));
      return;
    }

    if (failure !== undefined) {
      this.log.error('transcoder output failed', { pid: proc.pid, message: errorMessage(failure) });
      this.sink.emit(updates.error(`AAC relay error: ${errorMessage(failure)}`));
    } else {
      this.log.warn('transcoder exited unexpectedly while relaying', { pid: proc.pid });
      this.sink.emit(updates.error('ffmpeg exited unexpectedly during relay.'));
    }
    this.features.disable('transcoding', 'transcoder output ended unexpectedly');
  }

  private notifyMembership(): void {
    const count = this.sinks.size;
    for (const listener of Array.from(this.listeners)) {
      listener(count);
    }
  }
}
