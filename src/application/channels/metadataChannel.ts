import { createLogger } from '@/shared/logging/logger';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import { sleep } from '@/shared/abort';
import {
  ConnectTimeoutError,
  ConnectionRefusedError,
  InvalidTargetError,
  MalformedRecordError,
  isAbortError,
} from '@/domain/errors';
import { parseRdsMessage } from '@/domain/radio/rdsRecord';
import { parseWebSocketTarget } from '@/domain/upstreamTarget';
import { updates, type UpdateSink } from '@/ports/ControllerBus';
import type { ClockPort } from '@/ports/ClockPort';
import type { CommandTarget } from '@/ports/CommandLink';
import type { ControllerTask } from '@/ports/ControllerTask';
import type { KeepaliveSettings, UpstreamConnection, UpstreamConnector } from '@/ports/Upstream';
import { ReconnectGate } from '@/application/channels/reconnectGate';
import type { CommandLink } from '@/application/commandLink';

export type ChannelState = 'disconnected' | 'connecting' | 'connected' | 'closing';

export type MetadataChannelSettings = {
  url: string;
  reconnectIntervalMs: number;
  settleDelayMs: number;
  handshakeTimeoutMs: number;
  keepalive: KeepaliveSettings;
};

export type MetadataChannelDeps = {
  connector: UpstreamConnector;
  link: CommandLink;
  updates: UpdateSink;
  clock: ClockPort;
  settings: MetadataChannelSettings;
};

/**
 * Reconnecting text socket: RDS records in, tune commands out. While a
 * connection is open its send capability is published on the command link.
 */
export class MetadataChannel implements ControllerTask {
  public readonly name = 'metadata';
  public readonly restart = 'always';
  private readonly log = createLogger('Upstream', 'Text');
  private readonly gate: ReconnectGate;
  private state: ChannelState = 'disconnected';
  private attempts = 0;

  constructor(private readonly deps: MetadataChannelDeps) {
    this.gate = new ReconnectGate(deps.clock, deps.settings.reconnectIntervalMs);
  }

  public get connectionState(): ChannelState {
    return this.state;
  }

  public get connectAttempts(): number {
    return this.attempts;
  }

  public async run(signal: AbortSignal): Promise<void> {
    const { settings } = this.deps;
    const target = settings.url;
    parseWebSocketTarget(target);

    while (!signal.aborted) {
      await this.gate.waitTurn(signal);
      this.attempts += 1;
      this.state = 'connecting';
      this.emitStatus('Connecting Text WS...');

      let connection: UpstreamConnection | null = null;
      try {
        connection = await this.deps.connector.connect(target, {
          handshakeTimeoutMs: settings.handshakeTimeoutMs,
          keepalive: settings.keepalive,
          signal,
        });
        await this.serve(connection, signal);
      } catch (error) {
        if (signal.aborted || isAbortError(error) || error instanceof InvalidTargetError) {
          throw error;
        }
        this.reportFailure(error);
      } finally {
        this.state = 'closing';
        if (connection) {
          const open = connection;
          await bestEffort(() => open.close(), {
            fallback: undefined,
            onError: 'debug',
            label: 'text socket close failed',
            log: this.log,
          });
        }
        this.state = 'disconnected';
      }

      this.emitStatus('Text WS disconnected. Retrying...');
      await sleep(settings.settleDelayMs, signal);
    }
  }

  private async serve(connection: UpstreamConnection, signal: AbortSignal): Promise<void> {
    const target: CommandTarget = {
      connectionId: connection.id,
      isOpen: () => connection.isOpen(),
      send: (text) => connection.send(text),
    };
    this.state = 'connected';
    this.deps.link.attach(target);
    this.log.info('text socket connected', { url: connection.url, connectionId: connection.id });
    this.emitStatus('Text WS connected.');

    try {
      for (;;) {
        const next = await connection.receive(signal);
        if (next.kind === 'closed') {
          this.log.info('text socket closed', { code: next.code, reason: next.reason });
          this.emitStatus(`Text WS closed (Code: ${next.code}, Reason: ${next.reason})`);
          return;
        }
        if (next.kind !== 'message') {
          continue;
        }
        const { message } = next;
        if (message.kind === 'text') {
          this.handleRecord(message.text);
        } else {
          this.log.debug('ignoring binary frame on text socket', { bytes: message.data.length });
        }
      }
    } finally {
      this.deps.link.detach(target);
    }
  }

  private handleRecord(raw: string): void {
    try {
      const { record, frequencyKhz } = parseRdsMessage(raw);
      this.deps.updates.emit(updates.data(record));
      if (frequencyKhz !== null) {
        this.deps.updates.emit(updates.currentFrequency(frequencyKhz));
      }
    } catch (error) {
      if (error instanceof MalformedRecordError) {
        this.log.warn('skipping malformed record', { message: error.message });
        this.deps.updates.emit(updates.error(error.message));
        return;
      }
      this.log.error('processing text data failed', { message: errorMessage(error) });
      this.deps.updates.emit(updates.error(`Processing text data failed: ${errorMessage(error)}`));
    }
  }

  private reportFailure(error: unknown): void {
    if (error instanceof ConnectionRefusedError) {
      this.log.info('text socket refused', { url: error.target });
      this.emitStatus('Text WS connection refused.');
      return;
    }
    if (error instanceof ConnectTimeoutError) {
      this.log.info('text socket handshake timed out', { timeoutMs: error.timeoutMs });
      this.emitStatus('Text WS connection timeout.');
      return;
    }
    this.log.warn('text socket failed', { message: errorMessage(error) });
    this.deps.updates.emit(updates.error(`Text WS Error: ${errorMessage(error)}`));
  }

  private emitStatus(text: string): void {
    this.deps.updates.emit(updates.status(text));
  }
}
