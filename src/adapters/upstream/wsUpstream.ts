import WebSocket, { type RawData } from 'ws';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { abortError } from '@/shared/abort';
import { errorMessage } from '@/shared/bestEffort';
import { BoundedQueue } from '@/shared/queue/boundedQueue';
import {
  ConnectTimeoutError,
  ConnectionClosedError,
  ConnectionRefusedError,
  InvalidTargetError,
} from '@/domain/errors';
import type {
  ConnectOptions,
  KeepaliveSettings,
  ReceiveResult,
  UpstreamConnection,
  UpstreamConnector,
  UpstreamMessage,
} from '@/ports/Upstream';

/** Frames buffered between the socket and the channel's receive loop. */
export const INBOX_CAPACITY = 256;
const CLOSE_WAIT_MS = 2000;

type InboxItem =
  | { kind: 'message'; message: UpstreamMessage }
  | { kind: 'closed'; code: number; reason: string };

let nextConnectionId = 0;

function rawToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

class WsUpstreamConnection implements UpstreamConnection {
  public readonly id = ++nextConnectionId;
  private readonly inbox = new BoundedQueue<InboxItem>(INBOX_CAPACITY);
  private closedWith: InboxItem | null = null;
  private keepaliveTimer?: NodeJS.Timeout;
  private dropped = 0;

  constructor(
    public readonly url: string,
    private readonly socket: WebSocket,
    private readonly log: ComponentLogger,
    keepalive?: KeepaliveSettings,
  ) {
    socket.on('message', (data, isBinary) => {
      const message: UpstreamMessage = isBinary
        ? { kind: 'binary', data: rawToBuffer(data) }
        : { kind: 'text', text: rawToBuffer(data).toString('utf8') };
      const { evicted } = this.inbox.pushEvictingOldest({ kind: 'message', message });
      if (evicted) {
        this.dropped += 1;
        this.log.spam('inbox full; dropped oldest frame', { dropped: this.dropped });
      }
    });
    socket.on('close', (code, reason) => {
      this.stopKeepalive();
      const closed: InboxItem = { kind: 'closed', code, reason: reason.toString('utf8') };
      this.closedWith = closed;
      this.inbox.tryPush(closed);
      this.log.debug('socket closed', { id: this.id, code });
    });
    socket.on('error', (error) => {
      this.log.debug('socket error', { id: this.id, message: error.message });
    });
    if (keepalive) {
      this.startKeepalive(keepalive);
    }
  }

  public isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  public async receive(signal: AbortSignal, timeoutMs?: number): Promise<ReceiveResult> {
    const queued = this.inbox.tryShift();
    const item = queued ?? this.closedWith;
    if (item) {
      return item;
    }
    const next = await this.inbox.take(signal, timeoutMs);
    if (next.kind === 'timeout') {
      return next;
    }
    return next.item;
  }

  public send(text: string): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(new ConnectionClosedError(`${this.url} is not open`));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(text, (error) => {
        if (!error) {
          resolve();
          return;
        }
        reject(this.isOpen() ? error : new ConnectionClosedError(error.message));
      });
    });
  }

  public ping(timeoutMs: number): Promise<boolean> {
    if (!this.isOpen()) {
      return Promise.resolve(false);
    }
    return new Promise<boolean>((resolve) => {
      const onPong = () => finish(true);
      const timer = setTimeout(() => finish(false), timeoutMs);
      const finish = (ok: boolean) => {
        clearTimeout(timer);
        this.socket.off('pong', onPong);
        resolve(ok);
      };
      this.socket.on('pong', onPong);
      try {
        this.socket.ping();
      } catch (error) {
        this.log.debug('ping failed', { id: this.id, message: errorMessage(error) });
        finish(false);
      }
    });
  }

  public close(code = 1000, reason = ''): Promise<void> {
    this.stopKeepalive();
    if (this.socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.socket.terminate();
        resolve();
      }, CLOSE_WAIT_MS);
      this.socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      if (this.socket.readyState === WebSocket.OPEN) {
        this.socket.close(code, reason);
      }
    });
  }

  private startKeepalive(settings: KeepaliveSettings): void {
    this.keepaliveTimer = setInterval(() => {
      void this.ping(settings.timeoutMs).then((ok) => {
        if (!ok && this.isOpen()) {
          this.log.warn('keepalive pong timeout; dropping connection', { id: this.id, url: this.url });
          this.socket.terminate();
        }
      });
    }, settings.intervalMs);
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = undefined;
    }
  }
}

function connectFailure(url: string, error: Error): Error {
  if ('code' in error && error.code === 'ECONNREFUSED') {
    return new ConnectionRefusedError(url, error);
  }
  return error;
}

/**
 * Opens upstream WebSockets with the `ws` client. The handshake timeout is
 * enforced here so it surfaces as a ConnectTimeoutError.
 */
export class WsUpstreamConnector implements UpstreamConnector {
  constructor(private readonly log: ComponentLogger = createLogger('Upstream')) {}

  public connect(url: string, options: ConnectOptions): Promise<UpstreamConnection> {
    const { signal } = options;
    if (signal.aborted) {
      return Promise.reject(abortError(signal));
    }

    let socket: WebSocket;
    try {
      socket = new WebSocket(url, { perMessageDeflate: false });
    } catch (error) {
      return Promise.reject(new InvalidTargetError(url, errorMessage(error)));
    }

    return new Promise<UpstreamConnection>((resolve, reject) => {
      let settled = false;
      const settle = (fn: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        socket.off('open', onOpen);
        socket.off('error', onError);
        fn();
      };
      const onOpen = () => {
        settle(() => {
          this.log.debug('connected', { url });
          resolve(new WsUpstreamConnection(url, socket, this.log, options.keepalive));
        });
      };
      const onError = (error: Error) => {
        settle(() => reject(connectFailure(url, error)));
      };
      const onAbort = () => {
        settle(() => {
          socket.terminate();
          reject(abortError(signal));
        });
      };
      const timer = setTimeout(() => {
        settle(() => {
          socket.terminate();
          reject(new ConnectTimeoutError(url, options.handshakeTimeoutMs));
        });
      }, options.handshakeTimeoutMs);

      socket.on('error', (error) => {
        if (settled) {
          this.log.debug('socket error after connect attempt', { url, message: error.message });
        }
      });
      socket.once('open', onOpen);
      socket.once('error', onError);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
