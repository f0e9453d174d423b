import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { once } from 'node:events';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { whenAborted } from '@/shared/abort';
import { PortInUseError, isAbortError } from '@/domain/errors';
import { updates, type UpdateSink } from '@/ports/ControllerBus';
import type { ControllerTask } from '@/ports/ControllerTask';
import type { FeaturePort } from '@/ports/FeaturePort';
import type { BroadcastRelay } from '@/application/streaming/broadcastRelay';
import { ClientSink, END_OF_STREAM } from '@/application/streaming/clientSink';
import type { StreamServerConfig } from '@/config/stream';

export type StreamServerDeps = {
  relay: BroadcastRelay;
  features: FeaturePort;
  updates: UpdateSink;
  config: StreamServerConfig;
};

/**
 * Serves the transcoded AAC stream over plain HTTP. Each client gets its own
 * bounded sink on the relay for as long as the response stays open.
 */
export class StreamServer implements ControllerTask {
  public readonly name = 'stream-server';
  public readonly restart = 'never';
  public readonly feature = 'transcoding';
  private readonly log = createLogger('Stream', 'Http');
  private server: http.Server | null = null;
  private boundPort: number | null = null;

  constructor(private readonly deps: StreamServerDeps) {}

  /** The port actually bound, once listening. */
  public get port(): number | null {
    return this.boundPort;
  }

  public async run(signal: AbortSignal): Promise<void> {
    const { config } = this.deps;
    const server = http.createServer((req, res) => {
      this.handleRequest(req, res, signal).catch((error: unknown) => {
        this.log.error('stream request failed', { message: errorMessage(error) });
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'text/plain' });
        }
        res.end();
      });
    });
    this.server = server;

    try {
      await this.listen(server);
    } catch (error) {
      this.server = null;
      throw error;
    }

    const unsubscribe = this.deps.relay.onMembershipChange((clients) => this.reportClients(clients));
    this.reportClients(this.deps.relay.clientCount);
    const aborted = whenAborted(signal);
    try {
      await aborted.promise;
    } finally {
      aborted.dispose();
      unsubscribe();
      await this.close(server);
      this.server = null;
      this.deps.updates.emit(updates.streamStatus('Stream: Stopped'));
    }
  }

  public onAbandoned(error: unknown): void {
    if (error instanceof PortInUseError) {
      this.deps.updates.emit(updates.streamStatus(`Stream Err: Port ${error.port} in use`));
      return;
    }
    this.deps.updates.emit(updates.streamStatus('Stream: Server Failed'));
  }

  private listen(server: http.Server): Promise<void> {
    const { host, port } = this.deps.config;
    return new Promise<void>((resolve, reject) => {
      const onError = (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          this.log.error('stream port already in use', { port });
          reject(new PortInUseError(port, error));
          return;
        }
        reject(error);
      };
      server.once('error', onError);
      server.listen(port, host, () => {
        server.off('error', onError);
        server.on('error', (error) => {
          this.log.warn('stream server error', { message: error.message });
        });
        const address = server.address();
        this.boundPort = isAddressInfo(address) ? address.port : port;
        this.log.info('aac stream listening', {
          host,
          port: this.boundPort,
          path: this.deps.config.path,
        });
        resolve();
      });
    });
  }

  private close(server: http.Server): Promise<void> {
    return new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private reportClients(clients: number): void {
    const { path } = this.deps.config;
    const port = this.boundPort ?? this.deps.config.port;
    this.deps.updates.emit(updates.streamStatus(`Stream: AAC @ :${port}${path} | Clients: ${clients}`));
  }

  private async handleRequest(
    req: IncomingMessage,
    res: ServerResponse,
    signal: AbortSignal,
  ): Promise<void> {
    const { config, features, relay } = this.deps;
    const pathname = (req.url ?? '/').split(/[?#]/)[0];

    if (pathname !== config.path) {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not Found');
      return;
    }
    if (req.method !== 'GET') {
      res.writeHead(405, { 'Content-Type': 'text/plain', Allow: 'GET' });
      res.end('Method Not Allowed');
      return;
    }
    if (!features.isEnabled('transcoding') || signal.aborted) {
      res.writeHead(503, { 'Content-Type': 'text/plain' });
      res.end('Stream unavailable');
      return;
    }

    req.socket.setNoDelay(true);
    res.writeHead(200, {
      'Content-Type': config.contentType,
      'Cache-Control': 'no-cache, no-store',
      Connection: 'close',
    });
    res.flushHeaders();

    const label = `${req.socket.remoteAddress ?? 'unknown'}:${req.socket.remotePort ?? 0}`;
    const sink = new ClientSink(label, config.sinkCapacity);
    const client = new AbortController();
    const onGone = () => client.abort();
    res.on('close', onGone);
    signal.addEventListener('abort', onGone, { once: true });
    relay.attach(sink);
    this.log.info('stream client connected', { client: label });

    let reason = 'end of stream';
    try {
      for (;;) {
        const next = await sink.next(client.signal, config.clientTimeoutMs);
        if (next.kind === 'timeout') {
          reason = 'silence timeout';
          break;
        }
        if (next.item === END_OF_STREAM) {
          break;
        }
        if (!res.write(next.item)) {
          await once(res, 'drain', { signal: client.signal });
        }
      }
    } catch (error) {
      if (!isAbortError(error)) {
        throw error;
      }
      reason = signal.aborted ? 'shutdown' : 'client disconnected';
    } finally {
      relay.detach(sink);
      const dropped = sink.drain();
      res.off('close', onGone);
      signal.removeEventListener('abort', onGone);
      if (!res.writableEnded) {
        res.end();
      }
      this.log.info('stream client disconnected', { client: label, reason, dropped });
    }
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === 'object';
}
