import assert from 'node:assert/strict';
import http from 'node:http';
import net from 'node:net';
import { once } from 'node:events';
import { test } from './testHarness';
import { PortInUseError } from '../src/domain/errors';
import { FeatureSet } from '../src/application/features';
import { BroadcastRelay } from '../src/application/streaming/broadcastRelay';
import { TranscoderSlot } from '../src/application/streaming/transcoderSlot';
import { StreamServer } from '../src/adapters/http/streamServer';
import { buildStreamServerConfig, type StreamServerConfig } from '../src/config/stream';
import { RecordingSink } from './support/recordingSink';
import { waitFor } from './support/waitFor';

type Reply = { status: number; body: string; headers: http.IncomingHttpHeaders };

function request(port: number, path: string, method = 'GET'): Promise<Reply> {
  return new Promise<Reply>((resolve, reject) => {
    const req = http.request({ host: '127.0.0.1', port, path, method }, (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => chunks.push(chunk));
      res.on('end', () =>
        resolve({
          status: res.statusCode ?? 0,
          body: Buffer.concat(chunks).toString('utf8'),
          headers: res.headers,
        }),
      );
      res.on('error', reject);
    });
    req.on('error', reject);
    req.end();
  });
}

async function startServer(port = 0, overrides: Partial<StreamServerConfig> = {}) {
  const sink = new RecordingSink();
  const features = new FeatureSet({
    playback: { enabled: false, mandatory: false },
    transcoding: { enabled: true, mandatory: false },
  });
  const relay = new BroadcastRelay(new TranscoderSlot(), features, sink);
  const server = new StreamServer({
    relay,
    features,
    updates: sink,
    config: { ...buildStreamServerConfig({ enabled: true, host: '127.0.0.1', port }), ...overrides },
  });
  const controller = new AbortController();
  const running = server.run(controller.signal);
  const stop = async () => {
    controller.abort();
    await running;
  };
  return { sink, features, relay, server, running, stop };
}

async function boundPort(server: StreamServer): Promise<number> {
  await waitFor(() => server.port !== null, 'server listening');
  const port = server.port;
  assert.ok(port !== null);
  return port;
}

test('stream server answers only GET on the stream path', async () => {
  const { server, stop } = await startServer();
  const port = await boundPort(server);

  const missing = await request(port, '/other');
  assert.equal(missing.status, 404);
  assert.equal(missing.body, 'Not Found');

  const posted = await request(port, '/stream.aac', 'POST');
  assert.equal(posted.status, 405);
  assert.equal(posted.headers.allow, 'GET');
  await stop();
});

test('stream server refuses clients once streaming is disabled', async () => {
  const { server, features, stop } = await startServer();
  const port = await boundPort(server);
  features.disable('transcoding', 'test');

  const reply = await request(port, '/stream.aac');
  assert.equal(reply.status, 503);
  assert.equal(reply.body, 'Stream unavailable');
  await stop();
});

test('a stream client receives relayed audio until the stream ends', async () => {
  const { sink, relay, server, stop } = await startServer();
  const port = await boundPort(server);

  const reply = request(port, '/stream.aac?session=1');
  await waitFor(() => relay.clientCount === 1, 'client attached');
  relay.broadcast(Buffer.from('abc'));
  relay.broadcast(Buffer.from('def'));
  relay.endAll();

  const received = await reply;
  assert.equal(received.status, 200);
  assert.equal(received.headers['content-type'], 'audio/aac');
  assert.equal(received.body, 'abcdef');
  await waitFor(() => relay.clientCount === 0, 'client detached');
  assert.deepEqual(sink.texts('streamStatus'), [
    `Stream: AAC @ :${port}/stream.aac | Clients: 0`,
    `Stream: AAC @ :${port}/stream.aac | Clients: 1`,
    `Stream: AAC @ :${port}/stream.aac | Clients: 0`,
  ]);

  await stop();
  assert.equal(sink.texts('streamStatus').at(-1), 'Stream: Stopped');
});

test('a silent stream client is closed after the client timeout', async () => {
  const { relay, server, stop } = await startServer(0, { clientTimeoutMs: 30 });
  const port = await boundPort(server);

  const reply = await request(port, '/stream.aac');
  assert.equal(reply.status, 200);
  assert.equal(reply.body, '');
  await waitFor(() => relay.clientCount === 0, 'client detached');
  await stop();
});

test('a client that hangs up mid-stream is detached', async () => {
  const { sink, relay, server, stop } = await startServer();
  const port = await boundPort(server);

  const firstChunk = new Promise<string>((resolve, reject) => {
    const req = http.get({ host: '127.0.0.1', port, path: '/stream.aac' }, (res) => {
      res.once('data', (chunk: Buffer) => {
        resolve(chunk.toString('utf8'));
        req.destroy();
      });
    });
    req.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code !== 'ECONNRESET') {
        reject(error);
      }
    });
  });
  await waitFor(() => relay.clientCount === 1, 'client attached');
  relay.broadcast(Buffer.from('abc'));

  assert.equal(await firstChunk, 'abc');
  await waitFor(() => relay.clientCount === 0, 'client detached');
  relay.broadcast(Buffer.from('def'));
  assert.equal(relay.clientCount, 0);
  assert.equal(sink.texts('streamStatus').at(-1), `Stream: AAC @ :${port}/stream.aac | Clients: 0`);
  await stop();
});

test('a taken port fails the server and reports it', async () => {
  const blocker = net.createServer();
  blocker.listen(0, '127.0.0.1');
  await once(blocker, 'listening');
  const address = blocker.address();
  assert.ok(address !== null && typeof address === 'object');
  const taken = address.port;

  try {
    const { sink, server, running } = await startServer(taken);
    let failure: unknown = null;
    await assert.rejects(running, (error: unknown) => {
      failure = error;
      return error instanceof PortInUseError && error.port === taken;
    });
    server.onAbandoned(failure);
    assert.deepEqual(sink.texts('streamStatus'), [`Stream Err: Port ${taken} in use`]);
    assert.equal(server.port, null);
  } finally {
    await new Promise<void>((resolve) => blocker.close(() => resolve()));
  }
});
