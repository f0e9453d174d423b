import assert from 'node:assert/strict';
import net from 'node:net';
import { once } from 'node:events';
import { WebSocketServer, type WebSocket } from 'ws';
import { test } from './testHarness';
import { ConnectTimeoutError, ConnectionClosedError, ConnectionRefusedError, isAbortError } from '../src/domain/errors';
import { WsUpstreamConnector } from '../src/adapters/upstream/wsUpstream';
import { waitFor } from './support/waitFor';

function listeningPort(server: net.Server | WebSocketServer): number {
  const address = server.address();
  assert.ok(address !== null && typeof address === 'object');
  return address.port;
}

async function startWsServer() {
  const wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
  await once(wss, 'listening');
  const received: string[] = [];
  const peers: WebSocket[] = [];
  wss.on('connection', (socket) => {
    peers.push(socket);
    socket.on('message', (data, isBinary) => {
      if (!isBinary) {
        received.push(data.toString());
      }
    });
    socket.send('{"ps":"TESTFM"}');
    socket.send(Buffer.from([1, 2, 3]));
  });
  const close = () =>
    new Promise<void>((resolve) => {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close(() => resolve());
    });
  return { wss, port: listeningPort(wss), received, peers, close };
}

/** Accepts TCP connections and never answers the upgrade. */
async function startSilentServer() {
  const sockets: net.Socket[] = [];
  const server = net.createServer((socket) => sockets.push(socket));
  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const close = () =>
    new Promise<void>((resolve) => {
      for (const socket of sockets) {
        socket.destroy();
      }
      server.close(() => resolve());
    });
  return { port: listeningPort(server), close };
}

test('ws connection delivers text and binary frames and sends text', async () => {
  const server = await startWsServer();
  const connector = new WsUpstreamConnector();
  const signal = new AbortController().signal;
  try {
    const connection = await connector.connect(`ws://127.0.0.1:${server.port}/text`, {
      handshakeTimeoutMs: 1000,
      signal,
    });
    assert.equal(connection.isOpen(), true);

    assert.deepEqual(await connection.receive(signal, 1000), {
      kind: 'message',
      message: { kind: 'text', text: '{"ps":"TESTFM"}' },
    });
    assert.deepEqual(await connection.receive(signal, 1000), {
      kind: 'message',
      message: { kind: 'binary', data: Buffer.from([1, 2, 3]) },
    });
    assert.deepEqual(await connection.receive(signal, 20), { kind: 'timeout' });

    await connection.send('T97300');
    await waitFor(() => server.received.length === 1, 'command received');
    assert.deepEqual(server.received, ['T97300']);

    assert.equal(await connection.ping(1000), true);

    server.peers[0].close(4000, 'bye');
    assert.deepEqual(await connection.receive(signal, 1000), { kind: 'closed', code: 4000, reason: 'bye' });
    assert.deepEqual(await connection.receive(signal, 1000), { kind: 'closed', code: 4000, reason: 'bye' });
    assert.equal(connection.isOpen(), false);
    await assert.rejects(connection.send('T88000'), (error: unknown) => error instanceof ConnectionClosedError);
    assert.equal(await connection.ping(10), false);
    await connection.close();
  } finally {
    await server.close();
  }
});

test('a refused connection is reported as such', async () => {
  const server = await startSilentServer();
  const port = server.port;
  await server.close();

  const url = `ws://127.0.0.1:${port}/audio`;
  await assert.rejects(
    new WsUpstreamConnector().connect(url, { handshakeTimeoutMs: 1000, signal: new AbortController().signal }),
    (error: unknown) => error instanceof ConnectionRefusedError && error.target === url,
  );
});

test('a stalled handshake times out', async () => {
  const server = await startSilentServer();
  try {
    await assert.rejects(
      new WsUpstreamConnector().connect(`ws://127.0.0.1:${server.port}/text`, {
        handshakeTimeoutMs: 30,
        signal: new AbortController().signal,
      }),
      (error: unknown) => error instanceof ConnectTimeoutError && error.timeoutMs === 30,
    );
  } finally {
    await server.close();
  }
});

test('a pending connect is abandoned on abort', async () => {
  const server = await startSilentServer();
  try {
    const controller = new AbortController();
    const pending = new WsUpstreamConnector().connect(`ws://127.0.0.1:${server.port}/text`, {
      handshakeTimeoutMs: 5000,
      signal: controller.signal,
    });
    controller.abort();
    await assert.rejects(pending, (error: unknown) => isAbortError(error));
  } finally {
    await server.close();
  }
});

test('keepalive drops a connection whose peer stops answering pings', async () => {
  const wss = new WebSocketServer({ host: '127.0.0.1', port: 0, autoPong: false });
  await once(wss, 'listening');
  const signal = new AbortController().signal;
  try {
    const connection = await new WsUpstreamConnector().connect(`ws://127.0.0.1:${listeningPort(wss)}/text`, {
      handshakeTimeoutMs: 1000,
      signal,
      keepalive: { intervalMs: 20, timeoutMs: 20 },
    });

    assert.deepEqual(await connection.receive(signal, 1000), { kind: 'closed', code: 1006, reason: '' });
    assert.equal(connection.isOpen(), false);
    await connection.close();
  } finally {
    await new Promise<void>((resolve) => {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close(() => resolve());
    });
  }
});

test('keepalive keeps a responsive connection open', async () => {
  const server = await startWsServer();
  const signal = new AbortController().signal;
  try {
    const connection = await new WsUpstreamConnector().connect(`ws://127.0.0.1:${server.port}/text`, {
      handshakeTimeoutMs: 1000,
      signal,
      keepalive: { intervalMs: 10, timeoutMs: 200 },
    });
    assert.equal((await connection.receive(signal, 1000)).kind, 'message');
    assert.equal((await connection.receive(signal, 1000)).kind, 'message');

    assert.deepEqual(await connection.receive(signal, 60), { kind: 'timeout' });
    assert.equal(connection.isOpen(), true);
    await connection.close();
  } finally {
    await server.close();
  }
});
