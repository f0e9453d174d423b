import assert from 'node:assert/strict';
import { test } from './testHarness';
import {
  ConnectTimeoutError,
  ConnectionRefusedError,
  InvalidTargetError,
  isAbortError,
} from '../src/domain/errors';
import { parseRdsMessage } from '../src/domain/radio/rdsRecord';
import { updates } from '../src/ports/ControllerBus';
import { ReconnectGate } from '../src/application/channels/reconnectGate';
import { MetadataChannel, type MetadataChannelSettings } from '../src/application/channels/metadataChannel';
import { CommandLink } from '../src/application/commandLink';
import { systemClock } from '../src/infrastructure/time/systemClock';
import { FakeConnection, FakeConnector } from './support/fakeUpstream';
import { ManualClock } from './support/manualClock';
import { RecordingSink } from './support/recordingSink';
import { waitFor } from './support/waitFor';

const TEXT_URL = 'ws://radio.test:8073/text';

const settings: MetadataChannelSettings = {
  url: TEXT_URL,
  reconnectIntervalMs: 5,
  settleDelayMs: 1,
  handshakeTimeoutMs: 100,
  keepalive: { intervalMs: 1000, timeoutMs: 500 },
};

function startChannel(connector: FakeConnector, overrides: Partial<MetadataChannelSettings> = {}) {
  const sink = new RecordingSink();
  const link = new CommandLink();
  const channel = new MetadataChannel({
    connector,
    link,
    updates: sink,
    clock: systemClock,
    settings: { ...settings, ...overrides },
  });
  const controller = new AbortController();
  const running = channel.run(controller.signal);
  const stop = async () => {
    controller.abort();
    await assert.rejects(running, (error: unknown) => isAbortError(error));
  };
  return { sink, link, channel, running, stop };
}

test('reconnect gate spaces attempts from their start', async () => {
  const clock = new ManualClock(1000);
  const gate = new ReconnectGate(clock, 5000);
  assert.equal(gate.remainingMs(), 0);
  await gate.waitTurn(new AbortController().signal);

  clock.advance(2000);
  assert.equal(gate.remainingMs(), 3000);
  clock.advance(3500);
  assert.equal(gate.remainingMs(), 0);
  await gate.waitTurn(new AbortController().signal);
  assert.equal(gate.remainingMs(), 5000);
});

test('reconnect gate waits out the interval in real time', async () => {
  const gate = new ReconnectGate(systemClock, 30);
  const signal = new AbortController().signal;
  await gate.waitTurn(signal);
  const started = systemClock.now();
  await gate.waitTurn(signal);
  assert.ok(systemClock.now() - started >= 29);
});

test('reconnect gate waits are cancellable', async () => {
  const gate = new ReconnectGate(new ManualClock(0), 60_000);
  const controller = new AbortController();
  await gate.waitTurn(controller.signal);
  const waiting = gate.waitTurn(controller.signal);
  controller.abort();
  await assert.rejects(waiting, (error: unknown) => isAbortError(error));
});

test('metadata records are forwarded before the tuned frequency', async () => {
  const connection = new FakeConnection(TEXT_URL);
  const first = JSON.stringify({ freq: '97.3', ps: 'TESTFM' });
  connection.pushText(first);
  connection.pushText('{broken');
  connection.pushText('{"ps":"OTHER"}');
  connection.pushBinary(Buffer.from([1, 2]));
  const { sink, link, channel, stop } = startChannel(new FakeConnector([connection]));

  await waitFor(() => sink.events.length === 6, 'six updates');
  assert.deepEqual(sink.events, [
    updates.status('Connecting Text WS...'),
    updates.status('Text WS connected.'),
    updates.data(parseRdsMessage(first).record),
    updates.currentFrequency(97_300),
    updates.error('Invalid JSON received (Text WS).'),
    updates.data(parseRdsMessage('{"ps":"OTHER"}').record),
  ]);
  assert.equal(link.current()?.connectionId, connection.id);
  assert.equal(channel.connectionState, 'connected');

  await stop();
  assert.equal(link.current(), null);
  assert.equal(connection.closeCalls, 1);
  assert.equal(sink.events.length, 6);
});

test('metadata channel reconnects after the socket closes', async () => {
  const first = new FakeConnection(TEXT_URL);
  first.remoteClose(1006, 'gone');
  const second = new FakeConnection(TEXT_URL);
  const connector = new FakeConnector([first, second]);
  const { sink, link, channel, stop } = startChannel(connector);

  await waitFor(() => sink.texts('status').length === 6, 'second connection');
  assert.deepEqual(sink.texts('status'), [
    'Connecting Text WS...',
    'Text WS connected.',
    'Text WS closed (Code: 1006, Reason: gone)',
    'Text WS disconnected. Retrying...',
    'Connecting Text WS...',
    'Text WS connected.',
  ]);
  assert.equal(link.current()?.connectionId, second.id);
  assert.equal(channel.connectAttempts, 2);
  assert.equal(connector.attempts[1].url, TEXT_URL);
  assert.deepEqual(connector.attempts[1].options.keepalive, { intervalMs: 1000, timeoutMs: 500 });
  await stop();
});

test('connect failures are reported and retried', async () => {
  const connector = new FakeConnector([
    new ConnectionRefusedError(TEXT_URL),
    new ConnectTimeoutError(TEXT_URL, 100),
    new Error('boom'),
  ]);
  const { sink, stop } = startChannel(connector);

  await waitFor(() => connector.attempts.length === 4, 'fourth attempt');
  assert.deepEqual(sink.texts('status'), [
    'Connecting Text WS...',
    'Text WS connection refused.',
    'Text WS disconnected. Retrying...',
    'Connecting Text WS...',
    'Text WS connection timeout.',
    'Text WS disconnected. Retrying...',
    'Connecting Text WS...',
    'Text WS disconnected. Retrying...',
    'Connecting Text WS...',
  ]);
  assert.deepEqual(sink.texts('error'), ['Text WS Error: boom']);
  await stop();
});

test('an invalid target fails before any connection attempt', async () => {
  const connector = new FakeConnector();
  const sink = new RecordingSink();
  const channel = new MetadataChannel({
    connector,
    link: new CommandLink(),
    updates: sink,
    clock: systemClock,
    settings: { ...settings, url: 'http://radio.test/text' },
  });

  await assert.rejects(
    channel.run(new AbortController().signal),
    (error: unknown) => error instanceof InvalidTargetError && error.kind === 'fatal',
  );
  assert.equal(connector.attempts.length, 0);
  assert.deepEqual(sink.events, []);
});

test('a record with odd field types still tunes the display', async () => {
  const connection = new FakeConnection(TEXT_URL);
  const odd = JSON.stringify({ freq: '97.300', ps: 'RADIO1', sigTop: null, pi: 4660 });
  connection.pushText(odd);
  connection.pushText('42');
  const { sink, stop } = startChannel(new FakeConnector([connection]));

  await waitFor(() => sink.events.length === 5, 'five updates');
  assert.deepEqual(sink.events, [
    updates.status('Connecting Text WS...'),
    updates.status('Text WS connected.'),
    updates.data(parseRdsMessage(odd).record),
    updates.currentFrequency(97_300),
    updates.error('Invalid metadata record (Text WS).'),
  ]);
  await stop();
});
