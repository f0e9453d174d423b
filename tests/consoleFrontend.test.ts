import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';
import { test } from './testHarness';
import { BoundedQueue } from '../src/shared/queue/boundedQueue';
import { parseRdsMessage } from '../src/domain/radio/rdsRecord';
import { updates, type ControllerCommand, type UpdateEvent } from '../src/ports/ControllerBus';
import { ConsoleFrontend } from '../src/adapters/console/consoleFrontend';
import { formatRecordLine } from '../src/adapters/console/format';
import { TextSink } from './support/textSink';
import { waitFor } from './support/waitFor';

function createFrontend(commandCapacity = 8) {
  const updateQueue = new BoundedQueue<UpdateEvent>(16);
  const commands = new BoundedQueue<ControllerCommand>(commandCapacity);
  const output = new TextSink();
  let quits = 0;
  const frontend = new ConsoleFrontend({
    updates: updateQueue,
    commands,
    output,
    onQuit: () => {
      quits += 1;
    },
  });
  return { frontend, updateQueue, commands, output, quitCount: () => quits };
}

test('updates render as console lines', () => {
  const { frontend } = createFrontend();
  const record = parseRdsMessage('{"ps":"TESTFM","pi":"ABCD"}').record;

  assert.equal(frontend.render(updates.data(record)), formatRecordLine(record, null));
  assert.equal(frontend.render(updates.currentFrequency(97_300)), null);
  assert.equal(frontend.currentFrequencyKhz, 97_300);
  assert.equal(frontend.render(updates.data(record)), formatRecordLine(record, 97_300));
  assert.equal(frontend.render(updates.status('Text WS connected.')), '[status] Text WS connected.');
  assert.equal(frontend.render(updates.streamStatus('Stream: Stopped')), '[stream] Stream: Stopped');
  assert.equal(frontend.render(updates.error('boom')), '[error] boom');
  assert.equal(frontend.render(updates.closed()), 'Controller closed.');
});

test('typed frequencies become tune commands', () => {
  const { frontend, commands, output } = createFrontend();

  assert.equal(frontend.handleInput('  '), 'empty');
  assert.equal(frontend.handleInput('97,3'), 'tune');
  assert.equal(frontend.handleInput('120'), 'rejected');
  assert.equal(frontend.handleInput('abc'), 'rejected');

  assert.deepEqual(commands.tryShift(), { kind: 'tune', frequencyKhz: 97_300 });
  assert.equal(commands.tryShift(), undefined);
  assert.deepEqual(output.lines(), [
    'Tuning to 97.300 MHz...',
    'Invalid frequency: 120 (expected 87.5 to 108.0 MHz)',
    'Invalid frequency: abc (expected 87.5 to 108.0 MHz)',
  ]);
});

test('stepping needs a known frequency and stays in band', () => {
  const { frontend, commands, output } = createFrontend();

  assert.equal(frontend.handleInput('+'), 'rejected');
  frontend.render(updates.currentFrequency(107_950));
  assert.equal(frontend.handleInput('+'), 'tune');
  frontend.render(updates.currentFrequency(87_500));
  assert.equal(frontend.handleInput('-'), 'tune');

  assert.deepEqual(commands.tryShift(), { kind: 'tune', frequencyKhz: 108_000 });
  assert.deepEqual(commands.tryShift(), { kind: 'tune', frequencyKhz: 87_500 });
  assert.deepEqual(output.lines(), [
    'Frequency unknown, cannot step.',
    'Tuning to 108.000 MHz...',
    'Tuning to 87.500 MHz...',
  ]);
});

test('a full command queue rejects the tune', () => {
  const { frontend, output } = createFrontend(1);

  assert.equal(frontend.handleInput('97.3'), 'tune');
  assert.equal(frontend.handleInput('98.1'), 'rejected');
  assert.deepEqual(output.lines(), ['Tuning to 97.300 MHz...', 'Command queue full, try again.']);
});

test('quit asks the controller to stop', () => {
  const { frontend, quitCount } = createFrontend();
  assert.equal(frontend.handleInput('q'), 'quit');
  assert.equal(frontend.handleInput('quit'), 'quit');
  assert.equal(quitCount(), 2);
});

test('the render loop ends on closed', async () => {
  const { frontend, updateQueue, output } = createFrontend();
  updateQueue.tryPush(updates.status('Connecting Text WS...'));
  updateQueue.tryPush(updates.currentFrequency(97_300));
  updateQueue.tryPush(updates.error('boom'));
  updateQueue.tryPush(updates.closed());

  await frontend.run();
  assert.deepEqual(output.lines(), ['[status] Connecting Text WS...', '[error] boom', 'Controller closed.']);
  assert.equal(frontend.currentFrequencyKhz, 97_300);
});

test('stdin lines are handled until detached', async () => {
  const { frontend, commands, quitCount } = createFrontend();
  const input = new PassThrough();
  const detach = frontend.attachInput(input);

  input.write('98.5\nq\n');
  await waitFor(() => quitCount() === 1, 'quit handled');
  assert.deepEqual(commands.tryShift(), { kind: 'tune', frequencyKhz: 98_500 });

  detach();
  input.write('q\n');
  await new Promise((resolve) => setImmediate(resolve));
  assert.equal(quitCount(), 1);
});
