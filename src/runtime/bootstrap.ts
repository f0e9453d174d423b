import type { AppConfig } from '@/config';
import { createLogger } from '@/shared/logging/logger';
import { BoundedQueue } from '@/shared/queue/boundedQueue';
import type { ClockPort } from '@/ports/ClockPort';
import type { CommandQueue, UpdateQueue } from '@/ports/ControllerBus';
import type { ControllerTask } from '@/ports/ControllerTask';
import type { ProcessLauncher } from '@/ports/MediaProcess';
import type { UpstreamConnector } from '@/ports/Upstream';
import { AudioChannel } from '@/application/channels/audioChannel';
import { MetadataChannel } from '@/application/channels/metadataChannel';
import { CommandForwarder } from '@/application/commandForwarder';
import { CommandLink } from '@/application/commandLink';
import { FeatureSet } from '@/application/features';
import { ProcessRegistry } from '@/application/processRegistry';
import { BroadcastRelay } from '@/application/streaming/broadcastRelay';
import { TranscoderSlot } from '@/application/streaming/transcoderSlot';
import { Supervisor } from '@/application/supervisor';
import { UpdateBus } from '@/application/updateBus';
import { StreamServer } from '@/adapters/http/streamServer';
import { ChildProcessLauncher } from '@/adapters/process/processLauncher';
import { WsUpstreamConnector } from '@/adapters/upstream/wsUpstream';
import { systemClock } from '@/infrastructure/time/systemClock';

/** Seams replaced in tests; production uses ws, child_process and the monotonic clock. */
export type RuntimeOverrides = {
  connector?: UpstreamConnector;
  launcher?: ProcessLauncher;
  clock?: ClockPort;
};

export type Runtime = {
  /** Front-end side of the update channel. */
  updates: UpdateQueue;
  /** Front-end side of the command channel. */
  commands: CommandQueue;
  features: FeatureSet;
  relay: BroadcastRelay;
  streamServer: StreamServer | null;
  start: () => void;
  stop: () => Promise<void>;
  /** Resolves after `closed` was queued. */
  done: Promise<void>;
  /** The fatal failure that ended the run, if any. */
  failure: () => string | null;
};

export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const log = createLogger('Server');
  const updateQueue: UpdateQueue = new BoundedQueue(config.queues.updates);
  const commandQueue: CommandQueue = new BoundedQueue(config.queues.commands);
  const bus = new UpdateBus(updateQueue);
  const features = new FeatureSet(config.features);
  const processes = new ProcessRegistry();
  const link = new CommandLink();
  const slot = new TranscoderSlot();
  const relay = new BroadcastRelay(slot, features, bus, { chunkSize: config.stream.chunkSize });
  const clock = overrides.clock ?? systemClock;
  const connector = overrides.connector ?? new WsUpstreamConnector();
  const launcher = overrides.launcher ?? new ChildProcessLauncher(processes, bus);

  const tasks: ControllerTask[] = [
    new CommandForwarder(commandQueue, link, bus),
    new MetadataChannel({ connector, link, updates: bus, clock, settings: config.metadata }),
    new AudioChannel({
      connector,
      launcher,
      features,
      slot,
      updates: bus,
      clock,
      settings: config.audio,
    }),
  ];

  let streamServer: StreamServer | null = null;
  if (features.isEnabled('transcoding')) {
    streamServer = new StreamServer({ relay, features, updates: bus, config: config.stream });
    tasks.push(relay, streamServer);
  }

  const supervisor = new Supervisor({
    tasks,
    updates: bus,
    commands: commandQueue,
    features,
    processes,
    stopGraceMs: config.stopGraceMs,
  });

  return {
    updates: updateQueue,
    commands: commandQueue,
    features,
    relay,
    streamServer,
    start: () => {
      log.info('starting controller', {
        text: config.metadata.url,
        audio: config.audio.url,
        playback: features.isEnabled('playback'),
        transcoding: features.isEnabled('transcoding'),
      });
      supervisor.start();
    },
    stop: () => supervisor.stop(),
    done: supervisor.done,
    failure: () => supervisor.failure,
  };
}
