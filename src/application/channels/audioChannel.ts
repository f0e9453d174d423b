import { createLogger } from '@/shared/logging/logger';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import { sleep } from '@/shared/abort';
import {
  ConnectTimeoutError,
  ConnectionRefusedError,
  ControllerError,
  ExecutableNotFoundError,
  MandatoryFeatureError,
  ProcessWriteError,
  classifyFailure,
  isAbortError,
} from '@/domain/errors';
import { parseWebSocketTarget } from '@/domain/upstreamTarget';
import { updates, type UpdateSink } from '@/ports/ControllerBus';
import type { ClockPort } from '@/ports/ClockPort';
import type { ControllerTask } from '@/ports/ControllerTask';
import type { FeatureName, FeaturePort } from '@/ports/FeaturePort';
import {
  describeExit,
  isExpectedExit,
  type MediaProcess,
  type MediaProcessSpec,
  type ProcessLauncher,
} from '@/ports/MediaProcess';
import type { UpstreamConnection, UpstreamConnector } from '@/ports/Upstream';
import { ReconnectGate } from '@/application/channels/reconnectGate';
import type { ChannelState } from '@/application/channels/metadataChannel';
import type { TranscoderSlot } from '@/application/streaming/transcoderSlot';

/** Asks the source to send MP3 frames on the audio socket. */
export const FALLBACK_REQUEST = JSON.stringify({ type: 'fallback', data: 'mp3' });

const BROKEN_PIPE_YIELD_MS = 100;

export type AudioChannelSettings = {
  url: string;
  reconnectIntervalMs: number;
  settleDelayMs: number;
  handshakeTimeoutMs: number;
  receiveTimeoutMs: number;
  pingTimeoutMs: number;
  killGraceMs: number;
  player: MediaProcessSpec;
  transcoder: MediaProcessSpec;
};

export type AudioChannelDeps = {
  connector: UpstreamConnector;
  launcher: ProcessLauncher;
  features: FeaturePort;
  slot: TranscoderSlot;
  updates: UpdateSink;
  clock: ClockPort;
  settings: AudioChannelSettings;
};

type Attempt = {
  player: MediaProcess | null;
  transcoder: MediaProcess | null;
  playerInputBroken: boolean;
};

/**
 * Reconnecting audio socket feeding the local player and the AAC transcoder.
 * Every connection attempt owns the processes it started and tears them down
 * before the next one.
 */
export class AudioChannel implements ControllerTask {
  public readonly name = 'audio';
  public readonly restart = 'always';
  private readonly log = createLogger('Upstream', 'Audio');
  private readonly gate: ReconnectGate;
  private state: ChannelState = 'disconnected';
  private attempts = 0;

  constructor(private readonly deps: AudioChannelDeps) {
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
    parseWebSocketTarget(settings.url);

    while (!signal.aborted) {
      await this.gate.waitTurn(signal);
      this.attempts += 1;
      this.state = 'connecting';
      this.status('Connecting Audio WS...');

      const attempt: Attempt = { player: null, transcoder: null, playerInputBroken: false };
      let connection: UpstreamConnection | null = null;
      try {
        connection = await this.deps.connector.connect(settings.url, {
          handshakeTimeoutMs: settings.handshakeTimeoutMs,
          signal,
        });
        this.state = 'connected';
        this.log.info('audio socket connected', { url: connection.url, connectionId: connection.id });
        this.status('Audio WS connected.');
        await connection.send(FALLBACK_REQUEST);

        await this.startPlayer(attempt);
        await this.startTranscoder(attempt);
        await this.pump(connection, attempt, signal);
      } catch (error) {
        if (signal.aborted || isAbortError(error) || classifyFailure(error) === 'fatal') {
          throw error;
        }
        this.reportFailure(error);
      } finally {
        this.state = 'closing';
        await this.teardown(attempt);
        if (connection) {
          const open = connection;
          await bestEffort(() => open.close(), {
            fallback: undefined,
            onError: 'debug',
            label: 'audio socket close failed',
            log: this.log,
          });
        }
        this.state = 'disconnected';
      }

      this.status('Audio stream disconnected. Retrying...');
      await sleep(settings.settleDelayMs, signal);
    }
  }

  private async startPlayer(attempt: Attempt): Promise<void> {
    const { features, launcher, settings } = this.deps;
    if (!features.isEnabled('playback')) {
      return;
    }
    this.status('Starting audio player (ffplay)...');
    try {
      attempt.player = await launcher.launch(settings.player);
    } catch (error) {
      this.handleLaunchFailure('playback', error);
    }
  }

  private async startTranscoder(attempt: Attempt): Promise<void> {
    const { features, launcher, settings, slot } = this.deps;
    if (!features.isEnabled('transcoding')) {
      return;
    }
    this.status('Starting AAC encoder (ffmpeg)...');
    try {
      const transcoder = await launcher.launch(settings.transcoder);
      attempt.transcoder = transcoder;
      slot.publish(transcoder);
    } catch (error) {
      this.handleLaunchFailure('transcoding', error);
    }
  }

  /**
   * A missing executable is fatal for a mandatory feature and switches an
   * optional one off. Other spawn failures abort this attempt.
   */
  private handleLaunchFailure(feature: FeatureName, error: unknown): void {
    const { features } = this.deps;
    if (!(error instanceof ExecutableNotFoundError)) {
      if (feature === 'transcoding') {
        this.log.error('transcoder failed to start', { message: errorMessage(error) });
        this.emitError(`Failed to start ffmpeg: ${errorMessage(error)}. Streaming disabled.`);
        features.disable('transcoding', errorMessage(error));
        return;
      }
      throw error;
    }

    const executable = error.executable;
    if (features.isMandatory(feature)) {
      this.emitError(`Fatal: '${executable}' command not found.`);
      throw new MandatoryFeatureError(`'${executable}' is required for ${feature} but was not found`, error);
    }
    this.log.warn('optional executable missing; feature disabled', { executable, feature });
    if (feature === 'transcoding') {
      this.deps.updates.emit(updates.streamStatus(`Stream: disabled (${executable} not found)`));
      this.emitError(`'${executable}' not found. Cannot stream.`);
    } else {
      this.status(`'${executable}' not found. Playback disabled.`);
    }
    features.disable(feature, `${executable} not found`);
  }

  private async pump(
    connection: UpstreamConnection,
    attempt: Attempt,
    signal: AbortSignal,
  ): Promise<void> {
    const { settings } = this.deps;
    for (;;) {
      if (this.playerExited(attempt)) {
        return;
      }
      await this.checkTranscoder(attempt);

      const next = await connection.receive(signal, settings.receiveTimeoutMs);
      if (next.kind === 'timeout') {
        this.status('Audio WS recv timeout, pinging...');
        if (!(await connection.ping(settings.pingTimeoutMs))) {
          this.log.warn('audio socket ping timed out', { timeoutMs: settings.pingTimeoutMs });
          this.status('Audio WS ping timeout.');
          return;
        }
        continue;
      }
      if (next.kind === 'closed') {
        this.log.info('audio socket closed', { code: next.code, reason: next.reason });
        this.status(`Audio WS closed (Code: ${next.code})`);
        return;
      }
      const { message } = next;
      if (message.kind !== 'binary') {
        this.log.debug('ignoring text frame on audio socket', { length: message.text.length });
        continue;
      }
      if (message.data.length === 0) {
        continue;
      }
      await this.feed(attempt, message.data, signal);
    }
  }

  /** True when the player exited; the attempt ends so it is respawned. */
  private playerExited(attempt: Attempt): boolean {
    const player = attempt.player;
    if (!player) {
      return false;
    }
    const exit = player.exitStatus();
    if (exit) {
      if (isExpectedExit(exit)) {
        this.status(`${player.name} stopped.`);
      } else {
        this.log.error('player exited unexpectedly', { pid: player.pid, exit: describeExit(exit) });
        this.emitError(`${player.name} exited unexpectedly (${describeExit(exit)}).`);
      }
      attempt.player = null;
      return true;
    }
    if (attempt.playerInputBroken || !this.deps.features.isEnabled('playback')) {
      if (attempt.playerInputBroken) {
        this.emitError(`${player.name} stdin pipe broken. Playback disabled.`);
        this.deps.features.disable('playback', 'player input broken');
      }
      attempt.player = null;
      this.retire(player);
    }
    return false;
  }

  private async checkTranscoder(attempt: Attempt): Promise<void> {
    const transcoder = attempt.transcoder;
    if (!transcoder) {
      return;
    }
    const exit = transcoder.exitStatus();
    if (exit) {
      if (isExpectedExit(exit)) {
        this.deps.updates.emit(updates.streamStatus('Stream: Encoder stopped.'));
      } else {
        this.log.error('transcoder exited unexpectedly', { pid: transcoder.pid, exit: describeExit(exit) });
        this.emitError(`${transcoder.name} exited unexpectedly (${describeExit(exit)}). Streaming stopped.`);
      }
      this.deps.features.disable('transcoding', 'transcoder exited');
      attempt.transcoder = null;
      this.deps.slot.clear(transcoder);
      return;
    }
    if (!this.deps.features.isEnabled('transcoding')) {
      attempt.transcoder = null;
      this.deps.slot.clear(transcoder);
      await transcoder.stop(this.deps.settings.killGraceMs);
    }
  }

  private async feed(attempt: Attempt, frame: Buffer, signal: AbortSignal): Promise<void> {
    const { player, transcoder } = attempt;
    let playerBroke = false;
    if (player && !attempt.playerInputBroken) {
      try {
        await player.write(frame);
      } catch (error) {
        if (!(error instanceof ProcessWriteError)) {
          throw error;
        }
        // The next exit check decides between respawn and disabling playback.
        this.log.debug('player write failed', { message: error.message });
        attempt.playerInputBroken = true;
        playerBroke = true;
      }
    }

    if (transcoder) {
      await this.feedTranscoder(attempt, transcoder, frame);
    }
    if (playerBroke) {
      await sleep(BROKEN_PIPE_YIELD_MS, signal);
    }
  }

  private async feedTranscoder(attempt: Attempt, transcoder: MediaProcess, frame: Buffer): Promise<void> {
    try {
      await transcoder.write(frame);
    } catch (error) {
      if (!(error instanceof ProcessWriteError)) {
        throw error;
      }
      if (transcoder.exitStatus()) {
        await this.checkTranscoder(attempt);
        return;
      }
      this.log.warn('transcoder write failed; streaming disabled', { message: error.message });
      this.emitError(`${error.message}. Stopping stream.`);
      this.deps.features.disable('transcoding', error.message);
      attempt.transcoder = null;
      this.deps.slot.clear(transcoder);
      this.retire(transcoder);
    }
  }

  private retire(proc: MediaProcess): void {
    void bestEffort(() => proc.stop(this.deps.settings.killGraceMs), {
      fallback: null,
      onError: 'debug',
      label: 'retiring media process failed',
      context: { name: proc.name },
      log: this.log,
    });
  }

  private async teardown(attempt: Attempt): Promise<void> {
    const running = [attempt.player, attempt.transcoder].filter(
      (proc): proc is MediaProcess => proc !== null,
    );
    attempt.player = null;
    attempt.transcoder = null;
    await Promise.all(
      running.map(async (proc) => {
        await proc.stop(this.deps.settings.killGraceMs);
        if (proc.role === 'transcoder') {
          this.deps.slot.clear(proc);
        }
      }),
    );
  }

  private reportFailure(error: unknown): void {
    if (error instanceof ConnectionRefusedError) {
      this.log.info('audio socket refused', { url: error.target });
      this.status('Audio WS connection refused.');
      return;
    }
    if (error instanceof ConnectTimeoutError) {
      this.log.info('audio socket handshake timed out', { timeoutMs: error.timeoutMs });
      this.status('Audio WS connection timeout.');
      return;
    }
    this.log.warn('audio attempt failed', { message: errorMessage(error) });
    this.emitError(
      error instanceof ControllerError ? error.message : `Audio WS Error: ${errorMessage(error)}`,
    );
  }

  private status(text: string): void {
    this.deps.updates.emit(updates.status(text));
  }

  private emitError(text: string): void {
    this.deps.updates.emit(updates.error(text));
  }
}
