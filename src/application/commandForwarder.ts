import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { ConnectionClosedError } from '@/domain/errors';
import { isTunableKhz } from '@/domain/radio/frequency';
import { updates, type CommandQueue, type UpdateSink } from '@/ports/ControllerBus';
import type { ControllerTask } from '@/ports/ControllerTask';
import type { CommandLink } from '@/application/commandLink';

export function encodeTuneCommand(frequencyKhz: number): string {
  return `T${frequencyKhz}`;
}

/**
 * Drains the command channel into the open metadata connection. Commands are
 * never buffered: without an open connection they are reported and dropped.
 */
export class CommandForwarder implements ControllerTask {
  public readonly name = 'commands';
  public readonly restart = 'always';
  private readonly log = createLogger('Controller', 'Commands');

  constructor(
    private readonly commands: CommandQueue,
    private readonly link: CommandLink,
    private readonly sink: UpdateSink,
  ) {}

  public async run(signal: AbortSignal): Promise<void> {
    for (;;) {
      const next = await this.commands.take(signal);
      if (next.kind !== 'item') {
        continue;
      }
      const command = next.item;
      if (command.kind === 'stop') {
        if (signal.aborted) {
          return;
        }
        continue;
      }
      await this.forwardTune(command.frequencyKhz);
    }
  }

  private async forwardTune(frequencyKhz: number): Promise<void> {
    if (!isTunableKhz(frequencyKhz)) {
      this.sink.emit(updates.error(`Rejected tune request: ${frequencyKhz} kHz is outside the FM band.`));
      return;
    }
    const target = this.link.current();
    if (!target) {
      this.log.debug('tune command discarded; no open metadata connection', { frequencyKhz });
      this.sink.emit(updates.status('Text WS not connected, cannot tune.'));
      return;
    }
    try {
      await target.send(encodeTuneCommand(frequencyKhz));
    } catch (error) {
      if (error instanceof ConnectionClosedError) {
        this.sink.emit(updates.status('Text WS closed, cannot send cmd.'));
        this.link.detach(target);
        return;
      }
      this.log.warn('tune command send failed', { frequencyKhz, message: errorMessage(error) });
      this.sink.emit(updates.error(`Send command failed: ${errorMessage(error)}`));
      return;
    }
    this.log.info('tune command sent', { frequencyKhz, connectionId: target.connectionId });
    this.sink.emit(updates.currentFrequency(frequencyKhz));
  }
}
