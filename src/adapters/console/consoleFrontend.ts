import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { createLogger } from '@/shared/logging/logger';
import { khzToMhzString, mhzToKhz, stepFrequency } from '@/domain/radio/frequency';
import type { CommandQueue, UpdateEvent, UpdateQueue } from '@/ports/ControllerBus';
import { formatRecordLine } from '@/adapters/console/format';

export type ConsoleFrontendDeps = {
  updates: UpdateQueue;
  commands: CommandQueue;
  output: NodeJS.WritableStream;
  onQuit: () => void;
};

export type InputOutcome = 'empty' | 'quit' | 'tune' | 'rejected';

/**
 * Headless front-end: renders controller updates as lines and turns stdin
 * lines into tune commands.
 */
export class ConsoleFrontend {
  private readonly log = createLogger('Console');
  private tunedKhz: number | null = null;

  constructor(private readonly deps: ConsoleFrontendDeps) {}

  public get currentFrequencyKhz(): number | null {
    return this.tunedKhz;
  }

  /** Renders updates until the controller reports `closed`. */
  public async run(signal: AbortSignal = new AbortController().signal): Promise<void> {
    for (;;) {
      const next = await this.deps.updates.take(signal);
      if (next.kind !== 'item') {
        continue;
      }
      const line = this.render(next.item);
      if (line !== null) {
        this.write(line);
      }
      if (next.item.kind === 'closed') {
        return;
      }
    }
  }

  public render(event: UpdateEvent): string | null {
    switch (event.kind) {
      case 'data':
        return formatRecordLine(event.record, this.tunedKhz);
      case 'currentFrequency':
        this.tunedKhz = event.khz;
        return null;
      case 'status':
        return `[status] ${event.text}`;
      case 'streamStatus':
        return `[stream] ${event.text}`;
      case 'error':
        return `[error] ${event.text}`;
      case 'closed':
        return 'Controller closed.';
    }
  }

  public handleInput(raw: string): InputOutcome {
    const line = raw.trim();
    if (!line) {
      return 'empty';
    }
    if (line === 'q' || line === 'quit') {
      this.deps.onQuit();
      return 'quit';
    }
    if (line === '+' || line === '-') {
      if (this.tunedKhz === null) {
        this.write('Frequency unknown, cannot step.');
        return 'rejected';
      }
      return this.tune(stepFrequency(this.tunedKhz, line === '+' ? 1 : -1));
    }
    const khz = mhzToKhz(line);
    if (khz === null) {
      this.write(`Invalid frequency: ${line} (expected 87.5 to 108.0 MHz)`);
      return 'rejected';
    }
    return this.tune(khz);
  }

  /** Feeds lines from `input` into handleInput. Returns a detach function. */
  public attachInput(input: Readable): () => void {
    const lines = createInterface({ input, crlfDelay: Infinity, terminal: false });
    lines.on('line', (line) => {
      this.handleInput(line);
    });
    return () => lines.close();
  }

  private tune(khz: number): InputOutcome {
    if (!this.deps.commands.tryPush({ kind: 'tune', frequencyKhz: khz })) {
      this.log.warn('command queue full; tune request dropped', { frequencyKhz: khz });
      this.write('Command queue full, try again.');
      return 'rejected';
    }
    this.write(`Tuning to ${khzToMhzString(khz)} MHz...`);
    return 'tune';
  }

  private write(line: string): void {
    this.deps.output.write(`${line}\n`);
  }
}
