import type { RdsRecord } from '@/domain/radio/rdsRecord';
import type { BoundedQueue } from '@/shared/queue/boundedQueue';

/** Longest status/error text handed to a front-end. */
export const MAX_EVENT_TEXT_LENGTH = 500;

export type UpdateEvent =
  | { kind: 'data'; record: RdsRecord }
  | { kind: 'status'; text: string }
  | { kind: 'streamStatus'; text: string }
  | { kind: 'currentFrequency'; khz: number }
  | { kind: 'error'; text: string }
  | { kind: 'closed' };

export type UpdateKind = UpdateEvent['kind'];

export type ControllerCommand =
  | { kind: 'tune'; frequencyKhz: number }
  /** Wakes the command forwarder during shutdown. */
  | { kind: 'stop' };

export type UpdateQueue = BoundedQueue<UpdateEvent>;
export type CommandQueue = BoundedQueue<ControllerCommand>;

export interface UpdateSink {
  emit(event: UpdateEvent): void;
}

function capText(text: string): string {
  if (text.length <= MAX_EVENT_TEXT_LENGTH) {
    return text;
  }
  return `${text.slice(0, MAX_EVENT_TEXT_LENGTH - 3)}...`;
}

export const updates = {
  data: (record: RdsRecord): UpdateEvent => ({ kind: 'data', record }),
  status: (text: string): UpdateEvent => ({ kind: 'status', text: capText(text) }),
  streamStatus: (text: string): UpdateEvent => ({ kind: 'streamStatus', text: capText(text) }),
  currentFrequency: (khz: number): UpdateEvent => ({ kind: 'currentFrequency', khz }),
  error: (text: string): UpdateEvent => ({ kind: 'error', text: capText(text) }),
  closed: (): UpdateEvent => ({ kind: 'closed' }),
} as const;
