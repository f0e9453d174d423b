import type { RdsRecord } from '@/domain/radio/rdsRecord';
import { khzToMhzString, mhzToKhz } from '@/domain/radio/frequency';
import { programTypeName } from '@/domain/radio/programTypes';

function text(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

function flag(value: number | undefined): string {
  return value === 1 ? '*' : '-';
}

function signal(value: number | undefined): string {
  return typeof value === 'number' && Number.isFinite(value) ? `${value.toFixed(1)} dBf` : 'N/A';
}

/**
 * One-line summary of a metadata record. The record's own frequency wins over
 * the last known tuned frequency.
 */
export function formatRecordLine(record: RdsRecord, tunedKhz: number | null): string {
  const khz = mhzToKhz(record.freq) ?? tunedKhz;
  const stereo = record.st === 1 || record.st === true;
  const parts = [
    `${khz === null ? '---.---' : khzToMhzString(khz)} MHz`,
    `PS: ${text(record.ps, '----')}`,
    `PI: ${text(record.pi, '----')}`,
    `PTY: ${programTypeName(record.pty)}`,
    stereo ? 'Stereo' : 'Mono',
    `TP:${flag(record.tp)} TA:${flag(record.ta)}`,
    `Sig: ${signal(record.sig)}`,
  ];

  const radiotext = text(record.rt0, '');
  if (radiotext) {
    parts.push(`RT: ${radiotext}`);
  }
  const tx = record.txInfo;
  const station = text(tx?.tx, '');
  if (station) {
    const location = [tx?.city, tx?.itu]
      .map((part) => part?.trim())
      .filter((part): part is string => Boolean(part))
      .join(', ');
    parts.push(location ? `TX: ${station} (${location})` : `TX: ${station}`);
  }
  return parts.join(' | ');
}
