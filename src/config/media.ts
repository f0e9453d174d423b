import type { MediaProcessSpec } from '@/ports/MediaProcess';

/** Low-latency MP3 playback from stdin, no window. */
export function buildPlayerSpec(command: string): MediaProcessSpec {
  return {
    role: 'player',
    command,
    args: [
      '-probesize', '32',
      '-analyzeduration', '0',
      '-fflags', 'nobuffer',
      '-flags', 'low_delay',
      '-f', 'mp3',
      '-',
      '-nodisp',
      '-autoexit',
      '-loglevel', 'error',
    ],
    captureStdout: false,
  };
}

/** MP3 on stdin to ADTS-framed AAC on stdout. */
export function buildTranscoderSpec(command: string, bitrate: string): MediaProcessSpec {
  return {
    role: 'transcoder',
    command,
    args: [
      '-hide_banner',
      '-loglevel', 'error',
      '-probesize', '32',
      '-analyzeduration', '0',
      '-f', 'mp3',
      '-i', '-',
      '-c:a', 'aac',
      '-b:a', bitrate,
      '-f', 'adts',
      '-avioflags', 'direct',
      '-flush_packets', '1',
      '-',
    ],
    captureStdout: true,
  };
}
