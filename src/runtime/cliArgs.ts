import { parseArgs } from 'node:util';
import type { CliOptions } from '@/config';
import { LOG_LEVELS, type LogLevel } from '@/types/logLevel';

export const USAGE = `Usage: fmdx-relay <server-address> [options]

Connects to an FM-DX webserver, plays its audio and can re-serve it as AAC.

Arguments:
  server-address        host[:port], http(s)://host[:port] or ws(s)://host[:port]

Options:
  -s, --stream          also serve the audio as AAC over HTTP
  -p, --port <port>     stream server port (default 8080)
      --restream-only   serve the stream without local playback (implies --stream)
      --bitrate <rate>  AAC bitrate passed to ffmpeg (default 96k)
      --log-level <lvl> ${LOG_LEVELS.join(', ')}
      --json-logs       write log lines as JSON
  -h, --help            show this help`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CliParseResult = { kind: 'help' } | { kind: 'run'; options: CliOptions };

const BITRATE = /^\d+[kKmM]?$/;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parsePort(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new CliUsageError(`invalid port: ${raw}`);
  }
  const port = Number(raw);
  if (port < 1 || port > 65535) {
    throw new CliUsageError(`port out of range: ${raw}`);
  }
  return port;
}

export function parseCliArgs(argv: readonly string[]): CliParseResult {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
  const { values, positionals } = parsed;

  if (values.help) {
    return { kind: 'help' };
  }
  if (positionals.length === 0) {
    throw new CliUsageError('missing server address');
  }
  if (positionals.length > 1) {
    throw new CliUsageError(`unexpected argument: ${positionals[1]}`);
  }
  const serverAddress = positionals[0].trim();
  if (!serverAddress) {
    throw new CliUsageError('missing server address');
  }

  const logLevel = values['log-level'];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new CliUsageError(`invalid log level: ${logLevel}`);
  }
  const bitrate = values.bitrate;
  if (bitrate !== undefined && !BITRATE.test(bitrate)) {
    throw new CliUsageError(`invalid bitrate: ${bitrate}`);
  }

  const restreamOnly = values['restream-only'] ?? false;
  return {
    kind: 'run',
    options: {
      serverAddress,
      stream: (values.stream ?? false) || restreamOnly,
      restreamOnly,
      port: values.port === undefined ? undefined : parsePort(values.port),
      bitrate,
      logLevel,
      jsonLogs: values['json-logs'] ?? false,
    },
  };
}

function parseRaw(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      stream: { type: 'boolean', short: 's' },
      port: { type: 'string', short: 'p' },
      'restream-only': { type: 'boolean' },
      bitrate: { type: 'string' },
      'log-level': { type: 'string' },
      'json-logs': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
