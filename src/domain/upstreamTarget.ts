import { InvalidTargetError } from '@/domain/errors';

/** Parses a channel URI; anything but an absolute ws/wss URL with a host is fatal. */
export function parseWebSocketTarget(target: string): URL {
  let url: URL;
  try {
    url = new URL(target);
  } catch (error) {
    throw new InvalidTargetError(target, error instanceof Error ? error.message : 'not a URL');
  }
  if (url.protocol !== 'ws:' && url.protocol !== 'wss:') {
    throw new InvalidTargetError(target, `unsupported scheme ${url.protocol.replace(/:$/, '')}`);
  }
  if (!url.hostname) {
    throw new InvalidTargetError(target, 'missing host');
  }
  return url;
}
