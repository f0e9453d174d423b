import { InvalidTargetError } from '@/domain/errors';
import type { AudioChannelSettings } from '@/application/channels/audioChannel';
import type { MetadataChannelSettings } from '@/application/channels/metadataChannel';
import type { MediaProcessSpec } from '@/ports/MediaProcess';

export const AUDIO_PATH = '/audio';
export const TEXT_PATH = '/text';

export const RECONNECT_INTERVAL_MS = 5000;
export const SETTLE_DELAY_MS = 500;
export const TEXT_HANDSHAKE_TIMEOUT_MS = 10_000;
export const TEXT_KEEPALIVE_INTERVAL_MS = 20_000;
export const TEXT_KEEPALIVE_TIMEOUT_MS = 10_000;
export const AUDIO_HANDSHAKE_TIMEOUT_MS = 15_000;
export const AUDIO_RECEIVE_TIMEOUT_MS = 15_000;
export const AUDIO_PING_TIMEOUT_MS = 5000;
export const KILL_GRACE_MS = 2000;

export interface UpstreamEndpoints {
  secure: boolean;
  host: string;
  port: number;
  /** `host:port`, as shown to the user. */
  netloc: string;
  audioUrl: string;
  textUrl: string;
}

/**
 * Turns `host[:port]` or an http(s)/ws(s) URL into the two channel URIs.
 * https and wss map to wss; everything else maps to ws.
 */
export function parseServerAddress(input: string): UpstreamEndpoints {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidTargetError(input, 'server address is empty');
  }
  const withScheme = trimmed.includes('://') ? trimmed : `http://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new InvalidTargetError(input, 'could not parse server address');
  }
  if (!url.hostname) {
    throw new InvalidTargetError(input, 'could not determine hostname');
  }

  const scheme = url.protocol.replace(/:$/, '').toLowerCase();
  const secure = scheme === 'https' || scheme === 'wss';
  // URL drops a port that matches the scheme default.
  const port = url.port ? Number(url.port) : secure ? 443 : 80;
  const netloc = `${url.hostname}:${port}`;
  const wsScheme = secure ? 'wss' : 'ws';
  return {
    secure,
    host: url.hostname,
    port,
    netloc,
    audioUrl: `${wsScheme}://${netloc}${AUDIO_PATH}`,
    textUrl: `${wsScheme}://${netloc}${TEXT_PATH}`,
  };
}

export function buildMetadataChannelSettings(endpoints: UpstreamEndpoints): MetadataChannelSettings {
  return {
    url: endpoints.textUrl,
    reconnectIntervalMs: RECONNECT_INTERVAL_MS,
    settleDelayMs: SETTLE_DELAY_MS,
    handshakeTimeoutMs: TEXT_HANDSHAKE_TIMEOUT_MS,
    keepalive: {
      intervalMs: TEXT_KEEPALIVE_INTERVAL_MS,
      timeoutMs: TEXT_KEEPALIVE_TIMEOUT_MS,
    },
  };
}

export function buildAudioChannelSettings(
  endpoints: UpstreamEndpoints,
  media: { player: MediaProcessSpec; transcoder: MediaProcessSpec },
): AudioChannelSettings {
  return {
    url: endpoints.audioUrl,
    reconnectIntervalMs: RECONNECT_INTERVAL_MS,
    settleDelayMs: SETTLE_DELAY_MS,
    handshakeTimeoutMs: AUDIO_HANDSHAKE_TIMEOUT_MS,
    receiveTimeoutMs: AUDIO_RECEIVE_TIMEOUT_MS,
    pingTimeoutMs: AUDIO_PING_TIMEOUT_MS,
    killGraceMs: KILL_GRACE_MS,
    player: media.player,
    transcoder: media.transcoder,
  };
}
