export const DEFAULT_STREAM_PORT = 8080;
export const DEFAULT_STREAM_HOST = '0.0.0.0';
export const STREAM_PATH = '/stream.aac';
export const STREAM_CONTENT_TYPE = 'audio/aac';
export const DEFAULT_BITRATE = '96k';

export type StreamServerConfig = {
  enabled: boolean;
  host: string;
  port: number;
  path: string;
  contentType: string;
  /** Chunks buffered per client before the oldest is dropped. */
  sinkCapacity: number;
  /** A client that receives nothing for this long is disconnected. */
  clientTimeoutMs: number;
  chunkSize: number;
  bitrate: string;
};

export type StreamOverrides = {
  enabled?: boolean;
  host?: string;
  port?: number;
  bitrate?: string;
};

export function buildStreamServerConfig(overrides: StreamOverrides = {}): StreamServerConfig {
  return {
    enabled: overrides.enabled ?? false,
    host: overrides.host ?? DEFAULT_STREAM_HOST,
    port: overrides.port ?? DEFAULT_STREAM_PORT,
    path: STREAM_PATH,
    contentType: STREAM_CONTENT_TYPE,
    sinkCapacity: 10,
    clientTimeoutMs: 30_000,
    chunkSize: 1024,
    bitrate: overrides.bitrate ?? DEFAULT_BITRATE,
  };
}
