import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
import { buildPlayerSpec, buildTranscoderSpec } from '@/config/media';
import { buildStreamServerConfig, type StreamServerConfig } from '@/config/stream';
import {
  buildAudioChannelSettings,
  buildMetadataChannelSettings,
  parseServerAddress,
  type UpstreamEndpoints,
} from '@/config/upstream';
import type { AudioChannelSettings } from '@/application/channels/audioChannel';
import type { MetadataChannelSettings } from '@/application/channels/metadataChannel';
import type { FeatureSettings } from '@/ports/FeaturePort';
import type { LogLevel } from '@/types/logLevel';

export const DEFAULT_STOP_GRACE_MS = 7000;
export const UPDATE_QUEUE_CAPACITY = 256;
export const COMMAND_QUEUE_CAPACITY = 32;

/** What the command line contributes; see runtime/cliArgs. */
export type CliOptions = {
  serverAddress: string;
  stream: boolean;
  restreamOnly: boolean;
  port?: number;
  bitrate?: string;
  logLevel?: LogLevel;
  jsonLogs: boolean;
};

export type AppConfig = {
  env: EnvironmentConfig;
  endpoints: UpstreamEndpoints;
  features: FeatureSettings;
  metadata: MetadataChannelSettings;
  audio: AudioChannelSettings;
  stream: StreamServerConfig;
  logging: { level: LogLevel; json: boolean };
  queues: { updates: number; commands: number };
  stopGraceMs: number;
};

/**
 * Restream-only runs without local playback; the stream server is on
 * whenever transcoding is requested.
 */
export function resolveFeatures(options: Pick<CliOptions, 'stream' | 'restreamOnly'>): FeatureSettings {
  const streaming = options.stream || options.restreamOnly;
  return {
    playback: { enabled: !options.restreamOnly, mandatory: !options.restreamOnly },
    transcoding: { enabled: streaming, mandatory: false },
  };
}

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 * CLI flags win over the environment.
 */
export const loadConfig = (
  options: CliOptions,
  source: NodeJS.ProcessEnv = process.env,
): AppConfig => {
  const env = loadEnvironment(source);
  const endpoints = parseServerAddress(options.serverAddress);
  const features = resolveFeatures(options);
  const stream = buildStreamServerConfig({
    enabled: features.transcoding.enabled,
    port: options.port,
    bitrate: options.bitrate,
  });
  return {
    env,
    endpoints,
    features,
    metadata: buildMetadataChannelSettings(endpoints),
    audio: buildAudioChannelSettings(endpoints, {
      player: buildPlayerSpec(env.ffplayPath),
      transcoder: buildTranscoderSpec(env.ffmpegPath, stream.bitrate),
    }),
    stream,
    logging: {
      level: options.logLevel ?? env.logLevel ?? 'info',
      json: options.jsonLogs || (env.jsonLogs ?? false),
    },
    queues: { updates: UPDATE_QUEUE_CAPACITY, commands: COMMAND_QUEUE_CAPACITY },
    stopGraceMs: DEFAULT_STOP_GRACE_MS,
  };
};
