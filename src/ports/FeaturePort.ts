/**
 * Session feature switches. `transcoding` covers the transcoder process,
 * the broadcast relay and the client server.
 */
export type FeatureName = 'playback' | 'transcoding';

export type FeatureSpec = {
  enabled: boolean;
  mandatory: boolean;
};

export type FeatureSettings = Record<FeatureName, FeatureSpec>;

export type FeatureChange = {
  feature: FeatureName;
  enabled: boolean;
  reason: string;
};

export interface FeaturePort {
  isEnabled(feature: FeatureName): boolean;
  isMandatory(feature: FeatureName): boolean;
  /** Turns a feature off for the rest of the session. Returns false if it was already off. */
  disable(feature: FeatureName, reason: string): boolean;
  subscribe(listener: (change: FeatureChange) => void): () => void;
}
