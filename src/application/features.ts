import { EventEmitter } from 'node:events';
import { createLogger } from '@/shared/logging/logger';
import type {
  FeatureChange,
  FeatureName,
  FeaturePort,
  FeatureSettings,
} from '@/ports/FeaturePort';

/**
 * Feature switches for one controller run. Features only ever turn off;
 * nothing re-enables them before the next run.
 */
export class FeatureSet implements FeaturePort {
  private readonly log = createLogger('Controller', 'Features');
  private readonly events = new EventEmitter();
  private readonly state: FeatureSettings;

  constructor(initial: FeatureSettings) {
    this.state = {
      playback: { ...initial.playback },
      transcoding: { ...initial.transcoding },
    };
  }

  public isEnabled(feature: FeatureName): boolean {
    return this.state[feature].enabled;
  }

  public isMandatory(feature: FeatureName): boolean {
    return this.state[feature].mandatory;
  }

  public disable(feature: FeatureName, reason: string): boolean {
    const setting = this.state[feature];
    if (!setting.enabled) {
      return false;
    }
    setting.enabled = false;
    this.log.warn('feature disabled for session', { feature, reason });
    this.events.emit('change', { feature, enabled: false, reason } satisfies FeatureChange);
    return true;
  }

  public subscribe(listener: (change: FeatureChange) => void): () => void {
    this.events.on('change', listener);
    return () => this.events.off('change', listener);
  }

  public snapshot(): FeatureSettings {
    return {
      playback: { ...this.state.playback },
      transcoding: { ...this.state.transcoding },
    };
  }
}
