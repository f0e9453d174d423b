import type { FeatureName } from '@/ports/FeaturePort';

export type TaskName = 'commands' | 'metadata' | 'audio' | 'relay' | 'stream-server';

/**
 * - `always`: respawn after any recoverable failure.
 * - `never`: a failure disables the task's feature (if any) for the session.
 * - `while-feature-enabled`: respawn only while `feature` is still enabled.
 */
export type RestartPolicy = 'always' | 'never' | 'while-feature-enabled';

export interface ControllerTask {
  readonly name: TaskName;
  readonly restart: RestartPolicy;
  readonly feature?: FeatureName;
  run(signal: AbortSignal): Promise<void>;
  /** Called when the task fails and will not be respawned. */
  onAbandoned?(error: unknown): void;
}
