import type { ProcessRegistry } from '@/application/processRegistry';
import type { UpdateSink } from '@/ports/ControllerBus';
import type { MediaProcess, MediaProcessSpec, ProcessLauncher } from '@/ports/MediaProcess';
import { ProcessHandle, type SpawnFn } from '@/adapters/process/processHandle';

/** Spawns media processes and tracks each one for the shutdown safety net. */
export class ChildProcessLauncher implements ProcessLauncher {
  constructor(
    private readonly registry: ProcessRegistry,
    private readonly updates: UpdateSink,
    private readonly spawnFn?: SpawnFn,
  ) {}

  public async launch(spec: MediaProcessSpec): Promise<MediaProcess> {
    const handle = await ProcessHandle.spawn(spec, {
      spawnFn: this.spawnFn,
      updates: this.updates,
    });
    this.registry.track(handle);
    return handle;
  }
}
