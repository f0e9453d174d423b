import { Writable } from 'node:stream';
import { z } from 'zod';
import { ComponentLogger } from '../../src/shared/logging/logger';
import { LOG_LEVELS, type LogLevel } from '../../src/types/logLevel';

const entrySchema = z.object({
  level: z.enum(LOG_LEVELS),
  message: z.string(),
  context: z.record(z.unknown()),
});

export type LogEntry = z.infer<typeof entrySchema>;

/** A logger writing JSON lines into memory. */
export function createCaptureLogger(level: LogLevel = 'spam'): {
  log: ComponentLogger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      for (const line of chunk.toString('utf8').split('\n')) {
        if (line.trim()) {
          entries.push(entrySchema.parse(JSON.parse(line)));
        }
      }
      callback();
    },
  });
  const log = new ComponentLogger({ level, json: true, stdout: sink, stderr: sink }, ['Test']);
  return { log, entries };
}
