import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '@/types/logLevel';

const TRUTHY = ['1', 'true', 'yes', 'on'];
const FALSY = ['0', 'false', 'no', 'off'];

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUTHY.includes(value) || FALSY.includes(value), {
    message: `expected one of ${[...TRUTHY, ...FALSY].join(', ')}`,
  })
  .transform((value) => TRUTHY.includes(value));

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  FFMPEG_PATH: z.preprocess(emptyAsUndefined, z.string().default('ffmpeg')),
  FFPLAY_PATH: z.preprocess(emptyAsUndefined, z.string().default('ffplay')),
  LOG_LEVEL: z.preprocess(emptyAsUndefined, z.enum(LOG_LEVELS).optional()),
  LOG_JSON: z.preprocess(emptyAsUndefined, booleanFlag.optional()),
});

/**
 * Canonical view of the process environment consumed by the controller.
 */
export interface EnvironmentConfig {
  ffmpegPath: string;
  ffplayPath: string;
  logLevel?: LogLevel;
  jsonLogs?: boolean;
}

export class EnvironmentError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment: ${issues.join('; ')}`);
    this.name = 'EnvironmentError';
  }
}

export function loadEnvironment(source: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new EnvironmentError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return {
    ffmpegPath: parsed.data.FFMPEG_PATH,
    ffplayPath: parsed.data.FFPLAY_PATH,
    logLevel: parsed.data.LOG_LEVEL,
    jsonLogs: parsed.data.LOG_JSON,
  };
}
