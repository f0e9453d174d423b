import { z } from 'zod';
import { MalformedRecordError } from '@/domain/errors';
import { mhzToKhz } from '@/domain/radio/frequency';

/** A field of the wrong type is dropped instead of failing the record. */
function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

const text = () => lenient(z.string());
const numeric = () => lenient(z.number());
const numberOrText = () => lenient(z.union([z.number(), z.string()]));

export const transmitterSchema = z
  .object({
    tx: text(),
    city: text(),
    itu: text(),
    erp: numberOrText(),
    pol: text(),
    dist: numberOrText(),
    azi: numberOrText(),
  })
  .passthrough();

/**
 * Metadata record pushed by the source on its text socket. Any JSON object is
 * a record; known fields with an unexpected type read as absent, and anything
 * else is carried through untouched.
 */
export const rdsRecordSchema = z
  .object({
    freq: lenient(z.union([z.string(), z.number().transform(String)])),
    ps: text(),
    pi: text(),
    pty: lenient(z.number().int().min(0).max(31)),
    rt0: text(),
    rt1: text(),
    tp: numeric(),
    ta: numeric(),
    st: lenient(z.union([z.number(), z.boolean()])),
    ms: numeric(),
    users: numeric(),
    sig: numeric(),
    sigTop: numeric(),
    dist: numberOrText(),
    azi: numberOrText(),
    txInfo: lenient(transmitterSchema),
  })
  .passthrough();

export type RdsRecord = z.infer<typeof rdsRecordSchema>;
export type TransmitterInfo = z.infer<typeof transmitterSchema>;

export type ParsedRecord = {
  record: RdsRecord;
  /** Tuned frequency in kHz when `freq` is present and inside the band. */
  frequencyKhz: number | null;
};

/**
 * Decodes one text frame. Throws `MalformedRecordError` for invalid JSON or
 * a payload that is not a JSON object.
 */
export function parseRdsMessage(raw: string): ParsedRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new MalformedRecordError('Invalid JSON received (Text WS).', error);
  }
  const parsed = rdsRecordSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedRecordError('Invalid metadata record (Text WS).', parsed.error);
  }
  return { record: parsed.data, frequencyKhz: mhzToKhz(parsed.data.freq) };
}
