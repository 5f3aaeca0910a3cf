import { z } from 'zod';
import { Envelope } from '../types/index.js';

const EnvelopeSchema = z.object({
  meta: z
    .object({
      rc: z.string(),
      msg: z.string().optional(),
    })
    .passthrough(),
  // Passed through untouched; only a missing `data` is normalised
  data: z.unknown().default([]),
});

/**
 * Decodes a controller response body. Returns `undefined` when the body is
 * not JSON or does not carry a `{ meta, data }` envelope.
 */
export function parseEnvelope(text: string): Envelope | undefined {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return undefined;
  }

  const result = EnvelopeSchema.safeParse(json);
  if (!result.success) {
    return undefined;
  }
  return { meta: result.data.meta, data: result.data.data };
}
