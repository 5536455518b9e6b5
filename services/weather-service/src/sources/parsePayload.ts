import { z } from 'zod';
import { ParseError } from '../errors';

export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  source: string
): z.infer<S> {
  const parsed = schema.safeParse(data);

  if (!parsed.success) {
    throw new ParseError(`${source} schema mismatch`, parsed.error.issues);
  }

  return parsed.data;
}

export function toKph(metresPerSecond: number): number {
  return metresPerSecond * 3.6;
}
