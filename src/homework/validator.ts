import { z } from 'zod';
import { MalformedResponseError, MissingFieldError } from '../errors.js';
import type { StatusEnvelope } from '../types.js';
import { isPlainObject } from '../utils.js';

const envelopeSchema = z.object({
  homeworks: z.array(z.unknown()),
  current_date: z.number().int().nonnegative().nullish(),
});

/**
 * Checks the response envelope only. Individual homework entries are passed
 * through untouched; the interpreter validates the one it acts on.
 */
export function validateResponse(raw: unknown): StatusEnvelope {
  if (!isPlainObject(raw)) {
    throw new MalformedResponseError(`API response must be an object, got ${describeType(raw)}`);
  }

  if (raw.homeworks === undefined) {
    throw new MissingFieldError('homeworks');
  }

  const parsed = envelopeSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'response';
    throw new MalformedResponseError(`Unexpected API response shape at "${field}": ${issue?.message ?? 'invalid'}`);
  }

  return {
    homeworks: parsed.data.homeworks,
    currentDate: parsed.data.current_date ?? null,
  };
}

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}
