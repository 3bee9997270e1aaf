import { MalformedResponseError, MissingFieldError, UnknownVerdictError } from '../errors.js';
import type { InterpretedStatus, StatusRecord } from '../types.js';
import { isPlainObject } from '../utils.js';
import { VERDICT_TEXT, isVerdict } from './verdicts.js';

const NAME_FIELD = 'homework_name';
const STATUS_FIELD = 'status';
const UPDATED_FIELD = 'date_updated';

export function interpretStatus(record: unknown): InterpretedStatus {
  const flat = toStatusRecord(record);

  if (!isVerdict(flat.verdictCode)) {
    throw new UnknownVerdictError(flat.verdictCode);
  }

  return {
    subjectId: flat.id,
    verdict: flat.verdictCode,
    text: `Review status changed for "${flat.id}". ${VERDICT_TEXT[flat.verdictCode]}`,
    lastUpdate: flat.lastUpdate ?? null,
  };
}

/** Flattens a raw homework entry; the verdict code is not checked here. */
export function toStatusRecord(record: unknown): StatusRecord {
  if (!isPlainObject(record)) {
    throw new MalformedResponseError('Homework entry must be an object');
  }

  const id = readRequiredString(record, NAME_FIELD);
  const verdictCode = readRequiredString(record, STATUS_FIELD);
  const lastUpdate = readLastUpdate(record);

  return lastUpdate === null ? { id, verdictCode } : { id, verdictCode, lastUpdate };
}

// Largest |seconds| a Date can represent.
const MAX_EPOCH_SEC = 8.64e12;
const HAS_TIME_ZONE = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * `date_updated` as epoch seconds. The API sends ISO-8601 strings; integers
 * are accepted as-is. A date-time string without an offset is read as UTC.
 * Anything else, or a value outside the range of `Date`, counts as absent.
 */
export function readLastUpdate(record: unknown): number | null {
  if (!isPlainObject(record)) {
    return null;
  }

  const value = record[UPDATED_FIELD];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.abs(value) <= MAX_EPOCH_SEC ? Math.floor(value) : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    const iso = trimmed.includes('T') && !HAS_TIME_ZONE.test(trimmed) ? `${trimmed}Z` : trimmed;
    const parsedMs = Date.parse(iso);
    return Number.isNaN(parsedMs) ? null : Math.floor(parsedMs / 1000);
  }
  return null;
}

function readRequiredString(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  if (value === undefined || value === null) {
    throw new MissingFieldError(field);
  }
  if (typeof value !== 'string') {
    throw new MalformedResponseError(`Field "${field}" must be a string, got ${typeof value}`);
  }
  return value;
}
