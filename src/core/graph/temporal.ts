import type { ISODateString } from '../../shared/types.js';
import { InvalidArgumentError } from '../../shared/errors.js';

export interface ValidityInterval {
  valid_from: ISODateString;
  valid_to: ISODateString | null;
}

/**
 * Whether a relationship was in effect at `asOf` (epoch ms):
 * valid_from <= asOf < valid_to, with a null valid_to open-ended.
 * Unparseable bounds never match.
 */
export function isActive(edge: ValidityInterval, asOf: number): boolean {
  const from = Date.parse(edge.valid_from);
  if (Number.isNaN(from) || from > asOf) return false;
  if (edge.valid_to === null) return true;
  const to = Date.parse(edge.valid_to);
  return !Number.isNaN(to) && to > asOf;
}

/**
 * Normalize a caller-supplied as-of value. Missing means `now()`.
 */
export function parseAsOf(value: string | Date | undefined, now: () => Date = () => new Date()): Date {
  if (value === undefined) return now();
  const date = typeof value === 'string' ? new Date(value) : value;
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Invalid as_of timestamp: ${String(value)}`);
  }
  return date;
}
