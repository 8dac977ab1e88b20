/**
 * commander argument parsers
 * Parse failures surface through commander's own usage error.
 */

import { InvalidArgumentError } from 'commander';
import type { JsonObject } from '../../../shared/types.js';
import { jsonObjectSchema } from '../../../shared/schemas.js';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/** Parse a JSON object literal such as '{"owner":"placeholder-team"}' */
export function parseJsonObject(value: string): JsonObject {
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError('Not valid JSON.');
  }
  const parsed = jsonObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidArgumentError('Expected a JSON object.');
  }
  return parsed.data;
}
