/**
 * Recursive merge of payload mappings
 */

import { Payload, PayloadValue } from '../../types/payload';

/**
 * Whether a payload value is a nested mapping (not a sequence or a date)
 */
export function isMapping(value: PayloadValue): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Merges `source` into a copy of `target`.
 *
 * Keys present in both are merged recursively when both values are mappings;
 * otherwise the value from `source` wins, sequences included. Neither input is
 * modified.
 */
export function deepMerge(target: Payload, source: Payload): Payload {
  const merged: Payload = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = merged[key];
    merged[key] = isMapping(existing) && isMapping(value) ? deepMerge(existing, value) : value;
  }

  return merged;
}
