/**
 * Composite key parsing for frequency records
 *
 * The frequency service keys each record as `"<length>@<start>"`. The
 * span encoded in the key is the only part of a record the paginator
 * interprets.
 *
 * @module composite-key
 */

import { ValidationError } from "../../errors";
import type { CompositeKey, KeySpan } from "../../types";

const COMPOSITE_KEY_PATTERN = /^(\d+)@(\d+)$/;

/**
 * Check whether a string is a well-formed composite key
 */
export function isCompositeKey(key: string): key is CompositeKey {
  return COMPOSITE_KEY_PATTERN.test(key);
}

/**
 * Decode the span of a composite key
 *
 * @throws {ValidationError} When the key is not `"<length>@<start>"`
 *
 * @example
 * ```typescript
 * parseCompositeKey("5@20"); // { length: 5, start: 20, end: 25 }
 * ```
 */
export function parseCompositeKey(key: string): KeySpan {
  const match = COMPOSITE_KEY_PATTERN.exec(key);
  if (match === null) {
    throw new ValidationError(`Malformed composite key '${key}'`, 'Expected "<length>@<start>"');
  }

  const length = Number(match[1]);
  const start = Number(match[2]);
  if (!Number.isSafeInteger(length) || !Number.isSafeInteger(start)) {
    throw new ValidationError(`Composite key '${key}' exceeds the safe integer range`);
  }

  return { length, start, end: start + length };
}

export function formatCompositeKey(length: number, start: number): CompositeKey {
  return `${length}@${start}`;
}
