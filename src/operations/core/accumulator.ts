/**
 * Accumulator for paginated frequency records
 *
 * One instance belongs to exactly one pagination run. Pages are merged as
 * they arrive; identical keys overwrite, since they denote the same
 * variant. The highest covered position is tracked over every key ever
 * merged, not just the latest page, because pages are not guaranteed to
 * arrive in position order.
 */

import type {
  CompositeKey,
  FrequencyRecord,
  FrequencyResultSet,
  FrequencySummary,
} from "../../types";
import { ValidationError } from "../../errors";
import { isCompositeKey, parseCompositeKey } from "./composite-key";

export class FrequencyAccumulator {
  private readonly records = new Map<CompositeKey, FrequencyRecord>();
  private maxEnd: number | undefined;

  /**
   * Merge one page of results
   *
   * @param results - `results` mapping of a frequency response
   * @returns Number of keys not seen on an earlier page
   * @throws {ValidationError} On a malformed composite key; nothing from the page is merged
   */
  merge(results: Readonly<Record<string, FrequencyRecord>>): number {
    const parsed: Array<[CompositeKey, number, FrequencyRecord]> = [];
    for (const [key, record] of Object.entries(results)) {
      if (!isCompositeKey(key)) {
        throw new ValidationError(`Malformed composite key '${key}'`, 'Expected "<length>@<start>"');
      }
      parsed.push([key, parseCompositeKey(key).end, record]);
    }

    let added = 0;
    for (const [key, end, record] of parsed) {
      if (!this.records.has(key)) added++;
      this.records.set(key, record);
      if (this.maxEnd === undefined || end > this.maxEnd) {
        this.maxEnd = end;
      }
    }
    return added;
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Start of the next interval to query: one past the highest covered position
   *
   * @returns undefined while nothing has been merged
   */
  nextStart(): number | undefined {
    return this.maxEnd === undefined ? undefined : this.maxEnd + 1;
  }

  /**
   * Hand the records over as a read-only map
   */
  toResultSet(): FrequencyResultSet {
    return new Map(this.records);
  }
}

/**
 * Count and covered span of a result set
 */
export function summarizeRecords(records: FrequencyResultSet): FrequencySummary {
  let firstStart: number | undefined;
  let lastEnd: number | undefined;

  for (const key of records.keys()) {
    const { start, end } = parseCompositeKey(key);
    if (firstStart === undefined || start < firstStart) firstStart = start;
    if (lastEnd === undefined || end > lastEnd) lastEnd = end;
  }

  if (firstStart === undefined || lastEnd === undefined) {
    return { count: 0 };
  }
  return { count: records.size, firstStart, lastEnd };
}
