/**
 * Bounded in-memory history of connectivity checks
 */

import { CheckRecord } from '../types';
import { assertInvariant } from '../error-handling';

export const DEFAULT_HISTORY_CAPACITY = 500;

/**
 * Frozen copy with its own Date; freezing a record does not freeze the Date
 * it holds, so stored records never leave the store.
 */
function detach(record: CheckRecord): CheckRecord {
  return Object.freeze({ ...record, timestamp: new Date(record.timestamp.getTime()) });
}

/**
 * Append-only, capacity-bounded buffer of check records, oldest first.
 *
 * The monitor's tick is the only writer. `append()` keeps a private copy and
 * every reader gets frozen copies, so a later append or eviction never changes
 * what a reader holds and a reader can never change the stored history.
 */
export class HistoryStore {
  private records: CheckRecord[] = [];
  private readonly capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    assertInvariant(
      Number.isInteger(capacity) && capacity >= 1,
      `History capacity must be a positive integer, got ${capacity}`,
      'HistoryStore',
      { capacity }
    );
    this.capacity = capacity;
  }

  /**
   * Add a record at the tail, evicting the oldest records past capacity
   */
  append(record: CheckRecord): void {
    const last = this.records[this.records.length - 1];
    if (last) {
      assertInvariant(
        record.timestamp.getTime() >= last.timestamp.getTime(),
        'Check records must be appended in non-decreasing timestamp order',
        'HistoryStore',
        { latest: last.timestamp.toISOString(), attempted: record.timestamp.toISOString() }
      );
    }

    this.records.push(detach(record));

    const overflow = this.records.length - this.capacity;
    if (overflow > 0) {
      this.records.splice(0, overflow);
    }
  }

  /**
   * Point-in-time copy of the history, oldest first
   */
  snapshot(): ReadonlyArray<CheckRecord> {
    return Object.freeze(this.records.map(detach));
  }

  /**
   * Most recent record, if any check has completed
   */
  latest(): CheckRecord | undefined {
    const last = this.records[this.records.length - 1];
    return last ? detach(last) : undefined;
  }

  /**
   * Up to `limit` most recent records, newest first
   */
  recent(limit: number): ReadonlyArray<CheckRecord> {
    if (limit <= 0) {
      return Object.freeze([]);
    }
    return Object.freeze(this.records.slice(-limit).reverse().map(detach));
  }

  size(): number {
    return this.records.length;
  }

  getCapacity(): number {
    return this.capacity;
  }
}
