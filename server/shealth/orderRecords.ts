import { EPOCH_SENTINEL_DATE, epochMsOfDate, isValidDateString } from "./epochDays";
import type { PedometerRecord } from "./types";

/**
 * Sort key in epoch milliseconds: the fragment's own date at UTC midnight when
 * it is trustworthy, its mtime otherwise.
 */
export function recordSortKey(record: PedometerRecord): number {
  const rd = record.rawDate;
  if (rd && rd !== EPOCH_SENTINEL_DATE && isValidDateString(rd)) {
    return epochMsOfDate(rd);
  }
  return record.modifiedAt;
}

export function compareRecords(a: PedometerRecord, b: PedometerRecord): number {
  const diff = recordSortKey(a) - recordSortKey(b);
  if (diff !== 0) return diff;
  if (a.source < b.source) return -1;
  if (a.source > b.source) return 1;
  return 0;
}

export function orderRecords(records: readonly PedometerRecord[]): PedometerRecord[] {
  return [...records].sort(compareRecords);
}
