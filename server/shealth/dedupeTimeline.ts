import type { TimelineEntry } from "./types";

export interface DedupeResult {
  timeline: TimelineEntry[];
  zeroed: number;
}

/**
 * The same non-zero step count on two different days is the sensor reporting a
 * day twice. The chronologically first day keeps it; later days are zeroed.
 */
export function dedupeAcrossDates(timeline: readonly TimelineEntry[]): DedupeResult {
  const seen = new Set<number>();
  let zeroed = 0;
  const out = [...timeline]
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
    .map((row) => {
      if (row.steps === 0) return row;
      if (seen.has(row.steps)) {
        zeroed++;
        return { date: row.date, steps: 0, distanceKm: 0 };
      }
      seen.add(row.steps);
      return row;
    });
  return { timeline: out, zeroed };
}
