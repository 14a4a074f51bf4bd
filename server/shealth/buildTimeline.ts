import { ConfigError } from "../errors";
import { daysBetween, fromEpochDay, isValidDateString, shiftDate, toEpochDay } from "./epochDays";
import type { Anchor, Cluster, PedometerRecord, TimelineEntry } from "./types";

export type DayValue = Pick<TimelineEntry, "steps" | "distanceKm">;

export interface CalendarBounds {
  calStart: string;
  calEnd: string;
}

/** Smallest span covering every cluster's days. */
export function calendarBoundsFromClusters(clusters: readonly Cluster[]): CalendarBounds {
  if (clusters.length === 0) {
    throw new ConfigError("Cannot derive calendar bounds without clusters");
  }
  let start = Infinity;
  let end = -Infinity;
  for (const c of clusters) {
    const first = toEpochDay(c.startDate);
    start = Math.min(start, first);
    end = Math.max(end, first + Math.max(1, c.stepSequence.length) - 1);
  }
  return { calStart: fromEpochDay(start), calEnd: fromEpochDay(end) };
}

export function createBlankTimeline(calStart: string, calEnd: string): TimelineEntry[] {
  if (!isValidDateString(calStart) || !isValidDateString(calEnd)) {
    throw new ConfigError(`Invalid calendar bounds ${calStart}..${calEnd}`);
  }
  const days = daysBetween(calStart, calEnd) + 1;
  if (days < 1) {
    throw new ConfigError(`Calendar start ${calStart} is after end ${calEnd}`);
  }
  const first = toEpochDay(calStart);
  const rows: TimelineEntry[] = [];
  for (let k = 0; k < days; k++) {
    rows.push({ date: fromEpochDay(first + k), steps: 0, distanceKm: 0 });
  }
  return rows;
}

/**
 * Dates for every record index, extending the anchors one day per index:
 * backwards from the first, forwards between neighbours, forwards past the last.
 * Without anchors nothing is dated.
 */
export function assignDates(recordCount: number, anchors: readonly Anchor[]): Array<string | null> {
  const dates: Array<string | null> = new Array(recordCount).fill(null);
  const known = [...anchors].filter((a) => a.index >= 0 && a.index < recordCount).sort((a, b) => a.index - b.index);
  if (known.length === 0) return dates;

  const first = known[0];
  for (let i = 0; i < first.index; i++) {
    dates[i] = shiftDate(first.date, -(first.index - i));
  }
  for (let a = 0; a < known.length; a++) {
    const cur = known[a];
    const nextIndex = a + 1 < known.length ? known[a + 1].index : recordCount;
    dates[cur.index] = cur.date;
    for (let i = cur.index + 1; i < nextIndex; i++) {
      dates[i] = shiftDate(cur.date, i - cur.index);
    }
  }
  return dates;
}

export function isBetterDay(candidate: DayValue, current: DayValue): boolean {
  return (
    candidate.steps > current.steps ||
    (candidate.steps === current.steps && candidate.distanceKm > current.distanceKm)
  );
}

/** Keeps the most active record per date: greatest steps, then greatest distance. */
export function resolveByDate(
  records: readonly PedometerRecord[],
  dates: readonly (string | null)[],
): Map<string, DayValue> {
  const byDate = new Map<string, DayValue>();
  records.forEach((rec, i) => {
    const date = dates[i];
    if (!date) return;
    const cur = byDate.get(date);
    if (!cur || isBetterDay(rec, cur)) {
      byDate.set(date, { steps: rec.steps, distanceKm: rec.distanceKm });
    }
  });
  return byDate;
}

/** Writes resolved days into the timeline in place. Returns how many dates fell outside it. */
export function overlayTimeline(timeline: TimelineEntry[], byDate: ReadonlyMap<string, DayValue>): number {
  const idx = new Map<string, number>();
  timeline.forEach((row, i) => idx.set(row.date, i));

  let outside = 0;
  for (const [date, value] of byDate) {
    const i = idx.get(date);
    if (i === undefined) {
      outside++;
      continue;
    }
    if (isBetterDay(value, timeline[i])) {
      timeline[i] = { date, steps: value.steps, distanceKm: value.distanceKm };
    }
  }
  return outside;
}
