const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

export const EPOCH_SENTINEL_DATE = "1970-01-01";

export function isValidDateString(date: string): boolean {
  const m = date.match(DATE_REGEX);
  if (!m) return false;
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return d.toISOString().slice(0, 10) === date;
}

export function toEpochDay(date: string): number {
  if (!isValidDateString(date)) {
    throw new RangeError(`Invalid calendar date "${date}"`);
  }
  return Math.floor(Date.parse(date + "T00:00:00Z") / MS_PER_DAY);
}

export function fromEpochDay(day: number): string {
  return new Date(day * MS_PER_DAY).toISOString().slice(0, 10);
}

export function shiftDate(date: string, offset: number): string {
  return fromEpochDay(toEpochDay(date) + offset);
}

export function daysBetween(from: string, to: string): number {
  return toEpochDay(to) - toEpochDay(from);
}

export function epochMsOfDate(date: string): number {
  return toEpochDay(date) * MS_PER_DAY;
}

export function msToDate(ms: number): string | null {
  const d = new Date(ms);
  if (isNaN(d.getTime())) return null;
  return d.toISOString().slice(0, 10);
}
