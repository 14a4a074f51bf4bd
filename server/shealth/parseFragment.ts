import * as fs from "node:fs/promises";
import { FragmentUnreadableError } from "../errors";
import { isValidDateString, msToDate } from "./epochDays";
import { roundKm } from "./stepsToKm";
import type { PedometerRecord, StepsToKm } from "./types";

const BIN_STEP_KEYS = ["mStepCount", "mBestSteps", "count", "steps", "value"];
const AGGREGATE_STEP_KEYS = ["mBestSteps", "mStepCount", "count", "steps", "value"];
const DISTANCE_KEYS = ["mDistance", "distance"];
const DATE_KEYS = ["mBestStepsDate", "mStartTime", "start_time", "day_time", "time", "date", "day_start"];
const CONTAINER_KEYS = ["binning_data", "items", "data"];

// Above this a numeric timestamp is taken as milliseconds, below it as seconds.
const MS_THRESHOLD = 10_000_000_000;

export type ParsedFragment = Pick<PedometerRecord, "steps" | "distanceKm" | "rawDate">;

type JsonObject = { [key: string]: unknown };

function isObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function positiveNumber(obj: JsonObject, key: string): number | null {
  const v = obj[key];
  return typeof v === "number" && Number.isFinite(v) && v > 0 ? v : null;
}

function epochToDate(n: number): string | null {
  return msToDate(n > MS_THRESHOLD ? n : n * 1000);
}

export function parseDateLike(x: unknown): string | null {
  if (typeof x === "number" && Number.isFinite(x)) {
    return epochToDate(x);
  }
  if (typeof x === "string") {
    const iso = x.replace("Z", "").split("T")[0].match(/^(\d{4})-(\d{2})-(\d{2})/);
    if (iso) {
      const date = `${iso[1]}-${iso[2]}-${iso[3]}`;
      if (isValidDateString(date)) return date;
    }
    const compact = x.match(/^(\d{4})(\d{2})(\d{2})$/);
    if (compact) {
      const date = `${compact[1]}-${compact[2]}-${compact[3]}`;
      if (isValidDateString(date)) return date;
    }
    if (/^\d+$/.test(x)) return epochToDate(parseInt(x, 10));
  }
  return null;
}

export function extractDateFromEntry(entry: JsonObject): string | null {
  for (const key of DATE_KEYS) {
    if (key in entry) {
      const date = parseDateLike(entry[key]);
      if (date) return date;
    }
  }
  return null;
}

function finish(steps: number, distanceM: number, rawDate: string | null, toKm: StepsToKm): ParsedFragment | null {
  const distanceKm = roundKm(distanceM > 0 ? distanceM / 1000 : toKm(steps));
  // A few metres round to 0.00 km, which leaves nothing to place on a day.
  if (steps === 0 && distanceKm === 0) return null;
  return { steps, distanceKm, rawDate };
}

function accumulateBins(items: unknown[], toKm: StepsToKm): ParsedFragment | null {
  let totalSteps = 0;
  let totalDistanceM = 0;
  let rawDate: string | null = null;

  for (const entry of items) {
    if (!isObject(entry)) continue;

    for (const key of BIN_STEP_KEYS) {
      const v = positiveNumber(entry, key);
      if (v !== null) {
        totalSteps += Math.trunc(v);
        break;
      }
    }
    for (const key of DISTANCE_KEYS) {
      const v = positiveNumber(entry, key);
      if (v !== null) {
        totalDistanceM += v;
        break;
      }
    }
    if (!rawDate) rawDate = extractDateFromEntry(entry);
  }

  if (totalSteps === 0 && totalDistanceM === 0) return null;
  return finish(totalSteps, totalDistanceM, rawDate, toKm);
}

function parseAggregate(obj: JsonObject, toKm: StepsToKm): ParsedFragment | null {
  let steps = 0;
  for (const key of AGGREGATE_STEP_KEYS) {
    const v = positiveNumber(obj, key);
    if (v !== null) steps += Math.trunc(v);
  }
  let distanceM = 0;
  for (const key of DISTANCE_KEYS) {
    const v = positiveNumber(obj, key);
    if (v !== null) distanceM += v;
  }
  if (steps === 0 && distanceM === 0) return null;
  return finish(steps, distanceM, extractDateFromEntry(obj), toKm);
}

/**
 * Normalizes one decoded binning document. Samsung exports come as a bare list
 * of bins, an object wrapping the list, or a single day aggregate.
 * Returns null when nothing positive was recorded.
 */
export function parseFragmentJson(data: unknown, toKm: StepsToKm): ParsedFragment | null {
  if (Array.isArray(data)) return accumulateBins(data, toKm);
  if (!isObject(data)) return null;

  for (const key of CONTAINER_KEYS) {
    const container = data[key];
    if (Array.isArray(container)) {
      const result = accumulateBins(container, toKm);
      if (result) return result;
      break;
    }
  }
  return parseAggregate(data, toKm);
}

export async function parseFragmentFile(filePath: string, toKm: StepsToKm): Promise<PedometerRecord | null> {
  let data: unknown;
  let modifiedAt: number;
  try {
    let text = await fs.readFile(filePath, "utf-8");
    if (text.charCodeAt(0) === 0xfeff) text = text.slice(1);
    data = JSON.parse(text);
    modifiedAt = Math.trunc((await fs.stat(filePath)).mtimeMs);
  } catch (err) {
    throw new FragmentUnreadableError(filePath, err);
  }

  const parsed = parseFragmentJson(data, toKm);
  if (!parsed) return null;
  return { ...parsed, modifiedAt, source: filePath };
}
