import type { PedometerRecord } from "../../shealth/types";

const BASE_MTIME = Date.UTC(2020, 0, 1);

/** An ordered stream with no trustworthy dates: mtimes one minute apart, in the given order. */
export function makeStream(steps: number[]): PedometerRecord[] {
  return steps.map((s, i) => ({
    steps: s,
    distanceKm: Math.round(s * 0.75) / 1000,
    rawDate: null,
    modifiedAt: BASE_MTIME + i * 60_000,
    source: `/exports/f${String(i).padStart(3, "0")}.binning_data.json`,
  }));
}

export function makeRecord(overrides: Partial<PedometerRecord> = {}): PedometerRecord {
  return {
    steps: 1000,
    distanceKm: 0.75,
    rawDate: null,
    modifiedAt: BASE_MTIME,
    source: "/exports/a.binning_data.json",
    ...overrides,
  };
}

export function silenceConsole(): void {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });
  afterEach(() => {
    jest.restoreAllMocks();
  });
}
