import { ConfigError } from "../errors";
import {
  assignDates,
  calendarBoundsFromClusters,
  createBlankTimeline,
  isBetterDay,
  overlayTimeline,
  resolveByDate,
} from "../shealth/buildTimeline";
import { daysBetween } from "../shealth/epochDays";
import { makeRecord } from "./helpers/records";

describe("createBlankTimeline", () => {
  it("covers every day inclusive with zeroed values", () => {
    const rows = createBlankTimeline("2024-02-27", "2024-03-02");
    expect(rows).toEqual([
      { date: "2024-02-27", steps: 0, distanceKm: 0 },
      { date: "2024-02-28", steps: 0, distanceKm: 0 },
      { date: "2024-02-29", steps: 0, distanceKm: 0 },
      { date: "2024-03-01", steps: 0, distanceKm: 0 },
      { date: "2024-03-02", steps: 0, distanceKm: 0 },
    ]);
  });

  it("has length (end - start) + 1 with strictly consecutive dates", () => {
    const ranges: Array<[string, string]> = [
      ["2021-12-14", "2021-12-14"],
      ["2021-12-14", "2022-01-03"],
      ["2019-06-01", "2021-06-01"],
    ];
    for (const [start, end] of ranges) {
      const rows = createBlankTimeline(start, end);
      expect(rows).toHaveLength(daysBetween(start, end) + 1);
      expect(rows[0].date).toBe(start);
      expect(rows[rows.length - 1].date).toBe(end);
      for (let i = 1; i < rows.length; i++) {
        expect(daysBetween(rows[i - 1].date, rows[i].date)).toBe(1);
      }
    }
  });

  it("rejects reversed or invalid bounds", () => {
    expect(() => createBlankTimeline("2024-01-02", "2024-01-01")).toThrow(ConfigError);
    expect(() => createBlankTimeline("2024-01-32", "2024-02-01")).toThrow(ConfigError);
  });
});

describe("calendarBoundsFromClusters", () => {
  it("spans the first cluster day to the last", () => {
    expect(
      calendarBoundsFromClusters([
        { startDate: "2023-05-16", stepSequence: [2470, 9953, 5412] },
        { startDate: "2021-12-14", stepSequence: [4702, 6105, 10453] },
        { startDate: "2025-09-15", stepSequence: [4964, 1247, 2865] },
      ]),
    ).toEqual({ calStart: "2021-12-14", calEnd: "2025-09-17" });
  });

  it("needs at least one cluster", () => {
    expect(() => calendarBoundsFromClusters([])).toThrow(ConfigError);
  });
});

describe("assignDates", () => {
  it("extends backwards, between and forwards one day per index", () => {
    const dates = assignDates(9, [
      { index: 2, date: "2024-01-10" },
      { index: 3, date: "2024-01-11" },
      { index: 6, date: "2024-03-01" },
    ]);
    expect(dates).toEqual([
      "2024-01-08",
      "2024-01-09",
      "2024-01-10",
      "2024-01-11",
      "2024-01-12",
      "2024-01-13",
      "2024-03-01",
      "2024-03-02",
      "2024-03-03",
    ]);
  });

  it("places indices strictly between two anchors strictly between their dates", () => {
    const dates = assignDates(12, [
      { index: 1, date: "2022-06-01" },
      { index: 10, date: "2022-07-01" },
    ]);
    for (let i = 2; i < 10; i++) {
      const d = dates[i] ?? "";
      expect(d > "2022-06-01" && d < "2022-07-01").toBe(true);
      expect(daysBetween("2022-06-01", d)).toBe(i - 1);
    }
  });

  it("dates nothing without anchors", () => {
    expect(assignDates(3, [])).toEqual([null, null, null]);
  });
});

describe("resolveByDate", () => {
  const a = makeRecord({ steps: 800, distanceKm: 0.6 });
  const b = makeRecord({ steps: 800, distanceKm: 0.7 });
  const c = makeRecord({ steps: 500, distanceKm: 2.0 });

  it("keeps the most steps, then the most distance", () => {
    const byDate = resolveByDate([a, b, c], ["2024-01-01", "2024-01-01", "2024-01-01"]);
    expect(byDate.get("2024-01-01")).toEqual({ steps: 800, distanceKm: 0.7 });
  });

  it("gives the same winner whatever the input order", () => {
    const same = ["2024-01-01", "2024-01-01"];
    expect(resolveByDate([a, b], same)).toEqual(resolveByDate([b, a], same));
    expect(resolveByDate([c, a], same)).toEqual(resolveByDate([a, c], same));
  });

  it("ignores undated records", () => {
    expect(resolveByDate([a, c], [null, "2024-01-02"]).size).toBe(1);
  });
});

describe("overlayTimeline", () => {
  it("only raises values and counts dates outside the calendar", () => {
    const timeline = createBlankTimeline("2024-01-01", "2024-01-03");
    timeline[1] = { date: "2024-01-02", steps: 900, distanceKm: 0.5 };
    const byDate = new Map([
      ["2024-01-01", { steps: 100, distanceKm: 0.1 }],
      ["2024-01-02", { steps: 800, distanceKm: 3 }],
      ["2023-12-31", { steps: 50, distanceKm: 0 }],
    ]);

    const outside = overlayTimeline(timeline, byDate);
    expect(outside).toBe(1);
    expect(timeline).toEqual([
      { date: "2024-01-01", steps: 100, distanceKm: 0.1 },
      { date: "2024-01-02", steps: 900, distanceKm: 0.5 },
      { date: "2024-01-03", steps: 0, distanceKm: 0 },
    ]);
  });

  it("replaces on equal steps with more distance", () => {
    expect(isBetterDay({ steps: 10, distanceKm: 1 }, { steps: 10, distanceKm: 0.5 })).toBe(true);
    expect(isBetterDay({ steps: 10, distanceKm: 0.5 }, { steps: 10, distanceKm: 0.5 })).toBe(false);
  });
});
