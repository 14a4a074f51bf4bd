import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { FragmentUnreadableError } from "../errors";
import { msToDate } from "../shealth/epochDays";
import { parseDateLike, parseFragmentFile, parseFragmentJson } from "../shealth/parseFragment";

const perThousand = (steps: number) => steps / 1000;

describe("parseFragmentJson", () => {
  it("accumulates a list of bins", () => {
    const result = parseFragmentJson(
      [
        { mStepCount: 100, mDistance: 80, mStartTime: 1639440000000 },
        { mStepCount: 250, mDistance: 200 },
        "junk",
        { count: 0, steps: 50 },
      ],
      perThousand,
    );
    expect(result).toEqual({ steps: 400, distanceKm: 0.28, rawDate: "2021-12-14" });
  });

  it("reads the list under a container key and derives distance from steps", () => {
    const result = parseFragmentJson({ binning_data: [{ steps: 1000 }, { value: 500 }] }, perThousand);
    expect(result).toEqual({ steps: 1500, distanceKm: 1.5, rawDate: null });
  });

  it("falls back to the single-object aggregate when the container is empty", () => {
    const result = parseFragmentJson(
      { items: [], mBestSteps: 321, distance: 250, mBestStepsDate: "2023-05-16T00:00:00.000Z" },
      perThousand,
    );
    expect(result).toEqual({ steps: 321, distanceKm: 0.25, rawDate: "2023-05-16" });
  });

  it("sums every positive step field of an aggregate", () => {
    expect(parseFragmentJson({ mBestSteps: 100, steps: 200 }, perThousand)).toEqual({
      steps: 300,
      distanceKm: 0.3,
      rawDate: null,
    });
  });

  it("truncates fractional step counts", () => {
    expect(parseFragmentJson([{ steps: 12.7, distance: 9 }], perThousand)?.steps).toBe(12);
  });

  it("keeps a distance-only fragment", () => {
    expect(parseFragmentJson({ data: [{ mDistance: 1500 }] }, perThousand)).toEqual({
      steps: 0,
      distanceKm: 1.5,
      rawDate: null,
    });
  });

  it("returns null for fragments with nothing positive", () => {
    expect(parseFragmentJson([], perThousand)).toBeNull();
    expect(parseFragmentJson({ count: 0, mDistance: -4 }, perThousand)).toBeNull();
    expect(parseFragmentJson("text", perThousand)).toBeNull();
    expect(parseFragmentJson(null, perThousand)).toBeNull();
  });

  it("returns null when the distance rounds to zero and there are no steps", () => {
    expect(parseFragmentJson([{ mDistance: 3 }], perThousand)).toBeNull();
    expect(parseFragmentJson({ distance: 4.9 }, perThousand)).toBeNull();
    expect(parseFragmentJson([{ mDistance: 8 }], perThousand)).toEqual({ steps: 0, distanceKm: 0.01, rawDate: null });
  });
});

describe("parseDateLike", () => {
  it("reads epoch seconds and milliseconds", () => {
    expect(parseDateLike(1639440000)).toBe("2021-12-14");
    expect(parseDateLike(1639440000000)).toBe("2021-12-14");
    expect(parseDateLike("1639440000000")).toBe("2021-12-14");
  });

  it("reads the date part of ISO strings", () => {
    expect(parseDateLike("2021-12-14T10:00:00Z")).toBe("2021-12-14");
    expect(parseDateLike("2021-12-14")).toBe("2021-12-14");
  });

  it("reads compact yyyymmdd strings as calendar dates", () => {
    expect(parseDateLike("20211214")).toBe("2021-12-14");
    expect(parseDateLike("20210230")).toBe(msToDate(20210230 * 1000));
  });

  it("rejects anything else", () => {
    expect(parseDateLike("garbage")).toBeNull();
    expect(parseDateLike("2021-02-30")).toBeNull();
    expect(parseDateLike(undefined)).toBeNull();
    expect(parseDateLike({})).toBeNull();
  });
});

describe("parseFragmentFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "fragment-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("builds a record with mtime and source", async () => {
    const file = path.join(dir, "a.binning_data.json");
    fs.writeFileSync(file, "\uFEFF" + JSON.stringify([{ mStepCount: 4702 }]));
    const mtime = new Date(Date.UTC(2022, 0, 2, 3, 4, 5));
    fs.utimesSync(file, mtime, mtime);

    const record = await parseFragmentFile(file, perThousand);
    expect(record).toEqual({
      steps: 4702,
      distanceKm: 4.7,
      rawDate: null,
      modifiedAt: mtime.getTime(),
      source: file,
    });
  });

  it("returns null for an empty fragment", async () => {
    const file = path.join(dir, "empty.binning_data.json");
    fs.writeFileSync(file, JSON.stringify({ binning_data: [] }));
    await expect(parseFragmentFile(file, perThousand)).resolves.toBeNull();
  });

  it("raises FragmentUnreadableError on invalid JSON or a missing file", async () => {
    const bad = path.join(dir, "bad.binning_data.json");
    fs.writeFileSync(bad, "{not json");
    await expect(parseFragmentFile(bad, perThousand)).rejects.toBeInstanceOf(FragmentUnreadableError);
    await expect(parseFragmentFile(path.join(dir, "missing.json"), perThousand)).rejects.toBeInstanceOf(
      FragmentUnreadableError,
    );
  });
});
