import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { TimelineEntry } from "./types";

export const TIMELINE_CSV_NAME = "steps_summary_pedometer_fixed.csv";
export const TIMELINE_CSV_HEADER = "date,steps,distance_km";

export function formatTimelineCsv(timeline: readonly TimelineEntry[]): string {
  const rows = [...timeline]
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
    .map((r) => `${r.date},${Math.trunc(r.steps)},${r.distanceKm.toFixed(2)}`);
  return [TIMELINE_CSV_HEADER, ...rows].join("\n") + "\n";
}

export async function writeTimelineCsv(outputDir: string, timeline: readonly TimelineEntry[]): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  const file = path.join(outputDir, TIMELINE_CSV_NAME);
  await fs.writeFile(file, formatTimelineCsv(timeline), "utf-8");
  return file;
}
