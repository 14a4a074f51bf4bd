import * as fs from "node:fs/promises";
import { glob } from "glob";
import { errorMessage } from "../errors";
import { parseFragmentFile } from "./parseFragment";
import type { DiscoveryStats, PedometerRecord, StepsToKm } from "./types";

export const PEDOMETER_DIR_NAME = "com.samsung.shealth.tracker.pedometer_day_summary";
export const JSONS_DIR_NAME = "jsons";
export const FRAGMENT_SUFFIX = ".binning_data.json";

const DEFAULT_CONCURRENCY = 32;

export interface DiscoverOptions {
  stepsToKm: StepsToKm;
  concurrency?: number;
}

export interface DiscoveryResult {
  records: PedometerRecord[];
  stats: DiscoveryStats;
}

/** Every `.../jsons/com.samsung.shealth.tracker.pedometer_day_summary` directory below root, sorted. */
export async function findPedometerDirs(root: string): Promise<string[]> {
  const rootStat = await fs.stat(root);
  if (!rootStat.isDirectory()) {
    throw new Error(`Not a directory: ${root}`);
  }
  const matches = await glob(`**/${JSONS_DIR_NAME}/${PEDOMETER_DIR_NAME}`, { cwd: root, withFileTypes: true });
  return matches
    .filter((p) => p.isDirectory())
    .map((p) => p.fullpath())
    .sort();
}

export async function findFragmentFiles(pedometerDir: string): Promise<string[]> {
  const files = await glob(`**/*${FRAGMENT_SUFFIX}`, { cwd: pedometerDir, absolute: true, nodir: true });
  return files.sort();
}

/**
 * Collects records from every pedometer folder of every export under root.
 * Fragments are parsed concurrently; the returned list is in path order and
 * must go through orderRecords before anchoring.
 */
export async function discoverRecords(root: string, options: DiscoverOptions): Promise<DiscoveryResult> {
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const pedometerDirs = await findPedometerDirs(root);
  console.log(`[discovery] pedometer dirs found: ${pedometerDirs.length}`);

  const files: string[] = [];
  for (const dir of pedometerDirs) {
    files.push(...(await findFragmentFiles(dir)));
  }
  console.log(`[discovery] binning files found: ${files.length}`);

  const stats: DiscoveryStats = {
    pedometerDirs: pedometerDirs.length,
    filesFound: files.length,
    recordsParsed: 0,
    fragmentsEmpty: 0,
    fragmentsUnreadable: 0,
  };

  const slots: Array<PedometerRecord | null> = new Array(files.length).fill(null);
  for (let start = 0; start < files.length; start += concurrency) {
    const batch = files.slice(start, start + concurrency);
    await Promise.all(
      batch.map(async (file, offset) => {
        try {
          const record = await parseFragmentFile(file, options.stepsToKm);
          if (record) {
            slots[start + offset] = record;
            stats.recordsParsed++;
          } else {
            stats.fragmentsEmpty++;
          }
        } catch (err) {
          stats.fragmentsUnreadable++;
          console.warn(`[discovery] skipped ${file}: ${errorMessage(err)}`);
        }
      }),
    );
  }

  const records = slots.filter((r): r is PedometerRecord => r !== null);
  console.log(
    `[discovery] parsed=${stats.recordsParsed} empty=${stats.fragmentsEmpty} unreadable=${stats.fragmentsUnreadable}`,
  );
  return { records, stats };
}
