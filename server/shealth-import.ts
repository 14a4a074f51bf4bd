import * as fs from "node:fs";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import unzipper from "unzipper";
import { UnsafeArchivePathError } from "./errors";
import type { DailyStore, ImportRun } from "./fitness-store";
import type { ShealthConfig } from "./shealth-config";
import { runPedometerPipeline } from "./shealth/runPipeline";
import { makeStepsToKm } from "./shealth/stepsToKm";
import { writeTimelineCsv } from "./shealth/timelineCsv";
import type { PipelineStats } from "./shealth/types";

export const PROCESS_LOG_NAME = "process.log.txt";

export interface ZipUploadResult {
  zipSavedAs: string;
  zipFullPath: string;
  extractedFolderName: string;
  extractedFullPath: string;
  filesExtracted: number;
}

export interface ShealthListing {
  zipFiles: Array<{ fileName: string; fullPath: string; size: number; createdUtc: string }>;
  extracted: Array<{ folderName: string; fullPath: string; createdUtc: string }>;
}

export interface ProcessResult {
  folder: string;
  csv: string;
  log: string;
  inserted: number;
  skipped: number;
  stats: PipelineStats;
  importId: string;
}

export function sanitizeLabel(label: string | undefined | null): string {
  if (!label || !label.trim()) return "upload";
  return label.replace(/[^a-zA-Z0-9._-]+/g, "-");
}

export function formatStamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

/** Joins an archive entry path onto root, refusing anything that lands outside it. */
export function resolveInside(root: string, entryPath: string): string {
  const destRoot = path.resolve(root);
  const relative = entryPath.replace(/[\\/]+/g, path.sep);
  const full = path.resolve(destRoot, relative);
  if (full !== destRoot && !full.startsWith(destRoot + path.sep)) {
    throw new UnsafeArchivePathError(entryPath);
  }
  return full;
}

function uniqueDir(base: string): string {
  let dir = base;
  let i = 2;
  while (fs.existsSync(dir)) {
    dir = `${base}_${i++}`;
  }
  return dir;
}

export async function extractZip(fileBuffer: Buffer, destDir: string): Promise<number> {
  let extracted = 0;
  const zip = Readable.from(fileBuffer).pipe(unzipper.Parse({ forceStream: true }));

  for await (const entry of zip) {
    const typedEntry = entry as unzipper.Entry;
    if (!typedEntry.path) {
      typedEntry.autodrain();
      continue;
    }
    let fullPath: string;
    try {
      fullPath = resolveInside(destDir, typedEntry.path);
    } catch (err) {
      typedEntry.autodrain();
      throw err;
    }
    if (typedEntry.type === "Directory") {
      await fs.promises.mkdir(fullPath, { recursive: true });
      typedEntry.autodrain();
      continue;
    }
    await fs.promises.mkdir(path.dirname(fullPath), { recursive: true });
    await pipeline(typedEntry, fs.createWriteStream(fullPath));
    extracted++;
  }
  return extracted;
}

export async function saveAndExtractZip(
  config: Pick<ShealthConfig, "zipDir" | "rawDir">,
  fileBuffer: Buffer,
  label?: string | null,
  now: Date = new Date(),
): Promise<ZipUploadResult> {
  await fs.promises.mkdir(config.zipDir, { recursive: true });
  await fs.promises.mkdir(config.rawDir, { recursive: true });

  const baseName = `samsunghealth_${sanitizeLabel(label)}_${formatStamp(now)}`;
  const zipFileName = baseName + ".zip";
  const zipPath = path.join(config.zipDir, zipFileName);
  await fs.promises.writeFile(zipPath, fileBuffer);

  const destDir = uniqueDir(path.join(config.rawDir, baseName));
  await fs.promises.mkdir(destDir, { recursive: true });
  let filesExtracted: number;
  try {
    filesExtracted = await extractZip(fileBuffer, destDir);
  } catch (err) {
    await fs.promises.rm(destDir, { recursive: true, force: true });
    throw err;
  }

  console.log(`[shealth] ZIP saved to ${zipPath} and extracted to ${destDir} (${filesExtracted} files)`);
  return {
    zipSavedAs: zipFileName,
    zipFullPath: zipPath,
    extractedFolderName: path.basename(destDir),
    extractedFullPath: destDir,
    filesExtracted,
  };
}

export async function listShealth(config: Pick<ShealthConfig, "zipDir" | "rawDir">): Promise<ShealthListing> {
  await fs.promises.mkdir(config.zipDir, { recursive: true });
  await fs.promises.mkdir(config.rawDir, { recursive: true });

  const zipEntries = await fs.promises.readdir(config.zipDir, { withFileTypes: true });
  const zipFiles = await Promise.all(
    zipEntries
      .filter((e) => e.isFile() && e.name.toLowerCase().endsWith(".zip"))
      .map(async (e) => {
        const fullPath = path.join(config.zipDir, e.name);
        const st = await fs.promises.stat(fullPath);
        return { fileName: e.name, fullPath, size: st.size, createdUtc: st.birthtime.toISOString() };
      }),
  );

  const rawEntries = await fs.promises.readdir(config.rawDir, { withFileTypes: true });
  const extracted = await Promise.all(
    rawEntries
      .filter((e) => e.isDirectory())
      .map(async (e) => {
        const fullPath = path.join(config.rawDir, e.name);
        const st = await fs.promises.stat(fullPath);
        return { folderName: e.name, fullPath, createdUtc: st.birthtime.toISOString() };
      }),
  );

  zipFiles.sort((a, b) => b.createdUtc.localeCompare(a.createdUtc) || a.fileName.localeCompare(b.fileName));
  extracted.sort((a, b) => b.createdUtc.localeCompare(a.createdUtc) || a.folderName.localeCompare(b.folderName));
  return { zipFiles, extracted };
}

/** Absolute path of an extracted export folder, or null when it is missing or not directly under RAW_DATA. */
export function resolveRawFolder(config: Pick<ShealthConfig, "rawDir">, folder: string): string | null {
  if (!folder || folder.includes("/") || folder.includes("\\") || folder === "." || folder === "..") {
    return null;
  }
  const target = path.join(config.rawDir, folder);
  return fs.existsSync(target) && fs.statSync(target).isDirectory() ? target : null;
}

function formatProcessLog(startedAt: Date, folder: string, stats: PipelineStats, csvPath: string): string {
  const lines = [
    `UTC: ${startedAt.toISOString()}`,
    `FOLDER: ${folder}`,
    `CALENDAR: ${stats.calStart}..${stats.calEnd}`,
    `pedometer dirs found: ${stats.pedometerDirs}`,
    `binning files found: ${stats.filesFound}`,
    `records parsed: ${stats.recordsParsed}`,
    `fragments empty: ${stats.fragmentsEmpty}`,
    `fragments unreadable: ${stats.fragmentsUnreadable}`,
    `clusters anchored: ${stats.clustersAnchored}`,
    `clusters unmatched: ${stats.clustersUnmatched}`,
    `dates mapped: ${stats.datesMapped}`,
    `dates outside calendar: ${stats.datesOutsideCalendar}`,
    `duplicates zeroed: ${stats.duplicatesZeroed}`,
    `CSV: ${csvPath}`,
  ];
  return lines.join("\n") + "\n";
}

/**
 * Reconstructs the timeline of one extracted export, writes the CSV and a
 * run log beside it, and inserts the days for the configured user.
 */
export async function processFolder(
  config: ShealthConfig,
  store: DailyStore,
  folder: string,
  targetDir: string,
): Promise<ProcessResult> {
  const startedAt = new Date();
  const { timeline, stats } = await runPedometerPipeline(targetDir, {
    clusters: config.clusters,
    calStart: config.calStart,
    calEnd: config.calEnd,
    stepsToKm: makeStepsToKm(config.stepsToKmCoeffs),
  });

  const csv = await writeTimelineCsv(targetDir, timeline);
  const log = path.join(targetDir, PROCESS_LOG_NAME);
  await fs.promises.writeFile(log, formatProcessLog(startedAt, folder, stats, csv), "utf-8");

  const { inserted, skipped } = await store.insertDays(config.userId, timeline);
  const run: ImportRun = await store.recordImport({
    userId: config.userId,
    folder,
    csvPath: csv,
    dateRangeStart: stats.calStart,
    dateRangeEnd: stats.calEnd,
    rowsInserted: inserted,
    rowsSkipped: skipped,
    stats,
  });
  console.log(`[shealth] processed ${folder}: ${inserted} inserted, ${skipped} skipped`);

  return { folder, csv, log, inserted, skipped, stats, importId: run.id };
}
