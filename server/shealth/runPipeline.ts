import { anchorClusters } from "./anchorClusters";
import {
  assignDates,
  calendarBoundsFromClusters,
  createBlankTimeline,
  overlayTimeline,
  resolveByDate,
  type CalendarBounds,
} from "./buildTimeline";
import { dedupeAcrossDates } from "./dedupeTimeline";
import { discoverRecords } from "./discoverRecords";
import { orderRecords } from "./orderRecords";
import { stepsToKm as defaultStepsToKm } from "./stepsToKm";
import type { Cluster, DiscoveryStats, PedometerRecord, PipelineStats, StepsToKm, TimelineEntry } from "./types";

export interface TimelineOptions {
  clusters: readonly Cluster[];
  calStart?: string;
  calEnd?: string;
}

export interface PipelineOptions extends TimelineOptions {
  stepsToKm?: StepsToKm;
  concurrency?: number;
}

export type ReconstructionStats = Omit<PipelineStats, keyof DiscoveryStats>;

export interface ReconstructionResult {
  timeline: TimelineEntry[];
  stats: ReconstructionStats;
}

export interface PipelineResult {
  timeline: TimelineEntry[];
  stats: PipelineStats;
}

export function resolveCalendarBounds(options: TimelineOptions): CalendarBounds {
  if (options.calStart && options.calEnd) {
    return { calStart: options.calStart, calEnd: options.calEnd };
  }
  const derived = calendarBoundsFromClusters(options.clusters);
  return {
    calStart: options.calStart ?? derived.calStart,
    calEnd: options.calEnd ?? derived.calEnd,
  };
}

/**
 * Anchors, interpolates, overlays and dedupes an already ordered record list.
 * The calendar is built before anything else so an empty or unanchored input
 * still yields every day of the range.
 */
export function reconstructTimeline(ordered: readonly PedometerRecord[], options: TimelineOptions): ReconstructionResult {
  const { calStart, calEnd } = resolveCalendarBounds(options);
  const timeline = createBlankTimeline(calStart, calEnd);

  const { anchors, matched, unmatched } = anchorClusters(ordered, options.clusters);
  const dates = assignDates(ordered.length, anchors);
  const byDate = resolveByDate(ordered, dates);
  console.log(`[pipeline] mapped dates from records: ${byDate.size}`);

  const datesOutsideCalendar = overlayTimeline(timeline, byDate);
  const deduped = dedupeAcrossDates(timeline);

  return {
    timeline: deduped.timeline,
    stats: {
      clustersAnchored: matched.length,
      clustersUnmatched: unmatched.length,
      datesMapped: byDate.size,
      datesOutsideCalendar,
      duplicatesZeroed: deduped.zeroed,
      calStart,
      calEnd,
    },
  };
}

export async function runPedometerPipeline(rootDir: string, options: PipelineOptions): Promise<PipelineResult> {
  const toKm = options.stepsToKm ?? defaultStepsToKm;
  // Validates the bounds before touching the filesystem.
  resolveCalendarBounds(options);

  const discovery = await discoverRecords(rootDir, { stepsToKm: toKm, concurrency: options.concurrency });
  const ordered = orderRecords(discovery.records);
  const { timeline, stats } = reconstructTimeline(ordered, options);

  console.log(
    `[pipeline] ${discovery.stats.filesFound} fragments, ${discovery.stats.recordsParsed} parsed, ` +
      `${stats.clustersAnchored}/${options.clusters.length} clusters anchored, ${stats.duplicatesZeroed} duplicates zeroed`,
  );
  return { timeline, stats: { ...discovery.stats, ...stats } };
}
