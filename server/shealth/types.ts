export type StepsToKm = (steps: number) => number;

export interface PedometerRecord {
  steps: number;
  distanceKm: number;
  /** ISO yyyy-mm-dd as found in the fragment; "1970-01-01" marks an untrusted value. */
  rawDate: string | null;
  /** Fragment mtime, epoch milliseconds. */
  modifiedAt: number;
  source: string;
}

export interface Cluster {
  startDate: string;
  stepSequence: number[];
}

export interface TimelineEntry {
  date: string;
  steps: number;
  distanceKm: number;
}

export interface Anchor {
  index: number;
  date: string;
}

export type DiscoveryStats = {
  pedometerDirs: number;
  filesFound: number;
  recordsParsed: number;
  fragmentsEmpty: number;
  fragmentsUnreadable: number;
};

export type PipelineStats = DiscoveryStats & {
  clustersAnchored: number;
  clustersUnmatched: number;
  datesMapped: number;
  datesOutsideCalendar: number;
  duplicatesZeroed: number;
  calStart: string;
  calEnd: string;
};
