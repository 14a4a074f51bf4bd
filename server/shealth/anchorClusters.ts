import { shiftDate, toEpochDay } from "./epochDays";
import type { Anchor, Cluster, PedometerRecord } from "./types";

export interface ClusterMatch {
  cluster: Cluster;
  startIndex: number;
}

export interface AnchorResult {
  anchors: Anchor[];
  matched: ClusterMatch[];
  unmatched: Cluster[];
}

/** First index >= startAt where the steps of records[i..i+L-1] equal sequence element-wise. */
export function findSequenceIndexAfter(
  records: readonly Pick<PedometerRecord, "steps">[],
  sequence: readonly number[],
  startAt: number,
): number | null {
  const len = sequence.length;
  if (len === 0) return null;
  for (let i = Math.max(0, startAt); i + len <= records.length; i++) {
    let ok = true;
    for (let j = 0; j < len; j++) {
      if (records[i + j].steps !== sequence[j]) {
        ok = false;
        break;
      }
    }
    if (ok) return i;
  }
  return null;
}

export function sortClusters(clusters: readonly Cluster[]): Cluster[] {
  return [...clusters].sort((a, b) => toEpochDay(a.startDate) - toEpochDay(b.startDate));
}

/**
 * Binds record indices to calendar dates. Clusters are tried oldest first and
 * the search window only moves forward, so matched ranges never overlap and
 * never go back in record order.
 */
export function anchorClusters(records: readonly PedometerRecord[], clusters: readonly Cluster[]): AnchorResult {
  const anchors: Anchor[] = [];
  const matched: ClusterMatch[] = [];
  const unmatched: Cluster[] = [];
  let searchFrom = 0;

  for (const cluster of sortClusters(clusters)) {
    const startIndex = findSequenceIndexAfter(records, cluster.stepSequence, searchFrom);
    if (startIndex === null) {
      console.warn(`[anchor] cluster ${cluster.startDate} [${cluster.stepSequence.join(", ")}] not found`);
      unmatched.push(cluster);
      continue;
    }
    cluster.stepSequence.forEach((_, k) => {
      anchors.push({ index: startIndex + k, date: shiftDate(cluster.startDate, k) });
    });
    matched.push({ cluster, startIndex });
    searchFrom = startIndex + cluster.stepSequence.length;
    console.log(`[anchor] cluster ${cluster.startDate} matched at index ${startIndex}`);
  }

  return { anchors, matched, unmatched };
}
