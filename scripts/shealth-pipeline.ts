import * as path from "node:path";
import { loadShealthConfig } from "../server/shealth-config";
import { runPedometerPipeline } from "../server/shealth/runPipeline";
import { makeStepsToKm } from "../server/shealth/stepsToKm";
import { writeTimelineCsv } from "../server/shealth/timelineCsv";

// Usage: tsx scripts/shealth-pipeline.ts [rawDataDir] [outputDir]
async function main() {
  const config = loadShealthConfig();
  const rawRoot = path.resolve(process.argv[2] || process.env.SHEALTH_RAW_DATA || config.rawDir);
  const outputDir = path.resolve(process.argv[3] || process.env.SHEALTH_OUTPUT_DIR || rawRoot);

  console.log(`[pipeline] raw data -> ${rawRoot}`);
  const { timeline, stats } = await runPedometerPipeline(rawRoot, {
    clusters: config.clusters,
    calStart: config.calStart,
    calEnd: config.calEnd,
    stepsToKm: makeStepsToKm(config.stepsToKmCoeffs),
  });

  const nonZero = timeline.filter((r) => r.steps > 0).length;
  console.log(`[pipeline] calendar ${stats.calStart}..${stats.calEnd}: ${timeline.length} days, ${nonZero} with steps`);

  const csv = await writeTimelineCsv(outputDir, timeline);
  console.log(`[pipeline] wrote ${csv}`);
}

main().catch((err) => {
  console.error("[pipeline] fatal:", err);
  process.exit(1);
});
