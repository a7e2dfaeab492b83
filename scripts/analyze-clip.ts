/**
 * Evaluate exercise form for every frame of a pose track and print a summary.
 *
 * Usage:
 *   npx tsx scripts/analyze-clip.ts <posetrack.json> [exercise] [side] [config.json]
 *
 * exercise: bicep_curl (default) | lateral_raise
 * side:     left (default) | right
 * config:   optional JSON with { exercise, side, verticalAxis, thresholds };
 *           when given it replaces the exercise and side arguments
 */
import { from } from 'rxjs';
import { loadFormConfigFile, resolveFormConfig } from '../src/config/thresholds';
import { FormSession } from '../src/pipeline/FormSession';
import { LoggerMetricsSink, publishSummary } from '../src/services/MetricsReporter';
import { loadPoseTrack, toPoseFrames } from '../src/services/PoseTrackService';
import { createLogger } from '../src/utils/logger';

const log = createLogger({ component: 'analyze-clip' });

const [posetrackPath, exercise = 'bicep_curl', side = 'left', configPath] =
  process.argv.slice(2);

if (!posetrackPath) {
  console.error(
    'Usage: tsx scripts/analyze-clip.ts <posetrack.json> [exercise] [side] [config.json]'
  );
  process.exit(1);
}

try {
  const config = configPath
    ? loadFormConfigFile(configPath)
    : resolveFormConfig({ exercise, side });
  const track = loadPoseTrack(posetrackPath);

  log.info(
    `Analyzing ${posetrackPath}: ${track.frames.length} frames @ ${track.metadata.fps} fps, ${config.exercise} (${config.side})`
  );

  const session = new FormSession(config);
  session.reports$.subscribe((report) => {
    if ((report.frameIndex + 1) % 30 === 0) {
      log.info(`Processed ${report.frameIndex + 1}/${track.frames.length} frames...`);
    }
  });

  session.run(from(toPoseFrames(track))).subscribe({
    next: (summary) => {
      const pct = (rate: number | null) =>
        rate === null ? 'n/a' : `${(rate * 100).toFixed(1)}%`;

      console.log(`\n========== RESULTS ==========`);
      console.log(`Total frames:      ${summary.totalFrames}`);
      console.log(`Detected frames:   ${summary.detectedFrames}`);
      console.log(`Valid frames:      ${summary.passFrames}`);
      console.log(`Form accuracy:     ${pct(summary.overallPassRate)}`);
      console.log(`Frames w/ unknown: ${pct(summary.unknownFrameRate)}`);
      console.log(`\nPer rule:`);
      for (const rule of summary.rules) {
        const mean = rule.values.mean === null ? 'n/a' : rule.values.mean.toFixed(2);
        console.log(
          `  ${rule.name.padEnd(26)} pass ${pct(rule.passRate).padStart(6)}  ` +
            `(${rule.passes}/${rule.fails}/${rule.unknowns})  mean=${mean}`
        );
      }

      publishSummary(summary, new LoggerMetricsSink());
    },
    error: (error: unknown) => {
      log.error('Analysis failed', error);
      process.exitCode = 1;
    },
  });
} catch (error) {
  log.error('Analysis failed', error);
  process.exitCode = 1;
}
