/**
 * Metrics Reporter
 *
 * Hands a finalized SessionSummary to an experiment-tracking sink. The core
 * knows nothing about the tracking backend; anything that can record named
 * params and numeric metrics can be a sink.
 */

import type { SessionSummary } from '../analyzers/FormReport';
import { createLogger, type Logger } from '../utils/logger';

export interface MetricsSink {
  logParam(key: string, value: string | number): void;
  logMetric(key: string, value: number): void;
}

/**
 * Sink that writes params and metrics through the project logger
 */
export class LoggerMetricsSink implements MetricsSink {
  constructor(
    private readonly logger: Logger = createLogger({ component: 'Metrics' })
  ) {}

  logParam(key: string, value: string | number): void {
    this.logger.info(`param ${key}=${value}`);
  }

  logMetric(key: string, value: number): void {
    this.logger.info(`metric ${key}=${Number.isInteger(value) ? value : value.toFixed(4)}`);
  }
}

/**
 * Publish a summary as params (exercise, side) and metrics (frame counts,
 * accuracy, per-rule pass rates and value statistics). Rates that are
 * undefined for this clip are left out.
 */
export function publishSummary(summary: SessionSummary, sink: MetricsSink): void {
  sink.logParam('exercise_type', summary.exercise);
  sink.logParam('side', summary.side);

  sink.logMetric('total_frames_processed', summary.totalFrames);
  sink.logMetric('detected_frames', summary.detectedFrames);
  sink.logMetric('undetected_frames', summary.undetectedFrames);
  sink.logMetric('valid_frames', summary.passFrames);
  if (summary.overallPassRate !== null) {
    sink.logMetric('accuracy_percent', summary.overallPassRate * 100);
  }
  if (summary.unknownFrameRate !== null) {
    sink.logMetric('unknown_frame_rate', summary.unknownFrameRate);
  }

  for (const rule of summary.rules) {
    if (rule.passRate !== null) {
      sink.logMetric(`${rule.name}_pass_rate`, rule.passRate);
    }
    if (rule.values.mean !== null) {
      sink.logMetric(`avg_${rule.name}`, rule.values.mean);
    }
    if (rule.values.std !== null) {
      sink.logMetric(`std_${rule.name}`, rule.values.std);
    }
  }
}
