import { concat, defer, type Observable, of, Subject } from 'rxjs';
import { ignoreElements, tap } from 'rxjs/operators';
import type { FormConfig, FormConfigInput } from '../config/thresholds';
import { createFormEvaluator, type FormEvaluator } from '../analyzers/FormEvaluator';
import type { FrameReport, SessionSummary } from '../analyzers/FormReport';
import { SessionAggregator } from '../analyzers/SessionAggregator';
import type { LandmarkSet } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger({ component: 'FormSession' });

/**
 * One frame handed over by the pose detector. `landmarks` is null when the
 * detector found no person in the frame.
 */
export interface PoseFrame {
  index: number;
  /** Milliseconds from clip start */
  timestamp?: number;
  landmarks: LandmarkSet | null;
}

/**
 * Wires a clip's frames through the evaluator and the aggregator.
 *
 * Pipeline flow: PoseFrame → FormEvaluator.evaluate() → FrameReport →
 * SessionAggregator.record() → SessionSummary
 *
 * Every stage is synchronous; a frame is fully evaluated and recorded
 * before the next one is taken from the source. Reports are re-emitted on
 * reports$ for annotation consumers.
 */
export class FormSession {
  private readonly evaluator: FormEvaluator;
  private readonly aggregator: SessionAggregator;
  private readonly reportSubject = new Subject<FrameReport>();
  private summary: SessionSummary | null = null;

  /** FrameReports in frame order; completes when the session finishes */
  readonly reports$: Observable<FrameReport> = this.reportSubject.asObservable();

  /**
   * @throws InvalidConfigurationError before any frame is processed
   */
  constructor(config: FormConfigInput | FormConfig) {
    this.evaluator = createFormEvaluator(config);
    const { exercise, side } = this.evaluator.getConfig();
    this.aggregator = new SessionAggregator({ exercise, side });
  }

  getEvaluator(): FormEvaluator {
    return this.evaluator;
  }

  /**
   * Evaluate, record and publish one frame.
   */
  processFrame(frame: PoseFrame): FrameReport {
    const report = this.evaluator.evaluate(frame.landmarks ?? {}, {
      index: frame.index,
      timestamp: frame.timestamp,
    });
    this.aggregator.record(report);
    this.reportSubject.next(report);
    return report;
  }

  /**
   * Process every frame of `frames$` and emit the summary once the source
   * completes. Errors from the source are propagated without a summary.
   */
  run(frames$: Observable<PoseFrame>): Observable<SessionSummary> {
    return concat(
      frames$.pipe(
        tap((frame) => this.processFrame(frame)),
        ignoreElements()
      ),
      defer(() => of(this.finish()))
    );
  }

  /**
   * Finalize the aggregator and complete reports$. Idempotent.
   */
  finish(): SessionSummary {
    if (this.summary) return this.summary;

    this.summary = this.aggregator.finalize();
    this.reportSubject.complete();

    const { totalFrames, detectedFrames, overallPassRate } = this.summary;
    log.info(
      `Finished ${this.summary.exercise} (${this.summary.side}): ` +
        `${totalFrames} frames, ${detectedFrames} detected, ` +
        `pass rate ${overallPassRate === null ? 'n/a' : `${(overallPassRate * 100).toFixed(1)}%`}`,
      { action: 'finish' }
    );
    return this.summary;
  }
}
