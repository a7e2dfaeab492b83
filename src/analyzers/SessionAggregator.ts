/**
 * SessionAggregator - append-only accumulation of frame reports.
 *
 * Frames are recorded strictly in order by a single processing loop.
 * Counters only ever increase; finalize() returns a frozen snapshot and
 * closes the session to further recording.
 */

import type { ExerciseType, RuleScope } from '../types/exercise';
import type { Side } from '../types';
import type {
  FrameReport,
  RuleSummary,
  SessionSummary,
  ValueStats,
} from './FormReport';

/**
 * Welford's online mean/variance
 */
class RunningStats {
  private count = 0;
  private mean = 0;
  private m2 = 0;
  private min = Infinity;
  private max = -Infinity;

  push(value: number): void {
    this.count++;
    const delta = value - this.mean;
    this.mean += delta / this.count;
    this.m2 += delta * (value - this.mean);
    this.min = Math.min(this.min, value);
    this.max = Math.max(this.max, value);
  }

  snapshot(): ValueStats {
    if (this.count === 0) {
      return { count: 0, mean: null, std: null, min: null, max: null };
    }
    return {
      count: this.count,
      mean: this.mean,
      std: Math.sqrt(this.m2 / this.count),
      min: this.min,
      max: this.max,
    };
  }
}

interface RuleTally {
  scope: RuleScope;
  passes: number;
  fails: number;
  unknowns: number;
  stats: RunningStats;
}

export interface SessionInfo {
  exercise: ExerciseType;
  side: Side;
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

export class SessionAggregator {
  private totalFrames = 0;
  private undetectedFrames = 0;
  private passFrames = 0;
  private failFrames = 0;
  private unknownFrames = 0;
  private framesWithUnknown = 0;

  // Map keeps first-seen rule order
  private readonly rules = new Map<string, RuleTally>();

  private summary: SessionSummary | null = null;

  constructor(private readonly session: SessionInfo) {}

  /**
   * Add one frame's report to the running totals.
   *
   * @throws Error if the session has already been finalized
   */
  record(report: FrameReport): void {
    if (this.summary) {
      throw new Error(
        `Cannot record frame ${report.frameIndex}: session already finalized`
      );
    }

    this.totalFrames++;

    switch (report.status) {
      case 'undetected':
        this.undetectedFrames++;
        return;
      case 'pass':
        this.passFrames++;
        break;
      case 'fail':
        this.failFrames++;
        break;
      case 'unknown':
        this.unknownFrames++;
        break;
    }

    if (report.verdicts.some((v) => v.status === 'unknown')) {
      this.framesWithUnknown++;
    }

    for (const verdict of report.verdicts) {
      let tally = this.rules.get(verdict.rule);
      if (!tally) {
        tally = {
          scope: verdict.scope,
          passes: 0,
          fails: 0,
          unknowns: 0,
          stats: new RunningStats(),
        };
        this.rules.set(verdict.rule, tally);
      }

      if (verdict.status === 'pass') tally.passes++;
      else if (verdict.status === 'fail') tally.fails++;
      else tally.unknowns++;

      if (verdict.value !== null) {
        tally.stats.push(verdict.value);
      }
    }
  }

  /** Frames recorded so far */
  getFrameCount(): number {
    return this.totalFrames;
  }

  isFinalized(): boolean {
    return this.summary !== null;
  }

  /**
   * Close the session and return its summary. Repeated calls return the
   * same snapshot.
   */
  finalize(): SessionSummary {
    if (this.summary) return this.summary;

    const rules: RuleSummary[] = [];
    for (const [name, tally] of this.rules) {
      rules.push(
        Object.freeze({
          name,
          scope: tally.scope,
          passes: tally.passes,
          fails: tally.fails,
          unknowns: tally.unknowns,
          passRate: ratio(tally.passes, tally.passes + tally.fails),
          values: Object.freeze(tally.stats.snapshot()),
        })
      );
    }

    const detectedFrames = this.totalFrames - this.undetectedFrames;
    const summary: SessionSummary = {
      exercise: this.session.exercise,
      side: this.session.side,
      totalFrames: this.totalFrames,
      detectedFrames,
      undetectedFrames: this.undetectedFrames,
      passFrames: this.passFrames,
      failFrames: this.failFrames,
      unknownFrames: this.unknownFrames,
      framesWithUnknown: this.framesWithUnknown,
      overallPassRate: ratio(this.passFrames, detectedFrames),
      unknownFrameRate: ratio(this.framesWithUnknown, detectedFrames),
      rules: Object.freeze(rules),
    };

    this.summary = Object.freeze(summary);
    return this.summary;
  }
}
