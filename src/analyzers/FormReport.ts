/**
 * Form Report Types
 *
 * Values produced by the evaluator and the aggregator and handed to
 * annotation and metrics consumers. All of them are frozen once created.
 */

import type { InsufficientReason } from '../models/geometry';
import type { ExerciseType, RuleDefinition, RuleScope } from '../types/exercise';
import type { JointName, Side } from '../types';

/**
 * Tri-state rule outcome. 'unknown' means the feature could not be measured
 * (low confidence or degenerate geometry), which is not a failure.
 */
export type VerdictStatus = 'pass' | 'fail' | 'unknown';

/**
 * Frame outcome. 'undetected' means a required joint was absent entirely.
 */
export type FrameStatus = VerdictStatus | 'undetected';

/**
 * Result of one rule on one frame
 */
export interface Verdict {
  rule: string;
  scope: RuleScope;
  status: VerdictStatus;
  /** Measured feature value, null when unknown */
  value: number | null;
  unit: RuleDefinition['unit'];
  message: string;
  /** Why the value could not be measured (only when unknown) */
  reason?: InsufficientReason;
}

/**
 * Result of evaluating one frame
 */
export interface FrameReport {
  /** Frame index within the clip (0-based) */
  frameIndex: number;
  /** Milliseconds from clip start, when known */
  timestamp?: number;
  exercise: ExerciseType;
  side: Side;
  status: FrameStatus;
  /** Rule verdicts in rule order; empty when undetected */
  verdicts: readonly Verdict[];
  /** Feedback lines for display */
  feedback: readonly string[];
  /** Required joints absent from the frame */
  missingJoints: readonly JointName[];
}

/**
 * Running statistics of a rule's measured values
 */
export interface ValueStats {
  count: number;
  mean: number | null;
  /** Population standard deviation */
  std: number | null;
  min: number | null;
  max: number | null;
}

/**
 * Per-rule totals over a clip
 */
export interface RuleSummary {
  name: string;
  scope: RuleScope;
  passes: number;
  fails: number;
  unknowns: number;
  /** passes / (passes + fails); null when the rule never resolved */
  passRate: number | null;
  values: ValueStats;
}

/**
 * Totals over a clip
 */
export interface SessionSummary {
  exercise: ExerciseType;
  side: Side;
  totalFrames: number;
  /** Frames in which every required joint was present */
  detectedFrames: number;
  undetectedFrames: number;
  passFrames: number;
  failFrames: number;
  unknownFrames: number;
  /** Detected frames with at least one unknown verdict */
  framesWithUnknown: number;
  /** passFrames / detectedFrames; null when nothing was detected */
  overallPassRate: number | null;
  /** framesWithUnknown / detectedFrames; null when nothing was detected */
  unknownFrameRate: number | null;
  /** Rules in first-seen order */
  rules: readonly RuleSummary[];
}
