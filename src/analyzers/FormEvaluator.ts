/**
 * FormEvaluator - per-frame posture checker.
 *
 * Pipeline per frame: LandmarkSet → Skeleton → each rule's measure/check →
 * Verdicts → FrameReport. The evaluator holds only its configuration and
 * rule table; calling evaluate() twice with the same landmarks yields equal
 * reports.
 */

import {
  type FormConfig,
  type FormConfigInput,
  resolveFormConfig,
  type ThresholdOverrides,
} from '../config/thresholds';
import { getExerciseDefinition, getRequiredJoints, getRuleSet } from '../exercises';
import { sideLabel } from '../exercises/ruleHelpers';
import { Skeleton } from '../models/Skeleton';
import type { RuleDefinition } from '../types/exercise';
import type { JointName, LandmarkSet, VerticalAxis } from '../types';
import { createLogger } from '../utils/logger';
import type { FrameReport, FrameStatus, Verdict } from './FormReport';

const log = createLogger({ component: 'FormEvaluator' });

/**
 * Position of a frame within the clip
 */
export interface FrameInfo {
  index: number;
  /** Milliseconds from clip start */
  timestamp?: number;
}

function applyRule(rule: RuleDefinition, skeleton: Skeleton): Verdict {
  const measurement = rule.measure(skeleton);

  if (!measurement.ok) {
    const unknown: Verdict = {
      rule: rule.name,
      scope: rule.scope,
      status: 'unknown',
      value: null,
      unit: rule.unit,
      message: rule.messages.unknown,
      reason: measurement.reason,
    };
    return Object.freeze(unknown);
  }

  const passed = rule.check(measurement.value);
  const { fail } = rule.messages;
  const verdict: Verdict = {
    rule: rule.name,
    scope: rule.scope,
    status: passed ? 'pass' : 'fail',
    value: measurement.value,
    unit: rule.unit,
    message: passed
      ? rule.messages.pass
      : typeof fail === 'function'
        ? fail(measurement.value)
        : fail,
  };
  return Object.freeze(verdict);
}

/**
 * Fail wins over unknown, unknown wins over pass.
 */
function frameStatus(verdicts: readonly Verdict[]): FrameStatus {
  if (verdicts.some((v) => v.status === 'fail')) return 'fail';
  if (verdicts.some((v) => v.status === 'unknown')) return 'unknown';
  return 'pass';
}

export class FormEvaluator {
  private readonly rules: readonly RuleDefinition[];
  private readonly requiredJoints: readonly JointName[];
  private readonly goodFormMessage: string;

  /**
   * @param config - an already validated configuration; use
   *   createFormEvaluator() for raw input
   */
  constructor(private readonly config: FormConfig) {
    this.rules = Object.freeze(
      getRuleSet(config.exercise, config.side, config.thresholds)
    );
    this.requiredJoints = Object.freeze(getRequiredJoints(this.rules));
    const exerciseName = getExerciseDefinition(config.exercise).name.toLowerCase();
    this.goodFormMessage = `${sideLabel(config.side)} ${exerciseName}: Good form!`;
  }

  getConfig(): FormConfig {
    return this.config;
  }

  /** Rules in evaluation order */
  getRules(): readonly RuleDefinition[] {
    return this.rules;
  }

  /** Joints that must be present for a frame to be evaluated */
  getRequiredJoints(): readonly JointName[] {
    return this.requiredJoints;
  }

  /**
   * Evaluate one frame. Never throws for per-frame problems: absent joints
   * produce an 'undetected' report and unmeasurable features produce
   * 'unknown' verdicts.
   */
  evaluate(landmarks: LandmarkSet, frame: FrameInfo = { index: 0 }): FrameReport {
    const { exercise, side, verticalAxis, thresholds } = this.config;
    const skeleton = new Skeleton(landmarks, {
      visibilityThreshold: thresholds.minVisibility,
      verticalAxis,
    });

    const missingJoints = skeleton.findMissingJoints(this.requiredJoints);
    if (missingJoints.length > 0) {
      const noPose = missingJoints.length === this.requiredJoints.length;
      log.debug(
        noPose
          ? `Frame ${frame.index}: no pose detected`
          : `Frame ${frame.index}: missing ${missingJoints.join(', ')}`,
        { action: 'evaluate' }
      );
      const undetected: FrameReport = {
        frameIndex: frame.index,
        timestamp: frame.timestamp,
        exercise,
        side,
        status: 'undetected',
        verdicts: Object.freeze([]),
        feedback: Object.freeze([
          noPose
            ? 'No pose detected'
            : `Cannot locate: ${missingJoints.join(', ')}`,
        ]),
        missingJoints: Object.freeze(missingJoints),
      };
      return Object.freeze(undetected);
    }

    const verdicts = this.rules.map((rule) => applyRule(rule, skeleton));
    const status = frameStatus(verdicts);

    const feedback: string[] = [];
    if (status === 'pass') {
      feedback.push(this.goodFormMessage);
    } else {
      for (const verdict of verdicts) {
        if (verdict.status !== 'pass' && !feedback.includes(verdict.message)) {
          feedback.push(verdict.message);
        }
      }
    }

    const report: FrameReport = {
      frameIndex: frame.index,
      timestamp: frame.timestamp,
      exercise,
      side,
      status,
      verdicts: Object.freeze(verdicts),
      feedback: Object.freeze(feedback),
      missingJoints: Object.freeze([]),
    };
    return Object.freeze(report);
  }
}

/**
 * Validate a configuration and build an evaluator for it.
 *
 * @throws InvalidConfigurationError before any frame is processed
 */
export function createFormEvaluator(
  input: FormConfigInput | FormConfig
): FormEvaluator {
  return new FormEvaluator(resolveFormConfig(input));
}

export interface EvaluateOptions {
  verticalAxis?: VerticalAxis;
  thresholds?: ThresholdOverrides;
  frame?: FrameInfo;
}

/**
 * One-shot evaluation of a single frame.
 *
 * @throws InvalidConfigurationError for an unknown exercise or side
 */
export function evaluate(
  landmarks: LandmarkSet,
  exercise: string,
  side: string,
  options: EvaluateOptions = {}
): FrameReport {
  return createFormEvaluator({
    exercise,
    side,
    verticalAxis: options.verticalAxis,
    thresholds: options.thresholds,
  }).evaluate(landmarks, options.frame);
}
