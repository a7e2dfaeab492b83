/**
 * Exercise and Rule Types
 *
 * Rules are plain data records: each names the joints it reads, how it
 * measures a feature from a Skeleton, the check applied to that value and
 * the feedback shown for each outcome. Rule tables are built per tracked
 * side, so a rule never has to branch on left/right itself.
 */

import type { Skeleton, JointRef } from '../models/Skeleton';
import type { Measurement } from '../models/geometry';
import type { FormThresholds } from '../config/thresholds';
import type { Side } from '../types';

/**
 * Supported exercise types
 */
export enum ExerciseType {
  BicepCurl = 'bicep_curl',
  LateralRaise = 'lateral_raise',
}

export const EXERCISE_TYPES: readonly ExerciseType[] = Object.values(ExerciseType);

/**
 * Check if a string is a valid exercise type
 */
export function isValidExerciseType(value: string): value is ExerciseType {
  return EXERCISE_TYPES.some((type) => type === value);
}

export function isValidSide(value: string): value is Side {
  return value === 'left' || value === 'right';
}

/**
 * Whether a rule belongs to one exercise or to the shared posture checks
 */
export type RuleScope = 'exercise' | 'posture';

export interface RuleMessages {
  /** Shown when the check passes */
  pass: string;
  /** Shown when the check fails; may depend on the measured value */
  fail: string | ((value: number) => string);
  /** Shown when the feature could not be measured */
  unknown: string;
}

/**
 * A named form check
 */
export interface RuleDefinition {
  /** Stable identifier, e.g. 'elbow_angle_range' */
  name: string;
  description: string;
  scope: RuleScope;
  /** Joints read by `measure`; all must be present for the frame to count */
  joints: readonly JointRef[];
  /** Unit of the measured value, for reporting */
  unit: 'degrees' | 'torso_ratio' | 'coordinate';
  measure(skeleton: Skeleton): Measurement;
  check(value: number): boolean;
  messages: RuleMessages;
}

/**
 * Builds the rule table for one tracked side
 */
export type RuleTableFactory = (
  side: Side,
  thresholds: FormThresholds
) => RuleDefinition[];

/**
 * Complete definition of an exercise
 */
export interface ExerciseDefinition {
  type: ExerciseType;
  /** Human-readable name, e.g. 'Bicep Curl' */
  name: string;
  description: string;
  createRules: RuleTableFactory;
}
