/**
 * Small helpers shared by the rule tables.
 */

import type { RangeThreshold, TargetThreshold } from '../config/thresholds';
import type { JointName, Side } from '../types';

export type Limb = 'shoulder' | 'elbow' | 'wrist' | 'hip' | 'knee';

/**
 * Joint name for the tracked side, e.g. ('left', 'elbow') → 'left_elbow'
 */
export function sideJoint(side: Side, limb: Limb): JointName {
  return `${side}_${limb}`;
}

/**
 * 'left' → 'Left'
 */
export function sideLabel(side: Side): string {
  return side === 'left' ? 'Left' : 'Right';
}

export function withinRange(value: number, range: RangeThreshold): boolean {
  return value >= range.min && value <= range.max;
}

export function nearTarget(value: number, target: TargetThreshold): boolean {
  return Math.abs(value - target.ideal) <= target.tolerance;
}
