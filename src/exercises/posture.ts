/**
 * Shared Posture Rules
 *
 * Applied after the exercise rules for every exercise and side: level
 * shoulders and hips, a straight spine and weight centred over the hips.
 */

import type { FormThresholds } from '../config/thresholds';
import type { RuleDefinition } from '../types/exercise';
import { mapMeasurement, tiltIsLevel, withinDistance } from '../models/geometry';
import { nearTarget } from './ruleHelpers';

const UNKNOWN = 'Cannot detect body landmarks clearly';

export function createPostureRules(thresholds: FormThresholds): RuleDefinition[] {
  const { shoulderTiltTolerance, hipTiltTolerance, spineAngle, balanceTolerance } =
    thresholds.posture;

  return [
    {
      name: 'shoulders_level',
      description: `Shoulder line within ${shoulderTiltTolerance}° of horizontal`,
      scope: 'posture',
      joints: ['left_shoulder', 'right_shoulder'],
      unit: 'degrees',
      measure: (skeleton) => skeleton.getTilt('left_shoulder', 'right_shoulder'),
      check: (value) => tiltIsLevel(value, shoulderTiltTolerance),
      messages: {
        pass: 'Shoulders level',
        fail: 'Shoulders are not level - adjust posture',
        unknown: UNKNOWN,
      },
    },
    {
      name: 'hips_level',
      description: `Hip line within ${hipTiltTolerance}° of horizontal`,
      scope: 'posture',
      joints: ['left_hip', 'right_hip'],
      unit: 'degrees',
      measure: (skeleton) => skeleton.getTilt('left_hip', 'right_hip'),
      check: (value) => tiltIsLevel(value, hipTiltTolerance),
      messages: {
        pass: 'Hips level',
        fail: 'Hips are not level - balance your stance',
        unknown: UNKNOWN,
      },
    },
    {
      name: 'spine_straight',
      description: `Shoulder-hip-knee angle within ${spineAngle.tolerance}° of ${spineAngle.ideal}°`,
      scope: 'posture',
      joints: ['shoulder_mid', 'hip_mid', 'knee_mid'],
      unit: 'degrees',
      measure: (skeleton) =>
        skeleton.getAngle('shoulder_mid', 'hip_mid', 'knee_mid'),
      check: (value) => nearTarget(value, spineAngle),
      messages: {
        pass: 'Back straight',
        fail: 'Back is leaning - maintain straight posture',
        unknown: UNKNOWN,
      },
    },
    {
      name: 'balanced',
      description: 'Shoulders centred over hips',
      scope: 'posture',
      joints: ['shoulder_mid', 'hip_mid'],
      unit: 'torso_ratio',
      measure: (skeleton) =>
        skeleton.relativeToTorso(
          mapMeasurement(
            skeleton.getHorizontalOffset('shoulder_mid', 'hip_mid'),
            Math.abs
          )
        ),
      check: (value) => withinDistance(value, balanceTolerance),
      messages: {
        pass: 'Weight centred',
        fail: 'Body is not balanced - center your weight',
        unknown: UNKNOWN,
      },
    },
  ];
}
