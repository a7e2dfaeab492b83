/**
 * Bicep Curl Rules
 *
 * Filmed from the front or the tracked side. Checks:
 * - elbow_angle_range: shoulder-elbow-wrist angle stays between full flexion
 *   and lockout
 * - elbow_stationary: elbow stays pinned to the torso (no swinging)
 * - wrist_above_elbow_at_top: wrist is lifted above the elbow
 */

import type { FormThresholds } from '../config/thresholds';
import { ExerciseType, type ExerciseDefinition, type RuleDefinition } from '../types/exercise';
import type { Side } from '../types';
import { withinDistance } from '../models/geometry';
import { sideJoint, sideLabel, withinRange } from './ruleHelpers';

export function createBicepCurlRules(
  side: Side,
  thresholds: FormThresholds
): RuleDefinition[] {
  const { elbowAngle, elbowMaxTorsoDistance } = thresholds.bicepCurl;
  const shoulder = sideJoint(side, 'shoulder');
  const elbow = sideJoint(side, 'elbow');
  const wrist = sideJoint(side, 'wrist');
  const hip = sideJoint(side, 'hip');
  const arm = `${sideLabel(side)} arm`;
  const unknown = `Cannot detect ${side} arm landmarks clearly`;

  return [
    {
      name: 'elbow_angle_range',
      description: `Elbow angle between ${elbowAngle.min}° and ${elbowAngle.max}°`,
      scope: 'exercise',
      joints: [shoulder, elbow, wrist],
      unit: 'degrees',
      measure: (skeleton) => skeleton.getAngle(shoulder, elbow, wrist),
      check: (value) => withinRange(value, elbowAngle),
      messages: {
        pass: `${arm}: Elbow angle in range`,
        fail: (value) =>
          value < elbowAngle.min
            ? `${arm}: Elbow too bent (curl too high)`
            : `${arm}: Arm almost straight, keep tension at the bottom`,
        unknown,
      },
    },
    {
      name: 'elbow_stationary',
      description: 'Elbow stays close to the torso line',
      scope: 'exercise',
      joints: [shoulder, elbow, hip],
      unit: 'torso_ratio',
      measure: (skeleton) =>
        skeleton.relativeToTorso(
          skeleton.getDistanceToLine(elbow, shoulder, hip),
          side
        ),
      check: (value) => withinDistance(value, elbowMaxTorsoDistance),
      messages: {
        pass: `${arm}: Elbow pinned to the body`,
        fail: `${arm}: Keep elbow closer to body (avoid swinging)`,
        unknown,
      },
    },
    {
      name: 'wrist_above_elbow_at_top',
      description: 'Wrist rises above the elbow',
      scope: 'exercise',
      joints: [elbow, wrist],
      unit: 'coordinate',
      measure: (skeleton) => skeleton.getVerticalOffset(wrist, elbow),
      check: (value) => value > 0,
      messages: {
        pass: `${arm}: Wrist above elbow`,
        fail: `${arm}: Lift your wrist higher`,
        unknown,
      },
    },
  ];
}

export const bicepCurlDefinition: ExerciseDefinition = {
  type: ExerciseType.BicepCurl,
  name: 'Bicep Curl',
  description:
    'Elbow flexion with the upper arm held still against the torso.',
  createRules: createBicepCurlRules,
};
