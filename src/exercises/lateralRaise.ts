/**
 * Lateral Raise Rules
 *
 * Filmed from the front. The arm is raised sideways to shoulder height with
 * a soft elbow.
 */

import type { FormThresholds } from '../config/thresholds';
import { ExerciseType, type ExerciseDefinition, type RuleDefinition } from '../types/exercise';
import type { Side } from '../types';
import { nearTarget, sideJoint, sideLabel, withinRange } from './ruleHelpers';

export function createLateralRaiseRules(
  side: Side,
  thresholds: FormThresholds
): RuleDefinition[] {
  const { shoulderAngle, elbowAngle, wristAboveShoulderAllowance } =
    thresholds.lateralRaise;
  const shoulder = sideJoint(side, 'shoulder');
  const elbow = sideJoint(side, 'elbow');
  const wrist = sideJoint(side, 'wrist');
  const hip = sideJoint(side, 'hip');
  const arm = `${sideLabel(side)} arm`;
  const unknown = `Cannot detect ${side} arm landmarks clearly`;

  return [
    {
      name: 'arm_at_shoulder_height',
      description: `Arm-to-torso angle within ${shoulderAngle.tolerance}° of ${shoulderAngle.ideal}°`,
      scope: 'exercise',
      joints: [hip, shoulder, elbow],
      unit: 'degrees',
      measure: (skeleton) => skeleton.getAngle(hip, shoulder, elbow),
      check: (value) => nearTarget(value, shoulderAngle),
      messages: {
        pass: `${arm}: Raised to shoulder height`,
        fail: (value) =>
          value < shoulderAngle.ideal
            ? `${arm}: Raise arm higher to shoulder level`
            : `${arm}: Lower your arm to shoulder level`,
        unknown,
      },
    },
    {
      name: 'elbow_slightly_bent',
      description: `Elbow angle between ${elbowAngle.min}° and ${elbowAngle.max}°`,
      scope: 'exercise',
      joints: [shoulder, elbow, wrist],
      unit: 'degrees',
      measure: (skeleton) => skeleton.getAngle(shoulder, elbow, wrist),
      check: (value) => withinRange(value, elbowAngle),
      messages: {
        pass: `${arm}: Elbow softly bent`,
        fail: (value) =>
          value < elbowAngle.min
            ? `${arm}: Straighten your arm more`
            : `${arm}: Keep elbow slightly bent (don't lock)`,
        unknown,
      },
    },
    {
      name: 'wrist_not_above_shoulder',
      description: 'Wrist stays at or below shoulder height',
      scope: 'exercise',
      joints: [shoulder, wrist, hip],
      unit: 'torso_ratio',
      measure: (skeleton) =>
        skeleton.relativeToTorso(
          skeleton.getVerticalOffset(wrist, shoulder),
          side
        ),
      check: (value) => value <= wristAboveShoulderAllowance,
      messages: {
        pass: `${arm}: Wrist at or below shoulder`,
        fail: `${arm}: Don't raise wrist above shoulder level`,
        unknown,
      },
    },
  ];
}

export const lateralRaiseDefinition: ExerciseDefinition = {
  type: ExerciseType.LateralRaise,
  name: 'Lateral Raise',
  description: 'Shoulder abduction to shoulder height with a soft elbow.',
  createRules: createLateralRaiseRules,
};
