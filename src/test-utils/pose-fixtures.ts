/**
 * Pose Fixtures for Unit Tests
 *
 * Synthetic landmark sets in Cartesian units (Y grows upward), so tests
 * must evaluate them with verticalAxis 'up'. The body stands upright with
 * the torso about 2 units long:
 *
 *   shoulders at y=0, hips at y=-2, knees at y=-3.8
 *
 * Expected feature values for each pose are noted beside it.
 */

import { isJointName, JOINT_NAMES, type JointName, type Landmark, type LandmarkSet } from '../types';

export const VISIBLE = 0.9;

/**
 * Build a landmark; visible unless told otherwise
 */
export function lm(x: number, y: number, visibility: number = VISIBLE): Landmark {
  return { x, y, visibility };
}

/**
 * Shoulders, hips and knees of an upright, level, centred body.
 * Left shoulder→hip length is sqrt(0.1² + 2²) ≈ 2.0025.
 */
export const UPRIGHT_BODY: LandmarkSet = {
  left_shoulder: lm(0.4, 0),
  right_shoulder: lm(-0.4, 0),
  left_hip: lm(0.3, -2),
  right_hip: lm(-0.3, -2),
  left_knee: lm(0.3, -3.8),
  right_knee: lm(-0.3, -3.8),
};

/**
 * Left arm mid-curl:
 * - elbow angle ≈ 68.2°
 * - elbow distance from shoulder→hip line ≈ 0.0798 torso
 * - wrist 0.4 above elbow
 *
 * Right arm hangs straight down (wrist below elbow).
 */
export function goodCurlFrame(): LandmarkSet {
  return {
    ...UPRIGHT_BODY,
    left_elbow: lm(0.5, -1.2),
    left_wrist: lm(1.3, -0.8),
    right_elbow: lm(-0.45, -1.2),
    right_wrist: lm(-0.45, -2.2),
  };
}

/**
 * Left arm raised sideways, wrist level with the shoulder:
 * - hip-shoulder-elbow angle ≈ 98.57°
 * - elbow angle ≈ 168.58°
 * - wrist height above shoulder 0
 */
export function goodLateralRaiseFrame(): LandmarkSet {
  return {
    ...UPRIGHT_BODY,
    left_elbow: lm(1.4, 0.1),
    left_wrist: lm(2.4, 0),
    right_elbow: lm(-0.45, -1.2),
    right_wrist: lm(-0.45, -2.2),
  };
}

function counterpart(name: JointName): JointName {
  const swapped = name.startsWith('left_')
    ? `right_${name.slice('left_'.length)}`
    : name.startsWith('right_')
      ? `left_${name.slice('right_'.length)}`
      : name;
  return isJointName(swapped) ? swapped : name;
}

/**
 * Mirror a pose left-to-right: x is negated and left/right joints swap.
 * Every feature keeps its value, so a left-side pose becomes the same
 * pose for the right side.
 */
export function mirror(landmarks: LandmarkSet): LandmarkSet {
  const mirrored: Partial<Record<JointName, Landmark>> = {};
  for (const name of JOINT_NAMES) {
    const landmark = landmarks[name];
    if (landmark) {
      mirrored[counterpart(name)] = { ...landmark, x: -landmark.x };
    }
  }
  return mirrored;
}

/**
 * Flip Y so the pose reads correctly with verticalAxis 'down'
 */
export function toImageCoordinates(landmarks: LandmarkSet): LandmarkSet {
  const flipped: Partial<Record<JointName, Landmark>> = {};
  for (const name of JOINT_NAMES) {
    const landmark = landmarks[name];
    if (landmark) {
      flipped[name] = { ...landmark, y: -landmark.y };
    }
  }
  return flipped;
}

/**
 * Drop joints from a landmark set
 */
export function without(landmarks: LandmarkSet, ...joints: JointName[]): LandmarkSet {
  const remaining: Partial<Record<JointName, Landmark>> = {};
  for (const name of JOINT_NAMES) {
    const landmark = landmarks[name];
    if (landmark && !joints.includes(name)) {
      remaining[name] = landmark;
    }
  }
  return remaining;
}
