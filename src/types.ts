/**
 * Core pose types shared across the evaluation engine.
 *
 * Joint names follow the MediaPipe BlazePose 33-landmark vocabulary in
 * snake_case, which is what pose detectors hand us per frame.
 */

/**
 * Raw keypoint as emitted by a pose detector (MediaPipe-33 ordering).
 * Detectors disagree on whether confidence is called `score` or
 * `visibility`, so both are accepted.
 */
export interface PoseKeypoint {
  x: number;
  y: number;
  z?: number;
  score?: number;
  visibility?: number;
  name?: string;
}

/**
 * MediaPipe BlazePose landmark names, in detector index order (33 points).
 */
export const JOINT_NAMES = [
  'nose',
  'left_eye_inner',
  'left_eye',
  'left_eye_outer',
  'right_eye_inner',
  'right_eye',
  'right_eye_outer',
  'left_ear',
  'right_ear',
  'mouth_left',
  'mouth_right',
  'left_shoulder',
  'right_shoulder',
  'left_elbow',
  'right_elbow',
  'left_wrist',
  'right_wrist',
  'left_pinky',
  'right_pinky',
  'left_index',
  'right_index',
  'left_thumb',
  'right_thumb',
  'left_hip',
  'right_hip',
  'left_knee',
  'right_knee',
  'left_ankle',
  'right_ankle',
  'left_heel',
  'right_heel',
  'left_foot_index',
  'right_foot_index',
] as const;

/**
 * Joint name in the landmark vocabulary, e.g. 'left_elbow'
 */
export type JointName = (typeof JOINT_NAMES)[number];

export function isJointName(value: string): value is JointName {
  return JOINT_NAMES.some((name) => name === value);
}

/**
 * Tracked body side
 */
export type Side = 'left' | 'right';

/**
 * Direction in which the Y coordinate grows.
 * - 'down': image coordinates (detector output, origin top-left)
 * - 'up': Cartesian coordinates
 */
export type VerticalAxis = 'up' | 'down';

/**
 * A 2-D point. `z` is carried through but never used for geometry.
 */
export interface Point {
  x: number;
  y: number;
  z?: number;
}

/**
 * A body joint position with its detector confidence in [0, 1].
 */
export interface Landmark extends Point {
  visibility: number;
}

/**
 * One frame's landmarks keyed by joint name. Absent keys mean the detector
 * did not locate that joint at all.
 */
export type LandmarkSet = Readonly<Partial<Record<JointName, Landmark>>>;
