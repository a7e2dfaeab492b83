import type { JointName, Landmark, LandmarkSet, Side, VerticalAxis } from '../types';
import {
  angle,
  combine,
  DEFAULT_VISIBILITY_THRESHOLD,
  distance,
  distanceToLine,
  type FeatureOptions,
  horizontalOffset,
  insufficient,
  lineTilt,
  type Measurement,
  measured,
  midpoint,
  verticalOffset,
} from './geometry';

/**
 * Midpoints between the left and right joint of a pair
 */
export type DerivedJoint = 'shoulder_mid' | 'hip_mid' | 'knee_mid';

/**
 * Anything a rule can reference: a detected joint or a derived midpoint
 */
export type JointRef = JointName | DerivedJoint;

const DERIVED_JOINTS: Record<DerivedJoint, readonly [JointName, JointName]> = {
  shoulder_mid: ['left_shoulder', 'right_shoulder'],
  hip_mid: ['left_hip', 'right_hip'],
  knee_mid: ['left_knee', 'right_knee'],
};

function isDerivedJoint(ref: JointRef): ref is DerivedJoint {
  return ref in DERIVED_JOINTS;
}

/**
 * Expand joint references to the detected joints they depend on.
 * Order of first appearance is kept and duplicates are dropped.
 */
export function expandJointRefs(refs: readonly JointRef[]): JointName[] {
  const joints: JointName[] = [];
  for (const ref of refs) {
    const expanded = isDerivedJoint(ref) ? DERIVED_JOINTS[ref] : [ref];
    for (const joint of expanded) {
      if (!joints.includes(joint)) joints.push(joint);
    }
  }
  return joints;
}

export interface SkeletonOptions {
  visibilityThreshold?: number;
  verticalAxis?: VerticalAxis;
}

/**
 * Read-only view over one frame's landmarks.
 *
 * Resolves joint references (including derived midpoints) and calls the
 * geometric feature library with this frame's confidence threshold and
 * axis convention. A Skeleton never outlives the evaluate call it was
 * built for, and nothing is cached across frames.
 */
export class Skeleton {
  private readonly featureOptions: Required<FeatureOptions>;

  constructor(
    private readonly landmarks: LandmarkSet,
    options: SkeletonOptions = {}
  ) {
    this.featureOptions = {
      visibilityThreshold:
        options.visibilityThreshold ?? DEFAULT_VISIBILITY_THRESHOLD,
      verticalAxis: options.verticalAxis ?? 'down',
    };
  }

  getVerticalAxis(): VerticalAxis {
    return this.featureOptions.verticalAxis;
  }

  getVisibilityThreshold(): number {
    return this.featureOptions.visibilityThreshold;
  }

  /**
   * Joints from `refs` that are absent from this frame entirely
   */
  findMissingJoints(refs: readonly JointRef[]): JointName[] {
    return expandJointRefs(refs).filter((joint) => !this.landmarks[joint]);
  }

  /**
   * Look up a joint or derived midpoint
   */
  getLandmark(ref: JointRef): Landmark | undefined {
    if (!isDerivedJoint(ref)) {
      return this.landmarks[ref];
    }
    const [left, right] = DERIVED_JOINTS[ref];
    const a = this.landmarks[left];
    const b = this.landmarks[right];
    return a && b ? midpoint(a, b) : undefined;
  }

  /**
   * Angle at `vertex` between rays to `point1` and `point2`, in degrees
   */
  getAngle(point1: JointRef, vertex: JointRef, point2: JointRef): Measurement {
    const a = this.getLandmark(point1);
    const b = this.getLandmark(vertex);
    const c = this.getLandmark(point2);
    if (!a || !b || !c) return insufficient('missing');
    return angle(a, b, c, this.featureOptions);
  }

  /**
   * Height of `p` above `q` (positive = higher)
   */
  getVerticalOffset(p: JointRef, q: JointRef): Measurement {
    const a = this.getLandmark(p);
    const b = this.getLandmark(q);
    if (!a || !b) return insufficient('missing');
    return verticalOffset(a, b, this.featureOptions);
  }

  getHorizontalOffset(p: JointRef, q: JointRef): Measurement {
    const a = this.getLandmark(p);
    const b = this.getLandmark(q);
    if (!a || !b) return insufficient('missing');
    return horizontalOffset(a, b, this.featureOptions);
  }

  /**
   * Tilt of the line between two joints from horizontal, in degrees
   */
  getTilt(p: JointRef, q: JointRef): Measurement {
    const a = this.getLandmark(p);
    const b = this.getLandmark(q);
    if (!a || !b) return insufficient('missing');
    return lineTilt(a, b, this.featureOptions);
  }

  getDistance(p: JointRef, q: JointRef): Measurement {
    const a = this.getLandmark(p);
    const b = this.getLandmark(q);
    if (!a || !b) return insufficient('missing');
    return distance(a, b, this.featureOptions);
  }

  /**
   * Perpendicular distance of `joint` from the line lineStart→lineEnd
   */
  getDistanceToLine(
    joint: JointRef,
    lineStart: JointRef,
    lineEnd: JointRef
  ): Measurement {
    const point = this.getLandmark(joint);
    const start = this.getLandmark(lineStart);
    const end = this.getLandmark(lineEnd);
    if (!point || !start || !end) return insufficient('missing');
    return distanceToLine(point, { start, end }, this.featureOptions);
  }

  /**
   * Shoulder-to-hip length, used to express distances independently of
   * camera distance and image resolution.
   *
   * @param side - one side's shoulder and hip; omitted means the midpoints
   */
  getTorsoLength(side?: Side): Measurement {
    const length = side
      ? this.getDistance(`${side}_shoulder`, `${side}_hip`)
      : this.getDistance('shoulder_mid', 'hip_mid');
    if (length.ok && length.value === 0) return insufficient('degenerate');
    return length;
  }

  /**
   * A measurement divided by the torso length
   */
  relativeToTorso(value: Measurement, side?: Side): Measurement {
    return combine(value, this.getTorsoLength(side), (v, torso) =>
      measured(v / torso)
    );
  }
}
