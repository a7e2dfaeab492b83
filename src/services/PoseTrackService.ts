/**
 * PoseTrack Service
 *
 * Loads recorded pose tracks and converts detector keypoints into the
 * LandmarkSets the evaluator consumes.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { PoseTrackFormatError } from '../errors';
import type { PoseFrame } from '../pipeline/FormSession';
import {
  isJointName,
  JOINT_NAMES,
  type JointName,
  type Landmark,
  type LandmarkSet,
  type PoseKeypoint,
} from '../types';
import type { PoseTrackFile } from '../types/posetrack';
import { createLogger } from '../utils/logger';

const log = createLogger({ component: 'PoseTrackService' });

const keypointSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number().optional(),
  score: z.number().min(0).max(1).optional(),
  visibility: z.number().min(0).max(1).optional(),
  name: z.string().optional(),
});

const poseTrackSchema: z.ZodType<PoseTrackFile> = z.object({
  metadata: z.object({
    version: z.literal('1.0'),
    model: z.string(),
    sourceVideoName: z.string().optional(),
    sourceVideoDuration: z.number().nonnegative().optional(),
    frameCount: z.number().int().nonnegative(),
    fps: z.number().positive(),
    videoWidth: z.number().int().positive().optional(),
    videoHeight: z.number().int().positive().optional(),
  }),
  frames: z.array(
    z.object({
      frameIndex: z.number().int().nonnegative(),
      timestamp: z.number().nonnegative(),
      videoTime: z.number().nonnegative().optional(),
      keypoints: z.array(keypointSchema.nullable()),
    })
  ),
});

/**
 * Validate parsed JSON as a pose track.
 *
 * @param source - file name used in error messages
 * @throws PoseTrackFormatError when the data does not match the schema
 */
export function parsePoseTrack(data: unknown, source?: string): PoseTrackFile {
  const parsed = poseTrackSchema.safeParse(data);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
    throw new PoseTrackFormatError(
      `Invalid pose track: ${where}${first?.message ?? 'unknown error'}`,
      source
    );
  }

  const track = parsed.data;
  if (track.metadata.frameCount !== track.frames.length) {
    log.warn(
      `Metadata declares ${track.metadata.frameCount} frames but file has ${track.frames.length}`,
      { action: 'parse' }
    );
  }
  return track;
}

/**
 * Read and validate a pose track JSON file.
 */
export function loadPoseTrack(path: string): PoseTrackFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PoseTrackFormatError(`Cannot read pose track: ${reason}`, path);
  }
  return parsePoseTrack(raw, path);
}

/**
 * Convert MediaPipe-33 ordered keypoints to a LandmarkSet.
 *
 * A keypoint's own `name` wins over its array position when it is a known
 * joint. Confidence is taken from `visibility`, then `score`; a keypoint
 * with neither is treated as not visible.
 */
export function landmarksFromKeypoints(
  keypoints: readonly (PoseKeypoint | null | undefined)[]
): LandmarkSet {
  const landmarks: Partial<Record<JointName, Landmark>> = {};

  keypoints.forEach((keypoint, index) => {
    if (!keypoint) return;
    const name =
      keypoint.name !== undefined && isJointName(keypoint.name)
        ? keypoint.name
        : JOINT_NAMES[index];
    if (name === undefined) return;

    const landmark: Landmark = {
      x: keypoint.x,
      y: keypoint.y,
      visibility: keypoint.visibility ?? keypoint.score ?? 0,
    };
    if (keypoint.z !== undefined) landmark.z = keypoint.z;
    landmarks[name] = landmark;
  });

  return landmarks;
}

/**
 * Frames of a pose track in the shape FormSession consumes, in file order.
 */
export function toPoseFrames(track: PoseTrackFile): PoseFrame[] {
  return track.frames.map((frame) => ({
    index: frame.frameIndex,
    timestamp: frame.timestamp,
    landmarks:
      frame.keypoints.length > 0 ? landmarksFromKeypoints(frame.keypoints) : null,
  }));
}
