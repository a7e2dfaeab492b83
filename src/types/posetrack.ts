/**
 * PoseTrack Types
 *
 * A pose track stores a clip's detector output separately from the video,
 * so clips can be re-evaluated without running the pose model again.
 */

import type { PoseKeypoint } from '../types';

/**
 * Metadata about the pose track file
 */
export interface PoseTrackMetadata {
  /** Schema version for forward compatibility */
  version: '1.0';

  /** Model used for pose extraction, e.g. 'blazepose' */
  model: string;

  /** Original video filename (informational only) */
  sourceVideoName?: string;

  /** Duration of the source video in seconds */
  sourceVideoDuration?: number;

  /** Total number of frames in the pose track */
  frameCount: number;

  /** Frames per second of the source video */
  fps: number;

  /** Width of the source video in pixels */
  videoWidth?: number;

  /** Height of the source video in pixels */
  videoHeight?: number;
}

/**
 * A single frame of pose data
 */
export interface PoseTrackFrame {
  /** Frame index (0-based) */
  frameIndex: number;

  /** Timestamp in milliseconds from video start */
  timestamp: number;

  /** Video currentTime in seconds */
  videoTime?: number;

  /**
   * Keypoints in MediaPipe-33 order. Empty when no pose was detected;
   * null entries are joints the detector did not return.
   */
  keypoints: (PoseKeypoint | null)[];
}

/**
 * Complete pose track file structure
 */
export interface PoseTrackFile {
  metadata: PoseTrackMetadata;
  frames: PoseTrackFrame[];
}
