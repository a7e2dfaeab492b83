import { fileURLToPath } from 'node:url';
import { from } from 'rxjs';
import { describe, expect, it, vi } from 'vitest';
import type { SessionSummary } from '../analyzers/FormReport';
import { PoseTrackFormatError } from '../errors';
import { FormSession } from '../pipeline/FormSession';
import type { PoseKeypoint } from '../types';
import {
  landmarksFromKeypoints,
  loadPoseTrack,
  parsePoseTrack,
  toPoseFrames,
} from './PoseTrackService';

const FIXTURE = fileURLToPath(
  new URL('../test-utils/fixtures/curl-left.posetrack.json', import.meta.url)
);

function minimalTrack(frameCount: number) {
  return {
    metadata: { version: '1.0', model: 'blazepose', frameCount, fps: 30 },
    frames: [{ frameIndex: 0, timestamp: 0, keypoints: [] }],
  };
}

describe('parsePoseTrack', () => {
  it('accepts a minimal track', () => {
    const track = parsePoseTrack(minimalTrack(1));
    expect(track.metadata.fps).toBe(30);
    expect(track.frames).toHaveLength(1);
  });

  it('rejects an unsupported version with the offending path', () => {
    const data = { ...minimalTrack(1), metadata: { ...minimalTrack(1).metadata, version: '2.0' } };
    expect(() => parsePoseTrack(data, 'clip.json')).toThrow(PoseTrackFormatError);
    expect(() => parsePoseTrack(data, 'clip.json')).toThrow(
      /^Invalid pose track: metadata\.version: .* \(clip\.json\)$/
    );
  });

  it('rejects keypoints without coordinates', () => {
    const data = {
      ...minimalTrack(1),
      frames: [{ frameIndex: 0, timestamp: 0, keypoints: [{ x: 1 }] }],
    };
    expect(() => parsePoseTrack(data)).toThrow(/frames\.0\.keypoints\.0\.y/);
  });

  it('warns when the frame count does not match', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    parsePoseTrack(minimalTrack(5));
    expect(warn).toHaveBeenCalledWith(
      '[PoseTrackService] (parse) Metadata declares 5 frames but file has 1'
    );
    warn.mockRestore();
  });
});

describe('loadPoseTrack', () => {
  it('loads a track from disk', () => {
    const track = loadPoseTrack(FIXTURE);
    expect(track.metadata.model).toBe('blazepose');
    expect(track.frames.map((f) => f.frameIndex)).toEqual([0, 1, 2, 3]);
  });

  it('reports unreadable files', () => {
    expect(() => loadPoseTrack('/nonexistent/clip.posetrack.json')).toThrow(
      /^Cannot read pose track: .*\(\/nonexistent\/clip\.posetrack\.json\)$/
    );
  });
});

describe('landmarksFromKeypoints', () => {
  it('names keypoints by their MediaPipe index', () => {
    const keypoints: (PoseKeypoint | null)[] = Array(33).fill(null);
    keypoints[11] = { x: 10, y: 20, visibility: 0.8 };
    keypoints[16] = { x: 30, y: 40, z: -0.1, score: 0.7 };

    expect(landmarksFromKeypoints(keypoints)).toEqual({
      left_shoulder: { x: 10, y: 20, visibility: 0.8 },
      right_wrist: { x: 30, y: 40, z: -0.1, visibility: 0.7 },
    });
  });

  it('prefers an explicit joint name over the position', () => {
    const landmarks = landmarksFromKeypoints([
      { x: 1, y: 2, visibility: 1, name: 'left_hip' },
      { x: 3, y: 4, visibility: 1, name: 'not_a_joint' },
    ]);

    expect(landmarks.left_hip).toEqual({ x: 1, y: 2, visibility: 1 });
    expect(landmarks.left_eye_inner).toEqual({ x: 3, y: 4, visibility: 1 });
    expect(landmarks.nose).toBeUndefined();
  });

  it('treats a keypoint without confidence as not visible', () => {
    expect(landmarksFromKeypoints([{ x: 5, y: 5 }]).nose).toEqual({ x: 5, y: 5, visibility: 0 });
  });

  it('ignores keypoints beyond the landmark vocabulary', () => {
    const keypoints: PoseKeypoint[] = Array.from({ length: 34 }, (_, i) => ({
      x: i,
      y: i,
      visibility: 1,
    }));
    const landmarks = landmarksFromKeypoints(keypoints);

    expect(Object.keys(landmarks)).toHaveLength(33);
    expect(landmarks.right_foot_index).toEqual({ x: 32, y: 32, visibility: 1 });
  });
});

describe('toPoseFrames', () => {
  it('maps empty keypoint lists to frames without a pose', () => {
    const frames = toPoseFrames(loadPoseTrack(FIXTURE));

    expect(frames).toHaveLength(4);
    expect(frames[1]).toEqual({ index: 1, timestamp: 33.33, landmarks: null });
    expect(frames[0]?.landmarks?.left_elbow).toEqual({ x: 370, y: 360, visibility: 0.9 });
  });
});

describe('pose track evaluation', () => {
  it('evaluates a recorded clip end to end', () => {
    const session = new FormSession({ exercise: 'bicep_curl', side: 'left' });
    let summary: SessionSummary | undefined;

    session.run(from(toPoseFrames(loadPoseTrack(FIXTURE)))).subscribe((s) => {
      summary = s;
    });

    expect(summary).toMatchObject({
      totalFrames: 4,
      detectedFrames: 3,
      undetectedFrames: 1,
      passFrames: 1,
      failFrames: 1,
      unknownFrames: 1,
    });
    expect(summary?.overallPassRate).toBeCloseTo(1 / 3, 10);
    expect(summary?.rules.find((r) => r.name === 'elbow_stationary')?.passRate).toBeCloseTo(
      2 / 3,
      10
    );
  });
});
