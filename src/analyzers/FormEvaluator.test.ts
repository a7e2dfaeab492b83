import { describe, expect, it } from 'vitest';
import { InvalidConfigurationError } from '../errors';
import {
  goodCurlFrame,
  goodLateralRaiseFrame,
  lm,
  mirror,
  toImageCoordinates,
  without,
} from '../test-utils/pose-fixtures';
import { JOINT_NAMES, type JointName, type Landmark, type LandmarkSet } from '../types';
import { createFormEvaluator, evaluate, FormEvaluator } from './FormEvaluator';
import type { FrameReport, Verdict } from './FormReport';

const BICEP_CURL_JOINTS = [
  'left_shoulder',
  'left_elbow',
  'left_wrist',
  'left_hip',
  'right_shoulder',
  'right_hip',
  'left_knee',
  'right_knee',
];

function verdictFor(report: FrameReport, rule: string): Verdict {
  const verdict = report.verdicts.find((v) => v.rule === rule);
  if (!verdict) throw new Error(`no verdict for ${rule}`);
  return verdict;
}

/**
 * Arm hanging from a shoulder at the origin with the wrist swung slightly
 * forward; the rest of the body is upright and level.
 */
const HANGING_ARM: LandmarkSet = {
  left_shoulder: lm(0, 0),
  left_elbow: lm(0, -1),
  left_wrist: lm(0.3, -1.8),
  left_hip: lm(0, -2),
  left_knee: lm(0, -3.8),
  right_shoulder: lm(-0.8, 0),
  right_hip: lm(-0.8, -2),
  right_knee: lm(-0.8, -3.8),
};

function withVisibility(landmarks: LandmarkSet, visibility: number): LandmarkSet {
  const result: Partial<Record<JointName, Landmark>> = {};
  for (const name of JOINT_NAMES) {
    const landmark = landmarks[name];
    if (landmark) result[name] = { ...landmark, visibility };
  }
  return result;
}

describe('FormEvaluator', () => {
  const curl = createFormEvaluator({ exercise: 'bicep_curl', side: 'left', verticalAxis: 'up' });

  describe('configuration', () => {
    it('rejects an unknown exercise before any frame', () => {
      expect(() => createFormEvaluator({ exercise: 'squat' })).toThrow(InvalidConfigurationError);
      expect(() => evaluate(goodCurlFrame(), 'squat', 'left')).toThrow(
        'Unknown exercise type: squat'
      );
    });

    it('rejects an unknown side', () => {
      expect(() => createFormEvaluator({ exercise: 'bicep_curl', side: 'both' })).toThrow(
        'Unknown side: both'
      );
    });

    it('exposes its rules and required joints', () => {
      expect(curl.getRules()).toHaveLength(7);
      expect(curl.getRequiredJoints()).toEqual(BICEP_CURL_JOINTS);
      expect(curl.getConfig().verticalAxis).toBe('up');
    });
  });

  describe('bicep curl', () => {
    it('passes the elbow angle at the range boundary but fails a low wrist', () => {
      const report = curl.evaluate(HANGING_ARM);

      const elbow = verdictFor(report, 'elbow_angle_range');
      expect(elbow.status).toBe('pass');
      expect(elbow.value).toBeCloseTo(159.444, 3);

      expect(verdictFor(report, 'wrist_above_elbow_at_top')).toEqual({
        rule: 'wrist_above_elbow_at_top',
        scope: 'exercise',
        status: 'fail',
        value: expect.closeTo(-0.8, 10),
        unit: 'coordinate',
        message: 'Left arm: Lift your wrist higher',
      });
      expect(report.status).toBe('fail');
      expect(report.feedback).toEqual(['Left arm: Lift your wrist higher']);
    });

    it('reports good form when every rule passes', () => {
      const report = curl.evaluate(goodCurlFrame());

      expect(report.status).toBe('pass');
      expect(report.verdicts.map((v) => v.status)).toEqual(Array(7).fill('pass'));
      expect(report.feedback).toEqual(['Left bicep curl: Good form!']);
      expect(report.missingJoints).toEqual([]);
    });

    it('reads wrist height by the configured vertical axis', () => {
      const imageAxis = createFormEvaluator({ exercise: 'bicep_curl' });

      expect(imageAxis.evaluate(toImageCoordinates(goodCurlFrame())).status).toBe('pass');
      // Cartesian pose read as image coordinates puts the wrist below the elbow
      expect(
        verdictFor(imageAxis.evaluate(goodCurlFrame()), 'wrist_above_elbow_at_top').status
      ).toBe('fail');
    });

    it('evaluates the right arm from a mirrored pose', () => {
      const report = evaluate(mirror(goodCurlFrame()), 'bicep_curl', 'right', {
        verticalAxis: 'up',
      });

      expect(report.side).toBe('right');
      expect(report.status).toBe('pass');
      expect(report.feedback).toEqual(['Right bicep curl: Good form!']);
      expect(verdictFor(report, 'elbow_angle_range').value).toBeCloseTo(68.1986, 3);
    });

    it('applies threshold overrides', () => {
      const report = evaluate(goodCurlFrame(), 'bicep_curl', 'left', {
        verticalAxis: 'up',
        thresholds: { bicepCurl: { elbowAngle: { min: 70 } } },
      });

      expect(report.feedback).toEqual(['Left arm: Elbow too bent (curl too high)']);
    });

    it('keeps the default bound when an override field is undefined', () => {
      const report = evaluate(goodCurlFrame(), 'bicep_curl', 'left', {
        verticalAxis: 'up',
        thresholds: { bicepCurl: { elbowAngle: { min: undefined } } },
      });

      expect(report.status).toBe('pass');
      expect(verdictFor(report, 'elbow_angle_range').value).toBeCloseTo(68.1986, 3);
    });
  });

  describe('lateral raise', () => {
    it('passes a level arm with a soft elbow', () => {
      const report = evaluate(goodLateralRaiseFrame(), 'lateral_raise', 'left', {
        verticalAxis: 'up',
      });

      expect(verdictFor(report, 'arm_at_shoulder_height').status).toBe('pass');
      expect(verdictFor(report, 'elbow_slightly_bent').status).toBe('pass');
      expect(verdictFor(report, 'wrist_not_above_shoulder')).toMatchObject({
        status: 'pass',
        value: 0,
      });
      expect(report.feedback).toEqual(['Left lateral raise: Good form!']);
    });
  });

  describe('posture', () => {
    it.each(['bicep_curl', 'lateral_raise'])('fails tilted shoulders during %s', (exercise) => {
      const base = exercise === 'bicep_curl' ? goodCurlFrame() : goodLateralRaiseFrame();
      const report = evaluate({ ...base, right_shoulder: lm(-0.4, -0.5) }, exercise, 'left', {
        verticalAxis: 'up',
      });

      expect(verdictFor(report, 'shoulders_level').status).toBe('fail');
      expect(report.status).toBe('fail');
      expect(report.feedback).toEqual(['Shoulders are not level - adjust posture']);
    });
  });

  describe('insufficient data', () => {
    it('marks a frame without any landmarks as undetected', () => {
      const report = curl.evaluate({}, { index: 3 });

      expect(report).toEqual({
        frameIndex: 3,
        timestamp: undefined,
        exercise: 'bicep_curl',
        side: 'left',
        status: 'undetected',
        verdicts: [],
        feedback: ['No pose detected'],
        missingJoints: BICEP_CURL_JOINTS,
      });
    });

    it('names the joints that are absent', () => {
      const report = curl.evaluate(without(goodCurlFrame(), 'left_wrist', 'right_knee'));

      expect(report.status).toBe('undetected');
      expect(report.missingJoints).toEqual(['left_wrist', 'right_knee']);
      expect(report.feedback).toEqual(['Cannot locate: left_wrist, right_knee']);
    });

    it('returns unknown rather than fail for low-confidence joints', () => {
      const report = curl.evaluate({ ...goodCurlFrame(), left_wrist: lm(1.3, -0.8, 0.2) });

      expect(report.status).toBe('unknown');
      expect(verdictFor(report, 'elbow_angle_range')).toEqual({
        rule: 'elbow_angle_range',
        scope: 'exercise',
        status: 'unknown',
        value: null,
        unit: 'degrees',
        message: 'Cannot detect left arm landmarks clearly',
        reason: 'low_confidence',
      });
      expect(verdictFor(report, 'elbow_stationary').status).toBe('pass');
      expect(report.feedback).toEqual(['Cannot detect left arm landmarks clearly']);
    });

    it.each([
      ['bicep_curl', goodCurlFrame()],
      ['lateral_raise', goodLateralRaiseFrame()],
    ])('returns unknown for every rule of %s when no joint is trusted', (exercise, frame) => {
      const report = evaluate(withVisibility(frame, 0.1), exercise, 'left', {
        verticalAxis: 'up',
      });

      expect(report.status).toBe('unknown');
      expect(report.missingJoints).toEqual([]);
      expect(report.verdicts).toHaveLength(7);
      expect(report.verdicts.map((v) => v.status)).toEqual(Array(7).fill('unknown'));
      expect(report.verdicts.every((v) => v.value === null)).toBe(true);
    });

    it('lets a failing rule outrank an unknown one', () => {
      const report = curl.evaluate({
        ...goodCurlFrame(),
        left_wrist: lm(1.3, -0.8, 0.2),
        right_shoulder: lm(-0.4, -0.5),
      });

      expect(report.status).toBe('fail');
      expect(report.feedback).toEqual([
        'Cannot detect left arm landmarks clearly',
        'Shoulders are not level - adjust posture',
      ]);
    });

    it('uses the configured minimum visibility', () => {
      const lenient = createFormEvaluator({
        exercise: 'bicep_curl',
        verticalAxis: 'up',
        thresholds: { minVisibility: 0.1 },
      });
      const report = lenient.evaluate({ ...goodCurlFrame(), left_wrist: lm(1.3, -0.8, 0.2) });

      expect(report.status).toBe('pass');
    });
  });

  describe('reports', () => {
    it('carries the frame position', () => {
      const report = curl.evaluate(goodCurlFrame(), { index: 7, timestamp: 233.3 });
      expect(report.frameIndex).toBe(7);
      expect(report.timestamp).toBe(233.3);
    });

    it('is identical for repeated evaluation of the same frame', () => {
      const frame = goodCurlFrame();
      expect(curl.evaluate(frame)).toEqual(curl.evaluate(frame));
    });

    it('is frozen', () => {
      const report = curl.evaluate(HANGING_ARM);
      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.verdicts)).toBe(true);
      expect(report.verdicts.every((v) => Object.isFrozen(v))).toBe(true);
    });

    it('can be built directly from a resolved configuration', () => {
      const evaluator = new FormEvaluator(curl.getConfig());
      expect(evaluator.evaluate(goodCurlFrame()).status).toBe('pass');
    });
  });
});
