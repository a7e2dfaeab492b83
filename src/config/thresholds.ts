/**
 * Form Thresholds Configuration
 *
 * Every numeric threshold the rule tables use lives here. Distances are
 * expressed as a fraction of torso length so the same values work for
 * pixel and normalized coordinates. Values are starting points meant to be
 * calibrated against recorded clips.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { InvalidConfigurationError } from '../errors';
import { isValidExerciseType, isValidSide, type ExerciseType } from '../types/exercise';
import type { Side, VerticalAxis } from '../types';

/**
 * Inclusive [min, max] range
 */
export interface RangeThreshold {
  min: number;
  max: number;
}

/**
 * Ideal value with an allowed deviation on either side
 */
export interface TargetThreshold {
  ideal: number;
  tolerance: number;
}

export interface FormThresholds {
  /** Landmarks below this visibility are not trusted */
  minVisibility: number;

  bicepCurl: {
    /** Shoulder-elbow-wrist angle, degrees */
    elbowAngle: RangeThreshold;
    /** Elbow distance from the shoulder→hip line, torso fraction */
    elbowMaxTorsoDistance: number;
  };

  lateralRaise: {
    /** Hip-shoulder-elbow angle, degrees */
    shoulderAngle: TargetThreshold;
    /** Shoulder-elbow-wrist angle, degrees (bent but not locked) */
    elbowAngle: RangeThreshold;
    /** How far the wrist may rise above the shoulder, torso fraction */
    wristAboveShoulderAllowance: number;
  };

  posture: {
    /** Max shoulder line tilt from horizontal, degrees */
    shoulderTiltTolerance: number;
    /** Max hip line tilt from horizontal, degrees */
    hipTiltTolerance: number;
    /** Shoulder-hip-knee angle, degrees */
    spineAngle: TargetThreshold;
    /** Max horizontal shoulder/hip midpoint offset, torso fraction */
    balanceTolerance: number;
  };
}

export const DEFAULT_THRESHOLDS: FormThresholds = {
  minVisibility: 0.5,
  bicepCurl: {
    elbowAngle: { min: 30, max: 160 },
    elbowMaxTorsoDistance: 0.25,
  },
  lateralRaise: {
    shoulderAngle: { ideal: 90, tolerance: 20 },
    elbowAngle: { min: 140, max: 175 },
    wristAboveShoulderAllowance: 0,
  },
  posture: {
    shoulderTiltTolerance: 10,
    hipTiltTolerance: 10,
    spineAngle: { ideal: 180, tolerance: 20 },
    balanceTolerance: 0.15,
  },
};

const degrees = z.number().min(0).max(180);
const nonNegative = z.number().finite().nonnegative();

const rangeOverride = z
  .object({ min: degrees, max: degrees })
  .partial()
  .strict();

const targetOverride = z
  .object({ ideal: degrees, tolerance: degrees })
  .partial()
  .strict();

export const thresholdOverridesSchema = z
  .object({
    minVisibility: z.number().min(0).max(1),
    bicepCurl: z
      .object({
        elbowAngle: rangeOverride,
        elbowMaxTorsoDistance: nonNegative,
      })
      .partial()
      .strict(),
    lateralRaise: z
      .object({
        shoulderAngle: targetOverride,
        elbowAngle: rangeOverride,
        wristAboveShoulderAllowance: z.number().finite(),
      })
      .partial()
      .strict(),
    posture: z
      .object({
        shoulderTiltTolerance: z.number().min(0).max(90),
        hipTiltTolerance: z.number().min(0).max(90),
        spineAngle: targetOverride,
        balanceTolerance: nonNegative,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ThresholdOverrides = z.infer<typeof thresholdOverridesSchema>;

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path].filter((p) => p !== undefined).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function mergeRange(
  base: RangeThreshold,
  override: Partial<RangeThreshold> = {}
): RangeThreshold {
  return { min: override.min ?? base.min, max: override.max ?? base.max };
}

function mergeTarget(
  base: TargetThreshold,
  override: Partial<TargetThreshold> = {}
): TargetThreshold {
  return {
    ideal: override.ideal ?? base.ideal,
    tolerance: override.tolerance ?? base.tolerance,
  };
}

function checkRange(name: string, range: RangeThreshold, issues: string[]): void {
  if (range.min > range.max) {
    issues.push(`${name}: min (${range.min}) is greater than max (${range.max})`);
  }
}

/**
 * Merge overrides onto the defaults and check the result is usable.
 *
 * @throws InvalidConfigurationError for unknown keys, out-of-range values
 *   or inverted ranges
 */
export function resolveThresholds(
  overrides: unknown = {},
  base: FormThresholds = DEFAULT_THRESHOLDS
): FormThresholds {
  const parsed = thresholdOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new InvalidConfigurationError(formatIssues(parsed.error, 'thresholds'));
  }
  const o = parsed.data;

  const thresholds: FormThresholds = {
    minVisibility: o.minVisibility ?? base.minVisibility,
    bicepCurl: {
      elbowAngle: mergeRange(base.bicepCurl.elbowAngle, o.bicepCurl?.elbowAngle),
      elbowMaxTorsoDistance:
        o.bicepCurl?.elbowMaxTorsoDistance ??
        base.bicepCurl.elbowMaxTorsoDistance,
    },
    lateralRaise: {
      shoulderAngle: mergeTarget(
        base.lateralRaise.shoulderAngle,
        o.lateralRaise?.shoulderAngle
      ),
      elbowAngle: mergeRange(
        base.lateralRaise.elbowAngle,
        o.lateralRaise?.elbowAngle
      ),
      wristAboveShoulderAllowance:
        o.lateralRaise?.wristAboveShoulderAllowance ??
        base.lateralRaise.wristAboveShoulderAllowance,
    },
    posture: {
      shoulderTiltTolerance:
        o.posture?.shoulderTiltTolerance ?? base.posture.shoulderTiltTolerance,
      hipTiltTolerance:
        o.posture?.hipTiltTolerance ?? base.posture.hipTiltTolerance,
      spineAngle: mergeTarget(base.posture.spineAngle, o.posture?.spineAngle),
      balanceTolerance:
        o.posture?.balanceTolerance ?? base.posture.balanceTolerance,
    },
  };

  const issues: string[] = [];
  checkRange('thresholds.bicepCurl.elbowAngle', thresholds.bicepCurl.elbowAngle, issues);
  checkRange(
    'thresholds.lateralRaise.elbowAngle',
    thresholds.lateralRaise.elbowAngle,
    issues
  );
  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }

  return thresholds;
}

/**
 * Fully resolved configuration for one clip
 */
export interface FormConfig {
  exercise: ExerciseType;
  side: Side;
  verticalAxis: VerticalAxis;
  thresholds: FormThresholds;
}

/**
 * Configuration as supplied by a caller or a JSON file
 */
export interface FormConfigInput {
  exercise: string;
  side?: string;
  verticalAxis?: VerticalAxis;
  thresholds?: ThresholdOverrides;
}

const formConfigSchema = z
  .object({
    exercise: z.string({ required_error: 'exercise is required' }),
    side: z.string().default('left'),
    verticalAxis: z.enum(['up', 'down']).default('down'),
    thresholds: z.unknown().optional(),
  })
  .strict();

/**
 * Validate a configuration before any frame is processed.
 *
 * @throws InvalidConfigurationError for an unknown exercise or side, or
 *   unusable thresholds
 */
export function resolveFormConfig(input: unknown): FormConfig {
  const parsed = formConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(formatIssues(parsed.error));
  }

  const { exercise, side, verticalAxis } = parsed.data;
  const issues: string[] = [];
  if (!isValidExerciseType(exercise)) {
    issues.push(
      `Unknown exercise type: ${exercise} (expected bicep_curl or lateral_raise)`
    );
  }
  if (!isValidSide(side)) {
    issues.push(`Unknown side: ${side} (expected left or right)`);
  }
  if (!isValidExerciseType(exercise) || !isValidSide(side)) {
    throw new InvalidConfigurationError(issues);
  }

  return {
    exercise,
    side,
    verticalAxis,
    thresholds: resolveThresholds(parsed.data.thresholds ?? {}),
  };
}

/**
 * Read and validate a JSON configuration file.
 */
export function loadFormConfigFile(path: string): FormConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigurationError([`Cannot read ${path}: ${reason}`]);
  }
  return resolveFormConfig(raw);
}
