/**
 * Exercise Registry
 *
 * Central table from exercise type to its definition. Rule lists are looked
 * up by (exercise, side): exercise rules first, then the shared posture
 * rules, in a fixed order.
 */

import type { FormThresholds } from '../config/thresholds';
import { DEFAULT_THRESHOLDS } from '../config/thresholds';
import { InvalidConfigurationError } from '../errors';
import { expandJointRefs } from '../models/Skeleton';
import {
  EXERCISE_TYPES,
  ExerciseType,
  type ExerciseDefinition,
  type RuleDefinition,
} from '../types/exercise';
import type { JointName, Side } from '../types';
import { bicepCurlDefinition } from './bicepCurl';
import { lateralRaiseDefinition } from './lateralRaise';
import { createPostureRules } from './posture';

/**
 * Registry of all available exercise definitions
 */
export const exerciseRegistry: Record<ExerciseType, ExerciseDefinition> = {
  [ExerciseType.BicepCurl]: bicepCurlDefinition,
  [ExerciseType.LateralRaise]: lateralRaiseDefinition,
};

/**
 * Get an exercise definition by type
 *
 * @throws InvalidConfigurationError if the exercise type is not registered
 */
export function getExerciseDefinition(type: ExerciseType): ExerciseDefinition {
  const definition = exerciseRegistry[type];
  if (!definition) {
    throw new InvalidConfigurationError([`Unknown exercise type: ${type}`]);
  }
  return definition;
}

/**
 * Get all available exercise types
 */
export function getAvailableExercises(): ExerciseType[] {
  return [...EXERCISE_TYPES];
}

/**
 * Get exercise definition by string name (case-insensitive)
 *
 * @returns The exercise definition or undefined if not found
 */
export function getExerciseByName(name: string): ExerciseDefinition | undefined {
  const normalizedName = name.toLowerCase().replace(/[\s\-_]/g, '');

  for (const definition of Object.values(exerciseRegistry)) {
    const normalizedType = definition.type.replace(/_/g, '');
    const normalizedDisplayName = definition.name.toLowerCase().replace(/[\s\-_]/g, '');

    if (normalizedName === normalizedType || normalizedName === normalizedDisplayName) {
      return definition;
    }
  }

  return undefined;
}

/**
 * The ordered rule list for an exercise and tracked side.
 */
export function getRuleSet(
  exercise: ExerciseType,
  side: Side,
  thresholds: FormThresholds = DEFAULT_THRESHOLDS
): RuleDefinition[] {
  const definition = getExerciseDefinition(exercise);
  return [
    ...definition.createRules(side, thresholds),
    ...createPostureRules(thresholds),
  ];
}

/**
 * Every detected joint a rule list reads, in first-use order
 */
export function getRequiredJoints(rules: readonly RuleDefinition[]): JointName[] {
  return expandJointRefs(rules.flatMap((rule) => rule.joints));
}

export { bicepCurlDefinition, createBicepCurlRules } from './bicepCurl';
export { lateralRaiseDefinition, createLateralRaiseRules } from './lateralRaise';
export { createPostureRules } from './posture';
