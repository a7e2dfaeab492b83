/**
 * Form Check
 *
 * Frame-by-frame exercise form evaluation from pose landmarks.
 */

export {
  createFormEvaluator,
  evaluate,
  type EvaluateOptions,
  FormEvaluator,
  type FrameInfo,
  type FrameReport,
  type FrameStatus,
  type RuleSummary,
  SessionAggregator,
  type SessionSummary,
  type ValueStats,
  type Verdict,
  type VerdictStatus,
} from './analyzers';
export {
  DEFAULT_THRESHOLDS,
  type FormConfig,
  type FormConfigInput,
  type FormThresholds,
  loadFormConfigFile,
  resolveFormConfig,
  resolveThresholds,
  type ThresholdOverrides,
} from './config/thresholds';
export { InvalidConfigurationError, PoseTrackFormatError } from './errors';
export {
  exerciseRegistry,
  getAvailableExercises,
  getExerciseByName,
  getExerciseDefinition,
  getRequiredJoints,
  getRuleSet,
} from './exercises';
export * as geometry from './models/geometry';
export type { Measurement, InsufficientReason } from './models/geometry';
export { Skeleton, type DerivedJoint, type JointRef } from './models/Skeleton';
export { FormSession, type PoseFrame } from './pipeline/FormSession';
export {
  LoggerMetricsSink,
  type MetricsSink,
  publishSummary,
} from './services/MetricsReporter';
export {
  landmarksFromKeypoints,
  loadPoseTrack,
  parsePoseTrack,
  toPoseFrames,
} from './services/PoseTrackService';
export {
  ExerciseType,
  isValidExerciseType,
  isValidSide,
  type ExerciseDefinition,
  type RuleDefinition,
} from './types/exercise';
export type { PoseTrackFile, PoseTrackFrame, PoseTrackMetadata } from './types/posetrack';
export {
  JOINT_NAMES,
  type JointName,
  type Landmark,
  type LandmarkSet,
  type PoseKeypoint,
  type Side,
  type VerticalAxis,
} from './types';
export { createLogger, setLogLevel, type LogLevel } from './utils/logger';
