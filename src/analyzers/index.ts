/**
 * Form Analyzers
 *
 * Per-frame evaluation and per-clip aggregation.
 */

export {
  createFormEvaluator,
  evaluate,
  type EvaluateOptions,
  FormEvaluator,
  type FrameInfo,
} from './FormEvaluator';
export type {
  FrameReport,
  FrameStatus,
  RuleSummary,
  SessionSummary,
  ValueStats,
  Verdict,
  VerdictStatus,
} from './FormReport';
export { SessionAggregator, type SessionInfo } from './SessionAggregator';
