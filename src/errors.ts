/**
 * Errors that halt the caller.
 *
 * Per-frame problems (low confidence, missing joints, degenerate geometry)
 * are reported as values on the FrameReport and never thrown.
 */

/**
 * Raised before any frame is processed when the exercise, side or threshold
 * configuration cannot be used.
 */
export class InvalidConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid form check configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

/**
 * Raised when a pose track file does not have the expected shape.
 */
export class PoseTrackFormatError extends Error {
  constructor(
    message: string,
    readonly source?: string
  ) {
    super(source ? `${message} (${source})` : message);
    this.name = 'PoseTrackFormatError';
  }
}
