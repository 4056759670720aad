/** Configuration rejected before a run starts. User-correctable. */
export class InvalidConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

/** Queue ordering or state uniqueness broken. Always a defect; abort the run. */
export class InvariantViolationError extends Error {
  readonly minute: number;
  readonly problems: string[];

  constructor(minute: number, problems: string[]) {
    super(`Invariant violation at minute ${minute}: ${problems.join('; ')}`);
    this.name = 'InvariantViolationError';
    this.minute = minute;
    this.problems = problems;
  }
}
