export class LogLensError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends LogLensError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n - ${issues.join("\n - ")}`);
    this.issues = issues;
  }
}

/** A store call failed. The only failure the analyzer lets reach its caller. */
export class PersistenceError extends LogLensError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
    this.operation = operation;
  }
}

export class InvalidFeedbackError extends LogLensError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
