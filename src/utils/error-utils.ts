/**
 * Helpers for turning unknown thrown values into messages and errors.
 */

/**
 * Extracts a string message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wraps an error with additional context, keeping the original as `cause`.
 */
export function wrapError(error: unknown, context: string): Error {
  const message = `${context}: ${getErrorMessage(error)}`;
  return error instanceof Error ? new Error(message, { cause: error }) : new Error(message);
}

/**
 * Thrown when a validation request runs past its wall-clock budget.
 */
export class DeadlineExceededError extends Error {
  constructor(
    public readonly budgetMs: number,
    public readonly elapsedMs: number
  ) {
    super(`Validation exceeded its time budget of ${budgetMs}ms`);
    this.name = 'DeadlineExceededError';
  }

  static isDeadlineExceededError(error: unknown): error is DeadlineExceededError {
    return (
      error instanceof DeadlineExceededError ||
      (error instanceof Error && error.name === 'DeadlineExceededError')
    );
  }
}

/**
 * Thrown when the source nests deeper than the configured limit.
 */
export class NestingDepthError extends Error {
  constructor(
    public readonly maxDepth: number,
    public readonly line?: number
  ) {
    super(`Source nesting exceeds the maximum depth of ${maxDepth}`);
    this.name = 'NestingDepthError';
  }
}

/**
 * Thrown by the configuration loader for unreadable or invalid config files.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string
  ) {
    super(filePath ? `${message} (${filePath})` : message);
    this.name = 'ConfigError';
  }
}
