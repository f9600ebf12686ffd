import { DeadlineExceededError } from './error-utils';

/**
 * Wall-clock budget for one validation request. AST walks call `check()`
 * periodically; the first call past the budget throws.
 */
export class Deadline {
  private readonly startedAt: number;

  constructor(
    public readonly budgetMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = now();
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  expired(): boolean {
    return this.budgetMs > 0 && this.elapsedMs() > this.budgetMs;
  }

  check(): void {
    if (this.expired()) {
      throw new DeadlineExceededError(this.budgetMs, this.elapsedMs());
    }
  }

  /** A deadline that never expires */
  static unbounded(): Deadline {
    return new Deadline(0);
  }
}
