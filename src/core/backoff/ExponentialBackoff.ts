import { InvalidBackoffConfigError } from "../errors";

/**
 * Exponential retry delay with a ceiling.
 *
 * The current delay starts at the initial delay, doubles on every reported
 * error up to the maximum, and falls back to the initial delay on success.
 */
export class ExponentialBackoff {
  private readonly initialMs: number;
  private readonly maxMs: number;
  private currentMs: number;
  private consecutiveFailures: number = 0;

  constructor(initialMs: number, maxMs: number) {
    if (
      !Number.isFinite(initialMs) ||
      !Number.isFinite(maxMs) ||
      initialMs < 0 ||
      maxMs < 0 ||
      initialMs > maxMs
    ) {
      throw new InvalidBackoffConfigError(initialMs, maxMs);
    }
    this.initialMs = initialMs;
    this.maxMs = maxMs;
    this.currentMs = initialMs;
  }

  reportSuccess(): void {
    this.currentMs = this.initialMs;
    this.consecutiveFailures = 0;
  }

  reportError(): void {
    this.consecutiveFailures++;
    // A zero delay would never grow by doubling
    const grown = this.currentMs === 0 ? 1 : this.currentMs * 2;
    this.currentMs = Math.min(grown, this.maxMs);
  }

  getCurrentBackoff(): number {
    return this.currentMs;
  }

  getConsecutiveFailures(): number {
    return this.consecutiveFailures;
  }

  atMaxBackoff(): boolean {
    return this.currentMs >= this.maxMs;
  }
}
