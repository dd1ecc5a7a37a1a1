import { ExponentialBackoff } from "../backoff/ExponentialBackoff";
import { Logger, StoreLogger, getDefaultLogLevel } from "../logging";

export interface FlushSchedulerOptions {
  /** Debounce window for the first flush, and the delay restored after a success. */
  initialBackoffMs: number;
  /** Ceiling for the retry delay after consecutive failures. */
  maxBackoffMs: number;
}

/**
 * Scheduler state. With both delays at zero there is no backoff at all and
 * the owner persists inline.
 */
export type FlushSchedulerState =
  | { kind: "disabled" }
  | { kind: "idle"; backoff: ExponentialBackoff }
  | {
      kind: "armed";
      backoff: ExponentialBackoff;
      timer: ReturnType<typeof setTimeout>;
      delayMs: number;
    };

/**
 * Runs a task in the owner's serial order, so that a due flush never
 * interleaves with request handling.
 */
export type SerialExecutor = <T>(task: () => Promise<T>) => Promise<T>;

const runDirectly: SerialExecutor = (task) => task();

/**
 * Debounces flushes of the database image and retries failed ones with
 * exponential backoff.
 *
 * Mutations call {@link arm}. The first call starts a timer; later calls while
 * the timer is pending are absorbed by it. When the timer fires, a "flush due"
 * task is posted to the owner's serial executor. That task moves the scheduler
 * back to idle and saves; a failed save grows the backoff and re-arms.
 */
export class FlushScheduler {
  private state: FlushSchedulerState;
  private disposed: boolean = false;
  private readonly save: () => Promise<boolean>;
  private readonly executor: SerialExecutor;
  private logger: Logger;

  constructor(
    options: FlushSchedulerOptions,
    save: () => Promise<boolean>,
    executor: SerialExecutor = runDirectly,
    logger?: Logger
  ) {
    this.save = save;
    this.executor = executor;
    this.logger = logger || new StoreLogger(getDefaultLogLevel(), "FlushScheduler", true);

    if (options.initialBackoffMs === 0 && options.maxBackoffMs === 0) {
      this.state = { kind: "disabled" };
    } else {
      this.state = {
        kind: "idle",
        backoff: new ExponentialBackoff(options.initialBackoffMs, options.maxBackoffMs),
      };
    }
  }

  isDisabled(): boolean {
    return this.state.kind === "disabled";
  }

  isArmed(): boolean {
    return this.state.kind === "armed";
  }

  getState(): FlushSchedulerState {
    return this.state;
  }

  /**
   * Delay the next {@link arm} would use, or null when disabled.
   */
  currentDelayMs(): number | null {
    switch (this.state.kind) {
      case "disabled":
        return null;
      case "idle":
        return this.state.backoff.getCurrentBackoff();
      case "armed":
        return this.state.delayMs;
    }
  }

  /**
   * Schedule a flush after the current backoff delay.
   *
   * @returns the scheduled delay, or null if nothing was scheduled
   *   (disabled, disposed, or a flush is already armed)
   */
  arm(): number | null {
    if (this.disposed || this.state.kind !== "idle") {
      return null;
    }

    const backoff = this.state.backoff;
    const delayMs = backoff.getCurrentBackoff();
    const timer = setTimeout(async () => {
      try {
        await this.executor(() => this.runDueFlush(timer));
      } catch (e) {
        this.logger.error("Flush task failed", e);
      }
    }, delayMs);

    this.state = { kind: "armed", backoff, timer, delayMs };
    this.logger.trace(`Flush armed in ${delayMs}ms`);
    return delayMs;
  }

  /**
   * Clear a pending timer without flushing. The scheduler returns to idle.
   */
  cancel(): void {
    if (this.state.kind === "armed") {
      clearTimeout(this.state.timer);
      this.state = { kind: "idle", backoff: this.state.backoff };
    }
  }

  /**
   * Cancel any pending flush and stop arming. Used on shutdown, where the
   * owner performs one final flush itself.
   */
  dispose(): void {
    this.cancel();
    this.disposed = true;
  }

  private async runDueFlush(timer: ReturnType<typeof setTimeout>): Promise<void> {
    // A cancel() or dispose() between timer and task makes this a stale event
    if (this.disposed || this.state.kind !== "armed" || this.state.timer !== timer) {
      return;
    }
    const backoff = this.state.backoff;
    this.state = { kind: "idle", backoff };

    const success = await this.save();
    if (success) {
      if (backoff.getConsecutiveFailures() > 0) {
        this.logger.info(
          `Flush succeeded after ${backoff.getConsecutiveFailures()} failed attempt(s)`
        );
      }
      backoff.reportSuccess();
      return;
    }

    backoff.reportError();
    this.logger.warn(
      `Flush failed (${backoff.getConsecutiveFailures()} in a row), retrying in ${backoff.getCurrentBackoff()}ms`
    );
    this.arm();
  }
}
