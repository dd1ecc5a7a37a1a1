import { FlushScheduler } from "../core/persistence/FlushScheduler";
import { SerialQueue } from "../core/utils/SerialQueue";

/**
 * Scheduler wired to a queue and a scripted save function, so tests can
 * decide the outcome of every flush attempt.
 */
function createHarness(initialBackoffMs: number, maxBackoffMs: number) {
  const queue = new SerialQueue();
  const outcomes: boolean[] = [];
  let saves = 0;
  const scheduler = new FlushScheduler(
    { initialBackoffMs, maxBackoffMs },
    async () => {
      saves++;
      return outcomes.shift() ?? true;
    },
    (task) => queue.run(task)
  );
  return {
    scheduler,
    queue,
    outcomes,
    saves: () => saves,
  };
}

describe("FlushScheduler", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.useFakeTimers({ doNotFake: ["nextTick", "queueMicrotask"] });
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.useRealTimers();
    warnSpy.mockRestore();
  });

  test("is disabled when both delays are zero", () => {
    const { scheduler } = createHarness(0, 0);
    expect(scheduler.isDisabled()).toBe(true);
    expect(scheduler.arm()).toBeNull();
    expect(scheduler.isArmed()).toBe(false);
    expect(scheduler.currentDelayMs()).toBeNull();
    expect(scheduler.getState()).toEqual({ kind: "disabled" });
  });

  test("is enabled when only the maximum is non-zero", () => {
    const { scheduler } = createHarness(0, 100);
    expect(scheduler.isDisabled()).toBe(false);
    expect(scheduler.arm()).toBe(0);
  });

  test("arms once per window and flushes after the initial delay", async () => {
    const { scheduler, queue, saves } = createHarness(100, 1000);

    expect(scheduler.arm()).toBe(100);
    expect(scheduler.arm()).toBeNull();
    expect(scheduler.arm()).toBeNull();
    expect(scheduler.isArmed()).toBe(true);

    jest.advanceTimersByTime(99);
    await queue.onIdle();
    expect(saves()).toBe(0);

    jest.advanceTimersByTime(1);
    await queue.onIdle();
    expect(saves()).toBe(1);
    expect(scheduler.isArmed()).toBe(false);
  });

  test("re-arms with growing delays while saves fail, bounded by the maximum", async () => {
    const { scheduler, queue, outcomes, saves } = createHarness(100, 1000);
    outcomes.push(false, false, false, false, false);

    const delays: Array<number | null> = [scheduler.arm()];
    for (let attempt = 0; attempt < 5; attempt++) {
      const delay = scheduler.currentDelayMs() ?? 0;
      jest.advanceTimersByTime(delay);
      await queue.onIdle();
      expect(scheduler.isArmed()).toBe(true);
      delays.push(scheduler.currentDelayMs());
    }

    expect(delays).toEqual([100, 200, 400, 800, 1000, 1000]);
    expect(saves()).toBe(5);

    // Next attempt succeeds: back to idle with the initial delay
    jest.advanceTimersByTime(1000);
    await queue.onIdle();
    expect(saves()).toBe(6);
    expect(scheduler.isArmed()).toBe(false);
    expect(scheduler.currentDelayMs()).toBe(100);
    expect(scheduler.arm()).toBe(100);
  });

  test("runs due flushes behind work already queued", async () => {
    const { scheduler, queue, saves } = createHarness(10, 100);
    const order: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const blocker = queue.run(async () => {
      await gate;
      order.push("request");
    });

    scheduler.arm();
    jest.advanceTimersByTime(10);
    expect(saves()).toBe(0);

    release();
    await blocker;
    await queue.onIdle();
    order.push(`saves=${saves()}`);
    expect(order).toEqual(["request", "saves=1"]);
  });

  test("cancel drops a pending flush", async () => {
    const { scheduler, queue, saves } = createHarness(100, 1000);
    scheduler.arm();
    scheduler.cancel();
    expect(scheduler.isArmed()).toBe(false);

    jest.advanceTimersByTime(1000);
    await queue.onIdle();
    expect(saves()).toBe(0);
  });

  test("dispose stops arming", async () => {
    const { scheduler, queue, saves } = createHarness(100, 1000);
    scheduler.arm();
    scheduler.dispose();
    expect(scheduler.arm()).toBeNull();

    jest.advanceTimersByTime(1000);
    await queue.onIdle();
    expect(saves()).toBe(0);
  });

  test("ignores a due flush that was disposed after the timer fired", async () => {
    const { scheduler, queue, saves } = createHarness(10, 100);
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const blocker = queue.run(() => gate);

    scheduler.arm();
    jest.advanceTimersByTime(10); // flush task now waits behind the blocker
    scheduler.dispose();

    release();
    await blocker;
    await queue.onIdle();
    expect(saves()).toBe(0);
  });
});
