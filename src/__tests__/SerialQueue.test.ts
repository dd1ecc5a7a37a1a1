import { SerialQueue } from "../core/utils/SerialQueue";

describe("SerialQueue", () => {
  test("runs tasks one at a time in order", async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await new Promise((resolve) => setTimeout(resolve, ms));
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      queue.run(task("a", 20)),
      queue.run(task("b", 1)),
      queue.run(task("c", 5)),
    ]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["start a", "end a", "start b", "end b", "start c", "end c"]);
  });

  test("a failing task does not block the ones behind it", async () => {
    const queue = new SerialQueue();
    const failed = queue.run(async () => {
      throw new Error("boom");
    });
    const next = queue.run(() => 42);

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });

  test("tracks pending tasks and idleness", async () => {
    const queue = new SerialQueue();
    expect(queue.size()).toBe(0);

    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    void queue.run(() => gate);
    void queue.run(() => undefined);
    expect(queue.size()).toBe(2);

    const idle = queue.onIdle();
    release();
    await idle;
    expect(queue.size()).toBe(0);
  });
});
