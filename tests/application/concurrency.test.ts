import { describe, expect, test } from "vitest";
import {
  mapWithConcurrency,
  SerialQueue,
} from "#/application/use-cases/shared/concurrency";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("mapWithConcurrency", () => {
  test("keeps input order and never exceeds the limit", async () => {
    let running = 0;
    let peak = 0;

    const result = await mapWithConcurrency([1, 2, 3, 4, 5], 2, async (value, index) => {
      running += 1;
      peak = Math.max(peak, running);
      await tick();
      running -= 1;
      return `${index}:${value * 10}`;
    });

    expect(result).toEqual(["0:10", "1:20", "2:30", "3:40", "4:50"]);
    expect(peak).toBe(2);
  });

  test("treats a limit below one as one", async () => {
    let peak = 0;
    let running = 0;

    await mapWithConcurrency(["a", "b", "c"], 0, async () => {
      running += 1;
      peak = Math.max(peak, running);
      await tick();
      running -= 1;
    });

    expect(peak).toBe(1);
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

describe("SerialQueue", () => {
  test("runs tasks one at a time in submission order", async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`start ${name}`);
      await tick();
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.run(task("a")), queue.run(task("b"))]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["start a", "end a", "start b", "end b"]);
  });

  test("keeps going after a rejected task", async () => {
    const queue = new SerialQueue();

    const failed = queue.run(async () => {
      throw new Error("write failed");
    });
    const next = queue.run(async () => "written");

    await expect(failed).rejects.toThrow("write failed");
    expect(await next).toBe("written");
  });
});
