import { jest } from "@jest/globals";

import { TickScheduler } from "./TickScheduler";

beforeEach(() => {
  jest.useFakeTimers();
});

afterEach(() => {
  jest.useRealTimers();
});

describe("TickScheduler", () => {
  test("fires once per period", async () => {
    const scheduler = new TickScheduler(10);
    expect(scheduler.periodMs).toBe(100);
    scheduler.start();

    expect(scheduler.hasPendingTick()).toBe(false);
    await jest.advanceTimersByTimeAsync(100);
    expect(scheduler.takePendingTicks()).toBe(1);
    expect(scheduler.hasPendingTick()).toBe(false);

    scheduler.stop();
  });

  test("collapses missed fires into a single pending tick", async () => {
    const scheduler = new TickScheduler(10);
    scheduler.start();

    await jest.advanceTimersByTimeAsync(350);
    expect(scheduler.hasPendingTick()).toBe(true);
    expect(scheduler.takePendingTicks()).toBe(3);
    expect(scheduler.takePendingTicks()).toBe(0);

    scheduler.stop();
  });

  test("waitForTick resolves at the next fire", async () => {
    const scheduler = new TickScheduler(20);
    scheduler.start();

    let fired = false;
    const waiting = scheduler.waitForTick().then(() => {
      fired = true;
    });
    expect(scheduler.waitForTick()).toBe(scheduler.waitForTick());

    await jest.advanceTimersByTimeAsync(49);
    expect(fired).toBe(false);
    await jest.advanceTimersByTimeAsync(1);
    await waiting;
    expect(fired).toBe(true);

    scheduler.stop();
  });

  test("stop cancels the timer and pending ticks", async () => {
    const scheduler = new TickScheduler(10);
    scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    await jest.advanceTimersByTimeAsync(100);

    scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
    expect(scheduler.hasPendingTick()).toBe(false);

    await jest.advanceTimersByTimeAsync(500);
    expect(scheduler.takePendingTicks()).toBe(0);
  });

  test("rejects non-positive rates", () => {
    expect(() => new TickScheduler(0)).toThrow("Tick rate must be a positive number, received 0");
    expect(() => new TickScheduler(-5)).toThrow(
      "Tick rate must be a positive number, received -5",
    );
  });
});
