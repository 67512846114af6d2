import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { RenderLoop } from "./renderLoop";

describe("RenderLoop", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("should tick once per interval with the current time", () => {
    let time = 0;
    const onTick = vi.fn();
    const loop = new RenderLoop({ intervalMs: 40, getTime: () => time, onTick });

    loop.start();
    expect(onTick).not.toHaveBeenCalled();

    time = 0.04;
    vi.advanceTimersByTime(40);
    expect(onTick).toHaveBeenCalledTimes(1);
    expect(onTick).toHaveBeenLastCalledWith(0.04);

    time = 0.08;
    vi.advanceTimersByTime(40);
    expect(onTick).toHaveBeenCalledTimes(2);
    expect(onTick).toHaveBeenLastCalledWith(0.08);
  });

  it("should skip ticks while there is no time to report", () => {
    const onTick = vi.fn();
    const loop = new RenderLoop({ intervalMs: 40, getTime: () => null, onTick });

    loop.start();
    vi.advanceTimersByTime(120);

    expect(onTick).not.toHaveBeenCalled();
    expect(loop.isRunning()).toBe(true);
  });

  it("should not double-schedule when started twice", () => {
    const onTick = vi.fn();
    const loop = new RenderLoop({ intervalMs: 40, getTime: () => 0, onTick });

    loop.start();
    loop.start();
    vi.advanceTimersByTime(40);

    expect(onTick).toHaveBeenCalledTimes(1);
  });

  it("should stay stopped for good", () => {
    const onTick = vi.fn();
    const loop = new RenderLoop({ intervalMs: 40, getTime: () => 0, onTick });

    loop.start();
    vi.advanceTimersByTime(40);
    loop.stop();
    loop.stop();
    vi.advanceTimersByTime(200);
    loop.start();
    vi.advanceTimersByTime(200);

    expect(onTick).toHaveBeenCalledTimes(1);
    expect(loop.isRunning()).toBe(false);
  });

  it("should stop when the tick handler stops it", () => {
    let calls = 0;
    const loop = new RenderLoop({
      intervalMs: 40,
      getTime: () => 0,
      onTick: () => {
        calls++;
        loop.stop();
      },
    });

    loop.start();
    vi.advanceTimersByTime(200);

    expect(calls).toBe(1);
  });

  it("should log a throwing tick handler and keep going", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const failure = new Error("listener failed");
    const onTick = vi.fn(() => {
      throw failure;
    });
    const loop = new RenderLoop({ intervalMs: 40, getTime: () => 1, onTick });

    loop.start();
    vi.advanceTimersByTime(80);

    expect(onTick).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith("[RenderLoop] tick handler error:", failure);
  });
});
