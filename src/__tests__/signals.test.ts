import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";
import { onStopSignals } from "../signals.js";

describe("onStopSignals", () => {
  it("aborts on the first signal and exits 1 on the second", () => {
    const source = new EventEmitter();
    const exit = vi.fn();
    const controller = new AbortController();
    onStopSignals(controller, { source, exit });

    source.emit("SIGINT");
    expect(controller.signal.aborted).toBe(true);
    expect(exit).not.toHaveBeenCalled();

    source.emit("SIGTERM");
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("treats SIGTERM like SIGINT", () => {
    const source = new EventEmitter();
    const exit = vi.fn();
    const controller = new AbortController();
    onStopSignals(controller, { source, exit });

    source.emit("SIGTERM");
    expect(controller.signal.aborted).toBe(true);
    expect(exit).not.toHaveBeenCalled();
  });

  it("removes its handlers when disposed", () => {
    const source = new EventEmitter();
    const dispose = onStopSignals(new AbortController(), { source, exit: vi.fn() });

    expect(source.listenerCount("SIGINT")).toBe(1);
    expect(source.listenerCount("SIGTERM")).toBe(1);
    dispose();
    expect(source.listenerCount("SIGINT")).toBe(0);
    expect(source.listenerCount("SIGTERM")).toBe(0);
  });
});
