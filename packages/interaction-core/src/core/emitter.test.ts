import { describe, expect, it, vi } from "vitest";

import { Emitter } from "./emitter";
import { createTaggedLogger, type Logger } from "./logger";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("Emitter", () => {
  it("runs every listener until it unsubscribes", () => {
    const emitter = new Emitter<number>("ticks", silentLogger());
    const first = vi.fn();
    const second = vi.fn();
    const off = emitter.on(first);
    emitter.on(second);

    emitter.emit(1);
    off();
    emitter.emit(2);

    expect(first.mock.calls).toEqual([[1]]);
    expect(second.mock.calls).toEqual([[1], [2]]);
  });

  it("delivers to the listeners present when the emit started", () => {
    const emitter = new Emitter<string>("late", silentLogger());
    const late = vi.fn();
    emitter.on(() => {
      emitter.on(late);
    });

    emitter.emit("a");
    expect(late).not.toHaveBeenCalled();

    emitter.emit("b");
    expect(late).toHaveBeenCalledWith("b");
  });

  it("rethrows listener errors after all listeners ran", () => {
    const logger = silentLogger();
    const emitter = new Emitter<string>("clicked", logger);
    const after = vi.fn();
    emitter.on(() => {
      throw new Error("boom");
    });
    emitter.on(after);

    expect(() => emitter.emit("x")).toThrow(AggregateError);
    expect(after).toHaveBeenCalledWith("x");
    expect(vi.mocked(logger.error).mock.calls[0]?.[0]).toBe("clicked: 1 listener(s) failed");
  });

  it("drops every listener on clear", () => {
    const emitter = new Emitter<number>("flicked", silentLogger());
    const listener = vi.fn();
    emitter.on(listener);

    emitter.clear();
    emitter.emit(3);

    expect(listener).not.toHaveBeenCalled();
  });
});

describe("createTaggedLogger", () => {
  it("prefixes output and drops debug unless enabled", () => {
    const base = silentLogger();
    const quiet = createTaggedLogger("Engine", base);
    quiet.debug("hidden");
    quiet.warn("shown", 1);

    expect(base.debug).not.toHaveBeenCalled();
    expect(base.warn).toHaveBeenCalledWith("[Engine]", "shown", 1);

    createTaggedLogger("Engine", base, true).debug("visible");
    expect(base.debug).toHaveBeenCalledWith("[Engine]", "visible");
  });
});
