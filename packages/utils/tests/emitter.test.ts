import { describe, expect, it, vi } from "vitest";
import { Emitter } from "../src/emitter.js";

interface TestEvents {
  value: (n: number) => void;
  pair: (a: string, b: boolean) => void;
}

class TestEmitter extends Emitter<TestEvents> {
  fire<K extends keyof TestEvents>(event: K, ...args: Parameters<TestEvents[K]>): void {
    this.emit(event, ...args);
  }
}

describe("Emitter", () => {
  it("should deliver arguments to every listener of the event", () => {
    const emitter = new TestEmitter();
    const first = vi.fn();
    const second = vi.fn();
    emitter.on("pair", first).on("pair", second);

    emitter.fire("pair", "x", true);

    expect(first).toHaveBeenCalledWith("x", true);
    expect(second).toHaveBeenCalledWith("x", true);
  });

  it("should stop delivering after off()", () => {
    const emitter = new TestEmitter();
    const listener = vi.fn();
    emitter.on("value", listener);
    emitter.fire("value", 1);
    emitter.off("value", listener);
    emitter.fire("value", 2);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount("value")).toBe(0);
  });

  it("should keep delivering when a listener throws and report to the hook", () => {
    const onError = vi.fn();
    const emitter = new (class extends Emitter<TestEvents> {
      fire(n: number) {
        this.emit("value", n);
      }
    })(onError);
    const after = vi.fn();
    const boom = new Error("boom");
    emitter.on("value", () => {
      throw boom;
    });
    emitter.on("value", after);

    emitter.fire(7);

    expect(after).toHaveBeenCalledWith(7);
    expect(onError).toHaveBeenCalledWith(boom, "value");
  });

  it("should rethrow the first listener error when no hook is given", () => {
    const emitter = new TestEmitter();
    const after = vi.fn();
    emitter.on("value", () => {
      throw new Error("first");
    });
    emitter.on("value", after);

    expect(() => emitter.fire("value", 1)).toThrow("first");
    expect(after).toHaveBeenCalledWith(1);
  });
});
