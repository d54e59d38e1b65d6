import { describe, expect, it } from "vitest";
import { Outbox } from "../src/outbox.js";
import { read, text } from "./helpers.js";

describe("Outbox", () => {
  it("should flush payloads in enqueue order", () => {
    const outbox = new Outbox();
    outbox.enqueue(text("one"));
    outbox.enqueue(text("two"));
    outbox.enqueue(text("three"));

    const seen: string[] = [];
    const result = outbox.flush((payload) => {
      seen.push(read(payload));
      return true;
    });

    expect(seen).toEqual(["one", "two", "three"]);
    expect(result).toEqual({ delivered: 3, failed: 0 });
    expect(outbox.size).toBe(0);
  });

  it("should count failures and keep flushing the rest", () => {
    const outbox = new Outbox();
    outbox.enqueue(text("a"));
    outbox.enqueue(text("b"));
    outbox.enqueue(text("c"));

    const seen: string[] = [];
    const result = outbox.flush((payload) => {
      seen.push(read(payload));
      return read(payload) !== "b";
    });

    expect(seen).toEqual(["a", "b", "c"]);
    expect(result).toEqual({ delivered: 2, failed: 1 });
    expect(outbox.size).toBe(0);
  });

  it("should deliver payloads enqueued during the flush after the earlier ones", () => {
    const outbox = new Outbox();
    outbox.enqueue(text("first"));

    const seen: string[] = [];
    outbox.flush((payload) => {
      const value = read(payload);
      seen.push(value);
      if (value === "first") {
        expect(outbox.isFlushing).toBe(true);
        outbox.enqueue(text("late"));
      }
      return true;
    });

    expect(seen).toEqual(["first", "late"]);
    expect(outbox.isFlushing).toBe(false);
  });

  it("should drop everything on clear", () => {
    const outbox = new Outbox();
    outbox.enqueue(text("x"));
    outbox.clear();
    expect(outbox.flush(() => true)).toEqual({ delivered: 0, failed: 0 });
  });
});
