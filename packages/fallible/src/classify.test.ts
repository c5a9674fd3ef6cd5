/**
 * Tests for classify.ts - mapping exception classes to domain errors
 */
import { describe, it, expect, vi } from "vitest";
import { classifyError, on } from "./classify";
import { tryCatch, tryCatchAsync } from "./try";
import { failure } from "./outcome";

class TimeoutError extends Error {
  constructor(readonly ms: number) {
    super(`timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

class SlowNetworkError extends TimeoutError {}

type FetchError =
  | { type: "TIMEOUT"; ms: number }
  | { type: "NETWORK" }
  | { type: "UNKNOWN"; thrown: unknown };

const toFetchError = classifyError<FetchError>(
  [
    on(TimeoutError, (e): FetchError => ({ type: "TIMEOUT", ms: e.ms })),
    on(TypeError, (): FetchError => ({ type: "NETWORK" })),
  ],
  (thrown) => ({ type: "UNKNOWN", thrown })
);

describe("classifyError", () => {
  it("converts a matching exception class", () => {
    expect(toFetchError(new TimeoutError(250))).toEqual({ type: "TIMEOUT", ms: 250 });
    expect(toFetchError(new TypeError("fetch failed"))).toEqual({ type: "NETWORK" });
  });

  it("matches subclasses through instanceof", () => {
    expect(toFetchError(new SlowNetworkError(900))).toEqual({ type: "TIMEOUT", ms: 900 });
  });

  it("hands anything unmatched to the fallback", () => {
    const thrown = new RangeError("nope");
    expect(toFetchError(thrown)).toEqual({ type: "UNKNOWN", thrown });
    expect(toFetchError("not even an Error")).toEqual({
      type: "UNKNOWN",
      thrown: "not even an Error",
    });
  });

  it("tries cases in order and stops at the first match", () => {
    const general = vi.fn((): string => "general");
    const specific = vi.fn((): string => "specific");
    const classify = classifyError<string>(
      [on(Error, general), on(TimeoutError, specific)],
      () => "fallback"
    );

    expect(classify(new TimeoutError(1))).toBe("general");
    expect(specific).not.toHaveBeenCalled();
  });

  it("plugs into tryCatch as the error factory", () => {
    const out = tryCatch(() => {
      throw new TimeoutError(30);
    }, toFetchError);

    expect(out).toEqual(failure({ type: "TIMEOUT", ms: 30 }));
  });

  it("plugs into tryCatchAsync as the error factory", async () => {
    const out = await tryCatchAsync(() => Promise.reject(new TypeError("offline")), toFetchError);

    expect(out).toEqual(failure({ type: "NETWORK" }));
  });
});
