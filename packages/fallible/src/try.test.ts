/**
 * Tests for try.ts - exception capture and the cleanup clause
 */
import { setTimeout as delay } from "node:timers/promises";
import { afterEach, describe, it, expect, vi } from "vitest";
import { tryCatch, tryCatchAsync } from "./try";
import { success, failure } from "./outcome";
import { PendingContinuationError } from "./errors";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("tryCatch", () => {
  it("captures a returned value as a success", () => {
    expect(tryCatch(() => 42)).toEqual(success(42));
  });

  it("captures the thrown exception itself as the error", () => {
    const thrown = new RangeError("out of range");
    const out = tryCatch(() => {
      throw thrown;
    });

    expect(out.ok).toBe(false);
    expect(!out.ok && out.error).toBe(thrown);
  });

  it("captures non-Error throws as they are", () => {
    const out = tryCatch(() => {
      throw "plain string";
    });
    expect(out).toEqual(failure("plain string"));
  });

  it("maps the exception through onError", () => {
    const onError = vi.fn(() => "INVALID_JSON" as const);
    const out = tryCatch(() => JSON.parse("{"), onError);

    expect(out).toEqual(failure("INVALID_JSON"));
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]).toHaveLength(1);
  });

  it("does not call onError on success", () => {
    const onError = vi.fn(() => "NEVER");
    expect(tryCatch(() => "fine", onError)).toEqual(success("fine"));
    expect(onError).not.toHaveBeenCalled();
  });

  it("propagates an exception thrown by onError", () => {
    const mappingBug = new Error("mapper failed");
    expect(() =>
      tryCatch(
        () => {
          throw new Error("original");
        },
        () => {
          throw mappingBug;
        }
      )
    ).toThrow(mappingBug);
  });

  it("throws PendingContinuationError for an async operation", () => {
    expect(() => tryCatch(async () => 1)).toThrow(
      "tryCatch() received a pending value from its callback; use tryCatchAsync() instead"
    );
  });

  describe("finally", () => {
    it("runs after the operation on success", () => {
      const log: string[] = [];
      const out = tryCatch(
        () => {
          log.push("operation");
          return 1;
        },
        {
          finally: () => {
            log.push("cleanup");
          },
        }
      );

      expect(out).toEqual(success(1));
      expect(log).toEqual(["operation", "cleanup"]);
    });

    it("runs once after a throw that becomes a failure", () => {
      const log: string[] = [];
      const out = tryCatch(
        () => {
          log.push("operation");
          throw new Error("boom");
        },
        () => "FAILED",
        {
          finally: () => {
            log.push("cleanup");
          },
        }
      );

      expect(out).toEqual(failure("FAILED"));
      expect(log).toEqual(["operation", "cleanup"]);
    });

    it("runs before onError's exception propagates", () => {
      const log: string[] = [];
      const mappingBug = new Error("mapper failed");

      expect(() =>
        tryCatch(
          () => {
            throw new Error("original");
          },
          () => {
            log.push("onError");
            throw mappingBug;
          },
          {
            finally: () => {
              log.push("cleanup");
            },
          }
        )
      ).toThrow(mappingBug);
      expect(log).toEqual(["onError", "cleanup"]);
    });

    it("does not await a promise returned by the cleanup clause", () => {
      const cleanup = vi.fn(async () => undefined);

      const out = tryCatch(() => 42, { finally: cleanup });

      expect(out).toEqual(success(42));
      expect(cleanup).toHaveBeenCalledTimes(1);
    });

    it("reports a rejection from the cleanup clause's promise", async () => {
      const reason = new Error("release failed later");
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      const out = tryCatch(() => "value", {
        finally: () => Promise.reject(reason),
      });
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(out).toEqual(success("value"));
      expect(warn).toHaveBeenCalledWith(
        "fallible: a promise returned to tryCatch() rejected after tryCatch() had returned; " +
          "use tryCatchAsync() to await it.",
        reason
      );
    });

    it("propagates an exception from the cleanup clause", () => {
      const cleanupError = new Error("release failed");
      expect(() =>
        tryCatch(() => 1, {
          finally: () => {
            throw cleanupError;
          },
        })
      ).toThrow(cleanupError);
    });
  });
});

describe("tryCatchAsync", () => {
  it("captures a resolved value", async () => {
    await expect(tryCatchAsync(async () => "data")).resolves.toEqual(success("data"));
  });

  it("accepts a synchronous operation", async () => {
    await expect(tryCatchAsync(() => 7)).resolves.toEqual(success(7));
  });

  it("captures a rejection with the same exception object", async () => {
    const thrown = new Error("network down");
    const out = await tryCatchAsync(() => Promise.reject(thrown));

    expect(!out.ok && out.error).toBe(thrown);
  });

  it("captures a synchronous throw from the operation", async () => {
    const thrown = new TypeError("bad input");
    const out = await tryCatchAsync(() => {
      throw thrown;
    });

    expect(!out.ok && out.error).toBe(thrown);
  });

  it("maps a rejection through onError", async () => {
    const out = await tryCatchAsync(
      () => Promise.reject(new Error("503")),
      (thrown) => ({ type: "FETCH_FAILED" as const, cause: thrown })
    );

    expect(out.ok).toBe(false);
    expect(!out.ok && out.error.type).toBe("FETCH_FAILED");
  });

  it("captures cancellation through an aborted signal", async () => {
    const out = await tryCatchAsync(() => delay(1000, "late", { signal: AbortSignal.abort() }));

    expect(out.ok).toBe(false);
    expect(!out.ok && out.error instanceof Error && out.error.name).toBe("AbortError");
  });

  describe("finally", () => {
    it("awaits an async cleanup after the operation", async () => {
      const log: string[] = [];
      const out = await tryCatchAsync(
        async () => {
          await Promise.resolve();
          log.push("operation");
          return "ok";
        },
        {
          finally: async () => {
            await Promise.resolve();
            log.push("cleanup");
          },
        }
      );

      expect(out).toEqual(success("ok"));
      expect(log).toEqual(["operation", "cleanup"]);
    });

    it("runs once after a rejection", async () => {
      const cleanup = vi.fn();
      const out = await tryCatchAsync(() => Promise.reject(new Error("boom")), () => "FAILED", {
        finally: cleanup,
      });

      expect(out).toEqual(failure("FAILED"));
      expect(cleanup).toHaveBeenCalledTimes(1);
    });

    it("rejects with the cleanup's exception", async () => {
      const cleanupError = new Error("release failed");
      await expect(
        tryCatchAsync(async () => 1, {
          finally: async () => {
            throw cleanupError;
          },
        })
      ).rejects.toBe(cleanupError);
    });

    it("warns about onError's exception when the cleanup also throws", async () => {
      const mappingBug = new Error("mapper failed");
      const cleanupError = new Error("release failed");
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      await expect(
        tryCatchAsync(
          () => Promise.reject(new Error("original")),
          () => {
            throw mappingBug;
          },
          {
            finally: () => {
              throw cleanupError;
            },
          }
        )
      ).rejects.toBe(cleanupError);

      expect(warn).toHaveBeenCalledWith(
        "fallible: finally clause threw while an exception was already propagating; " +
          "the earlier exception is discarded in favour of the finally clause exception.",
        mappingBug
      );
    });
  });
});

describe("PendingContinuationError export", () => {
  it("is the error thrown by the synchronous form", () => {
    let caught: unknown;
    try {
      tryCatch(() => Promise.resolve("later"));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PendingContinuationError);
  });
});
