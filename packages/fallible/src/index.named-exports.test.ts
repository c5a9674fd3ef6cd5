import { describe, expect, it } from "vitest";
import { Fallible, success, failure, map, bindIf, pipe, R, tryCatch, using } from "./index";
import * as functionalEntry from "./functional-entry";

describe("root named exports", () => {
  it("keeps named exports aligned with Fallible namespace", () => {
    expect(success(1)).toEqual(Fallible.success(1));
    expect(failure("E")).toEqual(Fallible.failure("E"));

    const mapped = map(success(2), (n) => n + 1);
    const mappedViaNamespace = Fallible.map(Fallible.success(2), (n) => n + 1);
    expect(mapped).toEqual(mappedViaNamespace);

    const piped = pipe(2, (n) => n * 2);
    const pipedViaNamespace = Fallible.pipe(2, (n) => n * 2);
    expect(piped).toBe(pipedViaNamespace);
  });

  it("exposes the same functions by name and on the namespace", () => {
    expect(Fallible.bindIf).toBe(bindIf);
    expect(Fallible.tryCatch).toBe(tryCatch);
    expect(Fallible.using).toBe(using);
    expect(Fallible.R).toBe(R);
  });

  it("functional entry re-exports the same bindings", () => {
    expect(functionalEntry.pipe).toBe(pipe);
    expect(functionalEntry.R).toBe(R);
    expect(functionalEntry.map).toBe(map);
    expect(functionalEntry.bindIf).toBe(bindIf);
  });
});
