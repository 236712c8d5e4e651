import { describe, it, expect } from "vitest";
import { interpretOutcome, toRecordedOutcome } from "../src/outcome.js";

describe("interpretOutcome", () => {
  const sent = [100n, 50n];

  it("treats a remote failure as nothing used", () => {
    expect(interpretOutcome({ status: "failed", reason: "timeout" }, sent)).toEqual([100n, 50n]);
  });

  it("accepts strings, safe integers and bigints", () => {
    expect(interpretOutcome({ status: "succeeded", value: ["30", 7] }, sent)).toEqual([30n, 7n]);
    expect(interpretOutcome({ status: "succeeded", value: [1n, "0"] }, sent)).toEqual([1n, 0n]);
  });

  it("clamps each amount to what was sent", () => {
    expect(
      interpretOutcome({ status: "succeeded", value: ["340282366920938463463374607431768211456", "51"] }, sent),
    ).toEqual([100n, 50n]);
  });

  it.each([
    ["a non-array", "30"],
    ["a missing value", undefined],
    ["a negative number", [-1, 0]],
    ["a fraction", [1.5, 0]],
    ["a padded string", ["030", "0"]],
    ["too few entries", ["1"]],
    ["an unsafe integer", [2 ** 53, 0]],
  ])("treats %s as everything used", (_label, value) => {
    expect(interpretOutcome({ status: "succeeded", value }, sent)).toEqual([0n, 0n]);
  });
});

describe("toRecordedOutcome", () => {
  it("writes bigints as decimal strings", () => {
    expect(toRecordedOutcome({ status: "succeeded", value: [5n] })).toEqual({
      status: "succeeded",
      value: ["5"],
    });
  });

  it("records undefined and unserializable values as null", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic["self"] = cyclic;

    expect(toRecordedOutcome({ status: "succeeded", value: undefined })).toEqual({ status: "succeeded", value: null });
    expect(toRecordedOutcome({ status: "succeeded", value: cyclic })).toEqual({ status: "succeeded", value: null });
  });

  it("passes failures through", () => {
    const failed = { status: "failed", reason: "boom" } as const;
    expect(toRecordedOutcome(failed)).toBe(failed);
  });
});
