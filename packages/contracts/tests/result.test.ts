import { describe, expect, it } from "vitest";
import { Err, MapGenError, Ok } from "../src";

describe("Result", () => {
  it("exposes the ok value", () => {
    const res = Ok<number, string>(2);
    expect(res.isOk()).toBe(true);
    expect(res.isErr()).toBe(false);
    expect(res.value).toBe(2);
  });

  it("exposes the error", () => {
    const res = Err<number, string>("boom");
    expect(res.isErr()).toBe(true);
    expect(res.error).toBe("boom");
  });

  it("refuses to read the wrong side", () => {
    expect(() => Ok(1).error).toThrow("Cannot access error of Ok Result");
    expect(() => Err("x").value).toThrow("Cannot access value of Err Result");
  });
});

describe("MapGenError", () => {
  it("carries a code and details", () => {
    const error = MapGenError.insufficientBuckets("Only 1 bucket left", { remaining: 1 });
    expect(error.code).toBe("INSUFFICIENT_BUCKETS");
    expect(error.name).toBe("MapGenError");
    expect(MapGenError.isMapGenError(error)).toBe(true);
    expect(MapGenError.isMapGenError(new Error("x"))).toBe(false);
    expect(error.toJSON()).toEqual({
      name: "MapGenError",
      code: "INSUFFICIENT_BUCKETS",
      message: "Only 1 bucket left",
      details: { remaining: 1 },
    });
  });
});
