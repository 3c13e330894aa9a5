import { describe, expect, it } from "vitest";
import { andThen, err, ok, Result } from "../src/result/result.js";

const half = (value: number): Result<number, string> =>
  value % 2 === 0 ? ok(value / 2) : err(`${value} is odd`);

describe("andThen", () => {
  it("should run the step on a successful result", () => {
    expect(andThen(half)(ok(8))).toEqual({ success: true, data: 4 });
  });

  it("should pass the first error through", () => {
    const halveTwice = (value: number) => andThen(half)(half(value));

    expect(halveTwice(6)).toEqual({ success: false, error: "3 is odd" });
    expect(halveTwice(5)).toEqual({ success: false, error: "5 is odd" });
  });
});
