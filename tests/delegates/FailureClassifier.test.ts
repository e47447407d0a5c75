import { describe, it, expect } from "vitest";

import { classifyStatus, parseRetryAfter, truncateBody } from "../../src/delegates/FailureClassifier";

describe("FailureClassifier", () => {
  it("splits statuses into ok, transient and fatal", () => {
    expect([200, 201, 204].map(classifyStatus)).toEqual(["ok", "ok", "ok"]);
    expect([429, 500, 503].map(classifyStatus)).toEqual(["transient", "transient", "transient"]);
    expect([400, 401, 404, 409].map(classifyStatus)).toEqual(["fatal", "fatal", "fatal", "fatal"]);
  });

  it("renders bodies as text and truncates them", () => {
    expect(truncateBody({ code: "x" })).toBe('{"code":"x"}');
    expect(truncateBody(undefined)).toBe("");
    expect(truncateBody("abcdef", 3)).toBe("abc");
  });

  it("reads delta-seconds Retry-After values with a cap", () => {
    expect(parseRetryAfter("3")).toBe(3000);
    expect(parseRetryAfter("600")).toBe(30_000);
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:28:00 GMT")).toBeUndefined();
    expect(parseRetryAfter(undefined)).toBeUndefined();
  });
});
