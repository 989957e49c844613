/**
 * Error description tests.
 */

import { describe, expect, it } from "vitest";
import { describeError } from "./errors.ts";

const systemError = (message: string, code: string): Error =>
  Object.assign(new Error(message), { code });

describe("describeError", () => {
  it("should use the message of a plain error", () => {
    expect(describeError(new Error("socket hang up"))).toBe("socket hang up");
  });

  it("should follow the cause chain", () => {
    const err = new TypeError("fetch failed", {
      cause: systemError("connect ECONNREFUSED 127.0.0.1:8443", "ECONNREFUSED"),
    });
    expect(describeError(err)).toBe("fetch failed: connect ECONNREFUSED 127.0.0.1:8443");
  });

  it("should append a code the message does not mention", () => {
    const err = new TypeError("fetch failed", {
      cause: systemError("self-signed certificate", "DEPTH_ZERO_SELF_SIGNED_CERT"),
    });
    expect(describeError(err)).toBe(
      "fetch failed: self-signed certificate [DEPTH_ZERO_SELF_SIGNED_CERT]"
    );
  });

  it("should stringify non-error values", () => {
    expect(describeError("boom")).toBe("boom");
    expect(describeError(new Error("outer", { cause: 42 }))).toBe("outer: 42");
  });
});
