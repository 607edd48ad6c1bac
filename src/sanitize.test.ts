import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors.js";
import { sanitizePathParam } from "./sanitize.js";

describe("sanitizePathParam", () => {
  it.each(["", "..", "../etc/passwd", "a/b", "a\\b", "%2e%2e", "%2E%2E", "x%2Fy", "%5C", "%2e."])(
    "rejects %j",
    (value) => {
      expect(() => sanitizePathParam(value)).toThrow(ValidationError);
    },
  );

  it("quotes the offending value in the message", () => {
    expect(() => sanitizePathParam("%2e%2e")).toThrow('Invalid path parameter: "%2e%2e"');
  });

  it("encodes query and fragment characters", () => {
    expect(sanitizePathParam("a?b#c")).toBe("a%3Fb%23c");
  });

  it("encodes a stray percent sign", () => {
    expect(sanitizePathParam("100%")).toBe("100%25");
  });

  it("leaves ordinary ids unchanged", () => {
    expect(sanitizePathParam("human_test_001")).toBe("human_test_001");
  });
});
