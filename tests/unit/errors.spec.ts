import { describe, it, expect } from "vitest";
import {
  describeType,
  fnv1a32,
  getStackFingerprint,
  InvalidConfigurationError,
  InvalidParameterError,
  InvalidTypeError,
  makeInvalidParameterError,
  makeInvalidTypeError,
  PathWalkError,
  sanitizeErrorForLogs,
} from "../../src/errors";

describe("error classes", () => {
  it("prefix messages and carry codes", () => {
    const error = makeInvalidParameterError("bad value", "Url.withPort");
    expect(error).toBeInstanceOf(RangeError);
    expect(error.message).toBe("[canon-url] Url.withPort: bad value");
    expect(error.code).toBe("ERR_INVALID_PARAMETER");

    const typeError = makeInvalidTypeError("bad type");
    expect(typeError).toBeInstanceOf(TypeError);
    expect(typeError).toBeInstanceOf(InvalidTypeError);
    expect(typeError.message).toBe("[canon-url] bad type");

    expect(new InvalidConfigurationError("x").code).toBe(
      "ERR_INVALID_CONFIGURATION",
    );
  });

  it("describe path walk failures", () => {
    const error = new PathWalkError("different-anchors", "a", "/b");
    expect(error).toBeInstanceOf(InvalidParameterError);
    expect(error.message).toBe("[canon-url] 'a' and '/b' have different anchors");
  });
});

describe("describeType", () => {
  it("names primitives, arrays and class instances", () => {
    expect(describeType(null)).toBe("null");
    expect(describeType(1)).toBe("number");
    expect(describeType([])).toBe("array");
    expect(describeType(new Map())).toBe("Map");
    expect(describeType({})).toBe("Object");
    expect(describeType(Object.create(null))).toBe("object");
  });
});

describe("stack fingerprinting", () => {
  it("hashes with FNV-1a", () => {
    expect(fnv1a32("")).toBe(0x811c9dc5);
    expect(fnv1a32("a")).toBe(0xe40c292c);
  });

  it("ignores line and column numbers", () => {
    const first = "Error: boom\n at foo (file.js:10:5)\n at bar (file.js:20:7)";
    const second = "Error: boom\n at foo (file.js:11:2)\n at bar (file.js:42:1)";
    expect(getStackFingerprint(first)).toBe(getStackFingerprint(second));
    expect(getStackFingerprint(undefined)).toBeUndefined();
  });

  it("includes the fingerprint in sanitized output", () => {
    const error = new Error("boom");
    error.stack = "Error: boom\n at foo (file.js:10:5)";
    expect(sanitizeErrorForLogs(error).stackHash).toBe(
      getStackFingerprint(error.stack),
    );
  });
});
