// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import { describe, it, expect } from "vitest";
import { InvalidParameterError } from "../../src/errors";
import { fromUrlState, toUrlState } from "../../src/serialization";
import { Url } from "../../src/url";

describe("Url state", () => {
  const url = new Url("http://user@example.com:8080/p?q=1#f");

  it("captures the encoded components", () => {
    expect(toUrlState(url)).toEqual([
      "http",
      "user@example.com:8080",
      "/p",
      "q=1",
      "f",
    ]);
  });

  it("restores from a tuple with fresh derived values", () => {
    const restored = fromUrlState(toUrlState(url));
    expect(restored.equals(url)).toBe(true);
    expect(restored.host).toBe("example.com");
    expect(restored.explicitPort).toBe(8080);
  });

  it("restores from a component record", () => {
    expect(fromUrlState(url.components).toString()).toBe(url.toString());
  });

  it("restores from the legacy wrapped form", () => {
    const legacy = [null, { _val: ["https", "example.com", "/x", "", ""] }];
    expect(fromUrlState(legacy).toString()).toBe("https://example.com/x");
  });

  it("does not requote restored components", () => {
    const restored = fromUrlState(["http", "example.com", "/%7e", "", ""]);
    expect(restored.rawPath).toBe("/%7e");
  });

  it("rejects unknown shapes", () => {
    expect(() => fromUrlState(42)).toThrow(
      "[canon-url] fromUrlState: unrecognized Url state of type number",
    );
    expect(() => fromUrlState(["http", "example.com"])).toThrow(
      InvalidParameterError,
    );
  });
});
