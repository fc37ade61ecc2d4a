// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  BoundedCache,
  cacheClear,
  cacheConfigure,
  cacheInfo,
} from "../../src/cache";
import {
  DEFAULT_CACHE_BOUND,
  resolveCacheConfiguration,
} from "../../src/config";
import { InvalidConfigurationError } from "../../src/errors";
import { encodeHost } from "../../src/host";
import { resetDeprecationsForTests } from "../../src/logger";

describe("BoundedCache", () => {
  it("counts hits and misses", () => {
    const cache = new BoundedCache<string>(4);
    expect(cache.getOrCompute("a", (key) => key.toUpperCase())).toBe("A");
    expect(cache.getOrCompute("a", () => "unused")).toBe("A");
    expect(cache.info()).toEqual({
      hits: 1,
      misses: 1,
      bound: 4,
      currentSize: 1,
    });
  });

  it("holds a huge bound without allocating for it", () => {
    const cache = new BoundedCache<string>(Number.MAX_SAFE_INTEGER);
    cache.set("a", "1");
    expect(cache.get("a")).toBe("1");
    expect(cache.info().currentSize).toBe(1);
  });

  it("evicts the least recently used entry at its bound", () => {
    const cache = new BoundedCache<string>(2);
    cache.set("a", "1");
    cache.set("b", "2");
    cache.get("a");
    cache.set("c", "3");
    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe("1");
    expect(cache.info().currentSize).toBe(2);
  });

  it("stores nothing with a zero bound", () => {
    const cache = new BoundedCache<string>(0);
    cache.set("a", "1");
    expect(cache.get("a")).toBeUndefined();
    expect(cache.info()).toEqual({
      hits: 0,
      misses: 1,
      bound: 0,
      currentSize: 0,
    });
  });

  it("keeps every entry when unbounded", () => {
    const cache = new BoundedCache<string>(null);
    for (let index = 0; index < 300; index++) cache.set(`k${index}`, "v");
    expect(cache.info().currentSize).toBe(300);
  });

  it("stores nothing when the computation throws", () => {
    const cache = new BoundedCache<string>(4);
    expect(() =>
      cache.getOrCompute("a", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(cache.info().currentSize).toBe(0);
  });

  it("resets counters on clear", () => {
    const cache = new BoundedCache<string>(4);
    cache.getOrCompute("a", () => "1");
    cache.clear();
    expect(cache.info()).toEqual({
      hits: 0,
      misses: 0,
      bound: 4,
      currentSize: 0,
    });
  });
});

describe("resolveCacheConfiguration", () => {
  it("falls back to the default bound", () => {
    expect(resolveCacheConfiguration().bounds).toEqual({
      idnaEncodeSize: DEFAULT_CACHE_BOUND,
      idnaDecodeSize: DEFAULT_CACHE_BOUND,
      encodeHostSize: DEFAULT_CACHE_BOUND,
    });
  });

  it("keeps an explicit null as unbounded", () => {
    expect(resolveCacheConfiguration({ idnaEncodeSize: null }).bounds).toEqual({
      idnaEncodeSize: null,
      idnaDecodeSize: DEFAULT_CACHE_BOUND,
      encodeHostSize: DEFAULT_CACHE_BOUND,
    });
  });

  it("folds the legacy knobs into the host cache by taking the maximum", () => {
    const resolved = resolveCacheConfiguration({
      encodeHostSize: 10,
      ipAddressSize: 40,
      hostValidateSize: 20,
    });
    expect(resolved.bounds.encodeHostSize).toBe(40);
    expect(resolved.legacyKnobs).toEqual(["ipAddressSize", "hostValidateSize"]);
  });

  it("lets a null legacy knob make the host cache unbounded", () => {
    expect(
      resolveCacheConfiguration({ encodeHostSize: 10, ipAddressSize: null })
        .bounds.encodeHostSize,
    ).toBeNull();
  });

  it("rejects negative and fractional bounds", () => {
    expect(() => resolveCacheConfiguration({ idnaDecodeSize: -1 })).toThrow(
      InvalidConfigurationError,
    );
    expect(() => resolveCacheConfiguration({ encodeHostSize: 1.5 })).toThrow(
      "[canon-url] encodeHostSize must be a non-negative integer or null, got 1.5",
    );
  });
});

describe("host cache administration", () => {
  beforeEach(() => {
    cacheConfigure();
    cacheClear();
    resetDeprecationsForTests();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cacheConfigure();
  });

  it("reports the three host caches", () => {
    expect(Object.keys(cacheInfo()).sort()).toEqual([
      "host-encode",
      "idna-decode",
      "idna-encode",
    ]);
  });

  it("records host encoding lookups", () => {
    encodeHost("example.com", true);
    encodeHost("example.com", true);
    expect(cacheInfo()["host-encode"]).toEqual({
      hits: 1,
      misses: 1,
      bound: DEFAULT_CACHE_BOUND,
      currentSize: 1,
    });
  });

  it("empties the caches on clear", () => {
    encodeHost("example.com", true);
    cacheClear();
    expect(cacheInfo()["host-encode"]).toEqual({
      hits: 0,
      misses: 0,
      bound: DEFAULT_CACHE_BOUND,
      currentSize: 0,
    });
  });

  it("applies new bounds", () => {
    cacheConfigure({ idnaEncodeSize: 8, idnaDecodeSize: null, encodeHostSize: 0 });
    const info = cacheInfo();
    expect(info["idna-encode"].bound).toBe(8);
    expect(info["idna-decode"].bound).toBeNull();
    expect(info["host-encode"].bound).toBe(0);
  });

  it("accepts bounds far beyond the entries it will hold", () => {
    expect(() =>
      cacheConfigure({
        idnaEncodeSize: Number.MAX_SAFE_INTEGER,
        idnaDecodeSize: 1e10,
        encodeHostSize: 2 ** 32 + 1,
      }),
    ).not.toThrow();
    encodeHost("example.com", true);
    expect(cacheInfo()["host-encode"]).toEqual({
      hits: 0,
      misses: 1,
      bound: 2 ** 32 + 1,
      currentSize: 1,
    });
    expect(cacheInfo()["idna-encode"].bound).toBe(Number.MAX_SAFE_INTEGER);
  });

  it("warns once about the legacy knobs", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    cacheConfigure({ ipAddressSize: 16 });
    cacheConfigure({ ipAddressSize: 16 });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "DeprecationWarning: cacheConfigure(): ipAddressSize is deprecated, use encodeHostSize instead",
    );
    expect(cacheInfo()["host-encode"].bound).toBe(16);
  });
});
