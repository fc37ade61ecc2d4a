// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Bounded memoization caches used by host encoding, and the process-wide
 * administration surface around them.
 * @module
 */

import { LRUCache } from "lru-cache";
import {
  DEFAULT_CACHE_BOUNDS,
  resolveCacheConfiguration,
  type CacheBound,
  type CacheBounds,
  type CacheConfigureOptions,
} from "./config";
import { createLogger, warnDeprecated } from "./logger";

const logger = createLogger("cache");

/**
 * Cache statistics providing insight into cache performance and state.
 */
export type CacheStats = {
  /** Number of lookups answered from the cache. */
  readonly hits: number;
  /** Number of lookups that had to compute. */
  readonly misses: number;
  /** Configured maximum entry count; `null` when unbounded. */
  readonly bound: CacheBound;
  readonly currentSize: number;
};

type Storage<V extends {}> = {
  readonly get: (key: string) => V | undefined;
  readonly set: (key: string, value: V) => void;
  readonly clear: () => void;
  readonly size: () => number;
};

function createStorage<V extends {}>(bound: CacheBound): Storage<V> {
  if (bound === 0) {
    return {
      get: () => undefined,
      set: () => undefined,
      clear: () => undefined,
      size: () => 0,
    };
  }
  if (bound === null) {
    const map = new Map<string, V>();
    return {
      get: (key) => map.get(key),
      set: (key, value) => {
        map.set(key, value);
      },
      clear: () => map.clear(),
      size: () => map.size,
    };
  }
  // Each entry weighs 1, so `maxSize` bounds the entry count without preallocation.
  const lru = new LRUCache<string, V>({
    maxSize: bound,
    sizeCalculation: () => 1,
  });
  return {
    get: (key) => lru.get(key),
    set: (key, value) => {
      lru.set(key, value);
    },
    clear: () => lru.clear(),
    size: () => lru.size,
  };
}

/**
 * String-keyed memo table with a fixed entry bound. A bound of `null` keeps
 * every entry, `0` stores nothing but still counts lookups.
 */
export class BoundedCache<V extends {}> {
  readonly #storage: Storage<V>;
  readonly #bound: CacheBound;
  #hits = 0;
  #misses = 0;

  constructor(bound: CacheBound) {
    this.#bound = bound;
    this.#storage = createStorage<V>(bound);
  }

  public get bound(): CacheBound {
    return this.#bound;
  }

  public get(key: string): V | undefined {
    const value = this.#storage.get(key);
    if (value === undefined) {
      this.#misses++;
    } else {
      this.#hits++;
    }
    return value;
  }

  public set(key: string, value: V): void {
    this.#storage.set(key, value);
  }

  /**
   * Returns the cached value for `key`, computing and storing it on a miss.
   * Errors thrown by `compute` propagate and nothing is stored.
   */
  public getOrCompute(key: string, compute: (key: string) => V): V {
    const cached = this.get(key);
    if (cached !== undefined) return cached;
    const value = compute(key);
    this.#storage.set(key, value);
    return value;
  }

  public clear(): void {
    this.#storage.clear();
    this.#hits = 0;
    this.#misses = 0;
  }

  public info(): CacheStats {
    return {
      hits: this.#hits,
      misses: this.#misses,
      bound: this.#bound,
      currentSize: this.#storage.size(),
    };
  }
}

export type CacheName = "idna-encode" | "idna-decode" | "host-encode";

export type CacheInfo = Readonly<Record<CacheName, CacheStats>>;

/**
 * Capability object owning the three host caches. Reconfiguration swaps in
 * fresh cache instances so a lookup never observes a half-resized cache.
 */
export class HostCaches {
  #idnaEncode: BoundedCache<string>;
  #idnaDecode: BoundedCache<string>;
  #hostEncode: BoundedCache<string>;

  constructor(bounds: CacheBounds = DEFAULT_CACHE_BOUNDS) {
    this.#idnaEncode = new BoundedCache(bounds.idnaEncodeSize);
    this.#idnaDecode = new BoundedCache(bounds.idnaDecodeSize);
    this.#hostEncode = new BoundedCache(bounds.encodeHostSize);
  }

  public get idnaEncode(): BoundedCache<string> {
    return this.#idnaEncode;
  }

  public get idnaDecode(): BoundedCache<string> {
    return this.#idnaDecode;
  }

  public get hostEncode(): BoundedCache<string> {
    return this.#hostEncode;
  }

  /** Replaces every cache; previous entries and counters are discarded. */
  public configure(bounds: CacheBounds): void {
    const idnaEncode = new BoundedCache<string>(bounds.idnaEncodeSize);
    const idnaDecode = new BoundedCache<string>(bounds.idnaDecodeSize);
    const hostEncode = new BoundedCache<string>(bounds.encodeHostSize);
    this.#idnaEncode = idnaEncode;
    this.#idnaDecode = idnaDecode;
    this.#hostEncode = hostEncode;
    logger.debug("host caches reconfigured", bounds);
  }

  public clear(): void {
    this.#idnaEncode.clear();
    this.#idnaDecode.clear();
    this.#hostEncode.clear();
  }

  public info(): CacheInfo {
    return {
      "idna-encode": this.#idnaEncode.info(),
      "idna-decode": this.#idnaDecode.info(),
      "host-encode": this.#hostEncode.info(),
    };
  }
}

/** Process-wide host caches shared by every {@link Url}. */
export const hostCaches = new HostCaches();

/** Empties all host caches and resets their hit/miss counters. */
export function cacheClear(): void {
  hostCaches.clear();
}

export function cacheInfo(): CacheInfo {
  return hostCaches.info();
}

/**
 * Resizes the host caches. Omitted sizes fall back to the default bound and
 * `null` makes a cache unbounded. The legacy `ipAddressSize` and
 * `hostValidateSize` knobs are still honoured by folding them into
 * `encodeHostSize`.
 */
export function cacheConfigure(options: CacheConfigureOptions = {}): void {
  const { bounds, legacyKnobs } = resolveCacheConfiguration(options);
  if (legacyKnobs.length > 0) {
    warnDeprecated(
      `cacheConfigure(): ${legacyKnobs.join(", ")} ${legacyKnobs.length > 1 ? "are" : "is"} deprecated, use encodeHostSize instead`,
    );
  }
  hostCaches.configure(bounds);
}
