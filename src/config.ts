// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Configuration surface for the process-wide host caches.
 * @module
 */

import { InvalidConfigurationError } from "./errors";

/** Maximum entries per cache; `null` means unbounded, `0` disables storage. */
export type CacheBound = number | null;

export const DEFAULT_CACHE_BOUND = 256 as const;

export type CacheBounds = {
  readonly idnaEncodeSize: CacheBound;
  readonly idnaDecodeSize: CacheBound;
  readonly encodeHostSize: CacheBound;
};

export type CacheConfigureOptions = {
  readonly idnaEncodeSize?: CacheBound;
  readonly idnaDecodeSize?: CacheBound;
  readonly encodeHostSize?: CacheBound;
  /** @deprecated folded into `encodeHostSize` */
  readonly ipAddressSize?: CacheBound;
  /** @deprecated folded into `encodeHostSize` */
  readonly hostValidateSize?: CacheBound;
};

export const DEFAULT_CACHE_BOUNDS: CacheBounds = Object.freeze({
  idnaEncodeSize: DEFAULT_CACHE_BOUND,
  idnaDecodeSize: DEFAULT_CACHE_BOUND,
  encodeHostSize: DEFAULT_CACHE_BOUND,
});

export type ResolvedCacheConfiguration = {
  readonly bounds: CacheBounds;
  /** Legacy knob names that were supplied, in declaration order. */
  readonly legacyKnobs: readonly ("ipAddressSize" | "hostValidateSize")[];
};

function validateBound(name: string, value: unknown): CacheBound {
  if (value === null) return null;
  if (
    typeof value !== "number" ||
    !Number.isSafeInteger(value) ||
    value < 0
  ) {
    throw new InvalidConfigurationError(
      `${name} must be a non-negative integer or null, got ${String(value)}`,
    );
  }
  return value;
}

// `??` would also replace an explicit `null`.
function withDefault(bound: CacheBound | undefined): CacheBound {
  return bound === undefined ? DEFAULT_CACHE_BOUND : bound;
}

// `null` (unbounded) dominates every finite bound.
function maxBound(bounds: readonly CacheBound[]): CacheBound {
  let result: number = 0;
  for (const bound of bounds) {
    if (bound === null) return null;
    result = Math.max(result, bound);
  }
  return result;
}

/**
 * Validates user-supplied bounds and folds the legacy `ipAddressSize` and
 * `hostValidateSize` knobs into `encodeHostSize` by taking the maximum.
 * Omitted knobs take {@link DEFAULT_CACHE_BOUND}.
 */
export function resolveCacheConfiguration(
  options: CacheConfigureOptions = {},
): ResolvedCacheConfiguration {
  const pick = (name: keyof CacheConfigureOptions): CacheBound | undefined =>
    options[name] === undefined ? undefined : validateBound(name, options[name]);

  const legacyKnobs = (["ipAddressSize", "hostValidateSize"] as const).filter(
    (name) => options[name] !== undefined,
  );

  const hostCandidates = (
    ["encodeHostSize", "ipAddressSize", "hostValidateSize"] as const
  )
    .map(pick)
    .filter((bound): bound is CacheBound => bound !== undefined);

  return {
    bounds: {
      idnaEncodeSize: withDefault(pick("idnaEncodeSize")),
      idnaDecodeSize: withDefault(pick("idnaDecodeSize")),
      encodeHostSize:
        hostCandidates.length > 0
          ? maxBound(hostCandidates)
          : DEFAULT_CACHE_BOUND,
    },
    legacyKnobs,
  };
}
