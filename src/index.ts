// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Immutable URL parsing, building and percent-encoding.
 * @module canon-url
 */

// --- Re-export all public APIs ---

// Errors
export {
  InvalidConfigurationError,
  InvalidHostError,
  InvalidParameterError,
  InvalidTypeError,
  PathWalkError,
  sanitizeErrorForLogs,
} from "./errors";
export type { PathWalkFailure } from "./errors";

// URL value
export { Url } from "./url";
export type {
  BuildOptions,
  KeepOptions,
  UrlOptions,
  WithPathOptions,
} from "./url";
export type { UrlComponents } from "./parse";

// Query
export { QueryParams, queryVar } from "./query";
export type {
  Query,
  QueryFields,
  QueryMapping,
  QueryPair,
  QueryVariable,
  SimpleQuery,
} from "./query";

// Percent-encoding codec
export { Quoter, Unquoter, quote, unquote } from "./quoting";
export type { QuoterOptions, UnquoterOptions } from "./quoting";

// Host caches
export { cacheClear, cacheConfigure, cacheInfo } from "./cache";
export type { CacheInfo, CacheName, CacheStats } from "./cache";
export type { CacheBound, CacheConfigureOptions } from "./config";

// Persistence
export { fromUrlState, toUrlState } from "./serialization";
export type { UrlState, UrlStateTuple } from "./serialization";

// Environment & logging
export { environment, isDevelopment } from "./environment";
export { createLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";

// Constants
export { DEFAULT_PORTS } from "./constants";
