// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Custom error classes for machine-readable error handling.
 * @module
 */

const PREFIX = "[canon-url]";

export class InvalidParameterError extends RangeError {
  public readonly code: string = "ERR_INVALID_PARAMETER";

  constructor(message: string) {
    super(`${PREFIX} ${message}`);
    this.name = "InvalidParameterError";
  }
}

export class InvalidTypeError extends TypeError {
  public readonly code = "ERR_INVALID_TYPE";

  constructor(message: string) {
    super(`${PREFIX} ${message}`);
    this.name = "InvalidTypeError";
  }
}

/**
 * Raised when a host contains a character outside the registered-name
 * grammar. `position` is the zero-based index within `host`.
 */
export class InvalidHostError extends InvalidParameterError {
  public override readonly code = "ERR_INVALID_HOST";

  constructor(
    public readonly host: string,
    public readonly character: string,
    public readonly position: number,
    hint?: string,
  ) {
    super(
      `Host '${host}' cannot contain '${character}' (at position ${position})` +
        (hint ? `, ${hint}` : ""),
    );
    this.name = "InvalidHostError";
  }
}

export type PathWalkFailure = "different-anchors" | "unwalkable-parent";

export class PathWalkError extends InvalidParameterError {
  public override readonly code = "ERR_PATH_WALK";

  constructor(
    public readonly reason: PathWalkFailure,
    public readonly target: string,
    public readonly base: string,
  ) {
    super(
      reason === "different-anchors"
        ? `'${target}' and '${base}' have different anchors`
        : `'${target}' cannot be reached from '${base}': '..' in the base path cannot be walked`,
    );
    this.name = "PathWalkError";
  }
}

export class InvalidConfigurationError extends Error {
  public readonly code = "ERR_INVALID_CONFIGURATION";

  constructor(message: string) {
    super(`${PREFIX} ${message}`);
    this.name = "InvalidConfigurationError";
  }
}

/**
 * Create a typed InvalidParameterError with optional context prefix.
 * Centralizes message formatting so callers can rely on errors.ts for message shape.
 */
export function makeInvalidParameterError(
  detail: string,
  context?: string,
): InvalidParameterError {
  if (typeof context === "string" && context.length > 0) {
    return new InvalidParameterError(`${context}: ${detail}`);
  }
  return new InvalidParameterError(detail);
}

export function makeInvalidTypeError(
  detail: string,
  context?: string,
): InvalidTypeError {
  if (typeof context === "string" && context.length > 0) {
    return new InvalidTypeError(`${context}: ${detail}`);
  }
  return new InvalidTypeError(detail);
}

/** Human readable name of a runtime value's type, for type error messages. */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }
  return typeof value;
}

/**
 * Sanitizes error objects for logging by truncating messages and
 * extracting only the name, code and message.
 */
export function sanitizeErrorForLogs(error: unknown): {
  readonly name?: string;
  readonly code?: string;
  readonly message?: string;
  readonly stackHash?: string;
} {
  if (error instanceof Error) {
    const code =
      "code" in error && typeof error.code === "string"
        ? error.code
        : undefined;
    const stackHash = getStackFingerprint(error.stack);
    return {
      name: error.name,
      message: error.message.slice(0, 256),
      ...(code ? { code } : {}),
      ...(stackHash ? { stackHash } : {}),
    };
  }
  return { message: String(error).slice(0, 256) };
}

// FNV-1a 32-bit over UTF-16 code units.
export function fnv1a32(input: string, seed = 0x811c9dc5): number {
  let hash = seed >>> 0;
  for (let index = 0; index < input.length; index++) {
    hash = Math.imul((hash ^ input.charCodeAt(index)) >>> 0, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

const MAX_STACK_LENGTH = 8192;

export function getStackFingerprint(stack?: string): string | undefined {
  if (!stack) return undefined;
  // Line/column numbers and absolute paths vary between builds; strip them.
  const normalized = stack
    .slice(0, MAX_STACK_LENGTH)
    .split("\n")
    .map((line) =>
      line.replace(/\(([^()]{0,300})\)/g, (full, inner: string) =>
        /^[^):]{1,256}(?::\d{1,6}){2}$/.test(inner) ? "(FILE:LINE)" : full,
      ),
    )
    .map((line) => line.trim())
    .join("\n");
  return fnv1a32(normalized).toString(16).padStart(8, "0");
}
