// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Persistence contract: a Url is stored as its five encoded components and
 * restored in trusted mode with a fresh memo table.
 * @module
 */

import { describeType, makeInvalidParameterError } from "./errors";
import type { UrlComponents } from "./parse";
import { Url } from "./url";

export type UrlStateTuple = readonly [
  scheme: string,
  authority: string,
  path: string,
  query: string,
  fragment: string,
];

/** Accepted persisted shapes, newest first. */
export type UrlState =
  | UrlStateTuple
  | UrlComponents
  | readonly [null, { readonly _val: UrlStateTuple }];

function isStateTuple(value: unknown): value is UrlStateTuple {
  return (
    Array.isArray(value) &&
    value.length === 5 &&
    value.every((item) => typeof item === "string")
  );
}

function isStateRecord(value: unknown): value is UrlComponents {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return (["scheme", "authority", "path", "query", "fragment"] as const).every(
    (key) => typeof Reflect.get(value, key) === "string",
  );
}

function fromTuple(state: UrlStateTuple): UrlComponents {
  const [scheme, authority, path, query, fragment] = state;
  return { scheme, authority, path, query, fragment };
}

/** Snapshot of a Url's stored components. */
export function toUrlState(url: Url): UrlStateTuple {
  const { scheme, authority, path, query, fragment } = url.components;
  return [scheme, authority, path, query, fragment];
}

/** Restores a Url from any accepted persisted shape. */
export function fromUrlState(state: unknown): Url {
  if (isStateTuple(state)) return Url.fromComponents(fromTuple(state));
  if (isStateRecord(state)) return Url.fromComponents(state);
  if (Array.isArray(state) && state.length === 2 && state[0] === null) {
    const legacy: unknown = state[1];
    if (typeof legacy === "object" && legacy !== null) {
      const inner: unknown = Reflect.get(legacy, "_val");
      if (isStateTuple(inner)) return Url.fromComponents(fromTuple(inner));
    }
  }
  throw makeInvalidParameterError(
    `unrecognized Url state of type ${describeType(state)}`,
    "fromUrlState",
  );
}
