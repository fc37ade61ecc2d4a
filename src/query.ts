// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Query-string construction, parsing and merging.
 *
 * Every public entry point classifies its input once into a
 * {@link QuerySource} and then follows the decoding path for that tag.
 *
 * @module
 */

import {
  describeType,
  makeInvalidParameterError,
  makeInvalidTypeError,
} from "./errors";
import { QUERY_PART_QUOTER, QUERY_QUOTER, UNQUOTER_PLUS } from "./quoting";

export type SimpleQuery = string | number | bigint;
export type QueryVariable = SimpleQuery | readonly SimpleQuery[];
export type QueryFields = Readonly<Record<string, QueryVariable>>;
export type QueryMapping = QueryFields | ReadonlyMap<string, QueryVariable>;
export type QueryPair = readonly [string, SimpleQuery];
export type Query =
  | null
  | string
  | QueryMapping
  | QueryParams
  | readonly QueryPair[];

type Entry = readonly [string, unknown];

export type QuerySource =
  | { readonly kind: "clear" }
  | { readonly kind: "text"; readonly text: string }
  /** Values may be arrays, which expand into repeated pairs. */
  | { readonly kind: "mapping"; readonly entries: readonly Entry[] }
  | { readonly kind: "pairs"; readonly entries: readonly Entry[] };

function isBinary(value: unknown): boolean {
  return ArrayBuffer.isView(value) || value instanceof ArrayBuffer;
}

function isPlainRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toPairEntries(value: readonly unknown[], context: string): Entry[] {
  return value.map((item, index) => {
    if (!Array.isArray(item) || item.length !== 2) {
      throw makeInvalidTypeError(
        `query pair #${index} should be a [key, value] tuple, got ${describeType(item)}`,
        context,
      );
    }
    const [key, pairValue]: readonly unknown[] = item;
    return [requireKey(key, context), pairValue] as const;
  });
}

function requireKey(key: unknown, context: string): string {
  if (typeof key !== "string") {
    throw makeInvalidTypeError(
      `query keys should be strings, got ${describeType(key)}`,
      context,
    );
  }
  return key;
}

/**
 * Classifies the single-argument or keyword-field form of a query. Exactly
 * one of the two must be supplied.
 */
export function classifyQuery(
  query: unknown,
  fields?: QueryFields,
  context = "query",
): QuerySource {
  const hasFields = fields !== undefined && Object.keys(fields).length > 0;
  if (hasFields && query !== undefined) {
    throw makeInvalidParameterError(
      "Either fields or a single query parameter must be present",
      context,
    );
  }
  if (hasFields) {
    return { kind: "mapping", entries: Object.entries(fields) };
  }
  if (query === undefined) {
    throw makeInvalidParameterError(
      "Either fields or a single query parameter must be present",
      context,
    );
  }
  if (query === null) return { kind: "clear" };
  if (typeof query === "string") return { kind: "text", text: query };
  if (isBinary(query)) {
    throw makeInvalidTypeError(
      "Invalid query type: binary data is forbidden",
      context,
    );
  }
  if (query instanceof QueryParams) {
    return { kind: "pairs", entries: [...query.entries()] };
  }
  if (query instanceof Map) {
    return {
      kind: "mapping",
      entries: Array.from(query, ([key, value]: [unknown, unknown]) => [
        requireKey(key, context),
        value,
      ] as const),
    };
  }
  if (Array.isArray(query)) {
    return { kind: "pairs", entries: toPairEntries(query, context) };
  }
  if (typeof query === "object" && isPlainRecord(query)) {
    return { kind: "mapping", entries: Object.entries(query) };
  }
  throw makeInvalidTypeError(
    `Invalid query type: only string, mapping or array of [key, value] pairs is allowed, got ${describeType(query)}`,
    context,
  );
}

/** Whether a source carries no pairs at all (`""`, `{}`, `[]`). */
export function isEmptySource(source: QuerySource): boolean {
  switch (source.kind) {
    case "clear":
      return false;
    case "text":
      return source.text.length === 0;
    case "mapping":
    case "pairs":
      return source.entries.length === 0;
  }
}

/**
 * Renders one query value. Numbers must be finite; booleans and binary data
 * are rejected rather than coerced.
 */
export function queryVar(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number") {
    if (Number.isNaN(value)) {
      throw makeInvalidParameterError("NaN is not supported", "queryVar");
    }
    if (!Number.isFinite(value)) {
      throw makeInvalidParameterError(
        `${String(value)} is not supported`,
        "queryVar",
      );
    }
    if (Number.isInteger(value) && !Number.isSafeInteger(value)) {
      return BigInt(value).toString();
    }
    return String(value);
  }
  throw makeInvalidTypeError(
    `Invalid variable type: value should be string, number or bigint, got ${describeType(value)}`,
    "queryVar",
  );
}

function encodePair(key: string, value: unknown): string {
  return `${QUERY_PART_QUOTER.quote(key)}=${QUERY_PART_QUOTER.quote(queryVar(value))}`;
}

function encodeEntries(entries: readonly Entry[], expandArrays: boolean): string {
  const parts: string[] = [];
  for (const [key, value] of entries) {
    if (expandArrays && Array.isArray(value)) {
      for (const item of value) parts.push(encodePair(key, item));
    } else {
      parts.push(encodePair(key, value));
    }
  }
  return parts.join("&");
}

/** Percent-encoded query text for `source`; `null` for a clear request. */
export function encodeQuerySource(source: QuerySource): string | null {
  switch (source.kind) {
    case "clear":
      return null;
    case "text":
      return QUERY_QUOTER.quote(source.text);
    case "mapping":
      return encodeEntries(source.entries, true);
    case "pairs":
      return encodeEntries(source.entries, false);
  }
}

/** Single-argument convenience over {@link classifyQuery}. */
export function getStrQuery(
  query: Query | undefined,
  fields?: QueryFields,
): string | null {
  return encodeQuerySource(classifyQuery(query, fields));
}

/** Decodes raw query text into ordered `[key, value]` pairs. */
export function parseQueryPairs(raw: string): [string, string][] {
  const pairs: [string, string][] = [];
  for (const part of raw.split("&")) {
    if (part.length === 0) continue;
    const eq = part.indexOf("=");
    const key = eq === -1 ? part : part.slice(0, eq);
    const value = eq === -1 ? "" : part.slice(eq + 1);
    pairs.push([UNQUOTER_PLUS.unquote(key), UNQUOTER_PLUS.unquote(value)]);
  }
  return pairs;
}

/**
 * Multimap update: each incoming pair overwrites the next not yet
 * overwritten occurrence of its key, pairs for keys without a free
 * occurrence are appended, and left-over occurrences of updated keys are
 * dropped.
 */
export function mergeQueryEntries(
  existing: readonly Entry[],
  updates: readonly Entry[],
): Entry[] {
  const slots: (Entry | undefined)[] = [...existing];
  const replaced = new Set<number>();
  const cursor = new Map<string, number>();
  const appended: Entry[] = [];

  for (const [key, value] of updates) {
    let index = cursor.get(key) ?? 0;
    while (index < existing.length && existing[index]?.[0] !== key) index++;
    if (index < existing.length) {
      slots[index] = [key, value];
      replaced.add(index);
      cursor.set(key, index + 1);
    } else {
      appended.push([key, value]);
      cursor.set(key, existing.length);
    }
  }

  const result: Entry[] = [];
  slots.forEach((slot, index) => {
    if (slot === undefined) return;
    if (cursor.has(slot[0]) && !replaced.has(index)) return;
    result.push(slot);
  });
  return [...result, ...appended];
}

/**
 * Query text after applying an update request to `rawQuery`. `clear`
 * yields `""`; an empty request leaves the query untouched.
 */
export function updateQueryString(
  rawQuery: string,
  source: QuerySource,
): string {
  if (source.kind === "clear") return "";
  if (isEmptySource(source)) return rawQuery;

  const current = parseQueryPairs(rawQuery);
  switch (source.kind) {
    case "text":
      return encodeEntries(
        mergeQueryEntries(current, parseQueryPairs(QUERY_QUOTER.quote(source.text))),
        false,
      );
    case "mapping":
      return encodeEntries(mergeQueryEntries(current, source.entries), true);
    case "pairs":
      return encodeEntries(mergeQueryEntries(current, source.entries), false);
  }
}

/** Appends already-encoded `addition` to `rawQuery` with a single `&`. */
export function extendQueryString(rawQuery: string, addition: string): string {
  if (addition.length === 0) return rawQuery;
  if (rawQuery.length === 0) return addition;
  return rawQuery.endsWith("&")
    ? `${rawQuery}${addition}`
    : `${rawQuery}&${addition}`;
}

/**
 * Read-only, ordered multimap of decoded query parameters.
 */
export class QueryParams implements Iterable<[string, string]> {
  readonly #pairs: readonly (readonly [string, string])[];

  constructor(pairs: Iterable<readonly [string, string]> = []) {
    this.#pairs = Object.freeze(
      Array.from(pairs, ([key, value]) => Object.freeze([key, value] as const)),
    );
  }

  public static parse(raw: string): QueryParams {
    return new QueryParams(parseQueryPairs(raw));
  }

  /** Number of pairs, counting repeated keys. */
  public get size(): number {
    return this.#pairs.length;
  }

  /** First value stored under `key`. */
  public get(key: string): string | undefined {
    return this.#pairs.find(([name]) => name === key)?.[1];
  }

  public getAll(key: string): string[] {
    return this.#pairs.filter(([name]) => name === key).map(([, value]) => value);
  }

  public has(key: string): boolean {
    return this.#pairs.some(([name]) => name === key);
  }

  /** Keys in order, repeated once per occurrence. */
  public keys(): string[] {
    return this.#pairs.map(([key]) => key);
  }

  public values(): string[] {
    return this.#pairs.map(([, value]) => value);
  }

  public entries(): [string, string][] {
    return this.#pairs.map(([key, value]) => [key, value]);
  }

  public [Symbol.iterator](): Iterator<[string, string]> {
    return this.entries()[Symbol.iterator]();
  }

  /** First value per key, in first-occurrence order. */
  public toObject(): Record<string, string> {
    const seen = new Set<string>();
    return Object.fromEntries(
      this.#pairs.filter(([key]) => {
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      }),
    );
  }
}
