// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Percent-encoding codec for URL components.
 *
 * A {@link Quoter} turns text into ASCII with every byte outside its safe set
 * written as an upper-case `%XX` triplet; an {@link Unquoter} reverses that,
 * decoding triplet runs as UTF-8 while keeping structurally significant
 * characters escaped. Neither ever throws on malformed escapes.
 *
 * @module
 */

import { ALLOWED, FRAGMENT_SAFE, PATH_SAFE, QUERY_SAFE } from "./constants";
import { describeType, makeInvalidTypeError } from "./errors";

export type QuoterOptions = {
  /** Extra characters emitted literally. */
  readonly safe?: string;
  /**
   * Characters that are emitted literally but whose existing `%XX` escapes
   * are preserved when requoting.
   */
  readonly protected?: string;
  /** Query-string mode: space becomes `+` and `+&=;` are escaped. */
  readonly queryMode?: boolean;
  /** Re-interpret existing `%XX` triplets instead of escaping `%`. */
  readonly requote?: boolean;
};

export type UnquoterOptions = {
  /** Characters whose escapes are never decoded. */
  readonly ignore?: string;
  /** Characters that stay escaped, and get escaped when found literally. */
  readonly unsafe?: string;
  /** Query-string mode: `+` decodes to space and `+=&;` stay escaped. */
  readonly queryMode?: boolean;
  /** Decode `+` to space without the rest of query-string mode. */
  readonly plus?: boolean;
};

const HEX_DIGITS = "0123456789ABCDEF";
const PERCENT = 0x25;
const ALPHANUMERIC = /^[0-9A-Za-z]$/;
const HEX_PAIR = /^[0-9A-F]{2}$/;
const HEX_PAIR_ANY_CASE = /^[0-9A-Fa-f]{2}$/;
const LONE_SURROGATE =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

const encoder = new TextEncoder();

function percentByte(byte: number): string {
  return `%${HEX_DIGITS[byte >> 4]}${HEX_DIGITS[byte & 0x0f]}`;
}

/** UTF-8 bytes of `text`, silently dropping unpaired surrogates. */
export function utf8Bytes(text: string): Uint8Array {
  return encoder.encode(text.replace(LONE_SURROGATE, ""));
}

function requireText(value: unknown, operation: string): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value !== "string") {
    throw makeInvalidTypeError(
      `argument should be a string, got ${describeType(value)}`,
      operation,
    );
  }
  return value;
}

export class Quoter {
  readonly #safe: ReadonlySet<number>;
  readonly #protected: string;
  readonly #queryMode: boolean;
  readonly #requote: boolean;

  constructor(options: QuoterOptions = {}) {
    const protectedChars = options.protected ?? "";
    this.#protected = protectedChars;
    this.#queryMode = options.queryMode ?? false;
    this.#requote = options.requote ?? true;
    const safe =
      `${options.safe ?? ""}${ALLOWED}` +
      (this.#queryMode ? "" : "+&=;") +
      protectedChars;
    this.#safe = new Set(Array.from(safe, (ch) => ch.charCodeAt(0)));
  }

  public quote(value: string): string;
  public quote(value: string | null | undefined): string | null;
  public quote(value: unknown): string | null;
  public quote(value: unknown): string | null {
    const text = requireText(value, "quote");
    if (text === null) return null;
    if (text.length === 0) return "";

    const bytes = utf8Bytes(text);
    const out: string[] = [];
    let index = 0;
    while (index < bytes.length) {
      const byte = bytes[index] ?? 0;
      index++;

      if (byte === PERCENT && this.#requote) {
        const consumed = this.#requoteTriplet(bytes, index, out);
        index += consumed;
        continue;
      }
      if (this.#queryMode && byte === 0x20) {
        out.push("+");
        continue;
      }
      out.push(this.#safe.has(byte) ? String.fromCharCode(byte) : percentByte(byte));
    }
    return out.join("");
  }

  /**
   * Handles a `%` at `bytes[start - 1]`; returns how many following bytes
   * were consumed. A malformed triplet yields `%25` and consumes nothing,
   * so scanning resumes right after the `%`.
   */
  #requoteTriplet(bytes: Uint8Array, start: number, out: string[]): number {
    const first = bytes[start];
    const second = bytes[start + 1];
    if (first === undefined || second === undefined) {
      out.push("%25");
      return 0;
    }
    const pair = String.fromCharCode(first, second);
    if (
      !ALPHANUMERIC.test(pair.charAt(0)) ||
      !ALPHANUMERIC.test(pair.charAt(1)) ||
      !HEX_PAIR.test(pair.toUpperCase())
    ) {
      out.push("%25");
      return 0;
    }
    const upper = pair.toUpperCase();
    const decoded = Number.parseInt(upper, 16);
    const ch = String.fromCharCode(decoded);
    if (this.#protected.includes(ch)) {
      out.push(`%${upper}`);
    } else if (this.#safe.has(decoded)) {
      out.push(ch);
    } else {
      out.push(`%${upper}`);
    }
    return 2;
  }
}

/**
 * Minimal incremental UTF-8 decoder that reports how many bytes it is
 * holding, so a caller can re-emit their original escapes on failure.
 */
class Utf8Accumulator {
  #pending: number[] = [];
  #needed = 0;

  public get buffered(): number {
    return this.#pending.length;
  }

  public reset(): void {
    this.#pending = [];
    this.#needed = 0;
  }

  /**
   * Feeds one byte. Returns the decoded character, `""` while a sequence is
   * incomplete, or `null` when `byte` cannot continue the current state.
   */
  public push(byte: number): string | null {
    if (this.#pending.length === 0) {
      if (byte < 0x80) return String.fromCharCode(byte);
      const needed =
        byte >= 0xc2 && byte <= 0xdf
          ? 1
          : byte >= 0xe0 && byte <= 0xef
            ? 2
            : byte >= 0xf0 && byte <= 0xf4
              ? 3
              : -1;
      if (needed < 0) return null;
      this.#pending = [byte];
      this.#needed = needed;
      return "";
    }

    const lead = this.#pending[0] ?? 0;
    const [low, high] =
      this.#pending.length === 1
        ? lead === 0xe0
          ? [0xa0, 0xbf]
          : lead === 0xed
            ? [0x80, 0x9f]
            : lead === 0xf0
              ? [0x90, 0xbf]
              : lead === 0xf4
                ? [0x80, 0x8f]
                : [0x80, 0xbf]
        : [0x80, 0xbf];
    if (byte < low || byte > high) return null;

    this.#pending.push(byte);
    if (this.#pending.length <= this.#needed) return "";

    const [b0 = 0, b1 = 0, b2 = 0, b3 = 0] = this.#pending;
    const codePoint =
      this.#needed === 1
        ? ((b0 & 0x1f) << 6) | (b1 & 0x3f)
        : this.#needed === 2
          ? ((b0 & 0x0f) << 12) | ((b1 & 0x3f) << 6) | (b2 & 0x3f)
          : ((b0 & 0x07) << 18) |
            ((b1 & 0x3f) << 12) |
            ((b2 & 0x3f) << 6) |
            (b3 & 0x3f);
    this.reset();
    return String.fromCodePoint(codePoint);
  }
}

const PLAIN_QUOTER = new Quoter();
const QUERY_STRUCTURE_QUOTER = new Quoter({ queryMode: true });

export class Unquoter {
  readonly #ignore: string;
  readonly #unsafe: string;
  readonly #queryMode: boolean;
  readonly #plus: boolean;

  constructor(options: UnquoterOptions = {}) {
    this.#ignore = options.ignore ?? "";
    this.#unsafe = options.unsafe ?? "";
    this.#queryMode = options.queryMode ?? false;
    this.#plus = options.plus ?? false;
  }

  public unquote(value: string): string;
  public unquote(value: string | null | undefined): string | null;
  public unquote(value: unknown): string | null;
  public unquote(value: unknown): string | null {
    const text = requireText(value, "unquote");
    if (text === null) return null;
    if (text.length === 0) return "";

    const decoder = new Utf8Accumulator();
    const out: string[] = [];
    // Raw escapes of the bytes the decoder holds: always the immediately
    // preceding triplets, since any other character flushes the decoder.
    const heldEscapes = (end: number): string =>
      text.slice(end - decoder.buffered * 3, end);

    let index = 0;
    while (index < text.length) {
      const ch = text.charAt(index);
      index++;

      if (ch === "%" && index <= text.length - 2) {
        const pair = text.slice(index, index + 2);
        if (HEX_PAIR_ANY_CASE.test(pair)) {
          const byte = Number.parseInt(pair, 16);
          index += 2;
          let decoded = decoder.push(byte);
          if (decoded === null) {
            out.push(heldEscapes(index - 3));
            decoder.reset();
            decoded = decoder.push(byte);
            if (decoded === null) {
              out.push(text.slice(index - 3, index));
              continue;
            }
          }
          if (decoded.length > 0) out.push(this.#reescape(decoded));
          continue;
        }
      }

      if (decoder.buffered > 0) {
        out.push(heldEscapes(index - 1));
        decoder.reset();
      }

      if (ch === "+") {
        const decodePlus =
          (this.#queryMode || this.#plus) && !this.#unsafe.includes("+");
        out.push(decodePlus ? " " : "+");
        continue;
      }
      if (this.#unsafe.includes(ch)) {
        out.push(PLAIN_QUOTER.quote(ch));
        continue;
      }
      out.push(ch);
    }
    if (decoder.buffered > 0) out.push(heldEscapes(text.length));
    return out.join("");
  }

  #reescape(decoded: string): string {
    if (this.#queryMode && "+=&;".includes(decoded)) {
      return QUERY_STRUCTURE_QUOTER.quote(decoded);
    }
    if (this.#unsafe.includes(decoded) || this.#ignore.includes(decoded)) {
      return PLAIN_QUOTER.quote(decoded);
    }
    return decoded;
  }
}

// Shared codec instances for each URL component.
export const QUOTER = new Quoter({ requote: false });
export const REQUOTER = new Quoter();
export const PATH_QUOTER = new Quoter({
  safe: PATH_SAFE,
  protected: "/+",
  requote: false,
});
export const PATH_REQUOTER = new Quoter({ safe: PATH_SAFE, protected: "/+" });
export const QUERY_QUOTER = new Quoter({
  safe: QUERY_SAFE,
  protected: "=+&;",
  queryMode: true,
  requote: false,
});
export const QUERY_REQUOTER = new Quoter({
  safe: QUERY_SAFE,
  protected: "=+&;",
  queryMode: true,
});
export const QUERY_PART_QUOTER = new Quoter({
  safe: QUERY_SAFE,
  queryMode: true,
  requote: false,
});
export const FRAGMENT_QUOTER = new Quoter({ safe: FRAGMENT_SAFE, requote: false });
export const FRAGMENT_REQUOTER = new Quoter({ safe: FRAGMENT_SAFE });

export const UNQUOTER = new Unquoter();
export const PATH_UNQUOTER = new Unquoter({ unsafe: "+" });
export const PATH_SAFE_UNQUOTER = new Unquoter({ ignore: "/%", unsafe: "+" });
export const QS_UNQUOTER = new Unquoter({ queryMode: true });
export const UNQUOTER_PLUS = new Unquoter({ plus: true });

/** One-shot percent-encoding with an ad-hoc {@link Quoter}. */
export function quote(value: string, options?: QuoterOptions): string;
export function quote(
  value: string | null | undefined,
  options?: QuoterOptions,
): string | null;
export function quote(value: unknown, options: QuoterOptions = {}): string | null {
  return new Quoter(options).quote(value);
}

/** One-shot percent-decoding with an ad-hoc {@link Unquoter}. */
export function unquote(value: string, options?: UnquoterOptions): string;
export function unquote(
  value: string | null | undefined,
  options?: UnquoterOptions,
): string | null;
export function unquote(
  value: unknown,
  options: UnquoterOptions = {},
): string | null {
  return new Unquoter(options).unquote(value);
}

const NON_PRINTABLE =
  /[\p{Cc}\p{Cf}\p{Cs}\p{Co}\p{Cn}\p{Zl}\p{Zp}]|[^\P{Zs} ]/u;
const NON_PRINTABLE_GLOBAL = new RegExp(NON_PRINTABLE.source, "gu");

/**
 * Escapes only what a human-facing rendering must: `%`, the `unsafe`
 * characters, and anything non-printable.
 */
export function humanQuote(text: string, unsafe: string): string {
  if (text.length === 0) return text;
  let result = text;
  for (const ch of `%${unsafe}`) {
    if (result.includes(ch)) {
      result = result.split(ch).join(percentByte(ch.charCodeAt(0)));
    }
  }
  if (!NON_PRINTABLE.test(result)) return result;
  return result.replace(NON_PRINTABLE_GLOBAL, (ch) =>
    Array.from(utf8Bytes(ch), percentByte).join(""),
  );
}
