// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Host encoding: IP literal canonicalization, registered-name validation and
 * IDNA conversion, memoized through the process-wide host caches.
 * @module
 */

import ipaddr from "ipaddr.js";
import { domainToASCII, domainToUnicode } from "node:url";
import { hostCaches } from "./cache";
import { InvalidHostError, makeInvalidParameterError } from "./errors";
import { createLogger } from "./logger";

const logger = createLogger("host");

// Anything outside unreserved / pct-encoded / sub-delims, or a `%` that does
// not start a triplet.
const NOT_REG_NAME = /[^a-z0-9\-._~!$&'()*+,;=%]|%(?![0-9a-f]{2})/;

const ASCII_ONLY = /^[\x00-\x7f]*$/;

const AUTHORITY_HINT =
  "if the value includes a username or password, use 'authority' instead of 'host'";

export function isAscii(text: string): boolean {
  return ASCII_ONLY.test(text);
}

/** Whether `host` is worth handing to the IP literal parser. */
export function looksLikeIp(host: string): boolean {
  return /\d$/.test(host) || host.includes(":");
}

type IpLiteral = { readonly compressed: string; readonly version: 4 | 6 };

function parseIpLiteral(raw: string): IpLiteral | null {
  if (ipaddr.IPv4.isValidFourPartDecimal(raw)) {
    return { compressed: ipaddr.IPv4.parse(raw).toString(), version: 4 };
  }
  if (raw.includes(":") && ipaddr.IPv6.isValid(raw)) {
    return {
      compressed: ipaddr.IPv6.parse(raw).toRFC5952String(),
      version: 6,
    };
  }
  return null;
}

/**
 * Canonical form of an IP literal host (without brackets), keeping any
 * `%zone` suffix; `null` when `host` is not an IP address.
 */
export function compressIp(
  host: string,
): { readonly host: string; readonly version: 4 | 6 } | null {
  const zoneAt = host.indexOf("%");
  const raw = zoneAt === -1 ? host : host.slice(0, zoneAt);
  const parsed = parseIpLiteral(raw);
  if (parsed === null) return null;
  const zone = zoneAt === -1 ? "" : host.slice(zoneAt);
  return { host: `${parsed.compressed}${zone}`, version: parsed.version };
}

/**
 * Converts a host to its ASCII (A-label) form using the UTS #46 mapping,
 * which also applies NFKC and case folding.
 */
export function idnaEncode(host: string): string {
  return hostCaches.idnaEncode.getOrCompute(host, (key) => {
    const ascii = domainToASCII(key);
    if (ascii.length === 0 && key.length > 0) {
      throw makeInvalidParameterError(
        `Host '${key}' is not a valid internationalized domain name`,
        "idnaEncode",
      );
    }
    return ascii;
  });
}

/**
 * Converts A-labels back to Unicode. Hosts that do not decode are returned
 * unchanged.
 */
export function idnaDecode(raw: string): string {
  return hostCaches.idnaDecode.getOrCompute(raw, (key) => {
    if (!key.includes("xn--")) return key;
    const unicode = domainToUnicode(key);
    if (unicode.length === 0) {
      logger.debug("IDNA decode failed, keeping raw host", { host: key });
      return key;
    }
    return unicode;
  });
}

function encodeHostUncached(host: string, validate: boolean): string {
  if (looksLikeIp(host)) {
    const ip = compressIp(host);
    if (ip !== null) return ip.version === 6 ? `[${ip.host}]` : ip.host;
  }

  if (!isAscii(host)) return idnaEncode(host);

  const lowered = host.toLowerCase();
  if (validate) {
    const invalid = NOT_REG_NAME.exec(lowered);
    if (invalid !== null) {
      const character = invalid[0].charAt(0);
      const position = invalid.index;
      const looksLikeAuthority =
        character === "@" ||
        (character === ":" && lowered.slice(position).includes("@"));
      throw new InvalidHostError(
        lowered,
        character,
        position,
        looksLikeAuthority ? AUTHORITY_HINT : undefined,
      );
    }
  }
  return lowered;
}

/**
 * Encodes a host for inclusion in an authority: IPv6 literals come back
 * bracketed and compressed, registered names lower-cased (and validated when
 * `validate` is set), non-ASCII names IDNA-encoded.
 */
export function encodeHost(host: string, validate: boolean): string {
  return hostCaches.hostEncode.getOrCompute(
    `${validate ? "v" : "r"}:${host}`,
    () => encodeHostUncached(host, validate),
  );
}

/**
 * Decoded, human-facing host: IP literals stay as they are, everything else
 * is lower-cased without IDNA encoding.
 */
export function humanHost(host: string): string {
  if (looksLikeIp(host)) {
    const ip = compressIp(host);
    if (ip !== null) return ip.version === 6 ? `[${ip.host}]` : ip.host;
  }
  return host.toLowerCase();
}
