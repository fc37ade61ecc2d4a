// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Structural splitting of URL text into its five components, and of an
 * authority into user, password, host and port.
 * @module
 */

import { MAX_PORT, USES_AUTHORITY } from "./constants";
import { makeInvalidParameterError } from "./errors";
import { compressIp, encodeHost, isAscii } from "./host";
import { QUOTER, REQUOTER } from "./quoting";

/** The five percent-encoded components every URL is stored as. */
export type UrlComponents = {
  readonly scheme: string;
  readonly authority: string;
  readonly path: string;
  readonly query: string;
  readonly fragment: string;
};

export type Netloc = {
  readonly user: string | null;
  readonly password: string | null;
  /** Host without brackets; `null` when the authority names none. */
  readonly host: string | null;
  readonly port: number | null;
  /** Whether the host was written inside `[` and `]`. */
  readonly bracketed: boolean;
};

// WHATWG "C0 control or space", stripped from the start of input.
const LEADING_C0_OR_SPACE = /^[\x00-\x20]+/;
const TAB_OR_NEWLINE = /[\t\r\n]/g;
const SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*$/;
const IPV_FUTURE = /^v[a-fA-F0-9]+\..+$/;
const PORT = /^\d+$/;

function checkBracketedHost(host: string, netloc: string): void {
  if (host.startsWith("v")) {
    if (!IPV_FUTURE.test(host)) {
      throw makeInvalidParameterError(
        `IPvFuture address '${host}' is invalid`,
        "Invalid URL",
      );
    }
    return;
  }
  const ip = compressIp(host);
  if (ip === null || ip.version !== 6) {
    throw makeInvalidParameterError(
      `'${netloc}' does not contain a valid bracketed IPv6 address`,
      "Invalid URL",
    );
  }
}

// NFKC may turn look-alike characters into authority delimiters.
function checkNetlocNormalization(netloc: string): void {
  if (netloc.length === 0 || isAscii(netloc)) return;
  const stripped = netloc.replace(/[@:#?]/g, "");
  const normalized = stripped.normalize("NFKC");
  if (stripped === normalized) return;
  if (/[/?#@:]/.test(normalized)) {
    throw makeInvalidParameterError(
      `netloc '${netloc}' contains invalid characters under NFKC normalization`,
      "Invalid URL",
    );
  }
}

/**
 * Splits URL text into components without any decoding. The scheme is
 * lower-cased; everything else is returned as found.
 */
export function splitUrl(text: string): UrlComponents {
  let rest = text.replace(LEADING_C0_OR_SPACE, "").replace(TAB_OR_NEWLINE, "");
  let scheme = "";
  let authority = "";
  let query = "";
  let fragment = "";

  const colon = rest.indexOf(":");
  if (colon > 0 && SCHEME.test(rest.slice(0, colon))) {
    scheme = rest.slice(0, colon).toLowerCase();
    rest = rest.slice(colon + 1);
  }

  if (rest.startsWith("//")) {
    const end = rest.slice(2).search(/[/?#]/);
    const boundary = end === -1 ? rest.length : end + 2;
    authority = rest.slice(2, boundary);
    rest = rest.slice(boundary);

    const opens = authority.includes("[");
    const closes = authority.includes("]");
    if (opens !== closes) {
      throw makeInvalidParameterError("Invalid IPv6 URL", "Invalid URL");
    }
    if (opens) {
      const inner = authority.slice(
        authority.indexOf("[") + 1,
        authority.indexOf("]"),
      );
      checkBracketedHost(inner, authority);
    }
  }

  const hash = rest.indexOf("#");
  if (hash !== -1) {
    fragment = rest.slice(hash + 1);
    rest = rest.slice(0, hash);
  }
  const question = rest.indexOf("?");
  if (question !== -1) {
    query = rest.slice(question + 1);
    rest = rest.slice(0, question);
  }
  checkNetlocNormalization(authority);
  return { scheme, authority, path: rest, query, fragment };
}

function parsePort(raw: string, authority: string): number {
  if (!PORT.test(raw)) {
    throw makeInvalidParameterError(
      `port '${raw}' in '${authority}' is not a decimal integer`,
      "Invalid URL",
    );
  }
  const port = Number(raw);
  if (port > MAX_PORT) {
    throw makeInvalidParameterError(
      `port ${raw} is out of range 0-${MAX_PORT}`,
      "Invalid URL",
    );
  }
  return port;
}

/**
 * Splits an authority into its parts. Credentials end at the last `@`, the
 * password starts at the first `:` of the credentials, and a bracketed host
 * is taken verbatim.
 */
export function splitNetloc(authority: string): Netloc {
  const at = authority.lastIndexOf("@");
  let user: string | null = null;
  let password: string | null = null;
  if (at !== -1) {
    const userinfo = authority.slice(0, at);
    const colon = userinfo.indexOf(":");
    user = colon === -1 ? userinfo : userinfo.slice(0, colon);
    password = colon === -1 ? null : userinfo.slice(colon + 1);
    if (user.length === 0) user = null;
  }

  const hostinfo = at === -1 ? authority : authority.slice(at + 1);
  let host: string;
  let rawPort: string | null = null;
  if (hostinfo.startsWith("[")) {
    const close = hostinfo.indexOf("]");
    if (close === -1) {
      throw makeInvalidParameterError("Invalid IPv6 URL", "Invalid URL");
    }
    host = hostinfo.slice(1, close);
    const after = hostinfo.slice(close + 1);
    if (after.length > 0) {
      if (!after.startsWith(":")) {
        throw makeInvalidParameterError(
          `unexpected '${after}' after bracketed host in '${authority}'`,
          "Invalid URL",
        );
      }
      rawPort = after.slice(1);
    }
  } else {
    const colon = hostinfo.indexOf(":");
    if (colon !== -1 && hostinfo.indexOf(":", colon + 1) !== -1) {
      throw makeInvalidParameterError(
        `authority '${authority}' has several ':' outside brackets`,
        "Invalid URL",
      );
    }
    host = colon === -1 ? hostinfo : hostinfo.slice(0, colon);
    rawPort = colon === -1 ? null : hostinfo.slice(colon + 1);
  }

  return {
    user,
    password,
    host: host.length > 0 ? host : null,
    port: rawPort === null ? null : parsePort(rawPort, authority),
    bracketed: hostinfo.startsWith("["),
  };
}

export type MakeNetlocOptions = {
  /** Quote user and password with the plain quoter. */
  readonly encode?: boolean;
  /** Requote (rather than quote) user and password when encoding. */
  readonly requote?: boolean;
  /** Run the host through {@link encodeHost}. */
  readonly encodeHost?: boolean;
  /** Validate the host as a registered name while encoding it. */
  readonly validateHost?: boolean;
};

/** Reassembles an authority from its parts. */
export function makeNetloc(
  user: string | null,
  password: string | null,
  host: string | null,
  port: number | null,
  options: MakeNetlocOptions = {},
): string {
  if (host === null) return "";
  const encode = options.encode ?? false;
  const quoter = options.requote ? REQUOTER : QUOTER;

  let result: string;
  if (options.encodeHost) {
    result = encodeHost(host, options.validateHost ?? false);
  } else {
    result = host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
  }
  if (port !== null) result = `${result}:${port}`;

  if (password !== null) {
    const userPart = user === null ? "" : encode ? quoter.quote(user) : user;
    const passwordPart = encode ? quoter.quote(password) : password;
    return `${userPart}:${passwordPart}@${result}`;
  }
  if (user !== null && user.length > 0) {
    return `${encode ? quoter.quote(user) : user}@${result}`;
  }
  return result;
}

/** Joins components back into URL text. */
export function unsplitUrl(components: UrlComponents): string {
  const { scheme, authority, query, fragment } = components;
  let url = components.path;
  if (authority.length > 0) {
    if (url.length > 0 && !url.startsWith("/")) url = `/${url}`;
    url = `//${authority}${url}`;
  } else if (url.startsWith("//")) {
    // An empty authority must stay visible or the path would become one.
    url = `//${url}`;
  } else if (
    USES_AUTHORITY.has(scheme) &&
    scheme.length > 0 &&
    (url.length === 0 || url.startsWith("/"))
  ) {
    url = `//${url}`;
  }
  if (scheme.length > 0) url = `${scheme}:${url}`;
  if (query.length > 0) url = `${url}?${query}`;
  if (fragment.length > 0) url = `${url}#${fragment}`;
  return url;
}
