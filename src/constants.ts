// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Project-wide immutable constants: scheme tables and URL grammar
 * character classes.
 */

function frozenSet(values: readonly string[]): ReadonlySet<string> {
  const set = new Set(values);
  Object.freeze(set);
  return set;
}

/** Ports implied by a scheme when the authority does not name one. */
export const DEFAULT_PORTS: Readonly<Record<string, number>> = Object.freeze({
  http: 80,
  https: 443,
  ws: 80,
  wss: 443,
  ftp: 21,
});

export function defaultPortFor(scheme: string): number | null {
  return Object.hasOwn(DEFAULT_PORTS, scheme) ? (DEFAULT_PORTS[scheme] ?? null) : null;
}

/** Schemes whose absolute URLs are meaningless without a host. */
export const SCHEME_REQUIRES_HOST = frozenSet([
  "http",
  "https",
  "ws",
  "wss",
  "ftp",
]);

/** Schemes for which relative references are resolved against a base. */
export const USES_RELATIVE = frozenSet([
  "",
  "ftp",
  "http",
  "gopher",
  "nntp",
  "imap",
  "wais",
  "file",
  "https",
  "shttp",
  "mms",
  "prospero",
  "rtsp",
  "rtsps",
  "rtspu",
  "sftp",
  "svn",
  "svn+ssh",
  "ws",
  "wss",
]);

/** Schemes that always carry a `//authority` part when serialized. */
export const USES_AUTHORITY = frozenSet([
  ...USES_RELATIVE,
  "telnet",
  "snews",
  "rsync",
  "nfs",
  "git",
  "git+ssh",
  "itms-services",
]);

// RFC 3986 character classes.
export const ASCII_LETTERS =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const DIGITS = "0123456789";
export const UNRESERVED = `${ASCII_LETTERS}${DIGITS}-._~`;
export const SUB_DELIMS_WITHOUT_QS = "!$'()*,";
/** Characters a quoter never escapes. */
export const ALLOWED = `${UNRESERVED}${SUB_DELIMS_WITHOUT_QS}`;
export const PATH_SAFE = "@:";
export const QUERY_SAFE = "?/:@";
export const FRAGMENT_SAFE = "?/:@";

export const MAX_PORT = 65_535;
