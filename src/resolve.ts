// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Reference resolution (RFC 3986 section 5.2) over encoded components.
 * @module
 */

import { USES_AUTHORITY, USES_RELATIVE } from "./constants";
import type { UrlComponents } from "./parse";
import { normalizePath, splitPathParts } from "./path";

function mergePaths(base: UrlComponents, refPath: string): string {
  if (refPath.startsWith("/")) return refPath;
  if (base.path.length === 0) return `/${refPath}`;
  if (base.path.endsWith("/")) return `${base.path}${refPath}`;

  const hasAuthority = base.authority.length > 0;
  const directory = [...splitPathParts(base.path, hasAuthority).slice(0, -1), ""];
  // A leading "/" sentinel joins into a doubled slash.
  const merged = `${directory.join("/")}${refPath}`;
  return base.path.startsWith("/") ? merged.slice(1) : merged;
}

/**
 * Resolves `ref` against `base`. A reference with a foreign scheme, or any
 * reference against a scheme that does not resolve relatively, is returned
 * unchanged.
 */
export function resolveReference(
  base: UrlComponents,
  ref: UrlComponents,
): UrlComponents {
  const scheme = ref.scheme || base.scheme;
  if (scheme !== base.scheme || !USES_RELATIVE.has(scheme)) return ref;

  if (ref.authority.length > 0 && USES_AUTHORITY.has(scheme)) {
    return { ...ref, scheme };
  }

  if (ref.path.length === 0) {
    return {
      scheme,
      authority: base.authority,
      path: base.path,
      query: ref.query || base.query,
      fragment: ref.fragment || base.fragment,
    };
  }

  const merged = mergePaths(base, ref.path);
  return {
    scheme,
    authority: base.authority,
    path: merged.includes(".") ? normalizePath(merged) : merged,
    query: ref.query,
    fragment: ref.fragment,
  };
}
