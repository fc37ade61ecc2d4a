// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Path segment algebra over percent-encoded paths.
 * @module
 */

import { makeInvalidParameterError, PathWalkError } from "./errors";
import { PATH_QUOTER } from "./quoting";

/**
 * Drops `.` segments and resolves `..` against the preceding segment; a
 * `..` with nothing to pop is ignored. A trailing `.` or `..` leaves a
 * trailing empty segment behind.
 */
export function normalizePathSegments(
  segments: readonly string[],
): string[] {
  const resolved: string[] = [];
  for (const segment of segments) {
    if (segment === "..") {
      resolved.pop();
    } else if (segment !== ".") {
      resolved.push(segment);
    }
  }
  const last = segments[segments.length - 1];
  if (last === "." || last === "..") resolved.push("");
  return resolved;
}

/** Removes dot-segments from `path`, keeping a leading `/`. */
export function normalizePath(path: string): string {
  const rooted = path.startsWith("/");
  const body = rooted ? path.slice(1) : path;
  const normalized = normalizePathSegments(body.split("/")).join("/");
  return rooted ? `/${normalized}` : normalized;
}

/**
 * Path segments with a leading `/` sentinel for rooted paths. Under an
 * authority an empty path still yields `["/"]`.
 */
export function splitPathParts(path: string, hasAuthority: boolean): string[] {
  if (hasAuthority) {
    return path.length > 0 ? ["/", ...path.slice(1).split("/")] : ["/"];
  }
  if (path.startsWith("/")) return ["/", ...path.slice(1).split("/")];
  return path.split("/");
}

/** Last segment of `path` (`""` for the root). */
export function lastSegment(parts: readonly string[]): string {
  const [first, ...rest] = parts;
  if (first === "/") return rest[rest.length - 1] ?? "";
  return parts[parts.length - 1] ?? "";
}

/** `.ext` of `name` when its last dot is neither first nor last. */
export function suffixOf(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot > 0 && dot < name.length - 1 ? name.slice(dot) : "";
}

export function suffixesOf(name: string): string[] {
  if (name.endsWith(".")) return [];
  return name
    .replace(/^\.+/, "")
    .split(".")
    .slice(1)
    .map((suffix) => `.${suffix}`);
}

/**
 * Appends `segments` to `path`. Non-final segments lose a trailing empty
 * part, as does the existing path; under an authority the result is
 * normalized and rooted.
 */
export function appendPathSegments(
  path: string,
  segments: readonly string[],
  options: { readonly encoded: boolean; readonly hasAuthority: boolean },
): string {
  const parsed: string[] = [];
  let sawDot = false;
  for (let index = segments.length - 1; index >= 0; index--) {
    const raw = segments[index] ?? "";
    if (raw.startsWith("/")) {
      throw makeInvalidParameterError(
        `Appending path '${raw}' starting from slash is forbidden`,
        "joinPath",
      );
    }
    const segment = options.encoded ? raw : PATH_QUOTER.quote(raw);
    if (segment.includes(".")) sawDot = true;
    const pieces = segment.split("/").reverse();
    const isLast = index === segments.length - 1;
    // A trailing `/` only survives on the final segment.
    const dropTrailing = !isLast && pieces[0] === "";
    parsed.push(...(dropTrailing ? pieces.slice(1) : pieces));
  }
  parsed.reverse();

  let joined = parsed;
  if (path.length > 0) {
    const old = path.split("/");
    const kept = old[old.length - 1] === "" ? old.slice(0, -1) : old;
    joined = [...kept, ...parsed];
  }

  if (options.hasAuthority && joined.length > 0 && joined[0] !== "") {
    joined = ["", ...joined];
  }
  if (!options.hasAuthority || !sawDot) return joined.join("/");

  // Normalizing may consume the leading empty segment; restore the root.
  const normalized = normalizePathSegments(joined).join("/");
  return normalized.length > 0 && !normalized.startsWith("/")
    ? `/${normalized}`
    : normalized;
}

type WalkPath = {
  readonly tail: readonly string[];
  readonly root: string;
  readonly normalized: string;
  readonly name: string;
  readonly partsCount: number;
};

function walkPath(tail: readonly string[], root: string): WalkPath {
  return {
    tail,
    root,
    normalized: `${root}${tail.join("/")}`,
    name: tail[tail.length - 1] ?? "",
    partsCount: tail.length + (root ? 1 : 0),
  };
}

function toWalkPath(path: string, stripLast: boolean): WalkPath {
  const tail = path.split("/").filter((part) => part && part !== ".");
  // The base's last segment names a resource, not a directory.
  if (stripLast && !path.endsWith("/") && tail.length > 0) tail.pop();
  return walkPath(tail, path.startsWith("/") ? "/" : "");
}

function* parentsOf(path: WalkPath): Generator<WalkPath> {
  for (let index = path.tail.length - 1; index >= 0; index--) {
    yield walkPath(path.tail.slice(0, index), path.root);
  }
}

/**
 * Relative path that leads from the directory of `base` to `target`.
 * Throws a {@link PathWalkError} when the paths share no anchor, or when
 * reaching the common ancestor would mean walking up through a `..`.
 */
export function calculateRelativePath(target: string, base: string): string {
  const targetPath = toWalkPath(target || "/", false);
  const basePath = toWalkPath(base || "/", true);

  let targetAncestors: Set<string> | null = null;
  let step = 0;
  let common: WalkPath | null = null;
  for (const candidate of [basePath, ...parentsOf(basePath)]) {
    if (candidate.normalized === targetPath.normalized) {
      common = candidate;
      break;
    }
    if (targetAncestors === null) {
      targetAncestors = new Set();
      let found = false;
      for (const parent of parentsOf(targetPath)) {
        if (parent.normalized === basePath.normalized) {
          found = true;
          break;
        }
        targetAncestors.add(parent.normalized);
      }
      if (found) {
        common = candidate;
        break;
      }
    } else if (targetAncestors.has(candidate.normalized)) {
      common = candidate;
      break;
    }
    if (candidate.name === "..") {
      throw new PathWalkError(
        "unwalkable-parent",
        targetPath.normalized,
        basePath.normalized,
      );
    }
    step++;
  }
  if (common === null) {
    throw new PathWalkError(
      "different-anchors",
      targetPath.normalized,
      basePath.normalized,
    );
  }

  const targetParts = targetPath.root
    ? [targetPath.root, ...targetPath.tail]
    : [...targetPath.tail];
  const segments = [
    ...Array.from({ length: step }, () => ".."),
    ...targetParts.slice(common.partsCount),
  ];
  return segments.length > 0 ? segments.join("/") : ".";
}
