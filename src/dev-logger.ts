// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Development-only console sink shared by every component logger.
 * Output is suppressed entirely in production.
 */

import { environment } from "./environment";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type DevelopmentLogger = (
  level: LogLevel,
  component: string,
  message: string,
  context?: unknown,
) => void;

const MAX_CONTEXT_STRING = 256;

function serializeContext(context: unknown): string {
  if (context === undefined) return "";
  function replacer(_key: string, value: unknown): unknown {
    if (typeof value === "string" && value.length > MAX_CONTEXT_STRING) {
      return `${value.slice(0, MAX_CONTEXT_STRING)}...[TRUNC]`;
    }
    if (typeof value === "bigint") return value.toString();
    return value;
  }
  try {
    return JSON.stringify(context, replacer);
  } catch {
    // Cyclic structures and hostile toJSON implementations.
    return "[unserializable]";
  }
}

// Component names end up in every line; keep them short and printable.
function sanitizeComponentName(component: string): string {
  const cleaned = component.replace(/[^\w:.-]/g, "");
  return cleaned.length > 0 ? cleaned.slice(0, 64) : "unknown";
}

export const developmentLog: DevelopmentLogger = (
  level,
  component,
  message,
  context,
) => {
  if (environment.isProduction) return;
  const contextString = serializeContext(context);
  const line = `[${level.toUpperCase()}] (${sanitizeComponentName(component)}) ${message}`;
  const out = contextString ? `${line} | context=${contextString}` : line;
  switch (level) {
    case "debug":
      console.debug(out);
      break;
    case "info":
      console.info(out);
      break;
    case "warn":
      console.warn(out);
      break;
    case "error":
      console.error(out);
      break;
  }
};
