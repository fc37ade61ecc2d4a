// SPDX-License-Identifier: MIT
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Factory-based logging API over the development console sink.
 * @module
 */

import { developmentLog, type LogLevel } from "./dev-logger";
import { environment } from "./environment";

export type { LogLevel } from "./dev-logger";

export type Logger = {
  readonly debug: (message: string, context?: unknown) => void;
  readonly info: (message: string, context?: unknown) => void;
  readonly warn: (message: string, context?: unknown) => void;
  readonly error: (message: string, context?: unknown) => void;
  readonly child: (sub: string) => Logger;
};

/**
 * Creates a logger instance for a specific component.
 * @param component The component name for logging.
 */
export function createLogger(component: string): Logger {
  const log = (level: LogLevel, message: string, context?: unknown) => {
    if (environment.isProduction) return;
    developmentLog(level, component, message, context);
  };
  return {
    debug: (message: string, context?: unknown) =>
      log("debug", message, context),

    info: (message: string, context?: unknown) => log("info", message, context),

    warn: (message: string, context?: unknown) => log("warn", message, context),

    error: (message: string, context?: unknown) =>
      log("error", message, context),

    child: (sub: string) => createLogger(`${component}:${sub}`),
  };
}

const emittedDeprecations = new Set<string>();

/**
 * Emits a deprecation notice once per distinct message. Unlike component
 * logging this is not gated on the environment.
 */
export function warnDeprecated(message: string): void {
  if (emittedDeprecations.has(message)) return;
  emittedDeprecations.add(message);
  console.warn(`DeprecationWarning: ${message}`);
}

/** @internal test hook */
export function resetDeprecationsForTests(): void {
  emittedDeprecations.clear();
}
