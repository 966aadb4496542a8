/**
 * Logger
 * Layer: infra
 *
 * Provided ports:
 *   - logger.create
 *
 * Components log through this port so tests can capture output.
 * The production logger writes through @actions/core.
 */

import * as core from '@actions/core';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

/**
 * Returns a logger that prefixes every message with `[scope]`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}] `;
  return {
    debug: (message) => core.debug(prefix + message),
    info: (message) => core.info(prefix + message),
    warning: (message) => core.warning(prefix + message),
    error: (message) => core.error(prefix + message),
  };
}

/**
 * Formats an unknown thrown value for a log line.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
