/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Storey-split logger - consistent console logging across packages
 *
 * Log levels:
 * - error: Always logged - failures that abort an element or a pass
 * - warn: Always logged - recoverable issues, degraded output
 * - info: Logged when debugging is enabled - per-pass summaries
 * - debug: Logged when debugging is enabled - per-level decisions
 *
 * Enable debug logging with the STOREY_SPLIT_DEBUG=true environment variable.
 */

import type { ElementId } from './types.js';

export interface LogContext {
  /** Component/module name (e.g., 'LevelRanges', 'ExportPass') */
  component: string;
  /** Operation being performed (e.g., 'segment', 'register') */
  operation?: string;
  /** Element being processed, if any */
  elementId?: ElementId;
  /** Level being inspected, if any */
  levelId?: ElementId;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
}

export const DEBUG_ENV_VAR = 'STOREY_SPLIT_DEBUG';

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env[DEBUG_ENV_VAR] === 'true';
}

export function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.elementId !== undefined) {
    prefix += ` #${ctx.elementId}`;
  }
  if (ctx.levelId !== undefined) {
    prefix += ` @level ${ctx.levelId}`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string): Logger {
  return {
    /**
     * Log an error - always visible in console
     */
    error(message, error, ctx) {
      const prefix = formatContext({ component, ...ctx });
      const text = error !== undefined ? `${prefix} ${message}: ${formatError(error)}` : `${prefix} ${message}`;
      if (ctx?.data !== undefined) {
        console.error(text, ctx.data);
      } else {
        console.error(text);
      }
    },

    /**
     * Log a warning - always visible in console
     */
    warn(message, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    info(message, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    debug(message, data, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },
  };
}
