/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Logger shared by the measure packages
 *
 * Log levels:
 * - error: Always logged - failures that abort a measure or a CLI command
 * - warn: Always logged - recoverable issues
 * - info: Logged when LCC_DEBUG=true - general operational info
 * - debug: Logged when LCC_DEBUG=true - runner messages, model mutations
 */

export interface LogContext {
  /** Component name (e.g., 'InMemoryModel', 'MeasureRunner') */
  component: string;
  /** Operation being performed (e.g., 'createLifeCycleCost') */
  operation?: string;
  /** Model object handle if applicable */
  handle?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export type Logger = ReturnType<typeof createLogger>;

function isDebugEnabled(): boolean {
  return process.env.LCC_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.handle) {
    prefix += ` <${ctx.handle}>`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string) {
  return {
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        console.error(`${prefix} ${message}:`, formatError(error));
      } else {
        console.error(`${prefix} ${message}`);
      }
    },

    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /** Only visible when LCC_DEBUG=true */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /** Only visible when LCC_DEBUG=true */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
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
