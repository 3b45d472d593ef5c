/**
 * Centralized logger
 * - debug/info/warn are silent in production builds
 * - every message carries the `[tagtree]` prefix
 */

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

const PREFIX = '[tagtree]';

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

function callConsole(method: ConsoleMethod, args: unknown[]): void {
  if (typeof console === 'undefined') return;
  const fn: unknown = console[method];
  if (typeof fn !== 'function') return;
  try {
    fn.apply(console, [PREFIX, ...args]);
  } catch {
    // console unavailable or replaced
  }
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('debug', args);
  },

  info: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('info', args);
  },

  warn: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('warn', args);
  },

  error: (...args: unknown[]) => {
    callConsole('error', args);
  },
};

/** True when an opt-in debug switch such as `TAGTREE_RENDER_DEBUG` is on */
export function debugEnabled(flag: string): boolean {
  if (isProduction()) return false;
  const value = process.env[flag];
  return value === '1' || value === 'true';
}
