// src/lib/shell.ts

const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a string for use as a single POSIX shell word.
 * Plain words pass through; anything else is single-quoted with embedded
 * single quotes escaped.
 */
export function shellQuote(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return "'" + arg.replace(/'/g, "'\\''") + "'";
}
