// src/runner/util/path.ts
import path from 'node:path';

/** Normalize slashes to POSIX. */
export const normalizeSlashes = (p: string): string => p.replace(/\\/g, '/');

/**
 * Absolute form of a configured location.
 * - Absolute input is returned as-is (resolved).
 * - Relative input is taken from `base`.
 */
export const resolveFrom = (base: string, p: string): string =>
  path.isAbsolute(p) ? path.resolve(p) : path.resolve(base, p);
