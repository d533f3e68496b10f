// src/runner/registry/category.ts
import { ShelfError } from '@/runner/errors';
import { normalizeSlashes } from '@/runner/util/path';

import { isUnsafeKey } from './types';

/** Path segments of a category, with separators unified and empty parts dropped. */
export const categorySegments = (raw: string): string[] =>
  normalizeSlashes(raw)
    .split('/')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

/** @throws ShelfError for a category path the registry cannot store as a key. */
export const assertCategoryKey = (category: string): void => {
  if (isUnsafeKey(category)) {
    throw new ShelfError(`category '${category}' is reserved`);
  }
};

/**
 * Canonical category path: `/`-separated, no empty segments.
 * @throws ShelfError on an empty path, a `.`/`..` segment (these would
 *   escape or alias the storage root), or a reserved name.
 */
export const normalizeCategory = (raw: string): string => {
  const segments = categorySegments(raw);
  if (segments.length === 0) {
    throw new ShelfError('category must not be empty');
  }
  const bad = segments.find((s) => s === '.' || s === '..');
  if (bad) {
    throw new ShelfError(`category '${raw}' contains a '${bad}' segment`);
  }
  const category = segments.join('/');
  assertCategoryKey(category);
  return category;
};

/** Display depth of a category path: the number of separators. */
export const categoryDepth = (category: string): number =>
  category.split('/').length - 1;
