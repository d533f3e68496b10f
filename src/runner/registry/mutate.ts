// src/runner/registry/mutate.ts
/**
 * In-memory registry mutations. Callers persist with saveRegistry afterwards.
 */
import path from 'node:path';

import { AliasNotFoundError } from '@/runner/errors';
import { isReservedToken } from '@/runner/resolve/tokens';

import { assertCategoryKey } from './category';
import {
  hasKey,
  isUnsafeKey,
  type Registry,
  type ScriptMap,
  type ScriptRecord,
} from './types';

/** Default alias for a source file: its name without the final extension. */
export const aliasForFile = (sourceFile: string): string =>
  path.parse(sourceFile).name;

/** Names a script cannot run under: command tokens and unsafe object keys. */
const isUnusable = (alias: string): boolean =>
  isReservedToken(alias) || isUnsafeKey(alias);

/**
 * Pick the alias for `sourcePath` starting from `base`:
 * `base`, `base_1`, `base_2`, … until unused, except that an alias already
 * pointing at the same source path is reused. Command names (`cat`, `-l`, …)
 * and `__proto__` are always skipped.
 */
export const allocateAlias = (
  scripts: ScriptMap,
  base: string,
  sourcePath: string,
): string => {
  let alias = base;
  let counter = 1;
  while (isUnusable(alias) || hasKey(scripts, alias)) {
    if (!isUnusable(alias) && scripts[alias]?.path === sourcePath) break;
    alias = `${base}_${counter}`;
    counter += 1;
  }
  return alias;
};

/**
 * Register (or overwrite) a script record under a collision-free alias and
 * make sure its category is known.
 * @returns The alias the record was stored under.
 * @throws ShelfError when the category is a reserved name.
 */
export const upsertScript = (
  registry: Registry,
  record: ScriptRecord,
  base = aliasForFile(record.path),
): string => {
  assertCategoryKey(record.category);
  const alias = allocateAlias(registry.scripts, base, record.path);
  registry.scripts[alias] = { ...record };
  if (!hasKey(registry.categories, record.category)) {
    registry.categories[record.category] = '';
  }
  return alias;
};

export const setCategoryNote = (
  registry: Registry,
  category: string,
  note: string,
): void => {
  assertCategoryKey(category);
  registry.categories[category] = note;
};

/** @throws AliasNotFoundError when the alias is not registered. */
export const updateNote = (
  registry: Registry,
  alias: string,
  note: string,
): ScriptRecord => {
  const current = hasKey(registry.scripts, alias)
    ? registry.scripts[alias]
    : undefined;
  if (!current) throw new AliasNotFoundError(alias);
  const next = { ...current, note };
  registry.scripts[alias] = next;
  return next;
};
