/* src/runner/registry/schema.ts
 * Zod schemas for the persisted registry document.
 * Validation is per entry: a bad record is dropped, a bad field falls back
 * to its default; the document as a whole never fails.
 */
import { z } from 'zod';

import {
  type CategoryNotes,
  emptyRegistry,
  type Registry,
  type ScriptMap,
  UNCATEGORIZED,
} from './types';

export const scriptRecordSchema = z.object({
  path: z.string().min(1),
  backup: z.string().min(1).optional().catch(undefined),
  category: z.string().min(1).catch(UNCATEGORIZED),
  note: z.string().catch(''),
});

const isPlainObject = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

export type ParsedRegistry = {
  registry: Registry;
  /** Human-readable reasons for every entry that was discarded. */
  dropped: string[];
};

/** Coerce an arbitrary JSON value into a Registry. */
export const parseRegistry = (raw: unknown): ParsedRegistry => {
  const registry = emptyRegistry();
  const dropped: string[] = [];
  if (!isPlainObject(raw)) {
    dropped.push('(root): not an object');
    return { registry, dropped };
  }

  const scripts: ScriptMap = registry.scripts;
  if (isPlainObject(raw.scripts)) {
    for (const [alias, value] of Object.entries(raw.scripts)) {
      if (alias === '__proto__') {
        dropped.push('scripts.__proto__: reserved key');
        continue;
      }
      const res = scriptRecordSchema.safeParse(value);
      if (!res.success) {
        const first = res.error.issues[0];
        dropped.push(
          `scripts.${alias}: ${first ? `${first.path.join('.') || '(record)'}: ${first.message}` : 'invalid'}`,
        );
        continue;
      }
      const { path, backup, category, note } = res.data;
      scripts[alias] =
        typeof backup === 'string'
          ? { path, backup, category, note }
          : { path, category, note };
    }
  }

  const categories: CategoryNotes = registry.categories;
  if (isPlainObject(raw.categories)) {
    for (const [cat, note] of Object.entries(raw.categories)) {
      if (typeof note === 'string' && cat !== '__proto__')
        categories[cat] = note;
      else dropped.push(`categories.${cat}: not a string note`);
    }
  }

  return { registry, dropped };
};
