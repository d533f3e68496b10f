// src/runner/registry/types.ts

/** Category label used for records that carry none. */
export const UNCATEGORIZED = 'uncategorized';

export type ScriptRecord = {
  /** Absolute source location. */
  path: string;
  /** Archived copy location (absent in hand-edited documents). */
  backup?: string;
  /** Slash-separated category path. */
  category: string;
  note: string;
};

export type ScriptMap = Record<string, ScriptRecord>;
export type CategoryNotes = Record<string, string>;

export type Registry = {
  scripts: ScriptMap;
  categories: CategoryNotes;
};

export const emptyRegistry = (): Registry => ({ scripts: {}, categories: {} });

/** Own-key lookup (alias names are user data; never consult the prototype). */
export const hasKey = (o: Record<string, unknown>, k: string): boolean =>
  Object.prototype.hasOwnProperty.call(o, k);

/** Names that a plain object cannot hold as an own key through assignment. */
export const isUnsafeKey = (k: string): boolean => k === '__proto__';
