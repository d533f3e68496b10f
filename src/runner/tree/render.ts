// src/runner/tree/render.ts
/**
 * Tree view of the registry, derived from flat category paths.
 *
 * Entries are ordered by plain string comparison of their category, which
 * groups most hierarchies but not all: `a/b`, `a-x`, `a/c` sort in that
 * order ('-' \< '/'), so `a` is opened twice. That interleaving is accepted.
 */
import { categoryDepth } from '@/runner/registry/category';
import type { Registry, ScriptRecord } from '@/runner/registry/types';
import { hasKey } from '@/runner/registry/types';
import { bold, dim } from '@/runner/util/color';

export const TREE_WIDTH = 80;
export const TREE_TITLE = 'SHELF (TREE VIEW)';
export const EMPTY_MESSAGE =
  'shelf: no scripts registered yet. Add one with: shelf -add <category> <file> <note>';

const INDENT = '  ';
const ALIAS_PAD = 15;

const center = (s: string, width: number): string =>
  `${' '.repeat(Math.max(0, Math.floor((width - s.length) / 2)))}${s}`;

const compare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const headerLines = (
  category: string,
  categories: Registry['categories'],
): string[] => {
  const depth = categoryDepth(category);
  const indent = INDENT.repeat(depth);
  const name = category.split('/').pop() ?? category;
  const note = hasKey(categories, category) ? categories[category] : '';
  return [
    '',
    `${indent}${bold(name)}${note ? ` ${dim(`(${note})`)}` : ''}`,
    `${indent}${'-'.repeat(Math.max(0, TREE_WIDTH - indent.length))}`,
  ];
};

/** Category paths to open when moving from `prev` to `next`, outermost first. */
const pathsToOpen = (prev: string | null, next: string): string[] => {
  const nextSeg = next.split('/');
  const prevSeg = prev === null ? [] : prev.split('/');
  let shared = 0;
  while (
    shared < nextSeg.length - 1 &&
    shared < prevSeg.length &&
    nextSeg[shared] === prevSeg[shared]
  ) {
    shared += 1;
  }
  const out: string[] = [];
  for (let i = shared; i < nextSeg.length; i += 1) {
    out.push(nextSeg.slice(0, i + 1).join('/'));
  }
  return out;
};

const scriptLine = (alias: string, info: ScriptRecord): string => {
  const indent = INDENT.repeat(categoryDepth(info.category) + 1);
  return `${indent}* ${alias.padEnd(ALIAS_PAD)} : ${info.note}`;
};

/** Render the registry as lines (no trailing newline on each). */
export const renderTree = (registry: Registry): string[] => {
  const entries = Object.entries(registry.scripts);
  if (entries.length === 0) return [EMPTY_MESSAGE];

  // Array.prototype.sort is stable: equal categories keep registry order.
  const sorted = [...entries].sort(([, a], [, b]) =>
    compare(a.category, b.category),
  );

  const rule = '='.repeat(TREE_WIDTH);
  const lines: string[] = ['', rule, center(TREE_TITLE, TREE_WIDTH), rule];

  let last: string | null = null;
  for (const [alias, info] of sorted) {
    const cat = info.category;
    if (cat !== last) {
      for (const p of pathsToOpen(last, cat)) {
        lines.push(...headerLines(p, registry.categories));
      }
      last = cat;
    }
    lines.push(scriptLine(alias, info));
  }
  lines.push('');
  return lines;
};
