import { describe, expect, it } from 'vitest';

import type { Registry } from '@/runner/registry/types';

import { EMPTY_MESSAGE, renderTree } from './render';

const rule = (ch: string, n: number): string => ch.repeat(n);
const row = (depth: number, alias: string, note: string): string =>
  `${'  '.repeat(depth)}* ${alias.padEnd(15)} : ${note}`;
const banner = [
  '',
  rule('=', 80),
  `${' '.repeat(31)}SHELF (TREE VIEW)`,
  rule('=', 80),
];

describe('renderTree', () => {
  it('prints guidance instead of an empty tree', () => {
    expect(renderTree({ scripts: {}, categories: { tools: 'x' } })).toEqual([
      EMPTY_MESSAGE,
    ]);
  });

  it('nests a sub-category under its parent with notes', () => {
    const reg: Registry = {
      scripts: {
        ping: {
          path: '/tmp/ping.sh',
          backup: '/store/tools/net/ping.sh',
          category: 'tools/net',
          note: 'pings a host',
        },
      },
      categories: { 'tools/net': '', tools: 'everyday' },
    };

    expect(renderTree(reg)).toEqual([
      ...banner,
      '',
      'tools (everyday)',
      rule('-', 80),
      '',
      '  net',
      `  ${rule('-', 78)}`,
      row(2, 'ping', 'pings a host'),
      '',
    ]);
  });

  it('orders by category string and keeps registry order within one', () => {
    const reg: Registry = {
      scripts: {
        b: { path: '/s/b', category: 'a/c', note: 'nb' },
        x: { path: '/s/x', category: 'a-x', note: 'nx' },
        y: { path: '/s/y', category: 'a/b', note: 'ny' },
        z: { path: '/s/z', category: 'a/b', note: 'nz' },
      },
      categories: {},
    };

    expect(renderTree(reg)).toEqual([
      ...banner,
      '',
      'a-x',
      rule('-', 80),
      row(1, 'x', 'nx'),
      '',
      'a',
      rule('-', 80),
      '',
      '  b',
      `  ${rule('-', 78)}`,
      row(2, 'y', 'ny'),
      row(2, 'z', 'nz'),
      '',
      '  c',
      `  ${rule('-', 78)}`,
      row(2, 'b', 'nb'),
      '',
    ]);
  });

  it('does not repeat a parent header for a following sibling', () => {
    const reg: Registry = {
      scripts: {
        top: { path: '/s/top', category: 'ops', note: '' },
        deep: { path: '/s/deep', category: 'ops/db', note: 'dump' },
      },
      categories: { ops: 'operations', 'ops/db': 'databases' },
    };

    const headers = renderTree(reg).filter(
      (l) => l.trim() && !l.includes('*') && !/^[\s=-]+$/.test(l),
    );
    expect(headers).toEqual([
      `${' '.repeat(31)}SHELF (TREE VIEW)`,
      'ops (operations)',
      '  db (databases)',
    ]);
  });
});
