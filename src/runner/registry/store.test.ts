import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SaveError } from '@/runner/errors';
import { DBG_SCOPE_REGISTRY_LOAD } from '@/runner/util/debug-scopes';

import { loadRegistry, saveRegistry } from './store';
import type { Registry } from './types';

describe('registry store', () => {
  let dir: string;
  let dataFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'shelf-store-'));
    dataFile = path.join(dir, 'data.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    delete process.env.SHELF_DEBUG;
    vi.restoreAllMocks();
  });

  it('returns an empty registry when the file is missing', async () => {
    expect(await loadRegistry(dataFile)).toEqual({ scripts: {}, categories: {} });
  });

  it('returns an empty registry for unparsable JSON', async () => {
    await writeFile(dataFile, '{ "scripts": ', 'utf8');
    expect(await loadRegistry(dataFile)).toEqual({ scripts: {}, categories: {} });
  });

  it('returns an empty registry when the root is not an object', async () => {
    await writeFile(dataFile, '[1, 2, 3]', 'utf8');
    expect(await loadRegistry(dataFile)).toEqual({ scripts: {}, categories: {} });
  });

  it('drops invalid records and defaults missing fields', async () => {
    await writeFile(
      dataFile,
      JSON.stringify({
        scripts: {
          good: {
            path: '/src/good.sh',
            backup: '/store/tools/good.sh',
            category: 'tools',
            note: 'fine',
          },
          nopath: { category: 'tools', note: 'dropped' },
          bare: { path: '/src/bare.py' },
          oddbackup: { path: '/src/odd.sh', backup: 42, category: 'x', note: 'n' },
        },
        categories: { tools: 'helpers', broken: 3 },
      }),
      'utf8',
    );

    const reg = await loadRegistry(dataFile);

    expect(reg.scripts).toEqual({
      good: {
        path: '/src/good.sh',
        backup: '/store/tools/good.sh',
        category: 'tools',
        note: 'fine',
      },
      bare: { path: '/src/bare.py', category: 'uncategorized', note: '' },
      oddbackup: { path: '/src/odd.sh', category: 'x', note: 'n' },
    });
    expect('backup' in (reg.scripts.oddbackup ?? {})).toBe(false);
    expect(reg.categories).toEqual({ tools: 'helpers' });
  });

  it('round-trips content through save and load', async () => {
    const original: Registry = {
      scripts: {
        ping: {
          path: '/src/ping.sh',
          backup: '/store/tools/net/ping.sh',
          category: 'tools/net',
          note: 'pings a host',
        },
        ping_1: { path: '/other/ping.sh', category: 'tools/net', note: '' },
      },
      categories: { 'tools/net': 'network', tools: '' },
    };

    await saveRegistry(dataFile, original);
    const once = await loadRegistry(dataFile);
    await saveRegistry(dataFile, once);
    const twice = await loadRegistry(dataFile);

    expect(once).toEqual(original);
    expect(twice).toEqual(original);
  });

  it('writes indented JSON and leaves no temporary file behind', async () => {
    await saveRegistry(dataFile, { scripts: {}, categories: { a: 'b' } });

    expect(await readdir(dir)).toEqual(['data.json']);
    expect(await readFile(dataFile, 'utf8')).toBe(
      '{\n  "scripts": {},\n  "categories": {\n    "a": "b"\n  }\n}\n',
    );
  });

  it('creates missing parent directories', async () => {
    const nested = path.join(dir, 'db', 'registry.json');
    await saveRegistry(nested, { scripts: {}, categories: {} });
    expect(await loadRegistry(nested)).toEqual({ scripts: {}, categories: {} });
  });

  it('raises SaveError when the location cannot be written', async () => {
    await writeFile(path.join(dir, 'blocker'), 'not a directory', 'utf8');
    const target = path.join(dir, 'blocker', 'data.json');

    await expect(
      saveRegistry(target, { scripts: {}, categories: {} }),
    ).rejects.toBeInstanceOf(SaveError);
  });

  it('reports the recovered load failure under SHELF_DEBUG=1', async () => {
    process.env.SHELF_DEBUG = '1';
    const errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    await writeFile(dataFile, 'nope', 'utf8');

    await loadRegistry(dataFile);

    const first = String(errSpy.mock.calls[0]?.[0] ?? '');
    expect(first.startsWith(`shelf: debug: fallback: ${DBG_SCOPE_REGISTRY_LOAD}: `)).toBe(true);
    expect(first.endsWith('; using empty registry')).toBe(true);
  });
});
