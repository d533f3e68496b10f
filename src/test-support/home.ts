// src/test-support/home.ts
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { loadShelfConfig, type ShelfConfig } from '@/cli/config/load';

export const writeScript = async (
  root: string,
  rel: string,
  src: string,
): Promise<string> => {
  const abs = path.join(root, rel);
  await mkdir(path.dirname(abs), { recursive: true });
  await writeFile(abs, src, 'utf8');
  return abs;
};

/** Temporary shelf home with default configuration. */
export const makeHome = async (
  prefix = 'shelf-',
): Promise<{
  home: string;
  config: ShelfConfig;
  cleanup: () => Promise<void>;
}> => {
  const home = await mkdtemp(path.join(os.tmpdir(), prefix));
  const config = await loadShelfConfig(home);
  return {
    home,
    config,
    cleanup: () => rm(home, { recursive: true, force: true }),
  };
};
