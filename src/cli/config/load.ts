/* src/cli/config/load.ts
 * Resolve the shelf home and load/validate shelf.config.* from it.
 * Every component receives the resulting ShelfConfig; nothing reads fixed
 * global paths.
 */
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { pathExists } from 'fs-extra/esm';
import { ZodError } from 'zod';

import { parseText } from '@/common/config/parse';
import { builtinInterpreters, type InterpreterMap } from '@/runner/exec/interpreter';
import { packageRoot } from '@/runner/paths';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_CONFIG_DEFAULTS } from '@/runner/util/debug-scopes';
import { normalizeSlashes, resolveFrom } from '@/runner/util/path';

import { type ShelfConfigFile, shelfConfigSchema } from './schema';

export const CONFIG_FILE_NAMES = [
  'shelf.config.yml',
  'shelf.config.yaml',
  'shelf.config.json',
] as const;

export const DEFAULT_DATA_FILE = 'data.json';
export const DEFAULT_STORAGE_DIR = 'storage';

export type ShelfConfig = {
  /** Directory the registry and storage live beside. */
  home: string;
  /** Config file that was applied, when any. */
  configPath: string | null;
  dataFile: string;
  storageDir: string;
  interpreters: InterpreterMap;
  propagateExitCode: boolean;
  /** Only what the config file sets; unset keys leave the environment alone. */
  cliDefaults: { debug?: boolean; boring?: boolean };
};

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

/** SHELF_HOME when set; otherwise the directory holding the program. */
export const resolveHome = (env: NodeJS.ProcessEnv = process.env): string => {
  const fromEnv = env.SHELF_HOME?.trim();
  return fromEnv ? path.resolve(fromEnv) : packageRoot();
};

export const findConfigPath = async (home: string): Promise<string | null> => {
  for (const name of CONFIG_FILE_NAMES) {
    const p = path.join(home, name);
    if (await pathExists(p)) return p;
  }
  return null;
};

/**
 * Load the effective configuration for `home`.
 * @throws Error listing every validation issue when the config file is invalid.
 */
export const loadShelfConfig = async (
  home: string = resolveHome(),
): Promise<ShelfConfig> => {
  const configPath = await findConfigPath(home);
  const interpreters = builtinInterpreters();
  const base: ShelfConfig = {
    home,
    configPath,
    dataFile: path.join(home, DEFAULT_DATA_FILE),
    storageDir: path.join(home, DEFAULT_STORAGE_DIR),
    interpreters,
    propagateExitCode: false,
    cliDefaults: {},
  };
  if (!configPath) {
    debugFallback(
      DBG_SCOPE_CONFIG_DEFAULTS,
      `no ${CONFIG_FILE_NAMES.join('/')} in ${normalizeSlashes(home)}; using built-in defaults`,
    );
    return base;
  }

  const rel = normalizeSlashes(configPath);
  let parsed: ShelfConfigFile;
  try {
    const rootUnknown = parseText(configPath, await readFile(configPath, 'utf8'));
    parsed = shelfConfigSchema.parse(rootUnknown);
  } catch (e) {
    throw new Error(`invalid config in ${rel}\n${formatZodError(e)}`, {
      cause: e,
    });
  }

  for (const [ext, line] of Object.entries(parsed.interpreters ?? {})) {
    interpreters[ext.toLowerCase()] = line;
  }
  return {
    ...base,
    dataFile: resolveFrom(home, parsed.dataFile ?? DEFAULT_DATA_FILE),
    storageDir: resolveFrom(home, parsed.storageDir ?? DEFAULT_STORAGE_DIR),
    propagateExitCode: parsed.propagateExitCode ?? false,
    cliDefaults: { ...parsed.cliDefaults },
  };
};
