// src/runner/registry/store.ts
/**
 * Registry persistence.
 * - Load never fails: a missing or broken document yields an empty registry.
 * - Save is a full rewrite through a temporary sibling and a rename, so a
 *   crash mid-write leaves the previous document intact.
 * - No locking: concurrent invocations race and the last save wins.
 */
import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ensureDir, pathExists } from 'fs-extra/esm';

import { describeError, LoadError, SaveError } from '@/runner/errors';
import { debugFallback } from '@/runner/util/debug';
import {
  DBG_SCOPE_REGISTRY_ENTRY,
  DBG_SCOPE_REGISTRY_LOAD,
} from '@/runner/util/debug-scopes';

import { parseRegistry } from './schema';
import { emptyRegistry, type Registry } from './types';

const readDocument = async (dataFile: string): Promise<unknown> => {
  try {
    const raw = await readFile(dataFile, 'utf8');
    return JSON.parse(raw);
  } catch (e) {
    throw new LoadError(`${dataFile}: ${describeError(e)}`, { cause: e });
  }
};

export const loadRegistry = async (dataFile: string): Promise<Registry> => {
  if (!(await pathExists(dataFile))) return emptyRegistry();
  let doc: unknown;
  try {
    doc = await readDocument(dataFile);
  } catch (e) {
    debugFallback(
      DBG_SCOPE_REGISTRY_LOAD,
      `${describeError(e)}; using empty registry`,
    );
    return emptyRegistry();
  }
  const { registry, dropped } = parseRegistry(doc);
  for (const reason of dropped) debugFallback(DBG_SCOPE_REGISTRY_ENTRY, reason);
  return registry;
};

export const saveRegistry = async (
  dataFile: string,
  registry: Registry,
): Promise<void> => {
  const tmp = path.join(
    path.dirname(dataFile),
    `.${path.basename(dataFile)}.${process.pid}.tmp`,
  );
  try {
    await ensureDir(path.dirname(dataFile));
    await writeFile(tmp, `${JSON.stringify(registry, null, 2)}\n`, 'utf8');
    await rename(tmp, dataFile);
  } catch (e) {
    await rm(tmp, { force: true }).catch(() => undefined);
    throw new SaveError(
      `unable to save registry ${dataFile}: ${describeError(e)}`,
      { cause: e },
    );
  }
};
