// src/runner/archive/archive.ts
/**
 * Archive a script into the category tree under the storage root:
 * <storageDir>/<segment>/<segment>/<file name>.
 * Same-name files in one category directory are replaced.
 */
import { stat } from 'node:fs/promises';
import path from 'node:path';

import { copy, ensureDir } from 'fs-extra/esm';

import { ArchiveError, describeError } from '@/runner/errors';
import { normalizeCategory } from '@/runner/registry/category';

export type ArchiveResult = {
  /** Canonical category path the copy was filed under. */
  category: string;
  /** Absolute location of the archived copy. */
  backupPath: string;
};

const isFile = async (p: string): Promise<boolean> => {
  try {
    return (await stat(p)).isFile();
  } catch {
    return false;
  }
};

export const archiveScript = async (
  storageDir: string,
  sourceFile: string,
  rawCategory: string,
): Promise<ArchiveResult> => {
  let category: string;
  try {
    category = normalizeCategory(rawCategory);
  } catch (e) {
    throw new ArchiveError(describeError(e), { cause: e });
  }
  const source = path.resolve(sourceFile);
  if (!(await isFile(source))) {
    throw new ArchiveError(`source file not found '${source}'`);
  }

  const dir = path.join(storageDir, ...category.split('/'));
  const backupPath = path.join(dir, path.basename(source));
  try {
    await ensureDir(dir);
    await copy(source, backupPath, {
      overwrite: true,
      preserveTimestamps: true,
    });
  } catch (e) {
    throw new ArchiveError(`archive failed: ${describeError(e)}`, { cause: e });
  }
  return { category, backupPath };
};
