/* src/runner/service.ts
 * Command handlers behind the CLI: run, list, add, category, note.
 * Handlers throw ShelfError subclasses; the CLI layer reports them.
 */
import { constants } from 'node:os';
import path from 'node:path';

import { pathExists } from 'fs-extra/esm';

import type { ShelfConfig } from '@/cli/config/load';
import { archiveScript } from '@/runner/archive/archive';
import { AliasNotFoundError, describeError, ScriptMissingError } from '@/runner/errors';
import { buildCommand } from '@/runner/exec/interpreter';
import { type RunResult, runScript } from '@/runner/exec/run-script';
import { normalizeCategory } from '@/runner/registry/category';
import { setCategoryNote, updateNote, upsertScript } from '@/runner/registry/mutate';
import { loadRegistry, saveRegistry } from '@/runner/registry/store';
import { hasKey, type Registry, type ScriptRecord } from '@/runner/registry/types';
import { renderTree } from '@/runner/tree/render';
import { alert, error, ok } from '@/runner/util/color';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_EXEC_RESULT } from '@/runner/util/debug-scopes';

export const handleList = async (config: ShelfConfig): Promise<void> => {
  const registry = await loadRegistry(config.dataFile);
  console.log(renderTree(registry).join('\n'));
};

export type AddResult = {
  alias: string;
  category: string;
  record: ScriptRecord;
};

/**
 * Archive `file` under `category`, then register it.
 * The registry is loaded and saved only after the archive copy succeeded, so
 * an ArchiveError leaves it untouched.
 */
export const handleAdd = async (
  config: ShelfConfig,
  args: { category: string; file: string; note: string; cwd?: string },
): Promise<AddResult> => {
  const source = path.resolve(args.cwd ?? process.cwd(), args.file);
  const { category, backupPath } = await archiveScript(
    config.storageDir,
    source,
    args.category,
  );

  const registry = await loadRegistry(config.dataFile);
  const record: ScriptRecord = {
    path: source,
    backup: backupPath,
    category,
    note: args.note,
  };
  const alias = upsertScript(registry, record);
  await saveRegistry(config.dataFile, registry);

  console.log(ok(`shelf: added ${alias} to ${category}`));
  console.log(`shelf: archived -> ${backupPath}`);
  return { alias, category, record };
};

export const handleCategory = async (
  config: ShelfConfig,
  rawCategory: string,
  note: string,
): Promise<string> => {
  const category = normalizeCategory(rawCategory);
  const registry = await loadRegistry(config.dataFile);
  setCategoryNote(registry, category, note);
  await saveRegistry(config.dataFile, registry);
  console.log(ok(`shelf: category '${category}' note updated`));
  return category;
};

export const handleNote = async (
  config: ShelfConfig,
  alias: string,
  note: string,
): Promise<ScriptRecord> => {
  const registry = await loadRegistry(config.dataFile);
  const next = updateNote(registry, alias, note);
  await saveRegistry(config.dataFile, registry);
  console.log(ok(`shelf: note for '${alias}' updated`));
  return next;
};

const signalExitCode = (signal: NodeJS.Signals): number => {
  const num = Object.entries(constants.signals).find(([k]) => k === signal)?.[1];
  return 128 + (num ?? 0);
};

/**
 * Run a registered script with pass-through args.
 *
 * By default the manager exits 0 whatever the script did; set
 * `propagateExitCode` to surface the script's status instead.
 * @returns The manager's exit code.
 * @throws ScriptMissingError when the recorded source is gone (never restores
 *   from the backup).
 */
export const handleRun = async (
  config: ShelfConfig,
  registry: Registry,
  alias: string,
  passThrough: readonly string[],
  cwd: string = process.cwd(),
): Promise<number> => {
  const info = hasKey(registry.scripts, alias)
    ? registry.scripts[alias]
    : undefined;
  if (!info) throw new AliasNotFoundError(alias);
  if (!(await pathExists(info.path))) {
    throw new ScriptMissingError(info.path, info.backup);
  }

  const cmd = buildCommand(info.path, passThrough, config.interpreters);
  const propagate = config.propagateExitCode;
  let result: RunResult;
  try {
    result = await runScript(cmd, { cwd });
  } catch (e) {
    console.error(error(`shelf: failed to run ${alias}: ${describeError(e)}`));
    return propagate ? 1 : 0;
  }

  if (result.signal) {
    if (result.signal !== 'SIGINT') {
      console.error(alert(`shelf: ${alias} terminated by ${result.signal}`));
    }
    debugFallback(DBG_SCOPE_EXEC_RESULT, `${alias}: signal ${result.signal}`);
    return propagate ? signalExitCode(result.signal) : 0;
  }
  const code = result.code ?? 0;
  if (code !== 0) {
    debugFallback(DBG_SCOPE_EXEC_RESULT, `${alias}: exit code ${String(code)}`);
  }
  return propagate ? code : 0;
};
