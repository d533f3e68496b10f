/** Library entry point. */
export { type ShelfConfig, loadShelfConfig, resolveHome } from './cli/config/load';
export { makeCli, runCli } from './cli/index';
export { archiveScript } from './runner/archive/archive';
export * from './runner/errors';
export { buildCommand, builtinInterpreters } from './runner/exec/interpreter';
export { runScript } from './runner/exec/run-script';
export { normalizeCategory } from './runner/registry/category';
export {
  allocateAlias,
  setCategoryNote,
  updateNote,
  upsertScript,
} from './runner/registry/mutate';
export { loadRegistry, saveRegistry } from './runner/registry/store';
export type { Registry, ScriptRecord } from './runner/registry/types';
export { resolveAlias } from './runner/resolve/alias';
export {
  handleAdd,
  handleCategory,
  handleList,
  handleNote,
  handleRun,
} from './runner/service';
export { renderTree } from './runner/tree/render';
