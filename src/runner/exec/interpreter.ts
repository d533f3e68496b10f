// src/runner/exec/interpreter.ts
import path from 'node:path';

import { hasKey } from '@/runner/registry/types';

/** File extension (lower-case, with dot) -> interpreter command line. */
export type InterpreterMap = Record<string, string>;

export type ScriptCommand = {
  command: string;
  args: string[];
};

export const builtinInterpreters = (
  platform: NodeJS.Platform = process.platform,
  nodePath: string = process.execPath,
): InterpreterMap => ({
  '.js': nodePath,
  '.mjs': nodePath,
  '.cjs': nodePath,
  '.py': platform === 'win32' ? 'python' : 'python3',
  '.sh': 'sh',
  '.ps1': 'pwsh',
});

/**
 * Build the argv for a script: `<interpreter...> <script> <args...>`, or the
 * script itself when no interpreter is mapped (or the mapping is empty).
 */
export const buildCommand = (
  scriptPath: string,
  passThrough: readonly string[],
  interpreters: InterpreterMap,
): ScriptCommand => {
  const ext = path.extname(scriptPath).toLowerCase();
  const line = hasKey(interpreters, ext) ? (interpreters[ext] ?? '') : '';
  const [command, ...pre] = line.trim().split(/\s+/).filter(Boolean);
  if (!command) return { command: scriptPath, args: [...passThrough] };
  return { command, args: [...pre, scriptPath, ...passThrough] };
};
