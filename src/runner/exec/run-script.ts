/* src/runner/exec/run-script.ts
 * Foreground script execution: inherited stdio, blocks until the child exits.
 */
import { spawn } from 'node:child_process';

import treeKill from 'tree-kill';

import type { ScriptCommand } from './interpreter';

export type RunResult = {
  /** Exit code, or null when the child was ended by a signal. */
  code: number | null;
  signal: NodeJS.Signals | null;
};

/**
 * Spawn `cmd` and wait for it to close.
 * - SIGINT reaching the manager is ignored while the child runs (the
 *   terminal delivers it to the child's process group as well).
 * - SIGTERM reaching the manager is forwarded to the child's process tree.
 * Handlers are detached once the child has exited.
 * @throws The spawn error (missing executable, permission denied).
 */
export const runScript = async (
  cmd: ScriptCommand,
  opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<RunResult> => {
  const child = spawn(cmd.command, cmd.args, {
    cwd: opts.cwd ?? process.cwd(),
    env: opts.env ?? process.env,
    stdio: 'inherit',
  });

  const onSigint = (): void => {
    // child handles the interrupt; the manager keeps waiting for close
  };
  const onSigterm = (): void => {
    if (typeof child.pid === 'number') treeKill(child.pid, 'SIGTERM');
  };
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  try {
    return await new Promise<RunResult>((resolveP, rejectP) => {
      child.on('error', (e) => rejectP(e));
      child.on('close', (code, signal) => resolveP({ code, signal }));
    });
  } finally {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
  }
};
