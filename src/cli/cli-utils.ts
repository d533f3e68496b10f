/** Shared Commander helpers for the shelf CLI. */
import type { Command } from 'commander';

import { COMMAND_FLAGS, GLOBAL_FLAGS } from '@/runner/resolve/tokens';

export type GlobalFlags = { debug?: boolean; boring?: boolean };

/**
 * Peel leading root flags (-d/-D/-b/-B and long forms) off argv.
 * The last occurrence of each flag wins.
 */
export const splitGlobalFlags = (
  argv: readonly string[],
): { globals: GlobalFlags; rest: string[] } => {
  const globals: GlobalFlags = {};
  let i = 0;
  for (; i < argv.length; i += 1) {
    const t = argv[i] ?? '';
    if (!GLOBAL_FLAGS.includes(t)) break;
    if (t === '-d' || t === '--debug') globals.debug = true;
    else if (t === '-D' || t === '--no-debug') globals.debug = false;
    else if (t === '-b' || t === '--boring') globals.boring = true;
    else globals.boring = false;
  }
  return { globals, rest: argv.slice(i) };
};

/** Map a legacy flag spelling of the command token (-l, -add, …) to its subcommand. */
export const normalizeArgv = (argv: readonly string[]): string[] => {
  const [first, ...rest] = argv;
  if (first === undefined) return [];
  const mapped = Object.prototype.hasOwnProperty.call(COMMAND_FLAGS, first)
    ? COMMAND_FLAGS[first]
    : undefined;
  return [mapped ?? first, ...rest];
};

/**
 * Resolve debug/boring (flags \> environment \> config defaults) into
 * SHELF_DEBUG / SHELF_BORING (+ NO_COLOR/FORCE_COLOR for chalk).
 * An undefined result leaves the environment as it is.
 */
export const applyGlobalFlags = (
  flags: GlobalFlags,
  defaults?: GlobalFlags,
  env: NodeJS.ProcessEnv = process.env,
): void => {
  const debug =
    flags.debug ?? (env.SHELF_DEBUG === '1' ? true : defaults?.debug);
  if (debug === true) env.SHELF_DEBUG = '1';
  else if (debug === false) delete env.SHELF_DEBUG;

  const boring =
    flags.boring ?? (env.SHELF_BORING === '1' ? true : defaults?.boring);
  if (boring === true) {
    env.SHELF_BORING = '1';
    env.FORCE_COLOR = '0';
    env.NO_COLOR = '1';
  } else if (boring === false) {
    delete env.SHELF_BORING;
    delete env.FORCE_COLOR;
    delete env.NO_COLOR;
  }
};

/**
 * Install a Commander exit override that always throws, so Commander never
 * calls process.exit; the caller maps CommanderError.exitCode to a status.
 */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride((err) => {
    throw err;
  });
};

/** Names (and aliases) of every registered subcommand, plus "help". */
export const commandNames = (cli: Command): Set<string> =>
  new Set<string>([
    'help',
    ...cli.commands.flatMap((c) => [c.name(), ...c.aliases()]),
  ]);
