/* REQUIREMENTS (current):
 * - Export makeCli(ctx): Command — root CLI factory for the "shelf" tool.
 * - Register subcommands: list, add, category, note.
 * - Export runCli(argv): alias dispatch first, then Commander; resolves to
 *   the exit status and never rejects.
 * - Avoid invoking process.exit; Commander exits surface as CommanderError.
 * - Help for root includes the registered aliases.
 */
import { Command, CommanderError, Option } from 'commander';

import { type ShelfConfig, loadShelfConfig, resolveHome } from '@/cli/config/load';
import {
  describeError,
  ScriptMissingError,
  UnknownCommandError,
} from '@/runner/errors';
import { renderAliasesHelp } from '@/runner/help';
import { loadRegistry } from '@/runner/registry/store';
import type { Registry } from '@/runner/registry/types';
import { resolveAlias } from '@/runner/resolve/alias';
import { HELP_FLAGS } from '@/runner/resolve/tokens';
import {
  handleAdd,
  handleCategory,
  handleList,
  handleNote,
  handleRun,
} from '@/runner/service';
import { alert, error } from '@/runner/util/color';

import {
  applyGlobalFlags,
  commandNames,
  installExitOverride,
  normalizeArgv,
  splitGlobalFlags,
} from './cli-utils';

export type CliContext = {
  config: ShelfConfig;
  registry: Registry;
  cwd: string;
  /** Exit status accumulated by actions (0 unless one fails). */
  status: { exitCode: number };
};

/**
 * Print a failure as one line (plus the backup hint for a missing script).
 * An unknown command goes to stdout next to the usage pointer it carries.
 */
export const reportError = (e: unknown): void => {
  if (e instanceof UnknownCommandError) {
    console.log(error(`shelf: error: ${e.message}`));
    return;
  }
  console.error(error(`shelf: error: ${describeError(e)}`));
  if (e instanceof ScriptMissingError && e.backup) {
    console.error(alert(`shelf: backup available at -> ${e.backup}`));
  }
};

const guarded =
  <A extends unknown[]>(
    ctx: CliContext,
    fn: (...args: A) => Promise<unknown>,
  ) =>
  async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (e) {
      reportError(e);
      ctx.status.exitCode = 1;
    }
  };

/**
 * Build the root CLI (`shelf`) without side effects (safe for tests).
 *
 * Registers the management subcommands and the global `--debug`/`--boring`
 * options, and renders the help footer with the registered aliases.
 */
export const makeCli = (ctx: CliContext): Command => {
  const { config } = ctx;
  const cli = new Command();
  installExitOverride(cli);

  cli
    .name('shelf')
    .description(
      'Catalog scripts under aliases, archive copies by category, and run them by name.',
    )
    .usage('[options] <alias> [args...] | <command>');

  cli
    .addOption(new Option('-d, --debug', 'enable verbose debug logging'))
    .addOption(new Option('-D, --no-debug', 'disable verbose debug logging'))
    .addOption(
      new Option('-b, --boring', 'disable all color and styling (useful for CI)'),
    )
    .addOption(new Option('-B, --no-boring', 'do not disable color/styling'));

  cli.addHelpText('after', () => renderAliasesHelp(ctx.registry));

  // Root flags given after the command token land here.
  cli.hook('preAction', () => {
    const opts = cli.opts<{ debug?: boolean; boring?: boolean }>();
    applyGlobalFlags(opts, config.cliDefaults);
  });

  cli
    .command('list')
    .alias('ls')
    .description('Print the category tree of registered scripts (-l)')
    .action(
      guarded(ctx, async () => {
        await handleList(config);
      }),
    );

  cli
    .command('add')
    .description('Archive a script under a category and register it (-add)')
    .argument('<category>', 'category path, e.g. tools/net')
    .argument('<file>', 'script file to register')
    .argument('<note>', 'free-text note')
    .action(
      guarded(ctx, async (category: string, file: string, note: string) => {
        await handleAdd(config, { category, file, note, cwd: ctx.cwd });
      }),
    );

  cli
    .command('category')
    .alias('cat')
    .description('Set the note shown for a category (-cat)')
    .argument('<category>', 'category path')
    .argument('<note>', 'free-text note')
    .action(
      guarded(ctx, async (category: string, note: string) => {
        await handleCategory(config, category, note);
      }),
    );

  cli
    .command('note')
    .description("Replace a script's note (-n)")
    .argument('<alias>', 'registered alias')
    .argument('<note>', 'new note')
    .action(
      guarded(ctx, async (alias: string, note: string) => {
        await handleNote(config, alias, note);
      }),
    );

  for (const sub of cli.commands) installExitOverride(sub);

  // No arguments: usage text (outputHelp does not exit).
  cli.action(() => {
    cli.outputHelp();
  });

  return cli;
};

/**
 * Entry point for argv (without node/script prefix).
 * - First token naming an alias (see resolveAlias): run it with the rest.
 * - Otherwise a management command; an unknown token is an error.
 * @returns Process exit status.
 */
export const runCli = async (
  argv: readonly string[],
  opts: { cwd?: string; home?: string } = {},
): Promise<number> => {
  const cwd = opts.cwd ?? process.cwd();
  try {
    const { globals, rest } = splitGlobalFlags(argv);
    applyGlobalFlags(globals);
    const config = await loadShelfConfig(opts.home ?? resolveHome());
    applyGlobalFlags(globals, config.cliDefaults);
    const registry = await loadRegistry(config.dataFile);

    const first = rest[0];
    const alias = first === undefined ? undefined : resolveAlias(first, registry.scripts);
    if (alias !== undefined) {
      return await handleRun(config, registry, alias, rest.slice(1), cwd);
    }

    const ctx: CliContext = { config, registry, cwd, status: { exitCode: 0 } };
    const cli = makeCli(ctx);
    const normalized = normalizeArgv(rest);
    const token = normalized[0];
    if (
      token !== undefined &&
      !commandNames(cli).has(token) &&
      !HELP_FLAGS.includes(token)
    ) {
      throw new UnknownCommandError(token);
    }

    await cli.parseAsync(normalized, { from: 'user' });
    return ctx.status.exitCode;
  } catch (e) {
    // Commander already printed its own message (help, usage errors).
    if (e instanceof CommanderError) return e.exitCode;
    reportError(e);
    return 1;
  }
};
