import { describe, expect, it, vi } from 'vitest';

import { asEsmModule } from '@/test/mock-esm';

// Mock the help footer to a known marker before importing the CLI factory.
vi.mock('@/runner/help', () =>
  asEsmModule({
    renderAliasesHelp: () => '\nMOCK HELP FOOTER\n',
  }),
);

import { commandNames } from '@/cli/cli-utils';
import { type CliContext, makeCli } from '@/cli/index';
import { SUBCOMMAND_NAMES } from '@/runner/resolve/tokens';

const ctx = (): CliContext => ({
  config: {
    home: '/shelf',
    configPath: null,
    dataFile: '/shelf/data.json',
    storageDir: '/shelf/storage',
    interpreters: {},
    propagateExitCode: false,
    cliDefaults: { boring: true },
  },
  registry: { scripts: {}, categories: {} },
  cwd: '/shelf',
  status: { exitCode: 0 },
});

describe('CLI help footer and subcommand registration', () => {
  it('prints help with custom footer and registers subcommands', () => {
    const cli = makeCli(ctx());

    let printed = '';
    const writeSpy = vi
      .spyOn(process.stdout, 'write')
      .mockImplementation((chunk: unknown): boolean => {
        printed += String(chunk);
        return true;
      });

    // outputHelp prints the help (incl. addHelpText('after')) to stdout
    cli.outputHelp();

    writeSpy.mockRestore();

    expect(printed).toContain('MOCK HELP FOOTER');
    expect(printed).toContain('Usage: shelf [options] <alias> [args...] | <command>');

    expect(cli.commands.map((c) => c.name())).toEqual([
      'list',
      'add',
      'category',
      'note',
    ]);
    expect(cli.commands.map((c) => c.aliases())).toEqual([['ls'], [], ['cat'], []]);
  });

  it('reserves exactly the command words Commander knows', () => {
    const cli = makeCli(ctx());
    expect([...commandNames(cli)].sort()).toEqual([...SUBCOMMAND_NAMES].sort());
  });
});
