/* src/runner/resolve/tokens.ts
 * Command tokens shared by the alias resolver and the CLI argv normalizer.
 */

/** Flag spellings accepted for each management subcommand. */
export const COMMAND_FLAGS: Readonly<Record<string, string>> = {
  '-l': 'list',
  '--list': 'list',
  '-add': 'add',
  '--add': 'add',
  '-cat': 'category',
  '--cat': 'category',
  '--category': 'category',
  '-n': 'note',
  '--note': 'note',
};

export const HELP_FLAGS: readonly string[] = ['-h', '--help'];

/** Subcommand names and aliases registered with Commander. */
export const SUBCOMMAND_NAMES: readonly string[] = [
  'list',
  'ls',
  'add',
  'category',
  'cat',
  'note',
  'help',
];

/** Root options that may precede the command token. */
export const GLOBAL_FLAGS: readonly string[] = [
  '-d',
  '--debug',
  '-D',
  '--no-debug',
  '-b',
  '--boring',
  '-B',
  '--no-boring',
];

/** Tokens that always act as commands and never resolve to an alias. */
export const RESERVED_TOKENS: ReadonlySet<string> = new Set([
  ...Object.keys(COMMAND_FLAGS),
  ...SUBCOMMAND_NAMES,
  ...HELP_FLAGS,
  ...GLOBAL_FLAGS,
]);

export const isReservedToken = (token: string): boolean =>
  RESERVED_TOKENS.has(token);
