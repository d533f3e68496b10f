import type { Registry } from '@/runner/registry/types';

/**
 * Render a help footer listing registered aliases and usage examples.
 *
 * @returns Multi‑line string; the alias block is omitted when nothing is registered.
 */
export const renderAliasesHelp = (registry: Registry): string => {
  const aliases = Object.keys(registry.scripts).sort();
  const example = aliases[0] ?? 'ping';
  const lines = [''];
  if (aliases.length) {
    lines.push('Registered aliases:', `  ${aliases.join(', ')}`, '');
  }
  lines.push(
    'Examples:',
    `  shelf ${example} [args...]         # run a registered script`,
    '  shelf -l                          # tree view of all scripts',
    '  shelf -add tools/net ./ping.sh "pings a host"',
    '  shelf -cat tools/net "network helpers"',
    `  shelf -n ${example} "new note"`,
    '',
  );
  return lines.join('\n');
};
