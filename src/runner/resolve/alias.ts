// src/runner/resolve/alias.ts
/**
 * The first CLI token is either a command or an alias to run. Aliases whose
 * names look like flags are reachable through a dash-stripping fallback:
 * `-foo` runs `foo` unless `-foo` is a reserved command token.
 */
import { hasKey, type ScriptMap } from '@/runner/registry/types';

import { isReservedToken } from './tokens';

/** @returns The registered alias, or undefined when nothing matches. */
export const resolveAlias = (
  rawName: string,
  scripts: ScriptMap,
): string | undefined => {
  if (isReservedToken(rawName)) return undefined;
  if (hasKey(scripts, rawName)) return rawName;
  if (rawName.startsWith('-')) {
    const stripped = rawName.replace(/^-+/, '');
    if (stripped.length > 0 && hasKey(scripts, stripped)) return stripped;
  }
  return undefined;
};
