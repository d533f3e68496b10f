// src/runner/paths.ts
import path from 'node:path';
import { fileURLToPath } from 'node:url';

/** Directory holding the program (the package root). */
export const packageRoot = (): string =>
  path.resolve(fileURLToPath(new URL('../../', import.meta.url)));
