// src/cli/bin/shelf.ts
// CLI bootstrap. Kept separate from src/cli/index.ts so importing the CLI
// factory in tests has no side effects.
import { runCli } from '..';

void runCli(process.argv.slice(2)).then((code) => {
  process.exitCode = code;
});
