/* src/runner/errors.ts
 * User-facing error taxonomy. Every failure is reported as a single line of
 * text; none of these carry data meant for programmatic consumption beyond
 * what the CLI prints.
 */

export class ShelfError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Registry document could not be read or parsed (always recovered). */
export class LoadError extends ShelfError {}

/** Registry document could not be written. */
export class SaveError extends ShelfError {}

/** Source missing, bad category, or copy/mkdir failure while archiving. */
export class ArchiveError extends ShelfError {}

export class AliasNotFoundError extends ShelfError {
  constructor(readonly alias: string) {
    super(`no script registered as '${alias}'`);
  }
}

export class ScriptMissingError extends ShelfError {
  constructor(
    readonly scriptPath: string,
    readonly backup?: string,
  ) {
    super(`script missing on disk -> ${scriptPath}`);
  }
}

export class UnknownCommandError extends ShelfError {
  constructor(readonly token: string) {
    super(`unknown command '${token}' (see: shelf -h)`);
  }
}

/** Best-effort message extraction for anything thrown. */
export const describeError = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
