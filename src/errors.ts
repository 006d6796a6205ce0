// Fatal conditions. Anything thrown as a PushlintError aborts the run before a report is printed.

export class PushlintError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed filter/rule parameters or configuration file. */
export class ConfigError extends PushlintError {}

/** HEAD could not be resolved or the history could not be walked. */
export class RepositoryError extends PushlintError {}

/** The pending commit message could not be read. */
export class InputError extends PushlintError {}

/** The report sink rejected a write. */
export class OutputError extends PushlintError {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
