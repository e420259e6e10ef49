/**
 * Raised while reading the CSV files. `fatal` means the app cannot start:
 * the caller should show the message and stop. A non-fatal error concerns an
 * optional file and loading carries on without it.
 */
export class DatasetError extends Error {
  readonly fatal: boolean;

  constructor(message: string, options: { fatal?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "DatasetError";
    this.fatal = options.fatal ?? true;
  }
}

// Bad query string value (maps to HTTP 400)
export class QueryError extends Error {
  readonly param: string;

  constructor(param: string, message: string) {
    super(message);
    this.name = "QueryError";
    this.param = param;
  }
}

export const errorMessage = (err: unknown, fallback: string): string => {
  if (err instanceof Error && err.message) return err.message;
  if (typeof err === "string" && err) return err;
  return fallback;
};
