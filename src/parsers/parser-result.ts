/**
 * Parser Errors
 *
 * Failures raised while reading cartridge documents. Structural failures
 * exclude one entity; fatal failures abort the whole run.
 */

/**
 * A markup document is not well-formed
 */
export class MarkupParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'MarkupParseError';
  }
}

/**
 * The run cannot continue, e.g. the manifest is missing or unreadable
 */
export class FatalMigrationError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'FatalMigrationError';
  }
}

/**
 * Normalize a thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
