/**
 * Discriminant for the three ways building a report can fail
 */
export type ReportErrorKind = 'io' | 'decode' | 'malformed-input';

/**
 * Base error class for report parsing
 */
export abstract class ReportError extends Error {
  abstract readonly kind: ReportErrorKind;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toString(): string {
    return `${this.name}: ${this.message}`;
  }
}

/**
 * Error thrown when the input stream cannot be read to its end
 */
export class IOError extends ReportError {
  readonly kind = 'io' as const;
}

/**
 * Error thrown when the session body is not the expected JSON shape
 */
export class DecodeError extends ReportError {
  readonly kind = 'decode' as const;

  constructor(
    message: string,
    public readonly index?: number,
    public readonly field?: string
  ) {
    const location: string[] = [];
    if (index !== undefined) location.push(`session ${index}`);
    if (field !== undefined) location.push(`field "${field}"`);
    super(location.length > 0 ? `${message} (${location.join(', ')})` : message);
  }
}

/**
 * Error thrown when the header/body separator or a header line is malformed
 */
export class MalformedInputError extends ReportError {
  readonly kind = 'malformed-input' as const;

  constructor(
    message: string,
    public readonly line?: number
  ) {
    const location = line !== undefined ? ` at line ${line}` : '';
    super(`${message}${location}`);
  }
}

export function isReportError(error: unknown): error is ReportError {
  return error instanceof ReportError;
}
