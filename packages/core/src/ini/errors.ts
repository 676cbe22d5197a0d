/**
 * Typed error classes for INI parsing.
 *
 * Every error carries a `kind` discriminant, the 1-based line it is
 * attributed to (0 when no line applies) and the short `detail` text
 * without the kind-specific prefix that `message` adds.
 */

export type IniErrorKind = 'file-open' | 'parse' | 'memory' | 'handler' | 'options';

/** Plain record form of an error, for reports and serialization. */
export interface IniErrorRecord {
  kind: IniErrorKind;
  line: number;
  message: string;
}

/** Base class for all INI errors. */
export abstract class IniError extends Error {
  abstract readonly kind: IniErrorKind;

  constructor(
    message: string,
    public readonly detail: string,
    public readonly line: number = 0,
  ) {
    super(message);
    this.name = 'IniError';
  }
}

/** The input source could not be opened or read. */
export class IniFileOpenError extends IniError {
  readonly kind = 'file-open';

  constructor(detail: string) {
    super(`Unable to open file: ${detail}`, detail);
    this.name = 'IniFileOpenError';
  }
}

/** A line violates the grammar (bad section header, too long, unrecognized shape). */
export class IniSyntaxError extends IniError {
  readonly kind = 'parse';

  constructor(line: number, detail: string) {
    super(`Parse error on line ${line}: ${detail}`, detail, line);
    this.name = 'IniSyntaxError';
  }
}

/** A string or collection grew past what the runtime can allocate. */
export class IniMemoryError extends IniError {
  readonly kind = 'memory';

  constructor(line: number) {
    super('Memory allocation error', 'memory allocation error', line);
    this.name = 'IniMemoryError';
  }
}

/** The handler rejected an event. */
export class IniHandlerError extends IniError {
  readonly kind = 'handler';

  constructor(line: number, detail: string) {
    super(`Handler error: ${detail}`, detail, line);
    this.name = 'IniHandlerError';
  }
}

/** Parse options failed validation. */
export class IniOptionsError extends IniError {
  readonly kind = 'options';

  constructor(detail: string) {
    super(`Invalid parse options: ${detail}`, detail);
    this.name = 'IniOptionsError';
  }
}

export function toErrorRecord(error: IniError): IniErrorRecord {
  return { kind: error.kind, line: error.line, message: error.detail };
}

/**
 * Render an error as `file:line: message` (or `line N: message` without a
 * file), the form the CLI prints in warnings.
 */
export function formatIniError(error: IniError, file?: string): string {
  if (error.line === 0) {
    return file ? `${file}: ${error.message}` : error.message;
  }
  const loc = file ? `${file}:${error.line}` : `line ${error.line}`;
  return `${loc}: ${error.detail}`;
}
