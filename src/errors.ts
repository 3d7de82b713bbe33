/**
 * Error classes for genekb.
 *
 * Missing data is never an error here: query tools answer an unknown gene
 * with empty collections. These classes cover broken input files,
 * referential-integrity violations and bad configuration.
 */

export enum ErrorCode {
  PARSE_FAILED = 'E1000',
  PARSE_MISSING_ELEMENT = 'E1001',
  PARSE_MALFORMED_ELEMENT = 'E1002',

  VALIDATION_MISSING_PARENT = 'E2000',
  VALIDATION_CONSTRAINT = 'E2001',

  CONFIG_INVALID = 'E3000',

  STORE_NOT_WRITABLE = 'E4000',
}

export class GeneKbError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = 'GeneKbError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/** A source file is missing structure it must have. Fatal to that file only. */
export class ParseError extends GeneKbError {
  public readonly filePath?: string;
  public readonly line?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_FAILED,
    context?: Record<string, unknown> & { filePath?: string; line?: number },
  ) {
    super(message, code, context);
    this.name = 'ParseError';
    this.filePath = context?.filePath;
    this.line = context?.line;
  }

  /** Same error, attributed to a file. */
  withFile(filePath: string): ParseError {
    return new ParseError(this.message, this.code, { ...this.context, filePath });
  }

  toString(): string {
    let location = '';
    if (this.filePath) {
      location = ` at ${this.filePath}`;
      if (this.line !== undefined) location += `:${this.line}`;
    }
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/** An insert referenced a gene, pathway or GO term that is not stored. */
export class ValidationError extends GeneKbError {
  public readonly table: string;

  constructor(
    message: string,
    table: string,
    code: ErrorCode = ErrorCode.VALIDATION_MISSING_PARENT,
    context?: Record<string, unknown>,
  ) {
    super(message, code, { ...context, table });
    this.name = 'ValidationError';
    this.table = table;
  }
}

export class ConfigError extends GeneKbError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIG_INVALID, context);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof GeneKbError) return err.toString();
  if (err instanceof Error) return err.message;
  return String(err);
}
