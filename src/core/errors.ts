export type ErrorCode =
  | 'GRAMMAR_ERROR'
  | 'UNKNOWN_SECTION'
  | 'SPEC_FORMAT'
  | 'PREDICATE_CONFIG'
  | 'IO_ERROR'
  | 'CONFIG_ERROR'
  | 'INTERNAL';

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  file?: string;
  line?: number;
  raw?: unknown;
}

export class RcqueryError extends Error {
  readonly code: ErrorCode;
  readonly retryable = false;
  readonly file?: string;
  readonly line?: number;
  readonly raw?: unknown;

  constructor(details: ErrorDetails) {
    super(details.message);
    this.name = 'RcqueryError';
    this.code = details.code;
    this.file = details.file;
    this.line = details.line;
    this.raw = details.raw;
  }

  /** `file:line: message`, omitting whatever location is unknown. */
  describe(): string {
    const where = [this.file, this.line].filter((part) => part !== undefined).join(':');
    return where ? `${where}: ${this.message}` : this.message;
  }
}

type LocatedDetails = Omit<ErrorDetails, 'code'>;

export class GrammarError extends RcqueryError {
  constructor(details: LocatedDetails) {
    super({ ...details, code: 'GRAMMAR_ERROR' });
    this.name = 'GrammarError';
  }
}

export class UnknownSectionError extends RcqueryError {
  constructor(details: LocatedDetails) {
    super({ ...details, code: 'UNKNOWN_SECTION' });
    this.name = 'UnknownSectionError';
  }
}

export class SpecFormatError extends RcqueryError {
  constructor(details: LocatedDetails) {
    super({ ...details, code: 'SPEC_FORMAT' });
    this.name = 'SpecFormatError';
  }
}

export class PredicateConfigError extends RcqueryError {
  constructor(details: LocatedDetails) {
    super({ ...details, code: 'PREDICATE_CONFIG' });
    this.name = 'PredicateConfigError';
  }
}

export function toRcqueryError(error: unknown, fallback: Omit<ErrorDetails, 'message' | 'raw'>): RcqueryError {
  if (error instanceof RcqueryError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new RcqueryError({ ...fallback, message, raw: error });
}
