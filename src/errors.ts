/**
 * rowshape — error types
 *
 * Every error raised by a session extends RowShapeError. Header problems are
 * detected once, when the first row is requested, and are permanent for the
 * session. Row problems are permanent too: a session never resumes after it
 * has thrown.
 */

export class RowShapeError extends Error {
  /** Optional suggestion printed after the message by `format()`. */
  readonly hint?: string;

  constructor(message: string, options?: { hint?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RowShapeError';
    this.hint = options?.hint;
  }

  format(): string {
    return this.hint === undefined
      ? `error: ${this.message}`
      : `error: ${this.message}\n\nhelp: ${this.hint}`;
  }
}

// ─── Header reconciliation ────────────────────────────────────────────────────

/** Base class for the two ways a header row can fail to match a record shape. */
export class HeaderMismatchError extends RowShapeError {
  constructor(message: string, options?: { hint?: string }) {
    super(message, options);
    this.name = 'HeaderMismatchError';
  }
}

export class HeaderCountMismatchError extends HeaderMismatchError {
  readonly expected: number;
  readonly actual:   number;

  constructor(expected: number, actual: number, hint?: string) {
    super(
      `The record type has ${expected} field names, but there are ${actual} headers`,
      { hint },
    );
    this.name     = 'HeaderCountMismatchError';
    this.expected = expected;
    this.actual   = actual;
  }
}

export class HeaderNameMismatchError extends HeaderMismatchError {
  /** Which header or field failed, e.g. `column 1: header "B" vs field "b"`. */
  readonly detail: string;

  constructor(detail: string, hint?: string) {
    super(`Headers don't match field names (${detail})`, { hint });
    this.name   = 'HeaderNameMismatchError';
    this.detail = detail;
  }
}

// ─── Rows ─────────────────────────────────────────────────────────────────────

export class ExtraDataColumnsError extends RowShapeError {
  /** 1-based data row number. */
  readonly row:     number;
  readonly headers: number;

  constructor(row: number, headers: number) {
    super(`More data columns than headers (row ${row} has more than ${headers} columns)`);
    this.name    = 'ExtraDataColumnsError';
    this.row     = row;
    this.headers = headers;
  }
}

export class LeafDecodeError extends RowShapeError {
  readonly recordType: string;
  /** Dotted path of the failing leaf inside the record, `''` for a scalar record. */
  readonly leafPath:   string;
  readonly row:        number;

  constructor(recordType: string, leafPath: string, row: number, cause: string) {
    super(
      `Could not decode row ${row} into ${recordType}` +
      (leafPath === '' ? '' : ` at ${leafPath}`) + `: ${cause}`,
      { cause },
    );
    this.name       = 'LeafDecodeError';
    this.recordType = recordType;
    this.leafPath   = leafPath;
    this.row        = row;
  }
}

export class LeafEncodeError extends RowShapeError {
  readonly recordType: string;
  readonly leafPath:   string;

  constructor(recordType: string, leafPath: string, cause: string) {
    super(
      `Could not encode ${recordType}` +
      (leafPath === '' ? '' : ` at ${leafPath}`) + `: ${cause}`,
      { cause },
    );
    this.name       = 'LeafEncodeError';
    this.recordType = recordType;
    this.leafPath   = leafPath;
  }
}

/** A failure reported by the tabular-text codec, passed through unchanged as `cause`. */
export class CodecError extends RowShapeError {
  constructor(cause: unknown) {
    super(`CSV codec error: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'CodecError';
  }
}
