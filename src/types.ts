/**
 * rowshape — type definitions
 *
 * The collaborator contracts (RowSource, RowSink) and the values a session
 * derives once and then reuses for every row: the field name list, the
 * header row and the column mapping.
 */

// ─── Result ───────────────────────────────────────────────────────────────────

export type Result<T, E = Error> = { ok: true; data: T } | { ok: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { ok: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ─── Names, headers, mappings ─────────────────────────────────────────────────

/**
 * Field names of a shape in declaration order. Duplicates are allowed, e.g. a
 * tuple holding the same struct twice. Anonymous (positional) leaves are not
 * listed.
 */
export type FieldNameList = readonly string[];

export type HeaderRow = readonly string[];

/**
 * Indexed by column position. `null` marks a column that feeds no field;
 * otherwise the value is an index into the FieldNameList.
 */
export type ColumnMapping = readonly (number | null)[];

/** Equality between a header (left) and a field name (right). */
export type HeaderPredicate = (header: string, fieldName: string) => boolean;

/** Fully resolved matching policy. Built once per session and frozen. */
export interface HeaderPolicy {
  /** Match headers to fields regardless of position. Default false. */
  readonly reorderColumns:      boolean;
  /** Allow headers that match no field; their columns are dropped. Default false. */
  readonly ignoreUnusedColumns: boolean;
  readonly headerEquals:        HeaderPredicate;
}

export interface HeaderOptions {
  reorderColumns?:      boolean;
  ignoreUnusedColumns?: boolean;
  /**
   * Shorthand for `headerEquals: asciiCaseInsensitive`. Ignored when
   * `headerEquals` is given.
   */
  ignoreAsciiCase?:     boolean;
  headerEquals?:        HeaderPredicate;
}

// ─── Codec collaborators ──────────────────────────────────────────────────────

export type NextField =
  | { readonly kind: 'field'; readonly value: string }
  | { readonly kind: 'end-of-record' }
  | { readonly kind: 'end-of-input' }
  | { readonly kind: 'error'; readonly error: Error };

/**
 * The read half of a tabular-text codec. Quoting, escaping and framing happen
 * behind this interface; the engine only sees unescaped field text.
 */
export interface RowSource {
  /**
   * The header row, or null when the input holds no rows at all. Calling it
   * more than once returns the same row without advancing the input.
   */
  readHeaderRow(): HeaderRow | null;
  readNextField(): NextField;
}

/** The write half of a tabular-text codec. Errors are thrown. */
export interface RowSink {
  writeRow(fields: readonly string[]): void;
  /** Hand all buffered output to the underlying writer. */
  flush(): void;
  /** Release the underlying writer. Called once, after a final flush. */
  close?(): void;
}

// ─── Session status ───────────────────────────────────────────────────────────

/**
 *   initializing  header row not processed yet
 *   streaming     header reconciled, rows are being produced
 *   eos           input exhausted (terminal)
 *   error         a header or row error was thrown (terminal)
 */
export type SessionStatus = 'initializing' | 'streaming' | 'eos' | 'error';
