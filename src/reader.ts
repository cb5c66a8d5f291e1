/**
 * rowshape — decode sessions
 *
 * ── Lifecycle ────────────────────────────────────────────────────────────────
 *
 *   initializing ──first next() / headers() / mapping()──▶ streaming ──▶ eos
 *         │                                                    │
 *         └──────────────── any error ──────────────────▶ error ◀┘
 *
 * The first transition reads the header row, extracts the field layout of
 * the record shape and reconciles the two. It runs exactly once; repeated
 * header inspection returns the cached results. An empty header row means
 * the input holds no records: the session goes straight to eos.
 *
 * eos and error are terminal. After an error has been thrown, next() only
 * ever reports done, even if the codec could carry on.
 *
 * ── Row assembly ─────────────────────────────────────────────────────────────
 *
 * Fields are pulled from the codec until end-of-record. The column mapping
 * routes each one to its leaf; columns mapped to no field are dropped. Leaves
 * that no column feeds (anonymous tuple positions, or a row shorter than the
 * header) receive an empty field, so optional leaves read as null and string
 * leaves as ''. A column past the last header is an error.
 */

import { CsvSource, type CsvOptions } from './csv';
import { CodecError, ExtraDataColumnsError, LeafDecodeError } from './errors';
import { extractFieldLayout, type FieldLayout } from './field-names';
import { mapColumns, resolvePolicy } from './mapping';
import { FieldCursor, LeafError, type Shape } from './shape';
import type {
  ColumnMapping,
  FieldNameList,
  HeaderOptions,
  HeaderPolicy,
  HeaderPredicate,
  HeaderRow,
  RowSource,
  SessionStatus,
} from './types';

const DONE: IteratorReturnResult<undefined> = Object.freeze({ done: true, value: undefined });

// ─── DecodedRows ──────────────────────────────────────────────────────────────

export class DecodedRows<T> implements IterableIterator<T> {
  private _status:   SessionStatus = 'initializing';
  private _headers:  HeaderRow | null = null;
  private _mapping:  ColumnMapping | null = null;
  private _rowsRead: number = 0;
  private readonly _layout: FieldLayout;

  constructor(
    private readonly _source: RowSource,
    private readonly _shape:  Shape<T>,
    private readonly _policy: HeaderPolicy,
  ) {
    this._layout = extractFieldLayout(_shape);
  }

  get status(): SessionStatus {
    return this._status;
  }

  /** Data records pulled from the codec so far, including one that failed. */
  get rowsRead(): number {
    return this._rowsRead;
  }

  get policy(): HeaderPolicy {
    return this._policy;
  }

  /**
   * The header row, reading and reconciling it if that has not happened yet.
   * Empty when the input held no rows.
   *
   * @throws HeaderMismatchError | CodecError on the first call that fails
   */
  headers(): HeaderRow {
    this.prepare();
    return this._headers ?? [];
  }

  fieldNames(): FieldNameList {
    return this._layout.names;
  }

  /**
   * The column mapping, or null if the input held no rows. If reconciliation
   * fails, the first call throws the HeaderMismatchError and later calls
   * return null.
   */
  mapping(): ColumnMapping | null {
    this.prepare();
    return this._mapping;
  }

  [Symbol.iterator](): this {
    return this;
  }

  /**
   * @throws HeaderMismatchError    the header row does not fit the shape
   * @throws ExtraDataColumnsError  a record is wider than the header row
   * @throws LeafDecodeError        a field could not be parsed
   * @throws CodecError             the codec reported a failure
   */
  next(): IteratorResult<T, undefined> {
    this.prepare();
    if (this._status !== 'streaming') return DONE;

    try {
      const leaves = this.readRecord();
      if (leaves === null) {
        this._status = 'eos';
        return DONE;
      }
      return { done: false, value: this.decode(leaves) };
    } catch (e) {
      this._status = 'error';
      throw e;
    }
  }

  /** Drains the session into an array. */
  toArray(): T[] {
    return Array.from(this);
  }

  // ── First-row processing ──────────────────────────────────────────────────

  private prepare(): void {
    if (this._status !== 'initializing') return;

    let headers: HeaderRow | null;
    try {
      headers = this._source.readHeaderRow();
    } catch (e) {
      this._status = 'error';
      throw new CodecError(e);
    }

    if (headers === null || headers.length === 0) {
      this._headers = [];
      this._status  = 'eos';
      return;
    }
    this._headers = Object.freeze([...headers]);

    const result = mapColumns(this._headers, this._layout.names, this._policy);
    if (!result.ok) {
      this._status = 'error';
      throw result.error;
    }
    this._mapping = Object.freeze([...result.data]);
    this._status  = 'streaming';
  }

  // ── Rows ──────────────────────────────────────────────────────────────────

  /** One record's fields in leaf order, or null at end of input. */
  private readRecord(): string[] | null {
    const mapping = this._mapping ?? [];
    const leaves  = new Array<string>(this._layout.leafCount).fill('');
    let column = 0;

    for (;;) {
      const next = this._source.readNextField();
      switch (next.kind) {
        case 'error':
          throw new CodecError(next.error);

        case 'end-of-input':
          if (column === 0) return null;
          return leaves;

        case 'end-of-record':
          // A record with no fields at all carries no data.
          if (column === 0) continue;
          return leaves;

        case 'field': {
          if (column === 0) this._rowsRead++;
          if (column >= mapping.length) {
            throw new ExtraDataColumnsError(this._rowsRead, mapping.length);
          }
          const field = mapping[column];
          const leaf  = field === null || field === undefined ? undefined : this._layout.leafIndices[field];
          if (leaf !== undefined) leaves[leaf] = next.value;
          column++;
          break;
        }
      }
    }
  }

  private decode(leaves: readonly string[]): T {
    try {
      return this._shape.read(new FieldCursor(leaves), '');
    } catch (e) {
      if (e instanceof LeafError) {
        throw new LeafDecodeError(this._shape.name, e.path, this._rowsRead, e.reason);
      }
      throw e;
    }
  }
}

// ─── RowReader ────────────────────────────────────────────────────────────────

/**
 * Entry point for decoding. Configure the matching policy with the fluent
 * setters, then call decode() once. The policy is frozen from that point on.
 *
 * Usage:
 *   const rows = RowReader.fromString(text)
 *     .reorder()
 *     .ignoreAsciiCase()
 *     .decode(Animal);
 *   for (const animal of rows) { … }
 */
export class RowReader {
  private readonly options: HeaderOptions = {};
  private started = false;

  constructor(private readonly source: RowSource) {}

  static fromSource(source: RowSource): RowReader {
    return new RowReader(source);
  }

  static fromString(data: string, options?: CsvOptions): RowReader {
    return new RowReader(new CsvSource(data, options));
  }

  static fromBuffer(data: Buffer, options?: CsvOptions): RowReader {
    return new RowReader(new CsvSource(data, options));
  }

  static fromFile(path: string, options?: CsvOptions): RowReader {
    return new RowReader(CsvSource.fromFile(path, options));
  }

  /** Match headers to fields in any order. Default false. */
  reorder(yes: boolean = true): this {
    return this.set({ reorderColumns: yes });
  }

  /** Allow, and drop, columns whose header matches no field. Default false. */
  ignoreUnusedColumns(yes: boolean = true): this {
    return this.set({ ignoreUnusedColumns: yes });
  }

  /** Compare headers with field names ignoring ASCII case. Default false. */
  ignoreAsciiCase(yes: boolean = true): this {
    return this.set({ ignoreAsciiCase: yes });
  }

  /** Replace the header comparison entirely. Takes precedence over ignoreAsciiCase(). */
  headerEquals(predicate: HeaderPredicate): this {
    return this.set({ headerEquals: predicate });
  }

  decode<T>(shape: Shape<T>): DecodedRows<T> {
    if (this.started) {
      throw new Error('RowReader: decode() can only be called once per reader.');
    }
    this.started = true;
    return new DecodedRows(this.source, shape, resolvePolicy(this.options));
  }

  private set(patch: HeaderOptions): this {
    if (this.started) {
      throw new Error('RowReader: the matching policy cannot change once decoding has started.');
    }
    Object.assign(this.options, patch);
    return this;
  }
}

/** Functional form of `new RowReader(source).decode(shape)` with explicit options. */
export function decodeRows<T>(source: RowSource, shape: Shape<T>, options?: HeaderOptions): DecodedRows<T> {
  return new DecodedRows(source, shape, resolvePolicy(options));
}
