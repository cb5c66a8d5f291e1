/**
 * rowshape — encode sessions
 *
 * ── Header ───────────────────────────────────────────────────────────────────
 *
 * The first encode() writes the shape's field names as the header row, then
 * the record. Later calls write the record only. Encoding needs no column
 * mapping: fields go out in leaf order, so the header and every row line up
 * by construction.
 *
 * ── Failures ─────────────────────────────────────────────────────────────────
 *
 * A record is rendered completely before anything reaches the sink. A leaf
 * that cannot be rendered throws LeafEncodeError and writes nothing, not even
 * the header on a first call; the writer stays usable for the next record.
 * Errors from the sink are wrapped in CodecError.
 *
 * ── Flushing ─────────────────────────────────────────────────────────────────
 *
 * Output is buffered by the sink. flush() hands it to the underlying writer;
 * close() flushes and releases it. withRowWriter() runs a callback and closes
 * the writer on every exit path.
 */

import { CsvSink, type CsvOptions } from './csv';
import { CodecError, LeafEncodeError, RowShapeError } from './errors';
import { extractFieldLayout, type FieldLayout } from './field-names';
import { LeafError, type EncodeVisitor, type Shape } from './shape';
import type { FieldNameList, RowSink } from './types';

class RowBuilder implements EncodeVisitor {
  readonly fields: string[] = [];

  emit(raw: string): void {
    this.fields.push(raw);
  }
}

// ─── RowWriter ────────────────────────────────────────────────────────────────

/**
 * Usage:
 *   const writer = RowWriter.toMemory(Animal);
 *   for (const animal of zoo) writer.encode(animal);
 *   writer.toString(); // 'count,animal,…\n7,penguin,…\n'
 */
export class RowWriter<T> {
  private readonly layout: FieldLayout;
  private headerWritten = false;
  private closed        = false;
  private _rowsWritten  = 0;

  constructor(private readonly sink: RowSink, private readonly shape: Shape<T>) {
    this.layout = extractFieldLayout(shape);
  }

  /** Buffers everything in memory; read it back with toString(). */
  static toMemory<T>(shape: Shape<T>, options?: CsvOptions): RowWriter<T> {
    return new RowWriter(CsvSink.memory(options), shape);
  }

  /** Creates or truncates the file at `path`. */
  static toFile<T>(path: string, shape: Shape<T>, options?: CsvOptions): RowWriter<T> {
    return new RowWriter(CsvSink.file(path, options), shape);
  }

  static toSink<T>(sink: RowSink, shape: Shape<T>): RowWriter<T> {
    return new RowWriter(sink, shape);
  }

  fieldNames(): FieldNameList {
    return this.layout.names;
  }

  /** Data records written so far, not counting the header. */
  get rowsWritten(): number {
    return this._rowsWritten;
  }

  /**
   * @throws LeafEncodeError  a leaf value could not be rendered
   * @throws CodecError       the sink failed
   */
  encode(record: T): void {
    if (this.closed) throw new Error('RowWriter: cannot encode after close().');

    const row = this.render(record);
    if (!this.headerWritten) {
      this.write(this.layout.names);
      this.headerWritten = true;
    }
    this.write(row);
    this._rowsWritten++;
  }

  /** Encodes every record of `records` in order. */
  encodeAll(records: Iterable<T>): void {
    for (const record of records) this.encode(record);
  }

  flush(): void {
    this.guard(() => this.sink.flush());
  }

  /**
   * Flushes and releases the sink. The sink is released even when the flush
   * fails. Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.guard(() => {
      try {
        this.sink.flush();
      } finally {
        this.sink.close?.();
      }
    });
  }

  /** The output so far, for writers created with toMemory(). */
  toString(): string {
    if (this.sink instanceof CsvSink && this.sink.inMemory) return this.sink.contents();
    throw new TypeError('RowWriter: toString() is only available on in-memory writers.');
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private render(record: T): string[] {
    const builder = new RowBuilder();
    try {
      this.shape.write(record, builder, '');
    } catch (e) {
      if (e instanceof LeafError) throw new LeafEncodeError(this.shape.name, e.path, e.reason);
      throw e;
    }
    return builder.fields;
  }

  private write(fields: readonly string[]): void {
    // An empty record would read back as a blank line.
    const row = fields.length === 0 ? [''] : fields;
    this.guard(() => this.sink.writeRow(row));
  }

  private guard(action: () => void): void {
    try {
      action();
    } catch (e) {
      throw e instanceof RowShapeError ? e : new CodecError(e);
    }
  }
}

/**
 * Runs `fn` with `writer` and closes it afterwards, whether `fn` returns or
 * throws. If close() also fails after `fn` threw, both errors are raised
 * together in an AggregateError.
 */
export function withRowWriter<T, R>(writer: RowWriter<T>, fn: (writer: RowWriter<T>) => R): R {
  let result: R;
  try {
    result = fn(writer);
  } catch (e) {
    try {
      writer.close();
    } catch (closeError) {
      throw new AggregateError([e, closeError], 'RowWriter: callback failed and close() failed');
    }
    throw e;
  }
  writer.close();
  return result;
}
