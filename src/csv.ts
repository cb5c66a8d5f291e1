/**
 * rowshape — CSV codec adapters
 *
 * CsvSource and CsvSink put csv-parse and csv-stringify behind the RowSource
 * and RowSink contracts. Everything here is pass-through configuration:
 * delimiters, quoting and record terminators never reach the engine.
 *
 * Reading parses the whole input on the first request and then hands out
 * one field at a time. Blank lines are skipped. A parse failure is reported
 * by readHeaderRow() (thrown) or readNextField() (an `error` event).
 *
 * Writing renders each row immediately and buffers the text until flush().
 * A row made of a single empty field is written as `""` so that a reader
 * does not mistake it for a blank line.
 */

import { closeSync, openSync, readFileSync, writeSync } from 'node:fs';
import type { Options as ParseOptions } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import type { Options as StringifyOptions } from 'csv-stringify';
import { stringify } from 'csv-stringify/sync';
import type { HeaderRow, NextField, RowSink, RowSource } from './types';

export interface CsvOptions {
  /** Field delimiter. Default ','. */
  delimiter?:       string;
  /** Quote character, or false to disable quoting. Default '"'. */
  quote?:           string | false;
  /** Escape for quotes inside quoted fields. Default: doubling the quote. */
  escape?:          string;
  /**
   * Record terminator. When reading, \n, \r\n and \r are all recognised by
   * default, and may be mixed within one input; when writing the default is \n.
   */
  recordDelimiter?: string;
  /**
   * ASCII delimited text: unit separator (\x1f) between fields, record
   * separator (\x1e) between records, no quoting. Overrides the options above.
   */
  ascii?:           boolean;
}

interface ResolvedCsvOptions {
  readonly delimiter:        string;
  readonly quote:            string | false;
  readonly escape?:          string;
  readonly recordDelimiter?: string;
}

function resolveCsvOptions(options: CsvOptions): ResolvedCsvOptions {
  if (options.ascii === true) {
    return { delimiter: '\x1f', quote: false, recordDelimiter: '\x1e' };
  }
  return {
    delimiter:       options.delimiter ?? ',',
    quote:           options.quote ?? '"',
    escape:          options.escape,
    recordDelimiter: options.recordDelimiter,
  };
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

function isRows(value: unknown): value is string[][] {
  return Array.isArray(value)
    && value.every(row => Array.isArray(row) && row.every(field => typeof field === 'string'));
}

// ─── CsvSource ────────────────────────────────────────────────────────────────

const END_OF_RECORD: NextField = Object.freeze({ kind: 'end-of-record' });
const END_OF_INPUT:  NextField = Object.freeze({ kind: 'end-of-input' });

export class CsvSource implements RowSource {
  private readonly parseOptions: ParseOptions;
  private rows:    string[][] | null = null;
  private failure: Error | null = null;
  /** Index into rows of the record being read; row 0 is the header. */
  private record = 1;
  private column = 0;

  constructor(private readonly input: string | Buffer, options: CsvOptions = {}) {
    const resolved = resolveCsvOptions(options);
    const parseOptions: ParseOptions = {
      bom:                true,
      skip_empty_lines:   true,
      relax_column_count: true,
      delimiter:          resolved.delimiter,
      quote:              resolved.quote,
    };
    if (resolved.escape !== undefined) parseOptions.escape = resolved.escape;
    // Each record may end with any of the three; CRLF must be tried before CR.
    parseOptions.record_delimiter = resolved.recordDelimiter ?? ['\r\n', '\n', '\r'];
    this.parseOptions = parseOptions;
  }

  static fromFile(path: string, options?: CsvOptions): CsvSource {
    return new CsvSource(readFileSync(path), options);
  }

  readHeaderRow(): HeaderRow | null {
    return this.load()[0] ?? null;
  }

  readNextField(): NextField {
    let rows: string[][];
    try {
      rows = this.load();
    } catch (e) {
      return { kind: 'error', error: toError(e) };
    }

    const record = rows[this.record];
    if (record === undefined) return END_OF_INPUT;

    const value = record[this.column];
    if (value === undefined) {
      this.record++;
      this.column = 0;
      return END_OF_RECORD;
    }
    this.column++;
    return { kind: 'field', value };
  }

  private load(): string[][] {
    if (this.failure !== null) throw this.failure;
    if (this.rows !== null) return this.rows;
    try {
      const parsed: unknown = parse(this.input, this.parseOptions);
      if (!isRows(parsed)) throw new TypeError('csv-parse returned records that are not string arrays');
      this.rows = parsed;
      return parsed;
    } catch (e) {
      this.failure = toError(e);
      throw this.failure;
    }
  }
}

// ─── CsvSink ──────────────────────────────────────────────────────────────────

/** File sinks hand their buffer to the file once it grows past this size. */
const FILE_BUFFER_BYTES = 64 * 1024;

export class CsvSink implements RowSink {
  private readonly stringifyOptions: StringifyOptions;
  /** Text for a record holding one empty field. */
  private readonly emptyRecord: string;
  private pending = '';
  private flushed = '';
  private closed  = false;

  private constructor(private readonly fd: number | null, options: CsvOptions) {
    const resolved        = resolveCsvOptions(options);
    const recordDelimiter = resolved.recordDelimiter ?? '\n';
    const stringifyOptions: StringifyOptions = {
      delimiter:        resolved.delimiter,
      quote:            resolved.quote,
      record_delimiter: recordDelimiter,
      eof:              true,
    };
    if (resolved.escape !== undefined) stringifyOptions.escape = resolved.escape;
    this.stringifyOptions = stringifyOptions;
    this.emptyRecord = resolved.quote === false
      ? recordDelimiter
      : resolved.quote + resolved.quote + recordDelimiter;
  }

  /** Accumulates output in memory; read it back with contents(). */
  static memory(options: CsvOptions = {}): CsvSink {
    return new CsvSink(null, options);
  }

  /** Creates or truncates the file at `path`. */
  static file(path: string, options: CsvOptions = {}): CsvSink {
    return new CsvSink(openSync(path, 'w'), options);
  }

  writeRow(fields: readonly string[]): void {
    if (this.closed) throw new Error('CsvSink: cannot write after close().');
    this.pending += fields.length === 1 && fields[0] === ''
      ? this.emptyRecord
      : stringify([fields], this.stringifyOptions);
    if (this.fd !== null && this.pending.length >= FILE_BUFFER_BYTES) this.flush();
  }

  flush(): void {
    if (this.pending === '') return;
    if (this.fd !== null) {
      const bytes = Buffer.from(this.pending, 'utf8');
      let written = 0;
      // writeSync may accept only part of the buffer.
      while (written < bytes.length) {
        written += writeSync(this.fd, bytes, written, bytes.length - written);
      }
    } else {
      this.flushed += this.pending;
    }
    this.pending = '';
  }

  /** Flushes and releases the file. The descriptor is closed even if the flush fails. */
  close(): void {
    if (this.closed) return;
    try {
      this.flush();
    } finally {
      this.closed = true;
      if (this.fd !== null) closeSync(this.fd);
    }
  }

  get inMemory(): boolean {
    return this.fd === null;
  }

  /** Everything written to a memory sink so far, flushed or not. */
  contents(): string {
    if (this.fd !== null) throw new TypeError('CsvSink: contents() is only available on memory sinks.');
    return this.flushed + this.pending;
  }
}
