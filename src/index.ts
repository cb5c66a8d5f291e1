// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  Result,
  FieldNameList,
  HeaderRow,
  ColumnMapping,
  HeaderPredicate,
  HeaderPolicy,
  HeaderOptions,
  NextField,
  RowSource,
  RowSink,
  SessionStatus,
} from './types';

export { ok, err } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  RowShapeError,
  HeaderMismatchError,
  HeaderCountMismatchError,
  HeaderNameMismatchError,
  ExtraDataColumnsError,
  LeafDecodeError,
  LeafEncodeError,
  CodecError,
} from './errors';

// ─── Shapes ───────────────────────────────────────────────────────────────────
export {
  Shape,
  LeafShape,
  OptionalShape,
  NewtypeShape,
  ChoiceShape,
  StructShape,
  TupleShape,
  ArrayShape,
  FieldCursor,
  FieldFailure,
  LeafError,
  placeholderName,
  struct,
  tuple,
  array,
  optional,
  newtype,
  choice,
} from './shape';

export type {
  ShapeKind,
  Infer,
  NameVisitor,
  DecodeVisitor,
  EncodeVisitor,
  Variants,
  ChoiceValue,
  FieldShapes,
  StructValue,
  TupleValue,
} from './shape';

export { ScalarShape, int, uint, float, bool, char, string } from './scalars';
export type { ScalarKind } from './scalars';

// ─── Field names ──────────────────────────────────────────────────────────────
export { extractFieldNames, extractFieldLayout } from './field-names';
export type { FieldLayout } from './field-names';

// ─── Column mapping ───────────────────────────────────────────────────────────
export {
  mapColumns,
  resolvePolicy,
  exactMatch,
  asciiCaseInsensitive,
  DEFAULT_POLICY,
} from './mapping';

// ─── CSV codec ────────────────────────────────────────────────────────────────
export { CsvSource, CsvSink } from './csv';
export type { CsvOptions } from './csv';

// ─── Reader ───────────────────────────────────────────────────────────────────
export { RowReader, DecodedRows, decodeRows } from './reader';

// ─── Writer ───────────────────────────────────────────────────────────────────
export { RowWriter, withRowWriter } from './writer';
