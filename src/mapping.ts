/**
 * rowshape — header ⇄ field reconciliation
 *
 * mapColumns() is pure. It decides, once per session, which column feeds
 * which field. Four policies, chosen by two flags:
 *
 *   strict            counts equal; header i must match field i
 *   reorder           counts equal; each field, in declaration order, takes
 *                     the first unused header that matches it
 *   ignore unused     headers ≥ fields; each field takes the earliest
 *                     matching header at or after the previous match
 *   reorder + ignore  as reorder, with leftover headers left unmapped
 *
 * The reorder search is greedy, not a globally optimal matching. Because it
 * always takes the first available header, duplicate names pair up in order
 * on both sides: the first `a` field gets the first `a` header, and so on.
 */

import { HeaderCountMismatchError, HeaderNameMismatchError, type HeaderMismatchError } from './errors';
import {
  err,
  ok,
  type ColumnMapping,
  type FieldNameList,
  type HeaderOptions,
  type HeaderPolicy,
  type HeaderPredicate,
  type HeaderRow,
  type Result,
} from './types';

// ─── Predicates ───────────────────────────────────────────────────────────────

export const exactMatch: HeaderPredicate = (header, fieldName) => header === fieldName;

/** Equal after folding A–Z to a–z. Other characters compare exactly. */
export const asciiCaseInsensitive: HeaderPredicate = (header, fieldName) =>
  header.length === fieldName.length && foldAscii(header) === foldAscii(fieldName);

function foldAscii(s: string): string {
  return s.replace(/[A-Z]/g, c => String.fromCharCode(c.charCodeAt(0) + 32));
}

// ─── Policy ───────────────────────────────────────────────────────────────────

export const DEFAULT_POLICY: HeaderPolicy = Object.freeze({
  reorderColumns:      false,
  ignoreUnusedColumns: false,
  headerEquals:        exactMatch,
});

export function resolvePolicy(options: HeaderOptions = {}): HeaderPolicy {
  const headerEquals = options.headerEquals
    ?? (options.ignoreAsciiCase === true ? asciiCaseInsensitive : exactMatch);
  return Object.freeze({
    reorderColumns:      options.reorderColumns ?? false,
    ignoreUnusedColumns: options.ignoreUnusedColumns ?? false,
    headerEquals,
  });
}

// ─── mapColumns ───────────────────────────────────────────────────────────────

export function mapColumns(
  headers:    HeaderRow,
  fieldNames: FieldNameList,
  policy:     HeaderPolicy = DEFAULT_POLICY,
): Result<ColumnMapping, HeaderMismatchError> {
  const countOk = policy.ignoreUnusedColumns
    ? headers.length >= fieldNames.length
    : headers.length === fieldNames.length;

  if (!countOk) {
    return err(new HeaderCountMismatchError(
      fieldNames.length,
      headers.length,
      headers.length > fieldNames.length && !policy.ignoreUnusedColumns
        ? 'Enable ignoreUnusedColumns to skip headers that match no field.'
        : undefined,
    ));
  }

  if (policy.reorderColumns) return matchAnyOrder(headers, fieldNames, policy.headerEquals);
  if (policy.ignoreUnusedColumns) return matchInOrder(headers, fieldNames, policy.headerEquals);
  return matchPositionally(headers, fieldNames, policy.headerEquals);
}

function matchPositionally(
  headers:    HeaderRow,
  fieldNames: FieldNameList,
  equals:     HeaderPredicate,
): Result<ColumnMapping, HeaderMismatchError> {
  for (let i = 0; i < headers.length; i++) {
    const header = headers[i] ?? '';
    const field  = fieldNames[i] ?? '';
    if (!equals(header, field)) {
      return err(new HeaderNameMismatchError(
        `column ${i}: header "${header}" vs field "${field}"`,
        'Enable reorderColumns if the columns may appear in any order.',
      ));
    }
  }
  return ok(headers.map((_, i) => i));
}

function matchInOrder(
  headers:    HeaderRow,
  fieldNames: FieldNameList,
  equals:     HeaderPredicate,
): Result<ColumnMapping, HeaderMismatchError> {
  const mapping: (number | null)[] = headers.map(() => null);
  let cursor = 0;

  for (let field = 0; field < fieldNames.length; field++) {
    const name = fieldNames[field] ?? '';
    let column = cursor;
    while (column < headers.length && !equals(headers[column] ?? '', name)) column++;

    if (column === headers.length) {
      return err(new HeaderNameMismatchError(
        `no header at or after column ${cursor} matches field "${name}"`,
      ));
    }
    mapping[column] = field;
    cursor = column + 1;
  }
  return ok(mapping);
}

function matchAnyOrder(
  headers:    HeaderRow,
  fieldNames: FieldNameList,
  equals:     HeaderPredicate,
): Result<ColumnMapping, HeaderMismatchError> {
  const mapping: (number | null)[] = headers.map(() => null);

  for (let field = 0; field < fieldNames.length; field++) {
    const name   = fieldNames[field] ?? '';
    const column = headers.findIndex((header, i) => mapping[i] === null && equals(header, name));

    if (column === -1) {
      return err(new HeaderNameMismatchError(`no unused header matches field "${name}"`));
    }
    mapping[column] = field;
  }
  return ok(mapping);
}
