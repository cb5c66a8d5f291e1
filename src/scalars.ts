/**
 * rowshape — scalar leaves
 *
 * Text forms accepted on decode:
 *
 *   int     [+-]?digits, within Number.MAX_SAFE_INTEGER
 *   uint    +?digits, within Number.MAX_SAFE_INTEGER
 *   float   decimal or exponent notation; inf, infinity, nan (any case, signed)
 *   bool    true | false
 *   char    exactly one Unicode code point
 *   string  anything, including the empty field
 *
 * No whitespace is trimmed. Encoding renders integers and finite floats with
 * String(); non-finite floats render as NaN, inf and -inf.
 */

import { FieldFailure, LeafShape } from './shape';

export type ScalarKind = 'int' | 'uint' | 'float' | 'bool' | 'char' | 'string';

interface ScalarCodec<T> {
  readonly kind: ScalarKind;
  is(value: unknown): value is T;
  parse(raw: string): T;
  render(value: T): string;
}

export class ScalarShape<T> extends LeafShape<T> {
  readonly kind: ScalarKind;
  readonly name: string;

  constructor(private readonly codec: ScalarCodec<T>) {
    super();
    this.kind = codec.kind;
    this.name = codec.kind;
  }

  is(value: unknown): value is T {
    return this.codec.is(value);
  }

  parse(raw: string): T {
    return this.codec.parse(raw);
  }

  render(value: T): string {
    return this.codec.render(value);
  }
}

// ─── Codecs ───────────────────────────────────────────────────────────────────

const INT_TEXT     = /^[+-]?\d+$/;
const UINT_TEXT    = /^\+?\d+$/;
const FLOAT_TEXT   = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

function cannotParse(raw: string, kind: ScalarKind): FieldFailure {
  return new FieldFailure(`cannot parse "${raw}" as ${kind}`);
}

function cannotRender(value: unknown, kind: ScalarKind): FieldFailure {
  const shown = typeof value === 'string' ? `"${value}"` : String(value);
  return new FieldFailure(`cannot render ${shown} (${typeof value}) as ${kind}`);
}

function parseInteger(raw: string, pattern: RegExp, kind: ScalarKind): number {
  if (!pattern.test(raw)) throw cannotParse(raw, kind);
  const n = Number(raw);
  if (!Number.isSafeInteger(n)) {
    throw new FieldFailure(`"${raw}" is outside the safe integer range of ${kind}`);
  }
  return n === 0 ? 0 : n; // -0
}

const INT: ScalarCodec<number> = {
  kind: 'int',
  is: (value): value is number => Number.isSafeInteger(value),
  parse: raw => parseInteger(raw, INT_TEXT, 'int'),
  render(value) {
    if (!Number.isSafeInteger(value)) throw cannotRender(value, 'int');
    return String(value);
  },
};

const UINT: ScalarCodec<number> = {
  kind: 'uint',
  is: (value): value is number => typeof value === 'number' && Number.isSafeInteger(value) && value >= 0,
  parse: raw => parseInteger(raw, UINT_TEXT, 'uint'),
  render(value) {
    if (!Number.isSafeInteger(value) || value < 0) throw cannotRender(value, 'uint');
    return String(value);
  },
};

const FLOAT: ScalarCodec<number> = {
  kind: 'float',
  is: (value): value is number => typeof value === 'number',
  parse(raw) {
    if (FLOAT_TEXT.test(raw)) return Number(raw);
    const special = FLOAT_SPECIAL.exec(raw);
    if (special === null) throw cannotParse(raw, 'float');
    const [, sign, word] = special;
    if (word?.toLowerCase() === 'nan') return NaN;
    return sign === '-' ? -Infinity : Infinity;
  },
  render(value) {
    if (typeof value !== 'number') throw cannotRender(value, 'float');
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity)  return 'inf';
    if (value === -Infinity) return '-inf';
    return String(value);
  },
};

const BOOL: ScalarCodec<boolean> = {
  kind: 'bool',
  is: (value): value is boolean => typeof value === 'boolean',
  parse(raw) {
    if (raw === 'true')  return true;
    if (raw === 'false') return false;
    throw cannotParse(raw, 'bool');
  },
  render(value) {
    if (typeof value !== 'boolean') throw cannotRender(value, 'bool');
    return value ? 'true' : 'false';
  },
};

function isSingleCodePoint(value: unknown): value is string {
  return typeof value === 'string' && [...value].length === 1;
}

const CHAR: ScalarCodec<string> = {
  kind: 'char',
  is: isSingleCodePoint,
  parse(raw) {
    if (!isSingleCodePoint(raw)) throw cannotParse(raw, 'char');
    return raw;
  },
  render(value) {
    if (!isSingleCodePoint(value)) throw cannotRender(value, 'char');
    return value;
  },
};

const STRING: ScalarCodec<string> = {
  kind: 'string',
  is: (value): value is string => typeof value === 'string',
  parse: raw => raw,
  render(value) {
    if (typeof value !== 'string') throw cannotRender(value, 'string');
    return value;
  },
};

// ─── Builders ─────────────────────────────────────────────────────────────────

// Shapes are immutable, so one instance per scalar kind is shared.
const INT_SHAPE    = new ScalarShape(INT);
const UINT_SHAPE   = new ScalarShape(UINT);
const FLOAT_SHAPE  = new ScalarShape(FLOAT);
const BOOL_SHAPE   = new ScalarShape(BOOL);
const CHAR_SHAPE   = new ScalarShape(CHAR);
const STRING_SHAPE = new ScalarShape(STRING);

export function int(): ScalarShape<number> {
  return INT_SHAPE;
}

export function uint(): ScalarShape<number> {
  return UINT_SHAPE;
}

export function float(): ScalarShape<number> {
  return FLOAT_SHAPE;
}

export function bool(): ScalarShape<boolean> {
  return BOOL_SHAPE;
}

export function char(): ScalarShape<string> {
  return CHAR_SHAPE;
}

export function string(): ScalarShape<string> {
  return STRING_SHAPE;
}
