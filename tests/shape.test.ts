/**
 * rowshape — shape construction and traversal
 *
 * Exercises the decode and encode visitors directly, without a codec:
 * FieldCursor feeds raw fields in leaf order and a collecting EncodeVisitor
 * captures what write() emits.
 */

import { describe, it, expect } from 'vitest';
import {
  array,
  bool,
  choice,
  FieldCursor,
  int,
  LeafError,
  newtype,
  optional,
  string,
  struct,
  tuple,
  uint,
} from '../src/index';
import type { Infer, Shape } from '../src/index';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function decode<T>(shape: Shape<T>, fields: string[]): T {
  return shape.read(new FieldCursor(fields), '');
}

function encode<T>(shape: Shape<T>, value: T): string[] {
  const out: string[] = [];
  shape.write(value, { emit: raw => { out.push(raw); } }, '');
  return out;
}

function leafErrorOf(fn: () => unknown): LeafError {
  try {
    fn();
  } catch (e) {
    if (e instanceof LeafError) return e;
    throw e;
  }
  throw new Error('expected a LeafError');
}

const Pair = struct('Pair', { a: int(), b: int() });

// ─── Construction ─────────────────────────────────────────────────────────────

describe('struct construction', () => {
  it('counts one column per field and marks the shape as named', () => {
    const S = struct('S', { x: int(), y: string(), z: optional(bool()) });
    expect(S.columns).toBe(3);
    expect(S.named).toBe(true);
    expect(S.name).toBe('S');
  });

  it('rejects a field that is itself a struct', () => {
    expect(() => struct('Outer', { p: Pair })).toThrow(TypeError);
  });

  it('rejects a field wider than one column', () => {
    expect(() => struct('S', { q: tuple(int(), int()) })).toThrow(
      "struct S: field 'q' must occupy exactly one column without nested struct fields; " +
      '(int, int) occupies 2. Put records side by side in a tuple instead.',
    );
  });

  it('accepts a one-element array as a field', () => {
    const S = struct('S', { a: array(uint(), 1) });
    expect(S.columns).toBe(1);
    expect(decode(S, ['4'])).toEqual({ a: [4] });
  });

  it('rejects an array-index field name', () => {
    expect(() => struct('S', { a: int(), '1': int() })).toThrow(TypeError);
  });

  it('rejects __proto__ as a field name', () => {
    expect(() => struct('S', { a: int(), ['__proto__']: int() })).toThrow(
      "struct S: '__proto__' cannot be used as a field name.",
    );
  });

  it('rejects nested optionals', () => {
    expect(() => optional(optional(int()))).toThrow(TypeError);
  });

  it('rejects a choice without variants', () => {
    expect(() => choice('Empty', {})).toThrow('choice Empty: at least one variant is required.');
  });

  it('rejects an array of negative length', () => {
    expect(() => array(int(), -1)).toThrow(TypeError);
  });
});

describe('composite names and widths', () => {
  it('tuple sums the widths of its elements', () => {
    const T = tuple(Pair, int(), Pair);
    expect(T.columns).toBe(5);
    expect(T.named).toBe(true);
    expect(T.name).toBe('(Pair, int, Pair)');
  });

  it('array multiplies the element width', () => {
    const A = array(Pair, 3);
    expect(A.columns).toBe(6);
    expect(A.name).toBe('Pair[3]');
  });

  it('optional appends a question mark to the inner name', () => {
    expect(optional(string()).name).toBe('string?');
  });
});

// ─── Decode ───────────────────────────────────────────────────────────────────

describe('decode', () => {
  it('assembles a struct in declaration order', () => {
    const S = struct('S', { id: uint(), label: string(), ok: bool() });
    const value: Infer<typeof S> = decode(S, ['12', 'north', 'true']);
    expect(value).toEqual({ id: 12, label: 'north', ok: true });
  });

  it('assembles a tuple of structs', () => {
    expect(decode(tuple(Pair, Pair), ['0', '1', '2', '3'])).toEqual([
      { a: 0, b: 1 },
      { a: 2, b: 3 },
    ]);
  });

  it('assembles nested tuples', () => {
    const T = tuple(Pair, tuple(Pair, tuple(Pair)));
    expect(decode(T, ['1', '2', '3', '4', '5', '6'])).toEqual([
      { a: 1, b: 2 },
      [{ a: 3, b: 4 }, [{ a: 5, b: 6 }]],
    ]);
  });

  it('reads an empty field once the row runs out', () => {
    const S = struct('S', { a: string(), b: string() });
    expect(decode(S, ['only'])).toEqual({ a: 'only', b: '' });
  });

  it('tags a leaf failure with its struct path', () => {
    const error = leafErrorOf(() => decode(Pair, ['1', 'x']));
    expect(error.path).toBe('b');
    expect(error.reason).toBe('cannot parse "x" as int');
    expect(error.message).toBe('b: cannot parse "x" as int');
  });

  it('tags a leaf failure inside a tuple with its position', () => {
    const error = leafErrorOf(() => decode(tuple(Pair, Pair), ['1', '2', '3', 'z']));
    expect(error.path).toBe('[1].b');
  });
});

describe('optional', () => {
  const O = optional(int());

  it('reads an empty field as null', () => {
    expect(O.parse('')).toBeNull();
  });

  it('parses a present value with the inner leaf', () => {
    expect(O.parse('7')).toBe(7);
  });

  it('reads a malformed value as null', () => {
    expect(O.parse('seven')).toBeNull();
  });

  it('renders null as an empty field', () => {
    expect(O.render(null)).toBe('');
    expect(O.render(3)).toBe('3');
  });
});

describe('newtype', () => {
  const Count = newtype('Count', uint());

  it('reads and writes through its inner leaf', () => {
    expect(Count.parse('10')).toBe(10);
    expect(Count.render(10)).toBe('10');
    expect(Count.name).toBe('Count');
    expect(Count.columns).toBe(1);
  });
});

describe('choice', () => {
  const Group = choice('Group', { Bird: null, Mammal: null });
  const Amount = choice('Amount', { None: null, Count: int(), Label: string() });

  it('selects a unit variant by name', () => {
    expect(Group.parse('Mammal')).toEqual({ tag: 'Mammal' });
  });

  it('reports the variants when nothing matches', () => {
    expect(() => Group.parse('Fish')).toThrow('"Fish" does not match any variant of Group (Bird, Mammal)');
  });

  it('prefers a unit variant over payload variants', () => {
    expect(Amount.parse('None')).toEqual({ tag: 'None' });
  });

  it('tries payload variants in declaration order', () => {
    expect(Amount.parse('12')).toEqual({ tag: 'Count', value: 12 });
    expect(Amount.parse('twelve')).toEqual({ tag: 'Label', value: 'twelve' });
  });

  it('renders unit variants as their name and payload variants as the payload', () => {
    expect(Amount.render({ tag: 'None' })).toBe('None');
    expect(Amount.render({ tag: 'Count', value: 3 })).toBe('3');
    expect(Amount.render({ tag: 'Label', value: 'lots' })).toBe('lots');
  });

  it('lists its tags in declaration order', () => {
    expect(Amount.tags).toEqual(['None', 'Count', 'Label']);
  });
});

// ─── Encode ───────────────────────────────────────────────────────────────────

describe('encode', () => {
  it('emits one field per leaf in declaration order', () => {
    const S = struct('S', { id: uint(), note: optional(string()), ok: bool() });
    expect(encode(S, { id: 5, note: null, ok: false })).toEqual(['5', '', 'false']);
  });

  it('flattens tuples and arrays of structs', () => {
    expect(encode(tuple(Pair, Pair), [{ a: 0, b: 1 }, { a: 2, b: 3 }])).toEqual(['0', '1', '2', '3']);
    expect(encode(array(Pair, 2), [{ a: 4, b: 5 }, { a: 6, b: 7 }])).toEqual(['4', '5', '6', '7']);
  });

  it('rejects an array of the wrong length', () => {
    const error = leafErrorOf(() => encode(array(Pair, 2), [{ a: 4, b: 5 }]));
    expect(error.reason).toBe('expected exactly 2 element(s) for Pair[2], got array(1)');
  });

  it('tags a render failure with its path', () => {
    const error = leafErrorOf(() => encode(tuple(int(), Pair), [1, { a: 2, b: 2.5 }]));
    expect(error.path).toBe('[1].b');
    expect(error.reason).toBe('cannot render 2.5 (number) as int');
  });
});

// ─── Runtime checks ───────────────────────────────────────────────────────────

describe('is()', () => {
  it('checks struct values field by field', () => {
    expect(Pair.is({ a: 1, b: 2 })).toBe(true);
    expect(Pair.is({ a: 1, b: '2' })).toBe(false);
    expect(Pair.is([1, 2])).toBe(false);
  });

  it('checks tuple length', () => {
    const T = tuple(int(), string());
    expect(T.is([1, 'x'])).toBe(true);
    expect(T.is([1])).toBe(false);
  });
});
