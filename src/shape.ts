/**
 * rowshape — record shapes and the traversal protocol
 *
 * A shape is an immutable descriptor of one record type. It is built once,
 * with the builders below, and drives three kinds of visitor:
 *
 *   names    visitNames() announces struct fields and leaves in
 *            declaration order, without any instance
 *   decode   read() pulls one raw field per leaf and assembles a value
 *   encode   write() emits one raw field per leaf
 *
 * Internal nodes are struct (named children), tuple (anonymous children) and
 * array (fixed-length homogeneous tuple). Leaves occupy exactly one column:
 * scalars, optional leaves, newtypes and choices.
 *
 * A struct field must occupy exactly one column and contain no struct of its
 * own; otherwise the row would carry more names than a header can hold.
 *
 * Usage:
 *   const Animal = struct('Animal', {
 *     count:  uint(),
 *     animal: string(),
 *     note:   optional(string()),
 *   });
 *   type Animal = Infer<typeof Animal>;
 */

// ─── Visitors ─────────────────────────────────────────────────────────────────

export interface NameVisitor {
  /** A struct field begins. The child's leaves follow immediately. */
  field(name: string, position: number): void;
  /** One column. */
  leaf(): void;
}

export interface DecodeVisitor {
  /** The next raw field of the row, in leaf order. */
  nextField(): string;
}

export interface EncodeVisitor {
  emit(raw: string): void;
}

/** DecodeVisitor over an already reordered row. Yields '' past the end. */
export class FieldCursor implements DecodeVisitor {
  private position = 0;

  constructor(private readonly fields: readonly string[]) {}

  nextField(): string {
    const field = this.fields[this.position];
    this.position++;
    return field ?? '';
  }
}

// ─── Failures ─────────────────────────────────────────────────────────────────

/** A leaf could not parse or render a value. Carries no location. */
export class FieldFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FieldFailure';
  }
}

/** A failure tagged with the path of the leaf that raised it. */
export class LeafError extends Error {
  constructor(readonly path: string, readonly reason: string) {
    super(path === '' ? reason : `${path}: ${reason}`);
    this.name = 'LeafError';
  }
}

export function joinPath(path: string, key: string): string {
  return path === '' ? key : `${path}.${key}`;
}

/**
 * Name a positional field receives when a tuple-like record is walked as a
 * struct. Struct fields carrying exactly this name are treated as anonymous,
 * so real struct fields must not be named `_field0`, `_field1`, …
 */
export function placeholderName(position: number): string {
  return `_field${position}`;
}

export function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isList(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return `array(${value.length})`;
  return typeof value;
}

// ─── Shape ────────────────────────────────────────────────────────────────────

export type ShapeKind =
  | 'int'
  | 'uint'
  | 'float'
  | 'bool'
  | 'char'
  | 'string'
  | 'optional'
  | 'newtype'
  | 'choice'
  | 'struct'
  | 'tuple'
  | 'array';

export abstract class Shape<T> {
  abstract readonly kind: ShapeKind;
  /** Type name used in error messages. */
  abstract readonly name: string;
  /** Number of raw fields one value occupies. */
  abstract readonly columns: number;
  /** True when the shape declares struct fields at any depth. */
  abstract readonly named: boolean;

  /** Structural runtime check of a value against this shape. */
  abstract is(value: unknown): value is T;
  abstract visitNames(visitor: NameVisitor): void;
  /** @throws LeafError */
  abstract read(visitor: DecodeVisitor, path: string): T;
  /** @throws LeafError */
  abstract write(value: T, visitor: EncodeVisitor, path: string): void;
}

/** The TypeScript value type a shape decodes to. */
export type Infer<S> = S extends Shape<infer T> ? T : never;

// ─── Leaves ───────────────────────────────────────────────────────────────────

export abstract class LeafShape<T> extends Shape<T> {
  readonly columns = 1;
  readonly named   = false;

  /** @throws FieldFailure on malformed input */
  abstract parse(raw: string): T;
  /** @throws FieldFailure when the value cannot be rendered */
  abstract render(value: T): string;

  visitNames(visitor: NameVisitor): void {
    visitor.leaf();
  }

  read(visitor: DecodeVisitor, path: string): T {
    const raw = visitor.nextField();
    try {
      return this.parse(raw);
    } catch (e) {
      throw e instanceof FieldFailure ? new LeafError(path, e.message) : e;
    }
  }

  write(value: T, visitor: EncodeVisitor, path: string): void {
    let raw: string;
    try {
      raw = this.render(value);
    } catch (e) {
      throw e instanceof FieldFailure ? new LeafError(path, e.message) : e;
    }
    visitor.emit(raw);
  }
}

/**
 * An empty field decodes to null. A non-empty field is parsed by the inner
 * leaf; if that fails the value is null as well, so malformed optional data
 * reads as absent rather than raising an error.
 */
export class OptionalShape<T> extends LeafShape<T | null> {
  readonly kind = 'optional';
  readonly name: string;

  constructor(readonly inner: LeafShape<T>) {
    super();
    if (inner.kind === 'optional') {
      throw new TypeError(
        `optional: ${inner.name} is already optional; ` +
        `nested optionals cannot be told apart in a single column.`,
      );
    }
    this.name = `${inner.name}?`;
  }

  is(value: unknown): value is T | null {
    return value === null || this.inner.is(value);
  }

  visitNames(visitor: NameVisitor): void {
    this.inner.visitNames(visitor);
  }

  parse(raw: string): T | null {
    if (raw === '') return null;
    try {
      return this.inner.parse(raw);
    } catch (e) {
      if (e instanceof FieldFailure) return null;
      throw e;
    }
  }

  render(value: T | null): string {
    if (value === null || value === undefined) return '';
    return this.inner.render(value);
  }
}

/** A single-field tuple struct: one column, walked under a placeholder name. */
export class NewtypeShape<T> extends LeafShape<T> {
  readonly kind = 'newtype';

  constructor(readonly name: string, readonly inner: LeafShape<T>) {
    super();
  }

  is(value: unknown): value is T {
    return this.inner.is(value);
  }

  visitNames(visitor: NameVisitor): void {
    visitor.field(placeholderName(0), 0);
    this.inner.visitNames(visitor);
  }

  parse(raw: string): T {
    return this.inner.parse(raw);
  }

  render(value: T): string {
    return this.inner.render(value);
  }
}

export type Variants = { readonly [tag: string]: LeafShape<unknown> | null };

/** `{ tag }` for unit variants, `{ tag, value }` for variants with a payload. */
export type ChoiceValue<V extends Variants> = {
  [K in keyof V & string]: V[K] extends LeafShape<infer P>
    ? { readonly tag: K; readonly value: P }
    : { readonly tag: K };
}[keyof V & string];

/**
 * A tagged union whose variants carry zero or one leaf payload.
 *
 * Decoding: a field equal to the name of a unit variant selects it. Otherwise
 * payload variants are tried in declaration order and the first whose payload
 * parses wins. Encoding: unit variants render as their name, payload variants
 * as their payload.
 */
export class ChoiceShape<V extends Variants> extends LeafShape<ChoiceValue<V>> {
  readonly kind = 'choice';
  private readonly variants: ReadonlyMap<string, LeafShape<unknown> | null>;

  constructor(readonly name: string, variants: V) {
    super();
    const entries = Object.entries(variants);
    if (entries.length === 0) {
      throw new TypeError(`choice ${name}: at least one variant is required.`);
    }
    for (const [tag] of entries) {
      if (tag === '') throw new TypeError(`choice ${name}: variant names must not be empty.`);
    }
    this.variants = new Map(entries);
  }

  get tags(): readonly string[] {
    return [...this.variants.keys()];
  }

  is(value: unknown): value is ChoiceValue<V> {
    if (!isRecord(value)) return false;
    const tag = value['tag'];
    if (typeof tag !== 'string') return false;
    const payload = this.variants.get(tag);
    if (payload === undefined) return false;
    return payload === null || ('value' in value && payload.is(value['value']));
  }

  parse(raw: string): ChoiceValue<V> {
    if (this.variants.get(raw) === null) {
      return this.conform({ tag: raw });
    }
    for (const [tag, payload] of this.variants) {
      if (payload === null) continue;
      let value: unknown;
      try {
        value = payload.parse(raw);
      } catch (e) {
        if (e instanceof FieldFailure) continue;
        throw e;
      }
      return this.conform({ tag, value });
    }
    throw new FieldFailure(
      `"${raw}" does not match any variant of ${this.name} (${this.tags.join(', ')})`,
    );
  }

  render(value: ChoiceValue<V>): string {
    const variant: unknown = value;
    const tag = isRecord(variant) ? variant['tag'] : undefined;
    if (!isRecord(variant) || typeof tag !== 'string') {
      throw new FieldFailure(`expected a ${this.name} variant with a string tag, got ${describe(value)}`);
    }
    const payload = this.variants.get(tag);
    if (payload === undefined) {
      throw new FieldFailure(`unknown ${this.name} variant "${tag}"`);
    }
    return payload === null ? tag : payload.render(variant['value']);
  }

  private conform(candidate: object): ChoiceValue<V> {
    if (this.is(candidate)) return candidate;
    throw new FieldFailure(`decoded value does not conform to ${this.name}`);
  }
}

// ─── Structs ──────────────────────────────────────────────────────────────────

export type FieldShapes = { readonly [field: string]: Shape<unknown> };

export type StructValue<F extends FieldShapes> = { -readonly [K in keyof F]: Infer<F[K]> };

const CANONICAL_INDEX = /^(?:0|[1-9]\d*)$/;

export class StructShape<F extends FieldShapes> extends Shape<StructValue<F>> {
  readonly kind  = 'struct';
  readonly named = true;
  readonly columns: number;
  readonly fields: readonly (readonly [string, Shape<unknown>])[];

  constructor(readonly name: string, fields: F) {
    super();
    const entries = Object.entries(fields);

    for (const [key, shape] of entries) {
      // Integer-like keys are enumerated first by every JS engine, which
      // would silently reorder the columns.
      if (CANONICAL_INDEX.test(key)) {
        throw new TypeError(
          `struct ${name}: field name '${key}' is an array index and would not keep ` +
          `its declaration order. Use a non-numeric name.`,
        );
      }
      // Assigning this key would replace the prototype of the decoded object.
      if (key === '__proto__') {
        throw new TypeError(`struct ${name}: '__proto__' cannot be used as a field name.`);
      }
      if (shape.columns !== 1 || shape.named) {
        throw new TypeError(
          `struct ${name}: field '${key}' must occupy exactly one column without ` +
          `nested struct fields; ${shape.name} occupies ${shape.columns}. ` +
          `Put records side by side in a tuple instead.`,
        );
      }
    }

    this.fields  = entries;
    this.columns = entries.length;
  }

  is(value: unknown): value is StructValue<F> {
    if (!isRecord(value)) return false;
    return this.fields.every(([key, shape]) => shape.is(value[key]));
  }

  visitNames(visitor: NameVisitor): void {
    this.fields.forEach(([key, shape], position) => {
      visitor.field(key, position);
      shape.visitNames(visitor);
    });
  }

  read(visitor: DecodeVisitor, path: string): StructValue<F> {
    const out: Record<string, unknown> = {};
    for (const [key, shape] of this.fields) {
      out[key] = shape.read(visitor, joinPath(path, key));
    }
    if (this.is(out)) return out;
    throw new LeafError(path, `decoded value does not conform to ${this.name}`);
  }

  write(value: StructValue<F>, visitor: EncodeVisitor, path: string): void {
    const record: unknown = value;
    if (!isRecord(record)) {
      throw new LeafError(path, `expected an object for ${this.name}, got ${describe(record)}`);
    }
    for (const [key, shape] of this.fields) {
      shape.write(record[key], visitor, joinPath(path, key));
    }
  }
}

// ─── Tuples and arrays ────────────────────────────────────────────────────────

export type TupleValue<E extends readonly Shape<unknown>[]> = { -readonly [K in keyof E]: Infer<E[K]> };

export class TupleShape<E extends readonly Shape<unknown>[]> extends Shape<TupleValue<E>> {
  readonly kind = 'tuple';
  readonly name:    string;
  readonly columns: number;
  readonly named:   boolean;

  constructor(readonly elements: E) {
    super();
    this.name    = `(${elements.map(e => e.name).join(', ')})`;
    this.columns = elements.reduce((sum, e) => sum + e.columns, 0);
    this.named   = elements.some(e => e.named);
  }

  is(value: unknown): value is TupleValue<E> {
    return isList(value)
      && value.length === this.elements.length
      && this.elements.every((shape, i) => shape.is(value[i]));
  }

  visitNames(visitor: NameVisitor): void {
    for (const shape of this.elements) shape.visitNames(visitor);
  }

  read(visitor: DecodeVisitor, path: string): TupleValue<E> {
    const out = this.elements.map((shape, i) => shape.read(visitor, `${path}[${i}]`));
    if (this.is(out)) return out;
    throw new LeafError(path, `decoded value does not conform to ${this.name}`);
  }

  write(value: TupleValue<E>, visitor: EncodeVisitor, path: string): void {
    const items: unknown = value;
    if (!isList(items) || items.length !== this.elements.length) {
      throw new LeafError(
        path,
        `expected a ${this.elements.length}-element tuple for ${this.name}, got ${describe(items)}`,
      );
    }
    this.elements.forEach((shape, i) => shape.write(items[i], visitor, `${path}[${i}]`));
  }
}

/**
 * A fixed-length homogeneous tuple. As a struct field only `array(leaf, 1)`
 * is accepted, since a field holds one column.
 */
export class ArrayShape<T> extends Shape<T[]> {
  readonly kind = 'array';
  readonly name:    string;
  readonly columns: number;
  readonly named:   boolean;

  constructor(readonly element: Shape<T>, readonly length: number) {
    super();
    if (!Number.isInteger(length) || length < 0) {
      throw new TypeError(`array: length must be a non-negative integer; got ${length}.`);
    }
    this.name    = `${element.name}[${length}]`;
    this.columns = element.columns * length;
    this.named   = element.named;
  }

  is(value: unknown): value is T[] {
    return Array.isArray(value)
      && value.length === this.length
      && value.every(item => this.element.is(item));
  }

  visitNames(visitor: NameVisitor): void {
    for (let i = 0; i < this.length; i++) this.element.visitNames(visitor);
  }

  read(visitor: DecodeVisitor, path: string): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.length; i++) {
      out.push(this.element.read(visitor, `${path}[${i}]`));
    }
    return out;
  }

  write(value: T[], visitor: EncodeVisitor, path: string): void {
    if (!Array.isArray(value) || value.length !== this.length) {
      throw new LeafError(
        path,
        `expected exactly ${this.length} element(s) for ${this.name}, got ${describe(value)}`,
      );
    }
    value.forEach((item, i) => this.element.write(item, visitor, `${path}[${i}]`));
  }
}

// ─── Builders ─────────────────────────────────────────────────────────────────

export function struct<F extends FieldShapes>(name: string, fields: F): StructShape<F> {
  return new StructShape(name, fields);
}

export function tuple<E extends Shape<unknown>[]>(...elements: E): TupleShape<E> {
  return new TupleShape(elements);
}

export function array<T>(element: Shape<T>, length: number): ArrayShape<T> {
  return new ArrayShape(element, length);
}

export function optional<T>(inner: LeafShape<T>): OptionalShape<T> {
  return new OptionalShape(inner);
}

export function newtype<T>(name: string, inner: LeafShape<T>): NewtypeShape<T> {
  return new NewtypeShape(name, inner);
}

export function choice<V extends Variants>(name: string, variants: V): ChoiceShape<V> {
  return new ChoiceShape(name, variants);
}
