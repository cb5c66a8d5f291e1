/**
 * rowshape — field name extraction
 *
 * Walks a shape in names mode. No instance is needed: the walk only counts
 * leaves and records the struct field name each one sits under.
 *
 * A struct field whose name equals its positional placeholder (`_field0` at
 * position 0, …) is indistinguishable from a tuple position and is left out
 * of the name list. Its leaf still counts towards the row width.
 */

import { placeholderName, type NameVisitor, type Shape } from './shape';
import type { FieldNameList } from './types';

export interface FieldLayout {
  readonly names:       FieldNameList;
  /** `leafIndices[i]` is the leaf (raw field position) fed by `names[i]`. */
  readonly leafIndices: readonly number[];
  /** Total number of leaves, named or not. */
  readonly leafCount:   number;
}

class NameCollector implements NameVisitor {
  readonly names:       string[] = [];
  readonly leafIndices: number[] = [];
  leafCount = 0;

  field(name: string, position: number): void {
    if (name === placeholderName(position)) return;
    this.names.push(name);
    this.leafIndices.push(this.leafCount);
  }

  leaf(): void {
    this.leafCount++;
  }
}

const layouts = new WeakMap<Shape<unknown>, FieldLayout>();

/** Computed once per shape instance and cached. */
export function extractFieldLayout(shape: Shape<unknown>): FieldLayout {
  const cached = layouts.get(shape);
  if (cached !== undefined) return cached;

  const collector = new NameCollector();
  shape.visitNames(collector);

  if (collector.leafCount !== shape.columns) {
    throw new TypeError(
      `extractFieldLayout: ${shape.name} announced ${collector.leafCount} leaves ` +
      `but declares ${shape.columns} columns.`,
    );
  }

  const layout: FieldLayout = Object.freeze({
    names:       Object.freeze(collector.names),
    leafIndices: Object.freeze(collector.leafIndices),
    leafCount:   collector.leafCount,
  });
  layouts.set(shape, layout);
  return layout;
}

export function extractFieldNames(shape: Shape<unknown>): FieldNameList {
  return extractFieldLayout(shape).names;
}
