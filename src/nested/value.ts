import type { PathStep } from '../layout/fieldPath.js';
import type { ScalarValue } from '../schema/scalar.js';

export type NestedObject = { readonly kind: 'object'; readonly entries: ReadonlyMap<string, NestedValue> };
export type NestedArray = { readonly kind: 'array'; readonly items: readonly NestedValue[] };
export type NestedScalar = { readonly kind: 'scalar'; readonly value: ScalarValue };

export type NestedValue = NestedObject | NestedArray | NestedScalar;

export function nestedObject(entries: Iterable<readonly [string, NestedValue]>): NestedObject {
  return { kind: 'object', entries: new Map(entries) };
}

export function nestedArray(items: readonly NestedValue[]): NestedArray {
  return { kind: 'array', items };
}

export function nestedScalar(value: ScalarValue): NestedScalar {
  return { kind: 'scalar', value };
}

export function scalarEquals(a: ScalarValue, b: ScalarValue): boolean {
  // Object.is: NaN equals itself, so re-reading an unchanged NaN is not a change.
  return Object.is(a, b);
}

/** Structural equality; object key order is irrelevant. */
export function nestedEquals(a: NestedValue, b: NestedValue): boolean {
  switch (a.kind) {
    case 'scalar':
      return b.kind === 'scalar' && scalarEquals(a.value, b.value);
    case 'array':
      if (b.kind !== 'array' || a.items.length !== b.items.length) return false;
      return a.items.every((item, i) => {
        const other = b.items[i];
        return other !== undefined && nestedEquals(item, other);
      });
    case 'object': {
      if (b.kind !== 'object' || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !nestedEquals(value, other)) return false;
      }
      return true;
    }
  }
}

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export function scalarToJson(value: ScalarValue): JsonValue {
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return Number.isNaN(value) ? 'NaN' : value > 0 ? 'Infinity' : '-Infinity';
  }
  return value;
}

/**
 * Plain JSON rendering. Values JSON cannot carry are spelled out: non-finite floats as
 * `"NaN"`/`"Infinity"`/`"-Infinity"`, 64-bit integers beyond 2^53 as decimal strings.
 */
export function nestedToJson(value: NestedValue): JsonValue {
  switch (value.kind) {
    case 'scalar':
      return scalarToJson(value.value);
    case 'array':
      return value.items.map(nestedToJson);
    case 'object': {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, child] of value.entries) out[key] = nestedToJson(child);
      return out;
    }
  }
}

/** Leaf lookup by path steps; `undefined` when the path leaves the tree. */
export function nestedAt(value: NestedValue, steps: readonly PathStep[]): NestedValue | undefined {
  let node: NestedValue | undefined = value;
  for (const step of steps) {
    if (node === undefined) return undefined;
    if (step.kind === 'key') {
      node = node.kind === 'object' ? node.entries.get(step.key) : undefined;
    } else {
      node = node.kind === 'array' ? node.items[step.index] : undefined;
    }
  }
  return node;
}
