import { nestedToJson, scalarEquals, type JsonValue, type NestedValue } from '../nested/value.js';

/**
 * Sparse patch between two nested values.
 *
 * - `replace`: the whole subtree is the new value (changed scalar, kind change, array length change)
 * - `removed`: the key existed before and is gone now
 * - `object`: only the changed keys
 * - `elements`: only the changed indices of a same-length array
 */
export type Delta =
  | { readonly kind: 'replace'; readonly value: NestedValue }
  | { readonly kind: 'removed' }
  | { readonly kind: 'object'; readonly entries: ReadonlyMap<string, Delta> }
  | { readonly kind: 'elements'; readonly entries: ReadonlyMap<number, Delta> };

function replace(value: NestedValue): Delta {
  return { kind: 'replace', value };
}

/**
 * Computes the patch taking `prev` to `next`, or `null` when they are equal.
 *
 * An empty patch is always `null`, never an empty container, so callers can test the result
 * directly to decide whether anything changed.
 */
export function diffNested(prev: NestedValue, next: NestedValue): Delta | null {
  switch (prev.kind) {
    case 'scalar': {
      if (next.kind !== 'scalar') return replace(next);
      return scalarEquals(prev.value, next.value) ? null : replace(next);
    }

    case 'object': {
      if (next.kind !== 'object') return replace(next);
      const entries = new Map<string, Delta>();
      for (const [key, before] of prev.entries) {
        const after = next.entries.get(key);
        if (after === undefined) {
          entries.set(key, { kind: 'removed' });
          continue;
        }
        const sub = diffNested(before, after);
        if (sub !== null) entries.set(key, sub);
      }
      for (const [key, after] of next.entries) {
        if (!prev.entries.has(key)) entries.set(key, replace(after));
      }
      return entries.size > 0 ? { kind: 'object', entries } : null;
    }

    case 'array': {
      // Index-keyed patches do not survive a length change.
      if (next.kind !== 'array' || next.items.length !== prev.items.length) return replace(next);
      const entries = new Map<number, Delta>();
      let allReplaced = true;
      for (const [i, after] of next.items.entries()) {
        const before = prev.items[i];
        const sub = before === undefined ? replace(after) : diffNested(before, after);
        if (sub === null) {
          allReplaced = false;
          continue;
        }
        if (sub.kind !== 'replace') allReplaced = false;
        entries.set(i, sub);
      }
      if (entries.size === 0) return null;
      // Every element rewritten wholesale: the new array is the smaller patch.
      return allReplaced ? replace(next) : { kind: 'elements', entries };
    }
  }
}

/** Plain JSON rendering: `removed` is `null`, changed indices are stringified keys. */
export function deltaToJson(delta: Delta): JsonValue {
  switch (delta.kind) {
    case 'replace':
      return nestedToJson(delta.value);
    case 'removed':
      return null;
    case 'object':
    case 'elements': {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, sub] of delta.entries) out[String(key)] = deltaToJson(sub);
      return out;
    }
  }
}
