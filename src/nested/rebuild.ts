import { parseFieldPath, type FieldPath, type PathStep } from '../layout/fieldPath.js';
import type { DecodedValues } from '../decode/decoder.js';
import type { ScalarValue } from '../schema/scalar.js';
import { nestedArray, nestedObject, nestedScalar, type NestedValue } from './value.js';

// Mutable build-time tree. Holes are array slots (or undecoded leaves) not yet written; each
// carries the zero value of the field that created it.
type Hole = { kind: 'hole'; zero: ScalarValue };
type BuildObject = { kind: 'object'; entries: Map<string, Slot> };
type BuildArray = { kind: 'array'; items: Slot[] };
type BuildScalar = { kind: 'scalar'; value: ScalarValue };
type BuildContainer = BuildObject | BuildArray;
type Slot = BuildContainer | BuildScalar | Hole;

function containerFor(next: PathStep): BuildContainer {
  return next.kind === 'index' ? { kind: 'array', items: [] } : { kind: 'object', entries: new Map() };
}

function zeroLike(value: ScalarValue): ScalarValue {
  if (typeof value === 'boolean') return false;
  if (typeof value === 'bigint') return 0n;
  return 0;
}

class TreeBuilder {
  private root: Slot | null = null;

  insert(steps: readonly PathStep[], value: ScalarValue | undefined, zero: ScalarValue): void {
    const leaf: Slot = value === undefined ? { kind: 'hole', zero } : { kind: 'scalar', value };
    const first = steps[0];
    if (first === undefined) {
      this.root = leaf;
      return;
    }

    let root = this.root;
    if (root === null || root.kind === 'hole' || root.kind === 'scalar') {
      root = containerFor(first);
      this.root = root;
    }

    let node: BuildContainer = root;
    for (const [i, step] of steps.entries()) {
      const next = steps[i + 1];

      if (step.kind === 'key') {
        if (node.kind !== 'object') return;
        if (next === undefined) {
          node.entries.set(step.key, leaf);
          return;
        }
        const child = descend(node.entries.get(step.key), next);
        if (child === null) return;
        node.entries.set(step.key, child);
        node = child;
        continue;
      }

      if (node.kind !== 'array') return;
      while (node.items.length <= step.index) {
        node.items.push({ kind: 'hole', zero });
      }
      if (next === undefined) {
        node.items[step.index] = leaf;
        return;
      }
      const child = descend(node.items[step.index], next);
      if (child === null) return;
      node.items[step.index] = child;
      node = child;
    }
  }

  finish(): NestedValue {
    return this.root === null ? nestedObject([]) : freeze(this.root);
  }
}

// Reuses an existing container of the right shape, replaces a hole, and refuses to
// overwrite a scalar or a container of the other shape (two fields disagreeing on shape).
function descend(existing: Slot | undefined, next: PathStep): BuildContainer | null {
  if (existing === undefined || existing.kind === 'hole') return containerFor(next);
  if (existing.kind === 'scalar') return null;
  const wanted = next.kind === 'index' ? 'array' : 'object';
  return existing.kind === wanted ? existing : null;
}

function freeze(slot: Slot): NestedValue {
  switch (slot.kind) {
    case 'hole':
      return nestedScalar(slot.zero);
    case 'scalar':
      return nestedScalar(slot.value);
    case 'array':
      return nestedArray(slot.items.map(freeze));
    case 'object':
      return nestedObject(Array.from(slot.entries, ([key, child]) => [key, freeze(child)] as const));
  }
}

/**
 * Rebuilds the nested record value from a field list and values aligned with it.
 *
 * Every field is placed, decoded or not: undecoded values and array gaps become the field
 * type's zero, so the tree always has the schema's full shape. Same input, same tree.
 */
export function rebuildNested(fields: readonly FieldPath[], values: DecodedValues): NestedValue {
  const builder = new TreeBuilder();
  for (const [i, field] of fields.entries()) {
    builder.insert(field.steps, values[i], field.scalar.zero);
  }
  return builder.finish();
}

/** Rebuilds from a flat `label -> value` mapping such as `{ 'a.b[2].c': 1 }`. */
export function rebuildFromNamed(entries: Iterable<readonly [string, ScalarValue]>): NestedValue {
  const builder = new TreeBuilder();
  for (const [name, value] of entries) {
    builder.insert(parseFieldPath(name), value, zeroLike(value));
  }
  return builder.finish();
}
