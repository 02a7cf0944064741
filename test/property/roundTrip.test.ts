import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import fc from 'fast-check';

import { decodeInstance } from '../../src/decode/decoder.js';
import { flatten } from '../../src/layout/flatten.js';
import { rebuildNested } from '../../src/nested/rebuild.js';
import { nestedAt } from '../../src/nested/value.js';
import type { ScalarKind } from '../../src/schema/scalar.js';
import { compositeNode, member, scalarNode, tightSize, type Member } from '../../src/schema/typeNode.js';

const FC_NUM_RUNS = process.env.FC_NUM_RUNS ? Number(process.env.FC_NUM_RUNS) : process.env.CI ? 200 : 500;

const leafKinds: ScalarKind[] = ['float16', 'float32', 'float64', 'int8', 'int16', 'uint32', 'uint64', 'bool'];

const leafArb = fc.record({
  kind: fc.constantFrom(...leafKinds),
  rows: fc.integer({ min: 1, max: 3 }),
  columns: fc.integer({ min: 1, max: 4 }),
  elementCount: fc.integer({ min: 1, max: 3 }),
});

const recordArb = fc.array(leafArb, { minLength: 1, maxLength: 5 }).chain((leaves) => {
  const members: Member[] = [];
  let offset = 0;
  for (const [i, leaf] of leaves.entries()) {
    const node = scalarNode(leaf.kind, leaf);
    members.push(member(`m${i}`, offset, node));
    offset += tightSize(node);
  }
  const record = compositeNode(members);
  const { fields, stride } = flatten(record);
  return fc.tuple(fc.constant({ fields, stride }), fc.uint8Array({ minLength: stride, maxLength: stride + 8 }));
});

describe('decode then rebuild (property)', () => {
  it('every decoded value sits at its field path in the rebuilt tree', () => {
    fc.assert(
      fc.property(recordArb, ([{ fields, stride }, bytes]) => {
        const res = decodeInstance(bytes, fields, stride, 0);
        assert.equal(res.ok, true);
        if (!res.ok) return;

        const tree = rebuildNested(fields, res.value);
        for (const [i, field] of fields.entries()) {
          const leaf = nestedAt(tree, field.steps);
          assert.equal(leaf?.kind, 'scalar');
          if (leaf?.kind !== 'scalar') return;
          assert.ok(Object.is(leaf.value, res.value[i]), `${field.name}`);
        }
      }),
      { numRuns: FC_NUM_RUNS },
    );
  });

  it('the computed stride covers every field', () => {
    fc.assert(
      fc.property(recordArb, ([{ fields, stride }]) => {
        for (const field of fields) {
          assert.ok(field.offset + field.scalar.width <= stride);
        }
      }),
      { numRuns: FC_NUM_RUNS },
    );
  });
});
