import assert from 'node:assert/strict';
import test from 'node:test';

import { isInspectError } from '../src/errors.js';
import { flatten } from '../src/layout/flatten.js';
import { SCALAR_TYPES } from '../src/schema/scalar.js';
import {
  buildSchema,
  compositeNode,
  describeSchema,
  member,
  resolveRecordRoot,
  scalarNode,
  tightSize,
} from '../src/schema/typeNode.js';

test('buildSchema fills absent attributes with their documented defaults', () => {
  const node = buildSchema({ baseType: 'float' });
  assert.equal(node.kind, 'scalar');
  if (node.kind !== 'scalar') return;
  assert.equal(node.scalar, SCALAR_TYPES.float32);
  assert.equal(node.rows, 1);
  assert.equal(node.columns, 1);
  assert.equal(node.elementCount, 1);
  assert.equal(node.arrayStride, null);
});

test('buildSchema keeps unknown base types as undecodable leaves', () => {
  const node = buildSchema({ members: [{ name: 'tex', byteOffset: 0, type: { baseType: 'Sampler' } }] });
  assert.equal(node.kind, 'composite');
  if (node.kind !== 'composite') return;
  const leaf = node.members[0]?.type;
  assert.equal(leaf?.kind, 'scalar');
  if (leaf?.kind !== 'scalar') return;
  assert.equal(leaf.scalar, null);
  assert.equal(leaf.baseType, 'Sampler');
});

test('buildSchema derives a tight stride for arrays that declare none', () => {
  const node = buildSchema({
    members: [
      {
        name: 'pts',
        byteOffset: 0,
        type: {
          elements: 3,
          members: [
            { name: 'a', byteOffset: 0, type: { baseType: 'float' } },
            { name: 'b', byteOffset: 4, type: { baseType: 'float' } },
          ],
        },
      },
    ],
  });
  assert.equal(node.kind, 'composite');
  if (node.kind !== 'composite') return;
  const pts = node.members[0]?.type;
  assert.equal(pts?.arrayStride, 8);
  assert.equal(pts === undefined ? -1 : tightSize(pts), 24);
});

test('buildSchema output is frozen', () => {
  const node = buildSchema({ members: [{ name: 'a', byteOffset: 0, type: { baseType: 'uint' } }] });
  assert.ok(Object.isFrozen(node));
  assert.equal(node.kind, 'composite');
  if (node.kind !== 'composite') return;
  assert.ok(Object.isFrozen(node.members));
  assert.ok(Object.isFrozen(node.members[0]));
});

test('buildSchema rejects malformed descriptions', () => {
  assert.throws(
    () => buildSchema({ members: [{ name: '', byteOffset: 0, type: {} }] }),
    (e: unknown) => isInspectError(e, 'INVALID_SCHEMA'),
  );
  assert.throws(
    () => buildSchema({ members: [{ name: 'a', byteOffset: -4, type: {} }] }),
    (e: unknown) => isInspectError(e, 'INVALID_SCHEMA'),
  );
  assert.throws(() => buildSchema('float'), (e: unknown) => isInspectError(e, 'INVALID_SCHEMA'));
});

test('duplicate member names are rejected', () => {
  assert.throws(
    () => compositeNode([member('a', 0, scalarNode('float32')), member('a', 4, scalarNode('float32'))]),
    (e: unknown) => isInspectError(e, 'INVALID_SCHEMA') && /Duplicate member name: a/.test(e.message),
  );
});

test('a declared record stride wins over the computed one', () => {
  const node = buildSchema({
    arrayByteStride: 32,
    members: [{ name: 'a', byteOffset: 0, type: { baseType: 'float' } }],
  });
  assert.equal(flatten(node).stride, 32);
});

test('a single fixed-size array member is record data, not a wrapper', () => {
  const node = buildSchema({
    members: [
      {
        name: 'items',
        byteOffset: 0,
        type: { elements: 2, arrayByteStride: 4, members: [{ name: 'x', byteOffset: 0, type: { baseType: 'uint' } }] },
      },
    ],
  });
  assert.equal(node.kind, 'composite');
  if (node.kind !== 'composite') return;
  assert.equal(resolveRecordRoot(node).unwrapped, false);

  const { fields, stride } = flatten(node);
  assert.deepEqual(
    fields.map((f) => [f.name, f.offset]),
    [
      ['items[0].x', 0],
      ['items[1].x', 4],
    ],
  );
  assert.equal(stride, 8);
});

test('a runtime-array wrapper is unwrapped and lends its stride', () => {
  const node = buildSchema({
    members: [
      {
        name: 'data',
        byteOffset: 0,
        type: {
          elements: 0,
          arrayByteStride: 16,
          members: [
            { name: 'pos', byteOffset: 0, type: { baseType: 'float', columns: 3 } },
            { name: 'id', byteOffset: 12, type: { baseType: 'uint' } },
          ],
        },
      },
    ],
  });
  const { fields, stride } = flatten(node);
  assert.deepEqual(
    fields.map((f) => [f.name, f.offset]),
    [
      ['pos[0]', 0],
      ['pos[1]', 4],
      ['pos[2]', 8],
      ['id', 12],
    ],
  );
  assert.equal(stride, 16);
});

test('describeSchema summarises one record', () => {
  const node = buildSchema({
    members: [
      { name: 'pos', byteOffset: 0, type: { baseType: 'float', columns: 3 } },
      { name: 'm', byteOffset: 16, type: { baseType: 'float', rows: 4, columns: 4 } },
      { name: 'w', byteOffset: 80, type: { baseType: 'float', elements: 4 } },
      { name: 'uvs', byteOffset: 96, type: { baseType: 'float', columns: 2, elements: 2 } },
      {
        name: 'items',
        byteOffset: 112,
        type: { elements: 4, members: [{ name: 'x', byteOffset: 0, type: { baseType: 'UInt' } }] },
      },
    ],
  });
  assert.deepEqual(describeSchema(node), {
    pos: 'float[3]',
    m: 'float[4][4]',
    w: 'float[4]',
    uvs: 'float[2] x 2',
    items: { _array: 4, _element: { x: 'uint' } },
  });
});
