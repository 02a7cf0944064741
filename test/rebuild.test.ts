import assert from 'node:assert/strict';
import test from 'node:test';

import { decodeInstance } from '../src/decode/decoder.js';
import { flatten } from '../src/layout/flatten.js';
import { rebuildFromNamed, rebuildNested } from '../src/nested/rebuild.js';
import { nestedAt, nestedEquals, nestedToJson, nestedScalar } from '../src/nested/value.js';
import { compositeNode, member, scalarNode } from '../src/schema/typeNode.js';
import { concat, f32, u32 } from './helpers.js';

test('rebuilds objects and arrays from field steps', () => {
  const node = compositeNode([
    member('pos', 0, scalarNode('float32', { columns: 3 })),
    member('m', 12, scalarNode('float32', { rows: 2, columns: 2 })),
    member('id', 28, scalarNode('uint32')),
  ]);
  const { fields, stride } = flatten(node);
  const res = decodeInstance(concat(f32(1, 2, 3), f32(4, 5, 6, 7), u32(8)), fields, stride, 0);
  assert.equal(res.ok, true);
  if (!res.ok) return;

  assert.deepEqual(nestedToJson(rebuildNested(fields, res.value)), {
    pos: [1, 2, 3],
    m: [
      [4, 5],
      [6, 7],
    ],
    id: 8,
  });
});

test('undecoded values become the zero of their type', () => {
  const node = compositeNode(
    [member('n', 0, scalarNode('uint64')), member('flag', 8, scalarNode('bool')), member('x', 12, scalarNode('float32'))],
    { arrayStride: 8 },
  );
  const { fields } = flatten(node);
  const tree = rebuildNested(fields, [5n, undefined, undefined]);
  assert.deepEqual(nestedToJson(tree), { n: 5, flag: false, x: 0 });
});

test('gaps in named arrays are zero-filled', () => {
  const tree = rebuildFromNamed([
    ['a.b[2].c', 1],
    ['a.d', true],
  ]);
  assert.deepEqual(nestedToJson(tree), { a: { b: [0, 0, { c: 1 }], d: true } });
});

test('a field whose path conflicts with an earlier shape is dropped', () => {
  const tree = rebuildFromNamed([
    ['a', 1],
    ['a.b', 2],
    ['c[0]', 3],
    ['c.d', 4],
  ]);
  assert.deepEqual(nestedToJson(tree), { a: 1, c: [3] });
});

test('an empty field list rebuilds to an empty object', () => {
  assert.deepEqual(nestedToJson(rebuildNested([], [])), {});
});

test('rebuilding is deterministic', () => {
  const entries: [string, number][] = [
    ['x[1].y', 2],
    ['x[0].y', 1],
    ['z', 3],
  ];
  assert.ok(nestedEquals(rebuildFromNamed(entries), rebuildFromNamed(entries)));
});

test('nestedAt follows steps to a leaf', () => {
  const tree = rebuildFromNamed([['a.b[1]', 7]]);
  assert.deepEqual(nestedAt(tree, [{ kind: 'key', key: 'a' }, { kind: 'key', key: 'b' }, { kind: 'index', index: 1 }]), nestedScalar(7));
  assert.equal(nestedAt(tree, [{ kind: 'key', key: 'missing' }]), undefined);
  assert.equal(nestedAt(tree, [{ kind: 'index', index: 0 }]), undefined);
});

test('JSON rendering spells out values JSON cannot hold', () => {
  const tree = rebuildFromNamed([
    ['nan', Number.NaN],
    ['inf', -Infinity],
    ['big', 2n ** 60n],
    ['small', -3n],
  ]);
  assert.deepEqual(nestedToJson(tree), { nan: 'NaN', inf: '-Infinity', big: '1152921504606846976', small: -3 });
});
