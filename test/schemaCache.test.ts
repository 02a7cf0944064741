import assert from 'node:assert/strict';
import test from 'node:test';

import { flatten } from '../src/layout/flatten.js';
import { SchemaCache, makeSchemaCacheKey, type SchemaLayout } from '../src/schema/cache.js';
import { compositeNode, member, scalarNode } from '../src/schema/typeNode.js';

function layout(name: string): SchemaLayout {
  const schema = compositeNode([member(name, 0, scalarNode('uint32'))]);
  return { schema, ...flatten(schema) };
}

test('schema cache keys combine shader and binding', () => {
  assert.equal(makeSchemaCacheKey({ shaderId: 'cs_main', binding: 3 }), 'cs_main|3');
  assert.equal(makeSchemaCacheKey({ shaderId: 'cs_main', binding: null }), 'cs_main|?');
});

test('schema cache evicts the least recently used entry', () => {
  const cache = new SchemaCache(2);
  const a = layout('a');
  cache.set('a', a);
  cache.set('b', layout('b'));

  // Touch `a` so `b` becomes the eviction candidate.
  assert.equal(cache.get('a'), a);
  cache.set('c', layout('c'));

  assert.equal(cache.size, 2);
  assert.equal(cache.get('b'), null);
  assert.equal(cache.get('a'), a);
  assert.notEqual(cache.get('c'), null);
});

test('getOrBuild builds once per key', () => {
  const cache = new SchemaCache(4);
  let builds = 0;
  const build = () => {
    builds++;
    return layout('a');
  };
  const first = cache.getOrBuild('k', build);
  const second = cache.getOrBuild('k', build);
  assert.equal(builds, 1);
  assert.equal(first, second);
});

test('a zero-capacity cache stores nothing', () => {
  const cache = new SchemaCache(0);
  cache.set('k', layout('a'));
  assert.equal(cache.size, 0);
  assert.equal(cache.get('k'), null);
});
