import assert from 'node:assert/strict';
import test from 'node:test';

import { formatFieldPath, indexStep, keyStep, parseFieldPath } from '../src/layout/fieldPath.js';

test('parseFieldPath splits dotted and bracketed access', () => {
  assert.deepEqual(parseFieldPath('a.b[2].c'), [keyStep('a'), keyStep('b'), indexStep(2), keyStep('c')]);
  assert.deepEqual(parseFieldPath('m[1][3]'), [keyStep('m'), indexStep(1), indexStep(3)]);
  assert.deepEqual(parseFieldPath('lights[10].color'), [keyStep('lights'), indexStep(10), keyStep('color')]);
});

test('formatFieldPath renders steps as a label', () => {
  assert.equal(formatFieldPath([keyStep('a'), keyStep('b'), indexStep(2), keyStep('c')]), 'a.b[2].c');
  assert.equal(formatFieldPath([keyStep('m'), indexStep(0), indexStep(1)]), 'm[0][1]');
  assert.equal(formatFieldPath([]), '');
});

test('labels round-trip through the parser', () => {
  for (const label of ['x', 'a.b', 'v[0]', 'items[3].pos[2]', 'm[3][3]', 'a.b.c[1].d']) {
    assert.equal(formatFieldPath(parseFieldPath(label)), label);
  }
});
