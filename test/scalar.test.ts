import assert from 'node:assert/strict';
import test from 'node:test';

import { float16FromBits } from '../src/decode/float16.js';
import { SCALAR_TYPES, scalarTypeFor } from '../src/schema/scalar.js';

function view(...bytes: number[]): DataView {
  return new DataView(new Uint8Array(bytes).buffer);
}

test('scalar widths follow the shader layout rules', () => {
  assert.equal(SCALAR_TYPES.float16.width, 2);
  assert.equal(SCALAR_TYPES.float64.width, 8);
  assert.equal(SCALAR_TYPES.int8.width, 1);
  assert.equal(SCALAR_TYPES.uint64.width, 8);
  assert.equal(SCALAR_TYPES.bool.width, 4);
});

test('integers decode little-endian with sign', () => {
  assert.equal(SCALAR_TYPES.uint16.read(view(0x34, 0x12), 0), 0x1234);
  assert.equal(SCALAR_TYPES.int16.read(view(0xff, 0xff), 0), -1);
  assert.equal(SCALAR_TYPES.int8.read(view(0x80), 0), -128);
  assert.equal(SCALAR_TYPES.uint32.read(view(0xff, 0xff, 0xff, 0xff), 0), 4294967295);
});

test('64-bit integers decode to bigint', () => {
  assert.equal(SCALAR_TYPES.int64.read(view(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff), 0), -1n);
  assert.equal(SCALAR_TYPES.uint64.read(view(0, 0, 0, 0, 1, 0, 0, 0), 0), 4294967296n);
  assert.equal(SCALAR_TYPES.uint64.zero, 0n);
});

test('bool is any non-zero 32-bit word', () => {
  assert.equal(SCALAR_TYPES.bool.read(view(0, 0, 0, 0), 0), false);
  assert.equal(SCALAR_TYPES.bool.read(view(0, 0, 0, 0x80), 0), true);
});

test('normalised channels divide by their maximum', () => {
  assert.equal(SCALAR_TYPES.unorm8.read(view(0xff), 0), 1);
  assert.equal(SCALAR_TYPES.unorm8.read(view(0x80), 0), 0.501961);
  assert.equal(SCALAR_TYPES.snorm8.read(view(0x81), 0), -1);
  assert.equal(SCALAR_TYPES.snorm16.read(view(0xff, 0x7f), 0), 1);
});

test('float16 decodes normals, subnormals and specials', () => {
  assert.equal(float16FromBits(0x3c00), 1);
  assert.equal(float16FromBits(0xc000), -2);
  assert.equal(float16FromBits(0x3555), 0.333251953125);
  assert.equal(float16FromBits(0x0001), Math.pow(2, -24));
  assert.equal(float16FromBits(0x7c00), Infinity);
  assert.equal(float16FromBits(0xfc00), -Infinity);
  assert.ok(Number.isNaN(float16FromBits(0x7e00)));
  assert.ok(Object.is(float16FromBits(0x8000), -0));
});

test('scalarTypeFor accepts kind names and reflection aliases', () => {
  assert.equal(scalarTypeFor('float'), SCALAR_TYPES.float32);
  assert.equal(scalarTypeFor('Float'), SCALAR_TYPES.float32);
  assert.equal(scalarTypeFor('UInt'), SCALAR_TYPES.uint32);
  assert.equal(scalarTypeFor('SLong'), SCALAR_TYPES.int64);
  assert.equal(scalarTypeFor('half'), SCALAR_TYPES.float16);
  assert.equal(scalarTypeFor(' uint16 '), SCALAR_TYPES.uint16);
  assert.equal(scalarTypeFor('Sampler'), null);
  assert.equal(scalarTypeFor(''), null);
});
