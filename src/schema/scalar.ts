import { float16FromBits } from '../decode/float16.js';

export const SCALAR_KINDS = [
  'float16',
  'float32',
  'float64',
  'int8',
  'int16',
  'int32',
  'int64',
  'uint8',
  'uint16',
  'uint32',
  'uint64',
  'bool',
  // Normalised integer channels; only texel layouts produce these.
  'unorm8',
  'unorm16',
  'snorm8',
  'snorm16',
] as const;

export type ScalarKind = (typeof SCALAR_KINDS)[number];

export type ScalarValue = number | boolean | bigint;

export interface ScalarType {
  readonly kind: ScalarKind;
  /** Bytes per component. */
  readonly width: number;
  /** Shader-style name used in schema descriptions (`float`, `uint`, ...). */
  readonly typeName: string;
  readonly zero: ScalarValue;
  /** Little-endian decode of `width` bytes at `byteOffset`. Callers bounds-check first. */
  readonly read: (view: DataView, byteOffset: number) => ScalarValue;
}

export function roundTo6(v: number): number {
  return Math.round(v * 1e6) / 1e6;
}

function define(
  kind: ScalarKind,
  width: number,
  typeName: string,
  zero: ScalarValue,
  read: (view: DataView, byteOffset: number) => ScalarValue,
): ScalarType {
  return Object.freeze({ kind, width, typeName, zero, read });
}

export const SCALAR_TYPES: Readonly<Record<ScalarKind, ScalarType>> = Object.freeze({
  float16: define('float16', 2, 'half', 0, (v, o) => float16FromBits(v.getUint16(o, true))),
  float32: define('float32', 4, 'float', 0, (v, o) => v.getFloat32(o, true)),
  float64: define('float64', 8, 'double', 0, (v, o) => v.getFloat64(o, true)),
  int8: define('int8', 1, 'sbyte', 0, (v, o) => v.getInt8(o)),
  int16: define('int16', 2, 'short', 0, (v, o) => v.getInt16(o, true)),
  int32: define('int32', 4, 'int', 0, (v, o) => v.getInt32(o, true)),
  int64: define('int64', 8, 'int64', 0n, (v, o) => v.getBigInt64(o, true)),
  uint8: define('uint8', 1, 'ubyte', 0, (v, o) => v.getUint8(o)),
  uint16: define('uint16', 2, 'ushort', 0, (v, o) => v.getUint16(o, true)),
  uint32: define('uint32', 4, 'uint', 0, (v, o) => v.getUint32(o, true)),
  uint64: define('uint64', 8, 'uint64', 0n, (v, o) => v.getBigUint64(o, true)),
  // Shader booleans occupy a full 32-bit word.
  bool: define('bool', 4, 'bool', false, (v, o) => v.getUint32(o, true) !== 0),
  unorm8: define('unorm8', 1, 'unorm8', 0, (v, o) => roundTo6(v.getUint8(o) / 0xff)),
  unorm16: define('unorm16', 2, 'unorm16', 0, (v, o) => roundTo6(v.getUint16(o, true) / 0xffff)),
  snorm8: define('snorm8', 1, 'snorm8', 0, (v, o) => roundTo6(v.getInt8(o) / 0x7f)),
  snorm16: define('snorm16', 2, 'snorm16', 0, (v, o) => roundTo6(v.getInt16(o, true) / 0x7fff)),
});

// Reflection data names base types in a few dialects: our kind names, shader type names
// (`float`, `uint`) and replay-API enum names (`Float`, `UInt`, `SLong`).
const ALIASES: ReadonlyMap<string, ScalarKind> = new Map<string, ScalarKind>([
  ['half', 'float16'],
  ['float', 'float32'],
  ['double', 'float64'],
  ['sbyte', 'int8'],
  ['short', 'int16'],
  ['int', 'int32'],
  ['ubyte', 'uint8'],
  ['ushort', 'uint16'],
  ['uint', 'uint32'],
  ['sint', 'int32'],
  ['sshort', 'int16'],
  ['slong', 'int64'],
  ['ulong', 'uint64'],
  ['boolean', 'bool'],
]);

function isScalarKind(name: string): name is ScalarKind {
  return SCALAR_KINDS.some((k) => k === name);
}

/**
 * Maps a reflection base-type name to a decode rule. Returns `null` for types with no
 * scalar decode (opaque handles, structs reported as a base type, unknown enum values).
 */
export function scalarTypeFor(baseType: string): ScalarType | null {
  const lowered = baseType.trim().toLowerCase();
  if (isScalarKind(lowered)) return SCALAR_TYPES[lowered];
  const alias = ALIASES.get(lowered);
  return alias === undefined ? null : SCALAR_TYPES[alias];
}
