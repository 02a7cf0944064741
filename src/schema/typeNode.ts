import { z } from 'zod';

import { InspectError } from '../errors.js';
import { formatOneLineUtf8 } from '../util/text.js';
import { SCALAR_TYPES, scalarTypeFor, type ScalarKind, type ScalarType } from './scalar.js';

export interface Member {
  readonly name: string;
  /** Byte offset relative to the enclosing composite. */
  readonly offset: number;
  readonly type: TypeNode;
}

export interface CompositeNode {
  readonly kind: 'composite';
  readonly members: readonly Member[];
  readonly elementCount: number;
  /**
   * Distance between array elements. Declared by reflection, or derived from the tight
   * element size when the node is arrayed and reflection gave none. `null` only for
   * non-arrayed nodes without a declared stride.
   */
  readonly arrayStride: number | null;
}

export interface ScalarNode {
  readonly kind: 'scalar';
  /** `null` when the base type has no decode rule; flattening skips such leaves. */
  readonly scalar: ScalarType | null;
  readonly baseType: string;
  readonly rows: number;
  readonly columns: number;
  readonly elementCount: number;
  readonly arrayStride: number | null;
}

export type TypeNode = CompositeNode | ScalarNode;

// Reflection input. Every attribute other than member names and offsets is optional in
// practice; absence means rows/columns/elements = 1, stride = derive, slot = unknown.
export interface ReflectedType {
  baseType?: string | null;
  rows?: number | null;
  columns?: number | null;
  elements?: number | null;
  arrayByteStride?: number | null;
  members?: ReflectedMember[] | null;
}

export interface ReflectedMember {
  name: string;
  byteOffset: number;
  type: ReflectedType;
}

const count = z.number().int().min(0).nullish();

export const reflectedTypeSchema: z.ZodType<ReflectedType> = z.lazy(() =>
  z.object({
    baseType: z.string().nullish(),
    rows: count,
    columns: count,
    elements: count,
    arrayByteStride: count,
    members: z.array(reflectedMemberSchema).nullish(),
  }),
);

const reflectedMemberSchema: z.ZodType<ReflectedMember> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    byteOffset: z.number().int().min(0),
    type: reflectedTypeSchema,
  }),
);

const MAX_SCHEMA_DEPTH = 32;

export interface ScalarOptions {
  rows?: number;
  columns?: number;
  elementCount?: number;
  arrayStride?: number | null;
}

export function scalarNode(scalar: ScalarKind | ScalarType | null, opts: ScalarOptions = {}): ScalarNode {
  const type = typeof scalar === 'string' ? SCALAR_TYPES[scalar] : scalar;
  const rows = Math.max(opts.rows ?? 1, 1);
  const columns = Math.max(opts.columns ?? 1, 1);
  const elementCount = Math.max(opts.elementCount ?? 1, 1);
  let arrayStride = opts.arrayStride ? opts.arrayStride : null;
  if (arrayStride === null && elementCount > 1 && type) {
    arrayStride = rows * columns * type.width;
  }
  return Object.freeze({
    kind: 'scalar',
    scalar: type,
    baseType: type ? type.typeName : 'unknown',
    rows,
    columns,
    elementCount,
    arrayStride,
  });
}

export interface CompositeOptions {
  elementCount?: number;
  arrayStride?: number | null;
}

export function compositeNode(members: readonly Member[], opts: CompositeOptions = {}): CompositeNode {
  const seen = new Set<string>();
  for (const m of members) {
    if (seen.has(m.name)) {
      throw new InspectError('INVALID_SCHEMA', `Duplicate member name: ${formatOneLineUtf8(m.name, 128)}`);
    }
    seen.add(m.name);
  }

  const elementCount = Math.max(opts.elementCount ?? 1, 1);
  const frozenMembers = Object.freeze(members.map((m) => Object.freeze({ ...m })));
  let arrayStride = opts.arrayStride ? opts.arrayStride : null;
  if (arrayStride === null && elementCount > 1) {
    arrayStride = tightSize({ kind: 'composite', members: frozenMembers, elementCount: 1, arrayStride: null });
  }
  return Object.freeze({ kind: 'composite', members: frozenMembers, elementCount, arrayStride });
}

export function member(name: string, offset: number, type: TypeNode): Member {
  return { name, offset, type };
}

/** Bytes spanned by one element of `node`: the furthest decodable byte it touches. */
export function tightSize(node: TypeNode): number {
  if (node.kind === 'scalar') {
    if (!node.scalar) return 0;
    const one = node.rows * node.columns * node.scalar.width;
    return node.elementCount > 1 ? (node.elementCount - 1) * (node.arrayStride ?? one) + one : one;
  }

  let end = 0;
  for (const m of node.members) {
    end = Math.max(end, m.offset + tightSize(m.type));
  }
  if (node.elementCount > 1 && end > 0) {
    end = (node.elementCount - 1) * (node.arrayStride ?? end) + end;
  }
  return end;
}

function buildNode(desc: ReflectedType, depth: number): TypeNode {
  if (depth > MAX_SCHEMA_DEPTH) {
    throw new InspectError('INVALID_SCHEMA', `Type nesting exceeds ${MAX_SCHEMA_DEPTH} levels`);
  }

  const members = desc.members ?? [];
  if (members.length > 0) {
    return compositeNode(
      members.map((m) => member(m.name, m.byteOffset, buildNode(m.type, depth + 1))),
      { elementCount: desc.elements ?? 1, arrayStride: desc.arrayByteStride ?? null },
    );
  }

  const baseType = desc.baseType ?? '';
  const node = scalarNode(scalarTypeFor(baseType), {
    rows: desc.rows ?? 1,
    columns: desc.columns ?? 1,
    elementCount: desc.elements ?? 1,
    arrayStride: desc.arrayByteStride ?? null,
  });
  return node.scalar ? node : Object.freeze({ ...node, baseType: baseType || 'unknown' });
}

/**
 * Validates a reflection type description and builds the immutable schema tree.
 *
 * The result is safe to cache and share: every node is frozen.
 */
export function buildSchema(description: unknown): TypeNode {
  const parsed = reflectedTypeSchema.safeParse(description);
  if (!parsed.success) {
    throw new InspectError('INVALID_SCHEMA', `Invalid type description:\n${parsed.error.message}`);
  }
  return buildNode(parsed.data, 0);
}

export interface RecordRoot {
  /** The composite whose members make up one record. */
  readonly node: CompositeNode;
  /** Offset of `node` within the record (non-zero only when a wrapper was skipped). */
  readonly baseOffset: number;
  /** Declared stride of the skipped wrapper member, when one was skipped. */
  readonly innerStride: number | null;
  readonly unwrapped: boolean;
}

/**
 * Storage buffers are commonly reflected as `struct { Elem data[]; }`. When the top-level
 * composite has exactly one member and that member is a non-repeating composite (an unsized
 * runtime array reports a single element), the record is the inner struct. Applied once;
 * a fixed-size array member is record data and is left in place.
 */
export function resolveRecordRoot(node: CompositeNode): RecordRoot {
  const only = node.members.length === 1 ? node.members[0] : undefined;
  if (only && only.type.kind === 'composite' && only.type.elementCount <= 1) {
    return { node: only.type, baseOffset: only.offset, innerStride: only.type.arrayStride, unwrapped: true };
  }
  return { node, baseOffset: 0, innerStride: null, unwrapped: false };
}

export type SchemaDescription = string | number | { readonly [key: string]: SchemaDescription };

function describeScalar(node: ScalarNode): string {
  const base = node.scalar ? node.scalar.typeName : 'unknown';
  let core = base;
  if (node.rows > 1 && node.columns > 1) core = `${base}[${node.rows}][${node.columns}]`;
  else if (node.columns > 1) core = `${base}[${node.columns}]`;
  else if (node.rows > 1) core = `${base}[${node.rows}]`;

  if (node.elementCount <= 1) return core;
  return core === base ? `${base}[${node.elementCount}]` : `${core} x ${node.elementCount}`;
}

function describeMembers(members: readonly Member[]): { [key: string]: SchemaDescription } {
  const out: { [key: string]: SchemaDescription } = {};
  for (const m of members) {
    if (m.type.kind === 'scalar') {
      out[m.name] = describeScalar(m.type);
      continue;
    }
    const inner = describeMembers(m.type.members);
    out[m.name] = m.type.elementCount > 1 ? { _array: m.type.elementCount, _element: inner } : inner;
  }
  return out;
}

/** Compact, human-readable layout summary of one record (after wrapper unwrapping). */
export function describeSchema(node: TypeNode): SchemaDescription {
  if (node.kind === 'scalar') return describeScalar(node);
  return describeMembers(resolveRecordRoot(node).node.members);
}
