import { resolveRecordRoot, type ScalarNode, type TypeNode } from '../schema/typeNode.js';
import { formatFieldPath, indexStep, keyStep, parseFieldPath, type FieldPath, type PathStep } from './fieldPath.js';

export interface FlatLayout {
  readonly fields: readonly FieldPath[];
  /** Bytes per record instance; 0 when there are no decodable fields. */
  readonly stride: number;
}

function pushField(out: FieldPath[], node: ScalarNode, steps: PathStep[], offset: number): void {
  if (!node.scalar) return;
  out.push(Object.freeze({ name: formatFieldPath(steps), steps: Object.freeze(steps), offset, scalar: node.scalar }));
}

function visitScalarElement(out: FieldPath[], node: ScalarNode, steps: PathStep[], base: number): void {
  const width = node.scalar ? node.scalar.width : 0;
  if (node.rows * node.columns === 1) {
    pushField(out, node, steps, base);
    return;
  }

  const isMatrix = node.rows > 1 && node.columns > 1;
  for (let r = 0; r < node.rows; r++) {
    for (let c = 0; c < node.columns; c++) {
      const component = r * node.columns + c;
      const componentSteps = isMatrix ? [...steps, indexStep(r), indexStep(c)] : [...steps, indexStep(component)];
      pushField(out, node, componentSteps, base + component * width);
    }
  }
}

function visit(out: FieldPath[], node: TypeNode, steps: PathStep[], offset: number): void {
  const arrayed = node.elementCount > 1;
  const stride = node.arrayStride ?? 0;

  for (let i = 0; i < node.elementCount; i++) {
    const elemSteps = arrayed ? [...steps, indexStep(i)] : steps;
    const elemOffset = offset + i * stride;

    if (node.kind === 'scalar') {
      visitScalarElement(out, node, elemSteps, elemOffset);
      continue;
    }
    for (const m of node.members) {
      visit(out, m.type, [...elemSteps, keyStep(m.name)], elemOffset + m.offset);
    }
  }
}

function computedStride(fields: readonly FieldPath[]): number {
  let end = 0;
  for (const f of fields) {
    end = Math.max(end, f.offset + f.scalar.width);
  }
  return end;
}

/**
 * Flattens a record type into its leaf scalars.
 *
 * `node` describes one record: its own element count is the record array (the buffer) and
 * is not expanded here; its declared stride is the record stride. Members are flattened in
 * declaration order, array elements in index order and matrices row-major.
 *
 * Stride precedence: the record type's declared stride, then the stride of an unwrapped
 * wrapper member, then the furthest byte any leaf touches. A fixed-size array member is
 * record data, so its own stride is never the record stride.
 */
export function flatten(node: TypeNode, namePrefix = '', baseOffset = 0): FlatLayout {
  const prefix = namePrefix.length > 0 ? parseFieldPath(namePrefix) : [];
  const fields: FieldPath[] = [];
  let innerStride: number | null = null;

  if (node.kind === 'scalar') {
    visitScalarElement(fields, node, prefix, baseOffset);
  } else {
    const root = resolveRecordRoot(node);
    innerStride = root.innerStride;
    for (const m of root.node.members) {
      visit(fields, m.type, [...prefix, keyStep(m.name)], baseOffset + root.baseOffset + m.offset);
    }
  }

  if (fields.length === 0) {
    return { fields: Object.freeze([]), stride: 0 };
  }

  return {
    fields: Object.freeze(fields),
    stride: node.arrayStride ?? innerStride ?? computedStride(fields),
  };
}
