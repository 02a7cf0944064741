import type { FieldPath } from '../layout/fieldPath.js';
import { err, ok, type Result } from '../result.js';
import type { ScalarValue } from '../schema/scalar.js';

/**
 * Decoded values aligned index-for-index with the field list. A slot is `undefined` when
 * that field's read would overrun the buffer; the other fields still decode.
 */
export type DecodedValues = readonly (ScalarValue | undefined)[];

export function asDataView(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Decodes record `instanceIndex` out of `bytes`.
 *
 * Fails with `INSUFFICIENT_DATA` when the buffer does not hold the whole record. There is no
 * value validation: the source is arbitrary GPU memory and every bit pattern decodes to
 * something (NaN and infinities included).
 */
export function decodeInstance(
  bytes: Uint8Array,
  fields: readonly FieldPath[],
  stride: number,
  instanceIndex: number,
): Result<DecodedValues> {
  const base = instanceIndex * stride;
  if (bytes.byteLength < base + stride) {
    return err(
      'INSUFFICIENT_DATA',
      `record ${instanceIndex} needs bytes [${base}, ${base + stride}), have ${bytes.byteLength}`,
    );
  }

  const view = asDataView(bytes);
  const values: (ScalarValue | undefined)[] = new Array<ScalarValue | undefined>(fields.length);
  for (const [i, field] of fields.entries()) {
    const at = base + field.offset;
    values[i] = at + field.scalar.width <= bytes.byteLength ? field.scalar.read(view, at) : undefined;
  }
  return ok(values);
}

export function decodedCount(values: DecodedValues): number {
  let n = 0;
  for (const v of values) if (v !== undefined) n++;
  return n;
}
