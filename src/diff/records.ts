import { decodeInstance } from '../decode/decoder.js';
import type { FieldPath } from '../layout/fieldPath.js';
import { rebuildNested } from '../nested/rebuild.js';
import { diffNested, type Delta } from './nested.js';

export interface RecordDelta {
  /** Record index within the buffer. */
  element: number;
  delta: Delta;
}

export const DEFAULT_MAX_CHANGED_ELEMENTS = 3;

/**
 * Record-by-record diff of two snapshots of the same buffer.
 *
 * Compares the records both snapshots hold in full and stops after `maxChangedElements`
 * changed records. Without a layout (no fields or zero stride) there is nothing to compare
 * and the result is empty; use the byte differ instead.
 */
export function diffRecords(
  prev: Uint8Array,
  next: Uint8Array,
  fields: readonly FieldPath[],
  stride: number,
  opts: { maxChangedElements?: number } = {},
): RecordDelta[] {
  const maxChanged = opts.maxChangedElements ?? DEFAULT_MAX_CHANGED_ELEMENTS;
  if (fields.length === 0 || stride <= 0) return [];

  const count = Math.floor(Math.min(prev.byteLength, next.byteLength) / stride);
  const out: RecordDelta[] = [];
  for (let element = 0; element < count && out.length < maxChanged; element++) {
    const before = decodeInstance(prev, fields, stride, element);
    const after = decodeInstance(next, fields, stride, element);
    if (!before.ok || !after.ok) break;

    const delta = diffNested(rebuildNested(fields, before.value), rebuildNested(fields, after.value));
    if (delta !== null) out.push({ element, delta });
  }
  return out;
}
