import { roundTo6 } from '../schema/scalar.js';
import { toHex } from '../util/text.js';

export type ByteRegion =
  | { kind: 'changed'; offset: number; length: number; oldHex: string; newHex: string }
  | { kind: 'sizeChanged'; oldSize: number; newSize: number };

export interface DiffBytesOptions {
  maxRegions?: number;
  /** Hex shown per region; `length` still reports the full run. */
  maxDisplayBytes?: number;
}

export const DEFAULT_MAX_REGIONS = 3;
export const DEFAULT_MAX_DISPLAY_BYTES = 16;

/**
 * Byte-level fallback diff for data without a layout: the first `maxRegions` contiguous
 * runs of differing bytes over the overlapping range, then a size-change region when the
 * lengths differ and the cap leaves room.
 */
export function diffBytes(prev: Uint8Array, next: Uint8Array, opts: DiffBytesOptions = {}): ByteRegion[] {
  const maxRegions = opts.maxRegions ?? DEFAULT_MAX_REGIONS;
  const maxDisplay = opts.maxDisplayBytes ?? DEFAULT_MAX_DISPLAY_BYTES;
  const minLen = Math.min(prev.byteLength, next.byteLength);
  const regions: ByteRegion[] = [];

  let i = 0;
  while (i < minLen && regions.length < maxRegions) {
    if (prev[i] === next[i]) {
      i++;
      continue;
    }
    const start = i;
    while (i < minLen && prev[i] !== next[i]) i++;
    const shown = Math.min(i - start, maxDisplay);
    regions.push({
      kind: 'changed',
      offset: start,
      length: i - start,
      oldHex: toHex(prev.subarray(start, start + shown)),
      newHex: toHex(next.subarray(start, start + shown)),
    });
  }

  if (prev.byteLength !== next.byteLength && regions.length < maxRegions) {
    regions.push({ kind: 'sizeChanged', oldSize: prev.byteLength, newSize: next.byteLength });
  }
  return regions;
}

export interface WordDiff {
  index: number;
  offset: number;
  oldU32: number;
  newU32: number;
  // Present only when at least one side reads as a plausible float; the other side is
  // `null` when it does not.
  oldF32?: number | null;
  newF32?: number | null;
}

export interface WordDelta {
  totalWordsCompared: number;
  oldWordCount: number;
  newWordCount: number;
  wordsChanged: number;
  identical: boolean;
  firstDiffs: WordDiff[];
}

/** Finite and within [1e-10, 1e10] in magnitude, or exactly zero. */
export function isPlausibleFloat(f: number): boolean {
  if (!Number.isFinite(f)) return false;
  const mag = Math.abs(f);
  return f === 0 || (mag >= 1e-10 && mag <= 1e10);
}

function padTo4(bytes: Uint8Array): Uint8Array {
  const rem = bytes.byteLength % 4;
  if (rem === 0) return bytes;
  const padded = new Uint8Array(bytes.byteLength + (4 - rem));
  padded.set(bytes);
  return padded;
}

/**
 * 32-bit word diff. Both buffers are zero-padded to a 4-byte boundary and compared as
 * little-endian u32s; each reported word also carries its float reinterpretation when that
 * looks like a real float. Extra trailing words on either side count as changed.
 */
export function diffWords(prev: Uint8Array, next: Uint8Array, opts: { maxDiffs?: number } = {}): WordDelta {
  const maxDiffs = opts.maxDiffs ?? 8;
  const a = padTo4(prev);
  const b = padTo4(next);
  const va = new DataView(a.buffer, a.byteOffset, a.byteLength);
  const vb = new DataView(b.buffer, b.byteOffset, b.byteLength);

  const oldWordCount = a.byteLength / 4;
  const newWordCount = b.byteLength / 4;
  const compared = Math.min(oldWordCount, newWordCount);

  const firstDiffs: WordDiff[] = [];
  let wordsChanged = 0;
  for (let i = 0; i < compared; i++) {
    const offset = i * 4;
    const oldU32 = va.getUint32(offset, true);
    const newU32 = vb.getUint32(offset, true);
    if (oldU32 === newU32) continue;

    wordsChanged++;
    if (firstDiffs.length >= maxDiffs) continue;

    const diff: WordDiff = { index: i, offset, oldU32, newU32 };
    const oldF32 = va.getFloat32(offset, true);
    const newF32 = vb.getFloat32(offset, true);
    const oldOk = isPlausibleFloat(oldF32);
    const newOk = isPlausibleFloat(newF32);
    if (oldOk || newOk) {
      diff.oldF32 = oldOk ? roundTo6(oldF32) : null;
      diff.newF32 = newOk ? roundTo6(newF32) : null;
    }
    firstDiffs.push(diff);
  }

  wordsChanged += Math.abs(oldWordCount - newWordCount);
  return {
    totalWordsCompared: compared,
    oldWordCount,
    newWordCount,
    wordsChanged,
    identical: wordsChanged === 0,
    firstDiffs,
  };
}

export interface ByteDiff {
  offset: number;
  /** `0x..` byte, or `null` past the end of that side. */
  old: string | null;
  new: string | null;
}

export interface ByteDeltaSummary {
  totalBytesCompared: number;
  oldSize: number;
  newSize: number;
  bytesChanged: number;
  identical: boolean;
  firstDiffs: ByteDiff[];
}

function hexByte(b: number | undefined): string | null {
  return b === undefined ? null : `0x${b.toString(16).padStart(2, '0')}`;
}

/** Per-byte change count plus the first `maxDiffs` differing bytes, tail included. */
export function summarizeByteDelta(
  prev: Uint8Array,
  next: Uint8Array,
  opts: { maxDiffs?: number } = {},
): ByteDeltaSummary {
  const maxDiffs = opts.maxDiffs ?? 8;
  const minLen = Math.min(prev.byteLength, next.byteLength);
  const maxLen = Math.max(prev.byteLength, next.byteLength);
  const firstDiffs: ByteDiff[] = [];
  let bytesChanged = 0;

  for (let i = 0; i < minLen; i++) {
    if (prev[i] === next[i]) continue;
    bytesChanged++;
    if (firstDiffs.length < maxDiffs) {
      firstDiffs.push({ offset: i, old: hexByte(prev[i]), new: hexByte(next[i]) });
    }
  }

  bytesChanged += maxLen - minLen;
  for (let i = minLen; i < maxLen && firstDiffs.length < maxDiffs; i++) {
    firstDiffs.push({ offset: i, old: hexByte(prev[i]), new: hexByte(next[i]) });
  }

  return {
    totalBytesCompared: minLen,
    oldSize: prev.byteLength,
    newSize: next.byteLength,
    bytesChanged,
    identical: bytesChanged === 0,
    firstDiffs,
  };
}
