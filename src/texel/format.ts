import { InspectError } from '../errors.js';
import { SCALAR_TYPES, type ScalarKind } from '../schema/scalar.js';
import { compositeNode, member, scalarNode, type CompositeNode } from '../schema/typeNode.js';
import { formatOneLineUtf8 } from '../util/text.js';

export type TexelCompType = 'float' | 'uint' | 'sint' | 'unorm' | 'snorm' | 'srgb';

export interface TexelFormat {
  /** Display name, e.g. `R8G8B8A8_UNORM`. */
  name: string;
  compCount: number;
  compByteWidth: number;
  compType: TexelCompType;
  /** Block-compressed formats have no per-texel addressing. */
  compressed?: boolean;
}

export interface TextureDesc {
  width: number;
  height: number;
  depth?: number;
  mips: number;
  format: TexelFormat;
}

export interface TexelCoord {
  x: number;
  y: number;
  z?: number;
  mip?: number;
  slice?: number;
}

export type NormalizedTexelCoord = Readonly<Required<TexelCoord>>;

export const CHANNEL_NAMES = ['r', 'g', 'b', 'a'] as const;

const KIND_BY_TYPE: Readonly<Record<TexelCompType, Partial<Record<number, ScalarKind>>>> = {
  float: { 2: 'float16', 4: 'float32', 8: 'float64' },
  uint: { 1: 'uint8', 2: 'uint16', 4: 'uint32' },
  sint: { 1: 'int8', 2: 'int16', 4: 'int32' },
  unorm: { 1: 'unorm8', 2: 'unorm16' },
  snorm: { 1: 'snorm8', 2: 'snorm16' },
  // Stored encoded: channels read as unorm, no linearisation.
  srgb: { 1: 'unorm8' },
};

function unsupported(format: TexelFormat, why: string): InspectError {
  return new InspectError('UNSUPPORTED_FORMAT', `Texture format ${formatOneLineUtf8(format.name, 64)}: ${why}`);
}

export function channelKind(format: TexelFormat): ScalarKind {
  if (format.compressed) throw unsupported(format, 'block-compressed formats cannot be read per texel');
  if (!Number.isInteger(format.compCount) || format.compCount < 1 || format.compCount > CHANNEL_NAMES.length) {
    throw unsupported(format, `unsupported component count ${format.compCount}`);
  }
  const kind = KIND_BY_TYPE[format.compType][format.compByteWidth];
  if (kind === undefined) {
    throw unsupported(format, `no ${format.compByteWidth}-byte ${format.compType} channel decode`);
  }
  return kind;
}

export function bytesPerTexel(format: TexelFormat): number {
  return format.compCount * format.compByteWidth;
}

/** One texel as a record: a composite with one member per channel (`r`, `g`, `b`, `a`). */
export function texelSchema(format: TexelFormat): CompositeNode {
  const kind = channelKind(format);
  const width = SCALAR_TYPES[kind].width;
  return compositeNode(
    CHANNEL_NAMES.slice(0, format.compCount).map((name, i) => member(name, i * width, scalarNode(kind))),
  );
}

export function normalizeTexelCoord(coord: TexelCoord): NormalizedTexelCoord {
  return { x: coord.x, y: coord.y, z: coord.z ?? 0, mip: coord.mip ?? 0, slice: coord.slice ?? 0 };
}

export function texelKey(coord: TexelCoord): string {
  const c = normalizeTexelCoord(coord);
  return `${c.x},${c.y},${c.z},${c.mip},${c.slice}`;
}

export function mipExtent(size: number, mip: number): number {
  return Math.max(1, size >> mip);
}

function clamp(v: number, max: number): number {
  return Math.min(Math.max(0, v), max);
}

export interface TexelLocation {
  /** Subresource index: `mip + slice * mips`. */
  subresource: number;
  /** Byte offset of the texel within the subresource data. */
  offset: number;
  /** The coordinate actually read, after clamping into the mip's extent. */
  x: number;
  y: number;
  z: number;
}

/**
 * Addresses a texel in tightly packed subresource data. Coordinates outside the mip level
 * are clamped to its edge.
 */
export function locateTexel(desc: TextureDesc, coord: TexelCoord): TexelLocation {
  const c = normalizeTexelCoord(coord);
  const bpt = bytesPerTexel(desc.format);
  const mipWidth = mipExtent(desc.width, c.mip);
  const mipHeight = mipExtent(desc.height, c.mip);
  const mipDepth = mipExtent(desc.depth ?? 1, c.mip);

  const x = clamp(c.x, mipWidth - 1);
  const y = clamp(c.y, mipHeight - 1);
  const z = clamp(c.z, mipDepth - 1);
  const rowPitch = mipWidth * bpt;
  const slicePitch = rowPitch * mipHeight;

  return {
    subresource: c.mip + c.slice * desc.mips,
    offset: z * slicePitch + y * rowPitch + x * bpt,
    x,
    y,
    z,
  };
}
