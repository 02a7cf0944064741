import type { Config } from '../config.js';
import type { LoggerLike } from '../logger.js';
import type { SchemaCache } from '../schema/cache.js';
import type { TextureDesc } from '../texel/format.js';

export type ResourceKind = 'buffer' | 'texture' | 'other';

export interface ResourceInfo {
  id: string;
  name: string;
  kind: ResourceKind;
  /** Buffer size in bytes, when known. */
  byteSize?: number;
  texture?: TextureDesc;
}

/** Reflection of the shader binding that references a resource. */
export interface ReflectedResource {
  shaderId: string;
  /** `null` when the binding slot is unknown. */
  binding: number | null;
  name: string;
  /** Raw type description; validated by `buildSchema`. */
  type: unknown;
}

/**
 * What the engine needs from a capture replay. Reads are issued "as of" an observation
 * point; implementations may throw or return short data, and the engine treats either as
 * "not observed here". A returned array may be a view into memory the replay reuses for the
 * next read: the engine copies whatever it keeps.
 */
export interface ReplayCollaborator {
  listResources(): ResourceInfo[];
  /** `null` when no shader references the resource. */
  findReflection(resourceId: string): ReflectedResource | null;
  readBuffer(resourceId: string, offset: number, length: number, pointId: number): Uint8Array;
  /** Tightly packed data of one subresource (`mip + slice * mips`). */
  readTexture?(resourceId: string, subresource: number, pointId: number): Uint8Array;
  /** Observation points in replay order. */
  observationPoints(): number[];
  /** Display label only; never used to decide anything. */
  resourceName(resourceId: string): string | null;
}

export type ReplayLimits = Pick<
  Config,
  | 'MAX_CHANGED_ELEMENTS'
  | 'MAX_BYTE_REGIONS'
  | 'BYTE_REGION_DISPLAY_BYTES'
  | 'MAX_WORD_DIFFS'
  | 'MAX_BYTE_DIFFS'
  | 'MAX_READ_BYTES'
>;

export interface ReplayDeps {
  config: ReplayLimits;
  logger?: LoggerLike;
  cache?: SchemaCache;
}
