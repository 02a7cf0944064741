import { diffBytes, diffWords, summarizeByteDelta, type ByteDeltaSummary, type ByteRegion, type WordDelta } from '../diff/bytes.js';
import { deltaToJson } from '../diff/nested.js';
import { diffRecords } from '../diff/records.js';
import { isInspectError } from '../errors.js';
import type { FieldPath } from '../layout/fieldPath.js';
import { formatError, silentLogger, type LoggerLike } from '../logger.js';
import type { JsonValue } from '../nested/value.js';
import { safeResult } from '../result.js';
import { TimelineTracker, type TimelineCodec } from '../timeline/tracker.js';
import type { ReplayCollaborator, ReplayDeps, ReplayLimits } from './collaborator.js';
import { loadBufferLayout } from './trackBuffer.js';

export interface RecordLayout {
  fields: readonly FieldPath[];
  stride: number;
}

export type WriteDelta =
  | { mode: 'records'; identical: boolean; elements: { element: number; delta: JsonValue }[] }
  | { mode: 'bytes'; identical: boolean; regions: ByteRegion[]; words: WordDelta; bytes: ByteDeltaSummary };

/**
 * What a write did to a resource, given its contents before and after. With a record layout
 * the answer is per-record deltas; otherwise changed byte runs plus a 32-bit word view.
 */
export function describeWriteDelta(
  before: Uint8Array,
  after: Uint8Array,
  layout: RecordLayout | null | undefined,
  limits: Omit<ReplayLimits, 'MAX_READ_BYTES'>,
): WriteDelta {
  if (layout && layout.fields.length > 0 && layout.stride > 0) {
    const changed = diffRecords(before, after, layout.fields, layout.stride, {
      maxChangedElements: limits.MAX_CHANGED_ELEMENTS,
    });
    return {
      mode: 'records',
      identical: changed.length === 0,
      elements: changed.map((c) => ({ element: c.element, delta: deltaToJson(c.delta) })),
    };
  }

  const regions = diffBytes(before, after, {
    maxRegions: limits.MAX_BYTE_REGIONS,
    maxDisplayBytes: limits.BYTE_REGION_DISPLAY_BYTES,
  });
  return {
    mode: 'bytes',
    identical: regions.length === 0,
    regions,
    words: diffWords(before, after, { maxDiffs: limits.MAX_WORD_DIFFS }),
    bytes: summarizeByteDelta(before, after, { maxDiffs: limits.MAX_BYTE_DIFFS }),
  };
}

/**
 * Contents are compared whole: two reads that differ anywhere are a write, even when the
 * change lies past the last full record and so shows up as bytes.
 */
export function writeDeltaCodec(
  layout: RecordLayout | null,
  limits: Omit<ReplayLimits, 'MAX_READ_BYTES'>,
): TimelineCodec<Uint8Array, WriteDelta> {
  return {
    diff(prev, next) {
      if (sameBytes(prev, next)) return null;
      const delta = describeWriteDelta(prev, next, layout, limits);
      return delta.identical ? describeWriteDelta(prev, next, null, limits) : delta;
    },
  };
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

type ReadExtent = { name: string; length: number; truncated: boolean };

function readExtent(collaborator: ReplayCollaborator, resourceId: string, maxReadBytes: number): ReadExtent {
  const info = collaborator.listResources().find((r) => r.id === resourceId);
  const name = collaborator.resourceName(resourceId) ?? info?.name ?? resourceId;
  const size = info?.byteSize ?? maxReadBytes;
  const length = Math.min(size, maxReadBytes);
  return { name, length, truncated: size > length };
}

// Copied: a replay may hand out a view into a staging buffer it refills on the next read.
function readHead(collaborator: ReplayCollaborator, resourceId: string, length: number, pointId: number): Uint8Array {
  return collaborator.readBuffer(resourceId, 0, length, pointId).slice();
}

function layoutOrNull(
  collaborator: ReplayCollaborator,
  resourceId: string,
  name: string,
  deps: ReplayDeps,
  logger: LoggerLike,
): RecordLayout | null {
  try {
    return loadBufferLayout(collaborator, resourceId, deps.cache);
  } catch (e) {
    if (!isInspectError(e, 'SCHEMA_UNAVAILABLE')) throw e;
    logger.warn({ resource: name, err: formatError(e) }, 'no record layout; describing bytes');
    return null;
  }
}

export interface ResourceWriteDelta {
  resourceId: string;
  name: string;
  beforePointId: number;
  afterPointId: number;
  bytesRead: number;
  /** The buffer is larger than `MAX_READ_BYTES`; only its head was compared. */
  truncated: boolean;
  delta: WriteDelta;
}

/**
 * Reads a buffer as of two observation points and describes the difference. Uses the
 * buffer's record layout when reflection provides one.
 */
export function readWriteDelta(
  collaborator: ReplayCollaborator,
  resourceId: string,
  beforePointId: number,
  afterPointId: number,
  deps: ReplayDeps,
): ResourceWriteDelta {
  const logger = deps.logger ?? silentLogger;
  const { name, length, truncated } = readExtent(collaborator, resourceId, deps.config.MAX_READ_BYTES);

  const before = readHead(collaborator, resourceId, length, beforePointId);
  const after = readHead(collaborator, resourceId, length, afterPointId);
  const layout = layoutOrNull(collaborator, resourceId, name, deps, logger);

  return {
    resourceId,
    name,
    beforePointId,
    afterPointId,
    bytesRead: Math.min(before.byteLength, after.byteLength),
    truncated,
    delta: describeWriteDelta(before, after, layout, deps.config),
  };
}

export type WriteCheck = 'first_read' | 'data_changed' | 'data_unchanged' | 'read_failed';

export interface ResourceUse {
  pointId: number;
  /** `null` when there is no earlier read to compare with, or this read failed. */
  isWrite: boolean | null;
  check: WriteCheck;
  /** The use whose contents this one was compared with. */
  previousPointId?: number;
  dataSize?: number;
  delta?: WriteDelta;
  reason?: string;
}

export interface ResourceWrites {
  resourceId: string;
  name: string;
  mode: 'records' | 'bytes';
  truncated: boolean;
  writeCount: number;
  uses: ResourceUse[];
}

/**
 * Walks the uses of a buffer in point order and decides for each whether it wrote the
 * buffer, by comparing its contents with those at the previous successfully read use.
 * Uses default to every observation point; duplicates are dropped.
 */
export function trackResourceWrites(
  collaborator: ReplayCollaborator,
  resourceId: string,
  usePointIds: readonly number[] | undefined,
  deps: ReplayDeps,
): ResourceWrites {
  const logger = deps.logger ?? silentLogger;
  const { name, length, truncated } = readExtent(collaborator, resourceId, deps.config.MAX_READ_BYTES);
  const layout = layoutOrNull(collaborator, resourceId, name, deps, logger);
  const tracker = new TimelineTracker<string, Uint8Array, WriteDelta>(writeDeltaCodec(layout, deps.config));

  const points = [...new Set(usePointIds ?? collaborator.observationPoints())].sort((a, b) => a - b);
  const uses: ResourceUse[] = [];
  let previous: number | null = null;
  for (const pointId of points) {
    const data = safeResult(() => readHead(collaborator, resourceId, length, pointId));
    if (!data.ok) {
      logger.debug({ resource: name, pointId, code: data.code, reason: data.message }, 'read skipped');
      uses.push({ pointId, isWrite: null, check: 'read_failed', reason: data.message });
      continue;
    }

    const dataSize = data.value.byteLength;
    const delta = tracker.observe(pointId, resourceId, data.value);
    if (previous === null) {
      uses.push({ pointId, isWrite: null, check: 'first_read', dataSize });
    } else if (delta === null) {
      uses.push({ pointId, isWrite: false, check: 'data_unchanged', previousPointId: previous, dataSize });
    } else {
      uses.push({ pointId, isWrite: true, check: 'data_changed', previousPointId: previous, dataSize, delta });
    }
    previous = pointId;
  }

  logger.info({ resource: name, uses: uses.length, writes: tracker.totalChanges }, 'resource writes scanned');
  return {
    resourceId,
    name,
    mode: layout ? 'records' : 'bytes',
    truncated,
    writeCount: tracker.totalChanges,
    uses,
  };
}
