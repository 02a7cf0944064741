import { deltaToJson } from '../diff/nested.js';
import { InspectError, isInspectError } from '../errors.js';
import { flatten } from '../layout/flatten.js';
import { formatError, silentLogger } from '../logger.js';
import { nestedToJson, type JsonValue } from '../nested/value.js';
import { makeSchemaCacheKey, type SchemaCache, type SchemaLayout } from '../schema/cache.js';
import { buildSchema, describeSchema, type SchemaDescription } from '../schema/typeNode.js';
import {
  nestedCodec,
  rawBytesCodec,
  rawRecordReader,
  structuredReader,
  trackTimeline,
  type ByteSource,
} from '../timeline/tracker.js';
import { formatOneLineUtf8, toHex } from '../util/text.js';
import type { ReplayCollaborator, ReplayDeps } from './collaborator.js';
import { resolveResource } from './resolveResource.js';

function buildLayout(type: unknown, label: string): SchemaLayout {
  const schema = buildSchema(type);
  const { fields, stride } = flatten(schema);
  if (fields.length === 0) {
    throw new InspectError('SCHEMA_UNAVAILABLE', `Reflected type of ${label} has no decodable fields`);
  }
  return { schema, fields, stride };
}

/**
 * Record layout of a buffer, from the reflection of the shader that binds it. A buffer no
 * shader references, or whose type has nothing to decode, has no layout: that is a
 * `SCHEMA_UNAVAILABLE` failure, never an empty schema.
 */
export function loadBufferLayout(collaborator: ReplayCollaborator, resourceId: string, cache?: SchemaCache): SchemaLayout {
  const label = formatOneLineUtf8(collaborator.resourceName(resourceId) ?? resourceId, 128);
  const refl = collaborator.findReflection(resourceId);
  if (!refl) {
    throw new InspectError('SCHEMA_UNAVAILABLE', `No shader reflection references ${label}`);
  }
  if (!cache) return buildLayout(refl.type, label);
  return cache.getOrBuild(makeSchemaCacheKey(refl), () => buildLayout(refl.type, label));
}

export interface TrackBufferRequest {
  bufferName: string;
  /** Record indices to follow; defaults to `[0]`. */
  trackedIndices?: number[];
  /** Track raw record bytes at `fallbackStride` when no layout is available. */
  allowByteFallback?: boolean;
  fallbackStride?: number;
}

export interface TrackedElement {
  bufferIndex: number;
  initialPointId: number;
  /** Nested record value, or lowercase hex of the record bytes in byte mode. */
  initialState: JsonValue;
  changes: { pointId: number; delta: JsonValue }[];
}

export interface BufferChanges {
  bufferName: string;
  mode: 'structured' | 'bytes';
  schema: SchemaDescription | null;
  stride: number;
  trackedIndices: number[];
  totalChanges: number;
  elements: TrackedElement[];
}

/**
 * Follows records of one buffer across every observation point and reports the initial
 * value of each plus the deltas where it changed.
 */
export function trackBufferChanges(
  collaborator: ReplayCollaborator,
  request: TrackBufferRequest,
  deps: ReplayDeps,
): BufferChanges {
  const logger = deps.logger ?? silentLogger;
  const resource = resolveResource(collaborator.listResources(), request.bufferName, 'buffer');
  const bufferName = collaborator.resourceName(resource.id) ?? resource.name;
  const trackedIndices = request.trackedIndices ?? [0];

  const points = collaborator.observationPoints();
  if (points.length === 0) {
    throw new InspectError('NO_OBSERVATION_POINTS', 'Capture has no observation points');
  }

  const readBytes: ByteSource = (offset, length, pointId) =>
    collaborator.readBuffer(resource.id, offset, length, pointId);

  let layout: SchemaLayout;
  try {
    layout = loadBufferLayout(collaborator, resource.id, deps.cache);
  } catch (e) {
    const stride = request.fallbackStride ?? 0;
    if (!request.allowByteFallback || stride <= 0 || !isInspectError(e, 'SCHEMA_UNAVAILABLE')) throw e;

    logger.warn({ buffer: bufferName, stride, err: formatError(e) }, 'no record layout; tracking raw bytes');
    const result = trackTimeline(
      trackedIndices,
      points,
      rawRecordReader(readBytes, stride),
      rawBytesCodec({ maxRegions: deps.config.MAX_BYTE_REGIONS, maxDisplayBytes: deps.config.BYTE_REGION_DISPLAY_BYTES }),
      { logger },
    );
    logger.info({ buffer: bufferName, mode: 'bytes', totalChanges: result.totalChanges }, 'buffer tracked');
    return {
      bufferName,
      mode: 'bytes',
      schema: null,
      stride,
      trackedIndices,
      totalChanges: result.totalChanges,
      elements: result.logs.map((log) => ({
        bufferIndex: log.instance,
        initialPointId: log.initialPointId,
        initialState: toHex(log.initialState),
        changes: log.changes.map((c) => ({ pointId: c.pointId, delta: c.delta })),
      })),
    };
  }

  const result = trackTimeline(
    trackedIndices,
    points,
    structuredReader(readBytes, layout.fields, layout.stride),
    nestedCodec,
    { logger },
  );
  logger.info({ buffer: bufferName, mode: 'structured', totalChanges: result.totalChanges }, 'buffer tracked');
  return {
    bufferName,
    mode: 'structured',
    schema: describeSchema(layout.schema),
    stride: layout.stride,
    trackedIndices,
    totalChanges: result.totalChanges,
    elements: result.logs.map((log) => ({
      bufferIndex: log.instance,
      initialPointId: log.initialPointId,
      initialState: nestedToJson(log.initialState),
      changes: log.changes.map((c) => ({ pointId: c.pointId, delta: deltaToJson(c.delta) })),
    })),
  };
}
