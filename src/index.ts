export { loadConfig, type Config, type LogLevel } from './config.js';
export { InspectError, isInspectError, type InspectErrorCode } from './errors.js';
export { createLogger, formatError, silentLogger, type LoggerLike } from './logger.js';
export { err, ok, safeResult, type ErrorCode, type Result } from './result.js';

export { SCALAR_KINDS, SCALAR_TYPES, scalarTypeFor, type ScalarKind, type ScalarType, type ScalarValue } from './schema/scalar.js';
export {
  buildSchema,
  compositeNode,
  describeSchema,
  member,
  resolveRecordRoot,
  scalarNode,
  tightSize,
  type CompositeNode,
  type Member,
  type ReflectedMember,
  type ReflectedType,
  type ScalarNode,
  type SchemaDescription,
  type TypeNode,
} from './schema/typeNode.js';
export { SchemaCache, makeSchemaCacheKey, type SchemaCacheKey, type SchemaLayout } from './schema/cache.js';

export { formatFieldPath, parseFieldPath, type FieldPath, type PathStep } from './layout/fieldPath.js';
export { flatten, type FlatLayout } from './layout/flatten.js';

export { decodeInstance, decodedCount, type DecodedValues } from './decode/decoder.js';
export { float16FromBits } from './decode/float16.js';

export {
  nestedAt,
  nestedEquals,
  nestedToJson,
  type JsonValue,
  type NestedArray,
  type NestedObject,
  type NestedScalar,
  type NestedValue,
} from './nested/value.js';
export { rebuildFromNamed, rebuildNested } from './nested/rebuild.js';

export { deltaToJson, diffNested, type Delta } from './diff/nested.js';
export { diffRecords, type RecordDelta } from './diff/records.js';
export {
  diffBytes,
  diffWords,
  summarizeByteDelta,
  type ByteDeltaSummary,
  type ByteRegion,
  type WordDelta,
} from './diff/bytes.js';

export {
  TimelineTracker,
  nestedCodec,
  rawBytesCodec,
  rawRecordReader,
  structuredReader,
  trackTimeline,
  type InstanceLog,
  type TimelineCodec,
  type TimelineReader,
  type TimelineResult,
} from './timeline/tracker.js';

export {
  bytesPerTexel,
  locateTexel,
  texelSchema,
  type TexelCoord,
  type TexelFormat,
  type TextureDesc,
} from './texel/format.js';

export type { ReflectedResource, ReplayCollaborator, ResourceInfo, ResourceKind } from './replay/collaborator.js';
export { resolveResource } from './replay/resolveResource.js';
export { loadBufferLayout, trackBufferChanges, type BufferChanges, type TrackBufferRequest } from './replay/trackBuffer.js';
export { trackTextureChanges, type TextureChanges, type TrackTextureRequest } from './replay/trackTexture.js';
export {
  describeWriteDelta,
  readWriteDelta,
  trackResourceWrites,
  writeDeltaCodec,
  type ResourceUse,
  type ResourceWrites,
  type WriteCheck,
  type WriteDelta,
} from './replay/writeDelta.js';
