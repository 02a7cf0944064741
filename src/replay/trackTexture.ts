import { decodeInstance } from '../decode/decoder.js';
import { deltaToJson } from '../diff/nested.js';
import { InspectError } from '../errors.js';
import { flatten } from '../layout/flatten.js';
import { silentLogger } from '../logger.js';
import { rebuildNested } from '../nested/rebuild.js';
import { nestedToJson, type JsonValue, type NestedValue } from '../nested/value.js';
import { err, ok, safeResult, type Result } from '../result.js';
import {
  locateTexel,
  normalizeTexelCoord,
  texelKey,
  texelSchema,
  type NormalizedTexelCoord,
  type TexelCoord,
  type TexelFormat,
} from '../texel/format.js';
import { nestedCodec, trackTimeline, type TimelineReader } from '../timeline/tracker.js';
import { formatOneLineUtf8 } from '../util/text.js';
import type { ReplayCollaborator, ReplayDeps } from './collaborator.js';
import { resolveResource } from './resolveResource.js';

export interface TrackTextureRequest {
  textureName: string;
  /** Defaults to the single texel `{ x: 0, y: 0 }`. */
  trackedTexels?: TexelCoord[];
}

export interface TrackedTexel {
  coord: NormalizedTexelCoord;
  initialPointId: number;
  initialState: JsonValue;
  changes: { pointId: number; delta: JsonValue }[];
}

export interface TextureChanges {
  textureName: string;
  format: TexelFormat;
  trackedTexels: NormalizedTexelCoord[];
  totalChanges: number;
  texels: TrackedTexel[];
}

/**
 * Follows texels of one texture across every observation point. Each texel decodes to a
 * `{ r, g, b, a }` record (as many channels as the format has).
 */
export function trackTextureChanges(
  collaborator: ReplayCollaborator,
  request: TrackTextureRequest,
  deps: Pick<ReplayDeps, 'logger'> = {},
): TextureChanges {
  const logger = deps.logger ?? silentLogger;
  const resource = resolveResource(collaborator.listResources(), request.textureName, 'texture');
  const textureName = collaborator.resourceName(resource.id) ?? resource.name;
  const desc = resource.texture;
  if (!desc) {
    throw new InspectError('UNSUPPORTED_FORMAT', `No texture description for ${formatOneLineUtf8(textureName, 128)}`);
  }

  // Validates the format before any reads: compressed formats throw here.
  const { fields, stride } = flatten(texelSchema(desc.format));
  const readTexture = collaborator.readTexture?.bind(collaborator);
  if (!readTexture) {
    throw new InspectError('UNSUPPORTED_FORMAT', 'Replay cannot read texture data');
  }

  const points = collaborator.observationPoints();
  if (points.length === 0) {
    throw new InspectError('NO_OBSERVATION_POINTS', 'Capture has no observation points');
  }

  const texels = (request.trackedTexels ?? [{ x: 0, y: 0 }]).map(normalizeTexelCoord);

  // Texels sharing a subresource share one read per point.
  let subresources = new Map<number, Result<Uint8Array>>();
  const reader: TimelineReader<NormalizedTexelCoord, NestedValue> = {
    seek() {
      subresources = new Map();
    },
    read(coord, pointId) {
      const loc = locateTexel(desc, coord);
      let data = subresources.get(loc.subresource);
      if (!data) {
        data = safeResult(() => readTexture(resource.id, loc.subresource, pointId).slice());
        subresources.set(loc.subresource, data);
      }
      if (!data.ok) return data;

      const texel = data.value.subarray(loc.offset, loc.offset + stride);
      if (texel.byteLength < stride) {
        return err('INSUFFICIENT_DATA', `texel ${texelKey(coord)} lies past the end of subresource ${loc.subresource}`);
      }
      const values = decodeInstance(texel, fields, stride, 0);
      return values.ok ? ok(rebuildNested(fields, values.value)) : values;
    },
  };

  const result = trackTimeline(texels, points, reader, nestedCodec, { logger, keyOf: texelKey });
  logger.info({ texture: textureName, texels: texels.length, totalChanges: result.totalChanges }, 'texture tracked');

  return {
    textureName,
    format: { ...desc.format },
    trackedTexels: texels,
    totalChanges: result.totalChanges,
    texels: result.logs.map((log) => ({
      coord: log.instance,
      initialPointId: log.initialPointId,
      initialState: nestedToJson(log.initialState),
      changes: log.changes.map((c) => ({ pointId: c.pointId, delta: deltaToJson(c.delta) })),
    })),
  };
}
