import { decodeInstance } from '../decode/decoder.js';
import { diffBytes, type ByteRegion, type DiffBytesOptions } from '../diff/bytes.js';
import { diffNested, type Delta } from '../diff/nested.js';
import { InspectError } from '../errors.js';
import type { FieldPath } from '../layout/fieldPath.js';
import { silentLogger, type LoggerLike } from '../logger.js';
import { rebuildNested } from '../nested/rebuild.js';
import type { NestedValue } from '../nested/value.js';
import { err, ok, safeResult, type Result } from '../result.js';

/** How values of one kind are compared. `diff` returns `null` for "no change". */
export interface TimelineCodec<TValue, TDelta> {
  diff(prev: TValue, next: TValue): TDelta | null;
}

export const nestedCodec: TimelineCodec<NestedValue, Delta> = { diff: diffNested };

export function rawBytesCodec(opts: DiffBytesOptions = {}): TimelineCodec<Uint8Array, ByteRegion[]> {
  return {
    diff(prev, next) {
      const regions = diffBytes(prev, next, opts);
      return regions.length > 0 ? regions : null;
    },
  };
}

export interface TimelineChange<TDelta> {
  pointId: number;
  delta: TDelta;
}

export interface InstanceLog<TInstance, TValue, TDelta> {
  instance: TInstance;
  initialPointId: number;
  initialState: TValue;
  changes: TimelineChange<TDelta>[];
}

type InstanceState<TInstance, TValue, TDelta> = {
  log: InstanceLog<TInstance, TValue, TDelta>;
  lastValue: TValue;
  lastPointId: number;
};

export type InstanceKey<TInstance> = (instance: TInstance) => string;

/**
 * Per-instance change log. An instance is Unseen until its first observation, which becomes
 * the initial snapshot; after that each observation is diffed against the previous one and
 * only real changes are appended. Only the last value per instance is retained.
 */
export class TimelineTracker<TInstance, TValue, TDelta> {
  private readonly states = new Map<string, InstanceState<TInstance, TValue, TDelta>>();
  private readonly codec: TimelineCodec<TValue, TDelta>;
  private readonly keyOf: InstanceKey<TInstance>;
  private total = 0;

  constructor(codec: TimelineCodec<TValue, TDelta>, keyOf: InstanceKey<TInstance> = String) {
    this.codec = codec;
    this.keyOf = keyOf;
  }

  /**
   * Feeds one observation. Returns the recorded delta, or `null` for an initial snapshot or
   * an unchanged value. Point ids must strictly increase per instance: a delta only means
   * something relative to the immediately preceding observation.
   */
  observe(pointId: number, instance: TInstance, value: TValue): TDelta | null {
    const key = this.keyOf(instance);
    const state = this.states.get(key);
    if (!state) {
      this.states.set(key, {
        log: { instance, initialPointId: pointId, initialState: value, changes: [] },
        lastValue: value,
        lastPointId: pointId,
      });
      return null;
    }

    if (pointId <= state.lastPointId) {
      throw new InspectError(
        'OUT_OF_ORDER',
        `Observation point ${pointId} does not follow ${state.lastPointId} for instance ${key}`,
      );
    }

    const delta = this.codec.diff(state.lastValue, value);
    state.lastValue = value;
    state.lastPointId = pointId;
    if (delta === null) return null;

    state.log.changes.push({ pointId, delta });
    this.total++;
    return delta;
  }

  get totalChanges(): number {
    return this.total;
  }

  /** The log of `instance`, or `undefined` while it is still unseen. */
  logFor(instance: TInstance): InstanceLog<TInstance, TValue, TDelta> | undefined {
    return this.states.get(this.keyOf(instance))?.log;
  }

  /** Logs in first-observation order. */
  logs(): InstanceLog<TInstance, TValue, TDelta>[] {
    return Array.from(this.states.values(), (s) => s.log);
  }
}

export interface TimelineReader<TInstance, TValue> {
  /** Positions the source at `pointId`; called once per point before any read. */
  seek?(pointId: number): void;
  read(instance: TInstance, pointId: number): Result<TValue>;
}

export interface TrackTimelineOptions<TInstance> {
  logger?: LoggerLike;
  keyOf?: InstanceKey<TInstance>;
}

export interface TimelineResult<TInstance, TValue, TDelta> {
  logs: InstanceLog<TInstance, TValue, TDelta>[];
  totalChanges: number;
}

/**
 * One pass over `points`, reading every instance at each point.
 *
 * A failed read means "not observed here": the pair is skipped and the scan continues.
 * Logs come back in `instances` order (first listing wins); instances never observed are
 * left out.
 */
export function trackTimeline<TInstance, TValue, TDelta>(
  instances: readonly TInstance[],
  points: readonly number[],
  reader: TimelineReader<TInstance, TValue>,
  codec: TimelineCodec<TValue, TDelta>,
  options: TrackTimelineOptions<TInstance> = {},
): TimelineResult<TInstance, TValue, TDelta> {
  const logger = options.logger ?? silentLogger;
  const keyOf: InstanceKey<TInstance> = options.keyOf ?? String;
  const tracker = new TimelineTracker<TInstance, TValue, TDelta>(codec, keyOf);

  // An instance listed twice is still read once per point.
  const unique = new Map<string, TInstance>();
  for (const instance of instances) {
    const key = keyOf(instance);
    if (!unique.has(key)) unique.set(key, instance);
  }

  let skipped = 0;
  for (const pointId of points) {
    reader.seek?.(pointId);
    for (const [key, instance] of unique) {
      const res = reader.read(instance, pointId);
      if (!res.ok) {
        skipped++;
        logger.debug({ pointId, instance: key, code: res.code, reason: res.message }, 'read skipped');
        continue;
      }
      tracker.observe(pointId, instance, res.value);
    }
  }

  const logs: InstanceLog<TInstance, TValue, TDelta>[] = [];
  for (const instance of unique.values()) {
    const log = tracker.logFor(instance);
    if (log !== undefined) logs.push(log);
  }

  logger.debug(
    { instances: unique.size, points: points.length, skipped, totalChanges: tracker.totalChanges },
    'timeline scanned',
  );
  return { logs, totalChanges: tracker.totalChanges };
}

/** Reads `length` bytes at `offset` as of `pointId`; may throw or return fewer bytes. */
export type ByteSource = (offset: number, length: number, pointId: number) => Uint8Array;

/**
 * Timeline reader over record indices of a structured buffer. Each read fetches one
 * record's bytes, decodes them and rebuilds the nested value.
 */
export function structuredReader(
  readBytes: ByteSource,
  fields: readonly FieldPath[],
  stride: number,
): TimelineReader<number, NestedValue> {
  return {
    read(index, pointId) {
      const bytes = safeResult(() => readBytes(index * stride, stride, pointId));
      if (!bytes.ok) return bytes;
      const values = decodeInstance(bytes.value, fields, stride, 0);
      if (!values.ok) return values;
      return ok(rebuildNested(fields, values.value));
    },
  };
}

/** Timeline reader over raw record bytes, for buffers without a usable layout. */
export function rawRecordReader(readBytes: ByteSource, stride: number): TimelineReader<number, Uint8Array> {
  return {
    read(index, pointId) {
      const bytes = safeResult(() => readBytes(index * stride, stride, pointId));
      if (!bytes.ok) return bytes;
      if (bytes.value.byteLength < stride) {
        return err('INSUFFICIENT_DATA', `record ${index} is ${bytes.value.byteLength} of ${stride} bytes`);
      }
      // Copied: the source may hand out a view into memory it reuses.
      return ok(bytes.value.slice(0, stride));
    },
  };
}
