import type { FieldPath } from '../layout/fieldPath.js';
import type { TypeNode } from './typeNode.js';

export interface SchemaCacheKey {
  shaderId: string;
  /** `null` when reflection did not report a binding slot. */
  binding: number | null;
}

export function makeSchemaCacheKey(key: SchemaCacheKey): string {
  return `${key.shaderId}|${key.binding ?? '?'}`;
}

export interface SchemaLayout {
  readonly schema: TypeNode;
  readonly fields: readonly FieldPath[];
  readonly stride: number;
}

/**
 * Built layouts keyed by shader and binding, so reflection is walked once per distinct
 * pairing. Layouts are immutable and never expire; the bound is on entry count only.
 */
export class SchemaCache {
  private readonly entries = new Map<string, SchemaLayout>();
  private readonly maxEntries: number;

  constructor(maxEntries: number) {
    this.maxEntries = maxEntries;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): SchemaLayout | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    // Refresh recency by reinserting.
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  set(key: string, layout: SchemaLayout): void {
    if (this.maxEntries <= 0) return;

    this.entries.delete(key);
    this.entries.set(key, layout);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  getOrBuild(key: string, build: () => SchemaLayout): SchemaLayout {
    const hit = this.get(key);
    if (hit) return hit;
    const layout = build();
    this.set(key, layout);
    return layout;
  }
}
