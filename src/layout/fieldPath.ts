import type { ScalarType } from '../schema/scalar.js';

export type PathStep = { readonly kind: 'key'; readonly key: string } | { readonly kind: 'index'; readonly index: number };

/** One decodable leaf scalar of a record. */
export interface FieldPath {
  /** Display label, e.g. `lights[2].color[0]`. */
  readonly name: string;
  readonly steps: readonly PathStep[];
  /** Absolute byte offset within one record instance. */
  readonly offset: number;
  readonly scalar: ScalarType;
}

export function keyStep(key: string): PathStep {
  return { kind: 'key', key };
}

export function indexStep(index: number): PathStep {
  return { kind: 'index', index };
}

export function formatFieldPath(steps: readonly PathStep[]): string {
  let out = '';
  for (const step of steps) {
    if (step.kind === 'index') {
      out += `[${step.index}]`;
    } else {
      out += out.length === 0 ? step.key : `.${step.key}`;
    }
  }
  return out;
}

const PATH_TOKEN_RE = /([A-Za-z_]\w*)|\[(\d+)\]/g;

/**
 * Parses a dotted/bracketed label back into steps. `a.b[2].c` gives
 * key(a), key(b), index(2), key(c); dotted and bracket access interleave freely.
 *
 * Only needed for mappings keyed by label; flattening builds steps directly.
 */
export function parseFieldPath(name: string): PathStep[] {
  const steps: PathStep[] = [];
  for (const part of name.split('.')) {
    for (const match of part.matchAll(PATH_TOKEN_RE)) {
      const [, key, index] = match;
      if (key !== undefined) {
        steps.push(keyStep(key));
      } else if (index !== undefined) {
        steps.push(indexStep(Number(index)));
      }
    }
  }
  return steps;
}
