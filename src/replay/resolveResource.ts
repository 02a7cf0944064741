import { InspectError } from '../errors.js';
import { formatOneLineUtf8 } from '../util/text.js';
import type { ResourceInfo, ResourceKind } from './collaborator.js';

const MAX_LISTED_CANDIDATES = 10;
const MAX_NAME_BYTES = 128;

function listNames(resources: readonly ResourceInfo[]): string {
  const shown = resources.slice(0, MAX_LISTED_CANDIDATES).map((r) => formatOneLineUtf8(r.name, MAX_NAME_BYTES));
  const more = resources.length - shown.length;
  return more > 0 ? `${shown.join(', ')} (+${more} more)` : shown.join(', ');
}

/**
 * Finds a resource by id or name.
 *
 * Best-effort, in order: exact id, exact name, then case-insensitive substring of the name.
 * The first stage with exactly one hit wins; several hits in a stage is ambiguous.
 */
export function resolveResource(resources: readonly ResourceInfo[], query: string, kind?: ResourceKind): ResourceInfo {
  const pool = kind === undefined ? resources : resources.filter((r) => r.kind === kind);
  const needle = query.toLowerCase();
  const stages: ((r: ResourceInfo) => boolean)[] = [
    (r) => r.id === query,
    (r) => r.name === query,
    (r) => needle.length > 0 && r.name.toLowerCase().includes(needle),
  ];

  for (const matches of stages) {
    const hits = pool.filter(matches);
    const [only] = hits;
    if (hits.length === 1 && only) return only;
    if (hits.length > 1) {
      throw new InspectError(
        'RESOURCE_AMBIGUOUS',
        `${hits.length} ${kind ?? 'resource'}s match "${formatOneLineUtf8(query, MAX_NAME_BYTES)}": ${listNames(hits)}`,
      );
    }
  }

  const hint = pool.length > 0 ? `; available: ${listNames(pool)}` : '';
  throw new InspectError(
    'RESOURCE_NOT_FOUND',
    `No ${kind ?? 'resource'} matches "${formatOneLineUtf8(query, MAX_NAME_BYTES)}"${hint}`,
  );
}
