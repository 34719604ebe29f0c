import { UniquenessStatus } from '../common/Types';
import type { IMembershipFilter } from '../interfaces/Sketch';

export type UniquenessReport = Map<string, UniquenessStatus>;

/**
 * Classify each candidate in order against the filter.
 *
 * Unique candidates are added immediately, so a later repeat inside the
 * same batch comes back as already used. The report is keyed by the
 * candidate's own string form (`'null'` for an absent value): when two
 * candidates share a key the later status overwrites the earlier one,
 * keeping the key's first position.
 */
export function checkUniqueness(
  filter: IMembershipFilter,
  candidates: Iterable<unknown>
): UniquenessReport {
  const results: UniquenessReport = new Map();

  for (const candidate of candidates) {
    const item = filter.normalize(candidate);
    const key = String(candidate);

    if (item.trim() === '') {
      results.set(key, UniquenessStatus.INVALID);
      continue;
    }

    if (filter.contains(item)) {
      results.set(key, UniquenessStatus.ALREADY_USED);
    } else {
      filter.add(item);
      results.set(key, UniquenessStatus.UNIQUE);
    }
  }

  return results;
}

export function formatPasswordReport(results: UniquenessReport): string[] {
  const lines: string[] = [];
  for (const [password, status] of results) {
    lines.push(`Password '${password}' — ${status}.`);
  }
  return lines;
}
