import { hasUpdate } from './record';
import { PackageRecord } from './types';

export type StatusFilter = 'all' | 'updates' | 'uptodate';

export const STATUS_FILTERS: readonly StatusFilter[] = ['all', 'updates', 'uptodate'];

export interface RecordFilter {
  search?: string;
  status?: StatusFilter;
}

/** Case-insensitive search over name and id, combined with a status filter. */
export function filterRecords(records: readonly PackageRecord[], filter: RecordFilter = {}): PackageRecord[] {
  const search = filter.search?.trim().toLowerCase() ?? '';
  const status = filter.status ?? 'all';

  return records.filter((record) => {
    if (search && !record.name.toLowerCase().includes(search) && !record.id.toLowerCase().includes(search)) {
      return false;
    }
    if (status === 'updates') return hasUpdate(record);
    if (status === 'uptodate') return !hasUpdate(record);
    return true;
  });
}

export interface Selection {
  targets: string[];
  skipped: string[];
}

/**
 * Splits requested ids into those that currently have an update and those
 * that do not (or are not in the inventory at all).
 */
export function selectUpdatable(records: readonly PackageRecord[], ids: readonly string[]): Selection {
  const updatable = new Set(records.filter(hasUpdate).map((r) => r.id));
  const targets: string[] = [];
  const skipped: string[] = [];
  for (const id of new Set(ids)) {
    if (updatable.has(id)) targets.push(id);
    else skipped.push(id);
  }
  return { targets, skipped };
}
