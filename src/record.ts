import { PackageRecord, UpdateStatus } from './types';

export function createRecord(
  name: string,
  id: string,
  installedVersion: string,
  source: string,
): PackageRecord {
  return { name, id, installedVersion, source };
}

export function hasUpdate(record: PackageRecord): boolean {
  return record.availableVersion !== undefined && record.availableVersion !== record.installedVersion;
}

/**
 * Tri-state view of a record. Derived from the same two fields as
 * {@link hasUpdate} so the two always agree.
 */
export function updateStatus(record: PackageRecord): UpdateStatus {
  if (record.availableVersion === undefined) return 'unknown';
  return hasUpdate(record) ? 'updatable' : 'up-to-date';
}

export function countUpdates(records: readonly PackageRecord[]): number {
  return records.filter(hasUpdate).length;
}

export interface RecordView {
  name: string;
  id: string;
  installedVersion: string;
  availableVersion: string | null;
  source: string;
  hasUpdate: boolean;
  status: UpdateStatus;
}

export function toView(record: PackageRecord): RecordView {
  return {
    name: record.name,
    id: record.id,
    installedVersion: record.installedVersion,
    availableVersion: record.availableVersion ?? null,
    source: record.source,
    hasUpdate: hasUpdate(record),
    status: updateStatus(record),
  };
}
