import { stringify } from 'csv-stringify/sync';
import { updateStatus } from '../record';
import { PackageRecord } from '../types';

const COLUMNS = ['name', 'id', 'installed', 'available', 'source', 'status'];

export function report(records: readonly PackageRecord[]): string {
  const rows = records.map((record) => ({
    name: record.name,
    id: record.id,
    installed: record.installedVersion,
    available: record.availableVersion ?? '',
    source: record.source,
    status: updateStatus(record),
  }));
  return stringify(rows, { header: true, columns: COLUMNS });
}
