import { countUpdates, toView } from '../record';
import { PackageRecord } from '../types';

export function report(records: readonly PackageRecord[]): string {
  return JSON.stringify(
    { total: records.length, updateCount: countUpdates(records), records: records.map(toView) },
    null,
    2,
  );
}
