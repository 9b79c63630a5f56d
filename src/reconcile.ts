import { PackageRecord, UpgradeMap } from './types';

/**
 * Merges upgrade data into the inventory in place and returns how many
 * records matched.
 *
 * The listing is keyed by id for most sources and by display name for some,
 * so a record is looked up by id first, then by name. A record that matches
 * nothing and has never been checked is marked up to date; one that already
 * carries an available version keeps it. Only a rescan clears that state.
 */
export function reconcile(records: PackageRecord[], upgrades: UpgradeMap): number {
  let matched = 0;
  for (const record of records) {
    const available = upgrades.get(record.id) ?? upgrades.get(record.name);
    if (available !== undefined) {
      record.availableVersion = available;
      matched++;
    } else if (record.availableVersion === undefined) {
      record.availableVersion = record.installedVersion;
    }
  }
  return matched;
}
