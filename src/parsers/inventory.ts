import { createRecord } from '../record';
import { PackageRecord, ParseOptions } from '../types';
import { extractDataLines, tokenize } from './table';
import { looksLikeVersion } from './version';

export const DEFAULT_SOURCE = 'winget';

// Example: Microsoft Edge    Microsoft.Edge    118.0.2088.76    winget
export function parseInventoryLine(line: string, source: string = DEFAULT_SOURCE): PackageRecord | null {
  const tokens = tokenize(line);
  if (tokens.length < 2) return null;

  const versionIndex = tokens.findIndex(looksLikeVersion);
  if (versionIndex === -1) return null;

  const nameTokens = tokens.slice(0, Math.max(versionIndex - 1, 0));
  if (nameTokens.length === 0) return null;

  const id = tokens[versionIndex - 1];

  return createRecord(nameTokens.join(' '), id, tokens[versionIndex], source);
}

export function parseInventory(stdout: string, options: ParseOptions = {}): PackageRecord[] {
  const records: PackageRecord[] = [];
  for (const line of extractDataLines(stdout, options)) {
    const record = parseInventoryLine(line, options.source);
    if (record) records.push(record);
  }
  return records;
}
