import { ParseOptions, UpgradeMap } from '../types';
import { extractDataLines, tokenize } from './table';
import { looksLikeVersion } from './version';

// winget prints "N upgrades available." inside the table region.
export const DEFAULT_BANNER_TOKENS = ['アップグレード', 'upgrade'];

function isBanner(line: string, bannerTokens: string[]): boolean {
  const lower = line.toLowerCase();
  return bannerTokens.some((token) => lower.includes(token.toLowerCase()));
}

interface UpgradeEntry {
  id: string;
  availableVersion: string;
}

// Example: Git    Git.Git    2.40.0    2.42.0    winget
export function parseUpgradeLine(line: string): UpgradeEntry | null {
  const tokens = tokenize(line);
  if (tokens.length < 3) return null;

  const versions: number[] = [];
  tokens.forEach((token, index) => {
    if (looksLikeVersion(token)) versions.push(index);
  });
  if (versions.length < 2) return null;

  const idIndex = versions[0] - 1;
  if (idIndex < 0) return null;

  return { id: tokens[idIndex], availableVersion: tokens[versions[1]] };
}

export function parseUpgrades(stdout: string, options: ParseOptions = {}): UpgradeMap {
  const bannerTokens = options.bannerTokens ?? DEFAULT_BANNER_TOKENS;
  const upgrades: UpgradeMap = new Map();

  for (const line of extractDataLines(stdout, options)) {
    if (isBanner(line, bannerTokens)) continue;
    const entry = parseUpgradeLine(line);
    if (entry) {
      upgrades.set(entry.id, entry.availableVersion);
    }
  }
  return upgrades;
}
