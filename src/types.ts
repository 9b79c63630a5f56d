export interface PackageRecord {
  name: string;
  id: string;
  installedVersion: string;
  availableVersion?: string; // absent until a check has seen this record
  source: string;
}

export type UpdateStatus = 'unknown' | 'up-to-date' | 'updatable';

/** Identifier (or display name) -> available version. */
export type UpgradeMap = Map<string, string>;

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (argv: string[]) => Promise<RunResult>;

export interface ParseOptions {
  headerTokens?: string[];
  bannerTokens?: string[];
  source?: string;
}

export interface PackageManagerBackend {
  id: string;
  label: string;
  listCommand(): string[];
  upgradableCommand(): string[];
  upgradeCommand(packageId: string): string[];
  upgradeAllCommand(): string[];
  parseInventory(stdout: string): PackageRecord[];
  parseUpgrades(stdout: string): UpgradeMap;
}

export interface UpdateResult {
  id: string;
  success: boolean;
  errorText?: string;
}
