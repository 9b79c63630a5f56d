import { parseInventory, DEFAULT_SOURCE } from '../parsers/inventory';
import { parseUpgrades } from '../parsers/upgrades';
import { PackageManagerBackend, ParseOptions } from '../types';
import { validatePackageId } from '../utils/validators';

export interface WingetOptions {
  command?: string;
  source?: string;
  headerTokens?: string[];
  bannerTokens?: string[];
}

const READ_FLAGS = ['--disable-interactivity', '--accept-source-agreements'];
const WRITE_FLAGS = [
  '--silent',
  '--accept-package-agreements',
  '--accept-source-agreements',
  '--disable-interactivity',
];

export function createWingetBackend(options: WingetOptions = {}): PackageManagerBackend {
  const command = options.command ?? 'winget';
  const parseOptions: ParseOptions = {
    source: options.source ?? DEFAULT_SOURCE,
    headerTokens: options.headerTokens,
    bannerTokens: options.bannerTokens,
  };

  return {
    id: 'winget',
    label: 'Windows Package Manager',

    listCommand() {
      return [command, 'list', ...READ_FLAGS];
    },

    upgradableCommand() {
      return [command, 'upgrade', ...READ_FLAGS];
    },

    upgradeCommand(packageId: string) {
      const safeId = validatePackageId(packageId);
      return [command, 'upgrade', '--id', safeId, '--exact', ...WRITE_FLAGS];
    },

    upgradeAllCommand() {
      return [command, 'upgrade', '--all', ...WRITE_FLAGS];
    },

    parseInventory(stdout: string) {
      return parseInventory(stdout, parseOptions);
    },

    parseUpgrades(stdout: string) {
      return parseUpgrades(stdout, parseOptions);
    },
  };
}

const wingetBackend = createWingetBackend();

export default wingetBackend;
