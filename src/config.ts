import * as os from 'os';
import * as path from 'path';
import { cosmiconfigSync } from 'cosmiconfig';
import { DEFAULT_HEADER_TOKENS } from './parsers/table';
import { DEFAULT_BANNER_TOKENS } from './parsers/upgrades';

export interface UpdateCheckerConfig {
  command: string;
  source: string;
  logDir: string;
  timeoutMs?: number;
  headerTokens: string[];
  upgradeBannerTokens: string[];
}

export const defaultConfig: UpdateCheckerConfig = {
  command: 'winget',
  source: 'winget',
  logDir: path.join(os.homedir(), '.update-checker', 'logs'),
  headerTokens: DEFAULT_HEADER_TOKENS,
  upgradeBannerTokens: DEFAULT_BANNER_TOKENS,
};

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string') && value.length > 0;
}

/** Overlays the recognised keys of a loaded config object on the defaults. */
export function mergeConfig(raw: unknown, baseDir: string = process.cwd()): UpdateCheckerConfig {
  const config: UpdateCheckerConfig = { ...defaultConfig };
  if (typeof raw !== 'object' || raw === null) return config;
  const values = new Map<string, unknown>(Object.entries(raw));

  const command = values.get('command');
  if (typeof command === 'string' && command) config.command = command;
  const source = values.get('source');
  if (typeof source === 'string' && source) config.source = source;
  const logDir = values.get('logDir');
  if (typeof logDir === 'string' && logDir) config.logDir = path.resolve(baseDir, logDir);
  const timeoutMs = values.get('timeoutMs');
  if (typeof timeoutMs === 'number' && timeoutMs > 0) config.timeoutMs = timeoutMs;
  const headerTokens = values.get('headerTokens');
  if (isStringList(headerTokens)) config.headerTokens = headerTokens;
  const bannerTokens = values.get('upgradeBannerTokens');
  if (isStringList(bannerTokens)) config.upgradeBannerTokens = bannerTokens;

  return config;
}

export function loadConfig(searchFrom: string = process.cwd()): UpdateCheckerConfig {
  const explorer = cosmiconfigSync('updatechecker');
  try {
    const result = explorer.search(searchFrom);
    if (result && result.config) {
      return mergeConfig(result.config, path.dirname(result.filepath));
    }
  } catch (error) {
    console.warn('Warning: Failed to load configuration file:', error);
  }
  return defaultConfig;
}
