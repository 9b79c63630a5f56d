export type {
  CommandRunner,
  PackageManagerBackend,
  PackageRecord,
  ParseOptions,
  RunResult,
  UpdateResult,
  UpdateStatus,
  UpgradeMap,
} from './types';
export { createRecord, countUpdates, hasUpdate, toView, updateStatus } from './record';
export type { RecordView } from './record';
export { extractDataLines, tokenize, DEFAULT_HEADER_TOKENS } from './parsers/table';
export { looksLikeVersion } from './parsers/version';
export { parseInventory, parseInventoryLine } from './parsers/inventory';
export { parseUpgrades, parseUpgradeLine, DEFAULT_BANNER_TOKENS } from './parsers/upgrades';
export { reconcile } from './reconcile';
export { InventoryCoordinator } from './coordinator';
export type {
  CheckOutcome,
  CoordinatorOptions,
  InventorySnapshot,
  Phase,
  RefreshOutcome,
  ScanOutcome,
  UpdateOutcome,
  UpdateReport,
} from './coordinator';
export { fanOut, nullSink } from './events';
export type { EventSink, InventoryEvent } from './events';
export { AuditLog, describeEvent, latestLogFile, readAuditLog } from './audit-log';
export type { AuditEntry } from './audit-log';
export { createProcessRunner } from './runner';
export { createWingetBackend } from './package-managers/winget';
export { filterRecords, selectUpdatable } from './filter';
export { isValidPackageId, validatePackageId } from './utils/validators';
export { CommandTimeoutError, InvalidPackageIdError, ToolUnavailableError } from './errors';
export { loadConfig, mergeConfig, defaultConfig } from './config';
export type { UpdateCheckerConfig } from './config';
